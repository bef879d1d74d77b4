export { SequelizeMetadataStore } from './SequelizeMetadataStore.js';
export type { SequelizeMetadataStoreOptions } from './SequelizeMetadataStore.js';
export { loadSequelizeSettings, DEFAULT_TABLE_PREFIX } from './settings.js';
export type { SequelizeSettings } from './settings.js';
