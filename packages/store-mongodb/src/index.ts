export { MongoDocumentStore, indexName, toStoredDocument } from './MongoDocumentStore.js';
export { encodeId, idFilter, toSnapshot, fromSnapshot, toSnapshotValue, fromSnapshotValue } from './snapshots.js';
export { connectionCollections } from './DocumentCollection.js';
export type { DocumentCollection, CollectionProvider, MongoRecord, IndexDirection } from './DocumentCollection.js';
export { isDuplicateKeyError, isIndexConflict, isUnavailableError } from './mongoErrors.js';
export { loadMongoSettings } from './settings.js';
export type { MongoSettings } from './settings.js';
