export { OpenAISchemaNormalizer } from './OpenAISchemaNormalizer.js';
export type { OpenAISchemaNormalizerOptions } from './OpenAISchemaNormalizer.js';
export { openAIChatClient } from './ChatClient.js';
export type { ChatClient, ChatRequest } from './ChatClient.js';
export { aiResponseSchema, toProposal, sanitizeFieldName, sanitizeCollectionName } from './proposal.js';
export type { AIResponse } from './proposal.js';
export { loadOpenAISettings, DEFAULT_MODEL } from './settings.js';
export type { OpenAISettings } from './settings.js';
