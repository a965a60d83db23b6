import 'reflect-metadata';

export { default as logger } from './logger/logger.js';

export * from './common/errors/index.js';

export type * from './types/rag/document.js';
export { DOCUMENT_STATUSES } from './types/rag/document.js';
export type * from './types/rag/chunk.js';
export type * from './types/rag/provider.js';
export type * from './types/rag/answer.js';
export type * from './types/rag/ragConfig.js';

export {
  ProviderConfigSchema,
  ProvidersConfigSchema,
  type ProvidersConfigInput,
} from './config/providers/providersSchema.js';
export {
  loadProvidersConfig,
  parseProvidersConfig,
  DEFAULT_EMBEDDING_PROVIDER,
} from './config/providers/providersLoader.js';
