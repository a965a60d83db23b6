import 'reflect-metadata';

export { RagModule } from './rag.module.js';
export {
  RagService,
  type AskBatchItem,
  type AskOptions,
  type BatchOptions,
  type ProviderPreference,
  type SummarizeBatchItem,
  type SummarizeRequestOptions,
} from './rag.service.js';
export { ConfigModule } from '../config/config.module.js';
export { ConfigurationService } from '../config/configuration.js';
export { envSchema, type EnvConfig } from '../config/env.validation.js';

export { TextExtractionService, MIME_TYPES, toDocumentFormat } from './extraction/text-extraction.service.js';
export { ChunkingService, type ChunkOptions } from './chunking/chunking.service.js';
export { EmbeddingsService } from './embeddings/embeddings.service.js';
export { LocalHashEmbeddings, LOCAL_HASH_DIMENSIONS } from './embeddings/local-hash.embeddings.js';
export { VectorStoreService } from './vector-store/vector-store.service.js';
export { DocumentStoreService, canTransition } from './documents/document-store.service.js';
export {
  LangChainProviderFactory,
  PROVIDER_FACTORY,
  type EmbeddingModel,
  type GenerationModel,
  type HealthCheckResult,
  type ProviderFactory,
} from './llm/provider.factory.js';
export { ProviderRegistryService } from './llm/provider-registry.service.js';
export {
  LlmGatewayService,
  type GenerateOptions,
  type GenerationResult,
} from './llm/llm-gateway.service.js';
export { QaService, type AnswerOptions } from './qa/qa.service.js';
export { NO_CONTEXT_MARKER } from './qa/qa.prompts.js';
export { SummarizationService, type SummarizeOptions } from './summarization/summarization.service.js';
export { FileIngestionService } from './file-ingestion/file-ingestion.service.js';
export { PersistenceService, type ImportSummary } from './persistence/persistence.service.js';
export { SnapshotSchema, type RagSnapshot } from './persistence/snapshot.schema.js';
