import { Module } from '@nestjs/common';
import { ConfigModule } from '../config/config.module.js';
import { ChunkingService } from './chunking/chunking.service.js';
import { DocumentStoreService } from './documents/document-store.service.js';
import { EmbeddingsService } from './embeddings/embeddings.service.js';
import { TextExtractionService } from './extraction/text-extraction.service.js';
import { FileIngestionService } from './file-ingestion/file-ingestion.service.js';
import { LlmGatewayService } from './llm/llm-gateway.service.js';
import { LangChainProviderFactory, PROVIDER_FACTORY } from './llm/provider.factory.js';
import { ProviderRegistryService } from './llm/provider-registry.service.js';
import { PersistenceService } from './persistence/persistence.service.js';
import { QaService } from './qa/qa.service.js';
import { RagService } from './rag.service.js';
import { SummarizationService } from './summarization/summarization.service.js';
import { VectorStoreService } from './vector-store/vector-store.service.js';

@Module({
  imports: [ConfigModule],
  providers: [
    TextExtractionService,
    ChunkingService,
    VectorStoreService,
    DocumentStoreService,
    { provide: PROVIDER_FACTORY, useClass: LangChainProviderFactory },
    ProviderRegistryService,
    EmbeddingsService,
    LlmGatewayService,
    QaService,
    SummarizationService,
    FileIngestionService,
    PersistenceService,
    RagService,
  ],
  exports: [RagService, ProviderRegistryService, LlmGatewayService],
})
export class RagModule {}
