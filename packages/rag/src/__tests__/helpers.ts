import { ConfigService } from '@nestjs/config';
import type { BaseMessage } from '@langchain/core/messages';
import {
  ConfigurationError,
  type Chunk,
  type ProviderConfig,
} from '@docqa/core';
import { ConfigurationService } from '../../config/configuration.js';
import { ChunkingService } from '../chunking/chunking.service.js';
import { DocumentStoreService } from '../documents/document-store.service.js';
import { EmbeddingsService } from '../embeddings/embeddings.service.js';
import { LocalHashEmbeddings } from '../embeddings/local-hash.embeddings.js';
import { TextExtractionService } from '../extraction/text-extraction.service.js';
import { FileIngestionService } from '../file-ingestion/file-ingestion.service.js';
import { contentToText } from '../llm/failures.js';
import { LlmGatewayService } from '../llm/llm-gateway.service.js';
import type {
  EmbeddingModel,
  GenerationModel,
  HealthCheckResult,
  ProviderFactory,
} from '../llm/provider.factory.js';
import { ProviderRegistryService } from '../llm/provider-registry.service.js';
import { PersistenceService } from '../persistence/persistence.service.js';
import { QaService } from '../qa/qa.service.js';
import { SummarizationService } from '../summarization/summarization.service.js';
import { VectorStoreService } from '../vector-store/vector-store.service.js';

export const TEST_PROVIDERS = [
  {
    name: 'local-hash',
    kind: 'embedding',
    type: 'local',
    model: 'feature-hash-384',
    priority: 0,
    dimensions: 384,
  },
  { name: 'primary', kind: 'generation', type: 'ollama', model: 'llama3', priority: 1 },
  { name: 'secondary', kind: 'generation', type: 'openai', model: 'gpt-4o-mini', priority: 2 },
];

export function createConfiguration(env: Record<string, string> = {}): ConfigurationService {
  return new ConfigurationService(
    new ConfigService({
      RAG_PROVIDERS_JSON: JSON.stringify({ providers: TEST_PROVIDERS }),
      ...env,
    })
  );
}

/** Text of the last message sent to a chat model. */
export const promptOf = (messages: BaseMessage[]): string =>
  contentToText(messages[messages.length - 1].content);

/**
 * Chat model stand-in whose reply is computed from the prompt.
 */
export function fakeChatModel(reply: (prompt: string) => string | Promise<string>) {
  return {
    invoke: jest.fn(async (messages: BaseMessage[]) => ({
      content: await reply(promptOf(messages)),
    })),
  };
}

export function failingChatModel(error: unknown) {
  return {
    invoke: jest.fn(async (_messages: BaseMessage[]): Promise<{ content: string }> => {
      throw error;
    }),
  };
}

/** Never answers; only an abort ends the call. */
export function hangingChatModel() {
  return {
    invoke: jest.fn(
      (_messages: BaseMessage[]) => new Promise<{ content: string }>(() => undefined)
    ),
  };
}

export class FakeProviderFactory implements ProviderFactory {
  readonly models = new Map<string, GenerationModel>();
  readonly health = new Map<string, HealthCheckResult>();
  embeddingModel: EmbeddingModel = new LocalHashEmbeddings();

  createGenerationModel(config: ProviderConfig): GenerationModel {
    const model = this.models.get(config.name);
    if (!model) {
      throw new ConfigurationError(`No model registered for ${config.name}`);
    }
    return model;
  }

  createEmbeddingModel(): EmbeddingModel {
    return this.embeddingModel;
  }

  async checkHealth(config: ProviderConfig): Promise<HealthCheckResult> {
    return this.health.get(config.name) ?? { available: true };
  }
}

/**
 * Every pipeline service wired by hand, without a Nest container.
 */
export function createPipeline(
  env: Record<string, string> = {},
  factory = new FakeProviderFactory()
) {
  const config = createConfiguration(env);
  const registry = new ProviderRegistryService(config, factory);
  const vectorStore = new VectorStoreService();
  const documents = new DocumentStoreService(vectorStore);
  const embeddings = new EmbeddingsService(registry, config);
  const gateway = new LlmGatewayService(registry, config);
  const chunking = new ChunkingService();
  const extraction = new TextExtractionService();
  const qa = new QaService(documents, vectorStore, embeddings, gateway, config);
  const summarization = new SummarizationService(chunking, gateway, config);
  const ingestion = new FileIngestionService(
    extraction,
    chunking,
    embeddings,
    documents,
    config
  );
  const persistence = new PersistenceService(documents, vectorStore, embeddings);

  return {
    config,
    factory,
    registry,
    vectorStore,
    documents,
    embeddings,
    gateway,
    chunking,
    extraction,
    qa,
    summarization,
    ingestion,
    persistence,
  };
}

export type Pipeline = ReturnType<typeof createPipeline>;

/**
 * Store a ready document made of the given chunk texts, embedded with the active model.
 */
export async function publishDocument(
  pipeline: Pipeline,
  filename: string,
  texts: string[]
): Promise<{ documentId: string; chunkIds: string[] }> {
  const { documents, embeddings } = pipeline;
  const doc = documents.create({ filename, mimeType: 'text/plain', size: texts.join('').length });
  const vectors = await embeddings.embedBatch(texts);

  let offset = 0;
  const chunks: Chunk[] = texts.map((text, i) => {
    const chunk: Chunk = {
      id: `${filename}#${i}`,
      documentId: doc.id,
      sequenceIndex: i,
      text,
      start: offset,
      end: offset + text.length,
      tokenEstimate: Math.ceil(text.length / 4),
      vector: vectors[i],
    };
    offset += text.length;
    return chunk;
  });

  documents.updateStatus(doc.id, 'extracting');
  documents.updateStatus(doc.id, 'chunking');
  documents.updateStatus(doc.id, 'embedding');
  documents.attachChunks(doc.id, chunks, embeddings.configId);
  documents.updateStatus(doc.id, 'ready');
  return { documentId: doc.id, chunkIds: chunks.map((c) => c.id) };
}
