import 'reflect-metadata';
import { Test, TestingModule } from '@nestjs/testing';
import { CancelledError, NotFoundError } from '@docqa/core';
import { ConfigurationService } from '../../config/configuration.js';
import { DocumentStoreService } from '../documents/document-store.service.js';
import { PROVIDER_FACTORY } from '../llm/provider.factory.js';
import { NO_CONTEXT_MARKER } from '../qa/qa.prompts.js';
import { RagModule } from '../rag.module.js';
import { RagService } from '../rag.service.js';
import {
  FakeProviderFactory,
  createConfiguration,
  fakeChatModel,
  hangingChatModel,
} from './helpers.js';

const SENTENCE = 'The quick brown fox jumps over the lazy dog. ';
const FOX_TEXT = SENTENCE.repeat(134).slice(0, 6000);

const answerFrom = (name: string) =>
  fakeChatModel((prompt) =>
    prompt.includes(NO_CONTEXT_MARKER)
      ? 'The documents do not cover that.'
      : `Answer from ${name}.`
  );

describe('RagService', () => {
  let app: TestingModule;
  let rag: RagService;
  let factory: FakeProviderFactory;

  const createApp = async (env: Record<string, string> = {}) => {
    app = await Test.createTestingModule({ imports: [RagModule] })
      .overrideProvider(PROVIDER_FACTORY)
      .useValue(factory)
      .overrideProvider(ConfigurationService)
      .useValue(createConfiguration(env))
      .compile();
    await app.init();
    rag = app.get(RagService);
  };

  const ingestText = async (text: string, filename: string) => {
    const id = await rag.ingestDocument(Buffer.from(text), filename, 'text/plain');
    await rag.waitForIngestion(id);
    return id;
  };

  beforeEach(async () => {
    factory = new FakeProviderFactory();
    factory.models.set('primary', answerFrom('primary'));
    factory.models.set('secondary', answerFrom('secondary'));
    await createApp();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('documents', () => {
    it('ingests a text file into four searchable chunks', async () => {
      const updateStatus = jest.spyOn(app.get(DocumentStoreService), 'updateStatus');

      const id = await ingestText(FOX_TEXT, 'fox.txt');

      expect(updateStatus.mock.calls.map(([, status]) => status)).toEqual([
        'extracting',
        'chunking',
        'embedding',
        'ready',
      ]);
      expect(rag.getDocumentStatus(id)).toEqual({ id, status: 'ready', chunkCount: 4 });
      expect(rag.listDocuments()).toEqual([
        expect.objectContaining({ id, filename: 'fox.txt', status: 'ready' }),
      ]);
    });

    it('deletes a document with everything derived from it', async () => {
      const id = await ingestText(FOX_TEXT, 'fox.txt');

      await rag.deleteDocument(id);

      expect(() => rag.getDocument(id)).toThrow(NotFoundError);
      await expect(rag.ask('Where does the fox jump?', [id])).rejects.toBeInstanceOf(
        NotFoundError
      );
      await expect(rag.deleteDocument(id)).rejects.toThrow(`document ${id} not found`);
    });

    it('cancels a running ingestion before deleting', async () => {
      factory.embeddingModel = {
        embedDocuments: jest.fn(() => new Promise<number[][]>(() => undefined)),
        embedQuery: jest.fn(),
      };
      await app.close();
      await createApp();

      const id = await rag.ingestDocument(Buffer.from('Short text.'), 'a.txt', 'text/plain');
      await rag.deleteDocument(id);

      expect(rag.listDocuments()).toEqual([]);
      expect(() => rag.cancelIngestion(id)).toThrow(NotFoundError);
    });
  });

  describe('questions', () => {
    it('answers without context when nothing relevant was retrieved', async () => {
      const id = await ingestText('Bananas grow in tropical climates.', 'fruit.txt');

      const answer = await rag.ask('What is the capital of France?', [id], { k: 3 });

      expect(answer.noContext).toBe(true);
      expect(answer.citations).toEqual([]);
      expect(answer.answer).toBe('The documents do not cover that.');
      expect(answer.providerUsed).toBe('primary');
    });

    it('keeps batch results in input order with per-item providers', async () => {
      const id = await ingestText('Solar panels convert sunlight into electricity.', 'solar.txt');

      const results = await rag.askBatch(
        [
          'How do solar panels make electricity?',
          { question: 'What is the capital of France?', provider: 'secondary' },
        ],
        [id]
      );

      expect(results).toEqual([
        {
          ok: true,
          value: expect.objectContaining({
            providerUsed: 'primary',
            answer: 'Answer from primary.',
          }),
        },
        {
          ok: true,
          value: expect.objectContaining({
            providerUsed: 'secondary',
            answer: 'The documents do not cover that.',
          }),
        },
      ]);
    });

    it('cancels a request that outlives its timeout', async () => {
      factory.models.set('primary', hangingChatModel());
      await app.close();
      await createApp();
      const id = await ingestText('Bananas grow in tropical climates.', 'fruit.txt');

      const request = rag.ask('Where do bananas grow?', [id], {
        provider: 'primary',
        timeoutMs: 20,
      });

      await expect(request).rejects.toThrow(
        new CancelledError('Request timed out after 20ms')
      );
    });
  });

  describe('summaries', () => {
    it('reports a failing item in place and keeps the others', async () => {
      const results = await rag.summarizeBatch(
        [
          'The sun is a star. It is hot.',
          { text: 'The moon orbits the earth.', provider: 'invalid' },
        ],
        100
      );

      expect(results[0]).toEqual({
        ok: true,
        value: expect.objectContaining({ providerUsed: 'primary', strategy: 'single-pass' }),
      });
      expect(results[1]).toEqual({
        ok: false,
        error: expect.objectContaining({
          type: 'ALL_PROVIDERS_EXHAUSTED',
          message:
            'All providers failed: invalid (not_configured: No generation provider named invalid)',
        }),
      });
    });

    it('rejects an invalid batch', async () => {
      await expect(rag.summarizeBatch([], 100)).rejects.toThrow('At least one text is required');
      await expect(rag.summarizeBatch(['text'], -1)).rejects.toThrow(
        'maxLength must be a positive integer, got -1'
      );
    });
  });

  describe('providers', () => {
    it('reports health from generation provider availability', async () => {
      expect(rag.health()).toEqual({
        status: 'ok',
        documents: 0,
        availableProviders: ['local-hash', 'primary', 'secondary'],
      });

      factory.health.set('primary', { available: false, reason: 'down' });
      factory.health.set('secondary', { available: false, reason: 'OPENAI_API_KEY is not set' });
      const available = await rag.listAvailableProviders({ refresh: true });

      expect(available.map((p) => p.name)).toEqual(['local-hash']);
      expect(rag.health().status).toBe('degraded');
      expect(rag.describeProviders().find((p) => p.name === 'primary')?.reason).toBe('down');
    });
  });
});
