import { InvalidArgumentError, UnsupportedFormatError } from '@docqa/core';
import { createPipeline, type Pipeline } from '../../__tests__/helpers.js';

const SENTENCE = 'The quick brown fox jumps over the lazy dog. ';
const repeatTo = (length: number) =>
  SENTENCE.repeat(Math.ceil(length / SENTENCE.length)).slice(0, length);

const unitVector = () => [1, ...new Array<number>(383).fill(0)];

/** Lets pending promise callbacks run until `predicate` holds. */
async function until(predicate: () => boolean): Promise<void> {
  for (let i = 0; i < 100 && !predicate(); i++) {
    await new Promise((resolve) => setImmediate(resolve));
  }
  expect(predicate()).toBe(true);
}

function deferred<T>() {
  let settle: (value: T) => void = () => undefined;
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: (value: T) => settle(value) };
}

describe('FileIngestionService', () => {
  let pipeline: Pipeline;

  beforeEach(() => {
    pipeline = createPipeline();
  });

  it('takes a text file through every stage to ready', async () => {
    const updateStatus = jest.spyOn(pipeline.documents, 'updateStatus');

    const id = await pipeline.ingestion.ingest(
      Buffer.from(repeatTo(6000)),
      'fox.txt',
      'text/plain'
    );
    await pipeline.ingestion.waitFor(id);

    expect(updateStatus.mock.calls.map(([, status]) => status)).toEqual([
      'extracting',
      'chunking',
      'embedding',
      'ready',
    ]);
    const doc = pipeline.documents.get(id);
    expect(doc).toEqual(
      expect.objectContaining({
        filename: 'fox.txt',
        mimeType: 'text/plain',
        size: 6000,
        status: 'ready',
        embeddingConfigId: 'local-hash:feature-hash-384',
      })
    );
    const chunks = pipeline.documents.chunksOf(id);
    expect(chunks.map((c) => c.sequenceIndex)).toEqual([0, 1, 2, 3]);
    expect(chunks.map((c) => [c.start, c.end])).toEqual([
      [0, 1980],
      [1780, 3780],
      [3580, 5580],
      [5380, 6000],
    ]);
    expect(chunks[0].tokenEstimate).toBe(495);
    expect(pipeline.vectorStore.size()).toBe(4);
    expect(pipeline.ingestion.isPending(id)).toBe(false);
  });

  it('rejects empty and oversized uploads without creating a document', async () => {
    const small = createPipeline({ MAX_UPLOAD_BYTES: '10' });

    await expect(small.ingestion.ingest(Buffer.alloc(0), 'empty.txt', 'text/plain')).rejects.toThrow(
      new InvalidArgumentError('empty.txt is empty')
    );
    await expect(
      small.ingestion.ingest(Buffer.from('eleven char'), 'big.txt', 'text/plain')
    ).rejects.toThrow('big.txt is 11 bytes, the limit is 10');
    expect(small.documents.count()).toBe(0);
  });

  it('rejects unsupported formats up front', async () => {
    await expect(
      pipeline.ingestion.ingest(Buffer.from('not really an image'), 'image.png', 'image/png')
    ).rejects.toBeInstanceOf(UnsupportedFormatError);
    expect(pipeline.documents.count()).toBe(0);
  });

  it('fails documents without text', async () => {
    const id = await pipeline.ingestion.ingest(Buffer.from('  \n\n  '), 'blank.txt', 'text/plain');
    await pipeline.ingestion.waitFor(id);

    const doc = pipeline.documents.get(id);
    expect(doc.status).toBe('failed');
    expect(doc.error).toBe('Document contains no extractable text');
    expect(pipeline.vectorStore.size()).toBe(0);
  });

  it('fails with the embedding error when the model breaks', async () => {
    pipeline.factory.embeddingModel = {
      embedDocuments: jest.fn(async () => {
        throw new Error('model crashed');
      }),
      embedQuery: jest.fn(),
    };

    const id = await pipeline.ingestion.ingest(Buffer.from('Short text.'), 'a.txt', 'txt');
    await pipeline.ingestion.waitFor(id);

    expect(pipeline.documents.get(id).error).toBe(
      'Embedding failed for item 0: model crashed'
    );
  });

  it('cancels a running ingestion', async () => {
    const embedDocuments = jest.fn(() => new Promise<number[][]>(() => undefined));
    pipeline.factory.embeddingModel = { embedDocuments, embedQuery: jest.fn() };

    const id = await pipeline.ingestion.ingest(Buffer.from('Short text.'), 'a.txt', 'txt');
    await until(() => embedDocuments.mock.calls.length > 0);

    expect(pipeline.ingestion.cancel(id)).toBe(true);
    await pipeline.ingestion.waitFor(id);

    const doc = pipeline.documents.get(id);
    expect(doc.status).toBe('failed');
    expect(doc.error).toBe('Cancelled: Ingestion cancelled');
    expect(pipeline.ingestion.cancel(id)).toBe(false);
  });

  it('gives up after the ingestion timeout', async () => {
    pipeline = createPipeline({ INGESTION_TIMEOUT_MS: '20' });
    pipeline.factory.embeddingModel = {
      embedDocuments: jest.fn(() => new Promise<number[][]>(() => undefined)),
      embedQuery: jest.fn(),
    };

    const id = await pipeline.ingestion.ingest(Buffer.from('Short text.'), 'a.txt', 'txt');
    await pipeline.ingestion.waitFor(id);

    expect(pipeline.documents.get(id).error).toBe(
      'Cancelled: Ingestion timed out after 20ms'
    );
  });

  it('publishes nothing for a document deleted mid-run', async () => {
    const embedding = deferred<number[][]>();
    const embedDocuments = jest.fn(() => embedding.promise);
    pipeline.factory.embeddingModel = { embedDocuments, embedQuery: jest.fn() };

    const id = await pipeline.ingestion.ingest(Buffer.from('Short text.'), 'a.txt', 'txt');
    await until(() => embedDocuments.mock.calls.length > 0);

    pipeline.documents.delete(id);
    embedding.resolve([unitVector()]);
    await pipeline.ingestion.waitFor(id);

    expect(pipeline.documents.has(id)).toBe(false);
    expect(pipeline.vectorStore.size()).toBe(0);
  });

  it('aborts every run on shutdown', async () => {
    pipeline.factory.embeddingModel = {
      embedDocuments: jest.fn(() => new Promise<number[][]>(() => undefined)),
      embedQuery: jest.fn(),
    };
    const id = await pipeline.ingestion.ingest(Buffer.from('Short text.'), 'a.txt', 'txt');

    await pipeline.ingestion.onModuleDestroy();

    expect(pipeline.documents.get(id).error).toBe('Cancelled: Shutting down');
    expect(pipeline.ingestion.isPending(id)).toBe(false);
  });
});
