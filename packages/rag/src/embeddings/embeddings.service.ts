import { Injectable } from '@nestjs/common';
import { CancelledError, EmbeddingFailureError, logger } from '@docqa/core';
import { ConfigurationService } from '../../config/configuration.js';
import { ProviderRegistryService } from '../llm/provider-registry.service.js';
import { raceWithAbort, throwIfAborted } from '../utils/abort.js';
import { mapWithConcurrency } from '../utils/concurrency.js';

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

@Injectable()
export class EmbeddingsService {
  private dimension?: number;

  constructor(
    private readonly registry: ProviderRegistryService,
    private readonly config: ConfigurationService
  ) {}

  /**
   * Identifier of the active embedding configuration, `<provider>:<model>`.
   * Vectors produced under different identifiers are not comparable.
   */
  get configId(): string {
    const provider = this.registry.embeddingProvider();
    return `${provider.name}:${provider.model}`;
  }

  /**
   * Vector length seen so far under the active configuration, if any.
   */
  get dimensions(): number | undefined {
    return this.dimension;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    throwIfAborted(signal);
    let vector: number[];
    try {
      vector = await raceWithAbort(this.registry.embeddingModel().embedQuery(text), signal);
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      logger.error('Query embedding failed', err);
      throw new EmbeddingFailureError(0, errorMessage(err));
    }
    this.checkVector(vector, 0);
    this.checkDimension(vector, 0);
    return vector;
  }

  /**
   * Embed texts in input order. Sub-batches of `EMBEDDING_BATCH_SIZE` run with bounded
   * parallelism; when one fails its items are retried alone to find the failing index.
   * @throws EmbeddingFailureError for the first failing item, CancelledError on abort
   */
  async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    throwIfAborted(signal);

    const size = this.config.rag.embeddingBatchSize;
    const batches: { offset: number; texts: string[] }[] = [];
    for (let offset = 0; offset < texts.length; offset += size) {
      batches.push({ offset, texts: texts.slice(offset, offset + size) });
    }

    const results = await mapWithConcurrency(
      batches,
      this.config.rag.batchConcurrency,
      (batch) => this.embedSubBatch(batch.texts, batch.offset, signal)
    );

    const vectors = results.flat();
    vectors.forEach((vector, index) => this.checkDimension(vector, index));
    return vectors;
  }

  private async embedSubBatch(
    texts: string[],
    offset: number,
    signal?: AbortSignal
  ): Promise<number[][]> {
    throwIfAborted(signal);
    let vectors: number[][];
    try {
      vectors = await raceWithAbort(
        this.registry.embeddingModel().embedDocuments(texts),
        signal
      );
      if (vectors.length !== texts.length) {
        throw new Error(`expected ${texts.length} vectors, got ${vectors.length}`);
      }
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      if (texts.length === 1) {
        throw new EmbeddingFailureError(offset, errorMessage(err));
      }
      logger.warn(
        `Embedding sub-batch at ${offset} failed (${errorMessage(err)}), retrying items one by one`
      );
      return this.embedOneByOne(texts, offset, signal);
    }

    vectors.forEach((vector, i) => this.checkVector(vector, offset + i));
    return vectors;
  }

  private async embedOneByOne(
    texts: string[],
    offset: number,
    signal?: AbortSignal
  ): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i++) {
      vectors.push(...(await this.embedSubBatch([texts[i]], offset + i, signal)));
    }
    return vectors;
  }

  private checkVector(vector: unknown, index: number): void {
    if (!Array.isArray(vector) || vector.length === 0) {
      throw new EmbeddingFailureError(index, 'empty vector');
    }
    if (!vector.every((value) => typeof value === 'number' && Number.isFinite(value))) {
      throw new EmbeddingFailureError(index, 'vector contains non-finite values');
    }
  }

  private checkDimension(vector: number[], index: number): void {
    if (this.dimension === undefined) {
      this.dimension = vector.length;
      return;
    }
    if (vector.length !== this.dimension) {
      throw new EmbeddingFailureError(
        index,
        `expected ${this.dimension} dimensions, got ${vector.length}`
      );
    }
  }
}
