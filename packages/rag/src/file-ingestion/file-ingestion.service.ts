import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  CancelledError,
  InvalidArgumentError,
  logger,
  type Chunk,
  type DocumentFormat,
  type DocumentStatus,
} from '@docqa/core';
import { metrics, type IngestionOutcome } from '@docqa/metrics';
import { ConfigurationService } from '../../config/configuration.js';
import { ChunkingService } from '../chunking/chunking.service.js';
import { DocumentStoreService, isTerminal } from '../documents/document-store.service.js';
import { EmbeddingsService } from '../embeddings/embeddings.service.js';
import { MIME_TYPES, TextExtractionService } from '../extraction/text-extraction.service.js';
import {
  describeAbort,
  linkedAbort,
  raceWithAbort,
  throwIfAborted,
} from '../utils/abort.js';

interface PendingIngestion {
  abort: (reason: string) => void;
  done: Promise<void>;
}

/**
 * Accepts uploads and runs extract, chunk and embed in the background. A document only
 * becomes searchable once all of its chunks are published together.
 */
@Injectable()
export class FileIngestionService implements OnModuleDestroy {
  private readonly pending = new Map<string, PendingIngestion>();

  constructor(
    private readonly extraction: TextExtractionService,
    private readonly chunking: ChunkingService,
    private readonly embeddings: EmbeddingsService,
    private readonly documents: DocumentStoreService,
    private readonly config: ConfigurationService
  ) {}

  /**
   * Validate an upload, create its document and start the pipeline.
   * @returns The new document id, while the document is still `uploading`
   * @throws InvalidArgumentError for empty or oversized uploads, UnsupportedFormatError
   */
  async ingest(buffer: Buffer, filename: string, mimeType: string): Promise<string> {
    const { maxUploadBytes, timeoutMs } = this.config.rag.ingestion;
    if (buffer.length === 0) {
      throw new InvalidArgumentError(`${filename} is empty`);
    }
    if (buffer.length > maxUploadBytes) {
      logger.error(`Upload too large: ${buffer.length} > ${maxUploadBytes}`);
      throw new InvalidArgumentError(
        `${filename} is ${buffer.length} bytes, the limit is ${maxUploadBytes}`,
        { size: buffer.length, maxUploadBytes }
      );
    }

    const format = await this.extraction.resolveDocumentType(buffer, filename, mimeType);
    const doc = this.documents.create({
      filename,
      mimeType: MIME_TYPES[format],
      size: buffer.length,
    });

    const started = Date.now();
    const control = linkedAbort(undefined, timeoutMs, 'Ingestion timed out');
    const done = this.run(doc.id, Buffer.from(buffer), format, control.signal)
      .then((outcome) => {
        metrics.documentIngested(outcome, (Date.now() - started) / 1000);
      })
      .catch((error) => {
        logger.error(`Ingestion bookkeeping failed for ${doc.id}:`, error);
      })
      .finally(() => {
        control.dispose();
        this.pending.delete(doc.id);
      });

    this.pending.set(doc.id, { abort: control.abort, done });
    logger.info(`Ingesting ${filename} as ${doc.id} (${format}, ${buffer.length} bytes)`);
    return doc.id;
  }

  /**
   * Abort a running ingestion. Returns false when the document is not being ingested.
   */
  cancel(documentId: string, reason = 'Ingestion cancelled'): boolean {
    const run = this.pending.get(documentId);
    if (!run) {
      return false;
    }
    run.abort(reason);
    return true;
  }

  isPending(documentId: string): boolean {
    return this.pending.has(documentId);
  }

  /**
   * Resolves once the background run of `documentId` has ended, successfully or not.
   */
  waitFor(documentId: string): Promise<void> {
    return this.pending.get(documentId)?.done ?? Promise.resolve();
  }

  async onModuleDestroy(): Promise<void> {
    const runs = [...this.pending.values()];
    for (const run of runs) {
      run.abort('Shutting down');
    }
    await Promise.all(runs.map((run) => run.done));
  }

  private async run(
    id: string,
    buffer: Buffer,
    format: DocumentFormat,
    signal: AbortSignal
  ): Promise<IngestionOutcome> {
    try {
      await this.transition(id, 'extracting', signal);
      const text = await raceWithAbort(this.extraction.extract(buffer, format), signal);

      await this.transition(id, 'chunking', signal);
      const segments = this.chunking.chunk(text, this.config.rag.chunking);

      await this.transition(id, 'embedding', signal);
      const vectors = await this.embeddings.embedBatch(
        segments.map((segment) => segment.text),
        signal
      );
      const embeddingConfigId = this.embeddings.configId;

      const chunks: Chunk[] = segments.map((segment, i) => ({
        id: uuidv4(),
        documentId: id,
        sequenceIndex: segment.index,
        text: segment.text,
        start: segment.start,
        end: segment.end,
        tokenEstimate: Math.ceil(segment.text.length / 4),
        vector: vectors[i],
      }));

      const published = await this.documents.withLock(id, async () => {
        throwIfAborted(signal);
        if (!this.documents.has(id)) {
          return false;
        }
        this.documents.attachChunks(id, chunks, embeddingConfigId);
        this.documents.updateStatus(id, 'ready');
        return true;
      });

      if (!published) {
        logger.info(`Document ${id} was deleted before its chunks were published`);
        return 'cancelled';
      }
      logger.info(`Document ${id} ready with ${chunks.length} chunks`);
      return 'ready';
    } catch (error) {
      const cancelled = error instanceof CancelledError || signal.aborted;
      const message =
        error instanceof CancelledError
          ? error.message
          : signal.aborted
            ? new CancelledError(describeAbort(signal)).message
            : error instanceof Error
              ? error.message
              : String(error);

      logger.error(`Ingestion of ${id} failed: ${message}`);
      await this.fail(id, message);
      return cancelled ? 'cancelled' : 'failed';
    }
  }

  private transition(id: string, status: DocumentStatus, signal: AbortSignal): Promise<void> {
    return this.documents.withLock(id, async () => {
      throwIfAborted(signal);
      if (!this.documents.has(id)) {
        throw new CancelledError('Document deleted');
      }
      this.documents.updateStatus(id, status);
    });
  }

  private fail(id: string, message: string): Promise<void> {
    return this.documents.withLock(id, async () => {
      const doc = this.documents.find(id);
      if (!doc || isTerminal(doc.status)) {
        return;
      }
      this.documents.updateStatus(id, 'failed', message);
    });
  }
}
