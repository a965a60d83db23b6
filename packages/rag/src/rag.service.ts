import { Injectable } from '@nestjs/common';
import {
  InvalidArgumentError,
  NotFoundError,
  type Answer,
  type BatchItemResult,
  type DocumentRecord,
  type DocumentStatusReport,
  type DocumentSummary,
  type HealthReport,
  type ProviderDescriptor,
  type SummaryResult,
} from '@docqa/core';
import { ConfigurationService } from '../config/configuration.js';
import { DocumentStoreService } from './documents/document-store.service.js';
import { FileIngestionService } from './file-ingestion/file-ingestion.service.js';
import { ProviderRegistryService } from './llm/provider-registry.service.js';
import { PersistenceService, type ImportSummary } from './persistence/persistence.service.js';
import type { RagSnapshot } from './persistence/snapshot.schema.js';
import { QaService } from './qa/qa.service.js';
import { SummarizationService } from './summarization/summarization.service.js';
import { linkedAbort } from './utils/abort.js';
import { mapWithConcurrency, settleWithConcurrency } from './utils/concurrency.js';

export interface ProviderPreference {
  /** Use only this provider. */
  provider?: string;
  /** Try these providers in order. Ignored when `provider` is set. */
  providers?: readonly string[];
}

export interface AskOptions extends ProviderPreference {
  k?: number;
  /** Abort the request with `Cancelled` after this many milliseconds. */
  timeoutMs?: number;
}

export interface SummarizeRequestOptions extends ProviderPreference {
  timeoutMs?: number;
}

export interface BatchOptions {
  /** Rethrow the first item failure instead of returning it in place. */
  failFast?: boolean;
}

export type AskBatchItem = string | ({ question: string } & ProviderPreference);
export type SummarizeBatchItem = string | ({ text: string } & ProviderPreference);

/**
 * Operations exposed to the HTTP or CLI layer.
 */
@Injectable()
export class RagService {
  constructor(
    private readonly ingestion: FileIngestionService,
    private readonly documents: DocumentStoreService,
    private readonly qa: QaService,
    private readonly summarization: SummarizationService,
    private readonly registry: ProviderRegistryService,
    private readonly persistence: PersistenceService,
    private readonly config: ConfigurationService
  ) {}

  ingestDocument(buffer: Buffer, filename: string, mimeType: string): Promise<string> {
    return this.ingestion.ingest(buffer, filename, mimeType);
  }

  /**
   * Resolves when the document's background ingestion has ended.
   */
  waitForIngestion(documentId: string): Promise<void> {
    return this.ingestion.waitFor(documentId);
  }

  getDocumentStatus(documentId: string): DocumentStatusReport {
    const doc = this.documents.get(documentId);
    return {
      id: doc.id,
      status: doc.status,
      ...(doc.error !== undefined ? { error: doc.error } : {}),
      chunkCount: doc.chunkIds.length,
    };
  }

  getDocument(documentId: string): DocumentRecord {
    return this.documents.get(documentId);
  }

  listDocuments(): DocumentSummary[] {
    return this.documents.list();
  }

  /**
   * Delete a document with its chunks and index entries. A running ingestion is
   * cancelled first.
   * @throws NotFoundError
   */
  async deleteDocument(documentId: string): Promise<void> {
    if (!this.documents.has(documentId)) {
      throw new NotFoundError('document', documentId);
    }
    if (this.ingestion.cancel(documentId, 'Document deleted')) {
      await this.ingestion.waitFor(documentId);
    }
    await this.documents.withLock(documentId, async () => {
      this.documents.delete(documentId);
    });
  }

  /**
   * @returns false when the document is not being ingested
   * @throws NotFoundError
   */
  cancelIngestion(documentId: string): boolean {
    if (!this.documents.has(documentId)) {
      throw new NotFoundError('document', documentId);
    }
    return this.ingestion.cancel(documentId);
  }

  ask(question: string, documentIds: readonly string[], options: AskOptions = {}): Promise<Answer> {
    return this.withTimeout(options.timeoutMs, (signal) =>
      this.qa.answer(question, documentIds, {
        k: options.k,
        providers: this.providerOrder(options),
        signal,
      })
    );
  }

  /**
   * Answer several questions over the same documents. Results keep the input order.
   * @throws InvalidArgumentError for an empty question list or document id list
   */
  async askBatch(
    questions: readonly AskBatchItem[],
    documentIds: readonly string[],
    options: AskOptions & BatchOptions = {}
  ): Promise<BatchItemResult<Answer>[]> {
    if (questions.length === 0) {
      throw new InvalidArgumentError('At least one question is required');
    }
    if (documentIds.length === 0) {
      throw new InvalidArgumentError('At least one document id is required');
    }

    return this.runBatch(questions, options.failFast, (item) => {
      const { question, ...preference } =
        typeof item === 'string' ? { question: item } : item;
      return this.ask(question, documentIds, { ...options, ...this.override(preference) });
    });
  }

  summarize(
    text: string,
    maxLength: number,
    options: SummarizeRequestOptions = {}
  ): Promise<SummaryResult> {
    return this.withTimeout(options.timeoutMs, (signal) =>
      this.summarization.summarize(text, maxLength, {
        providers: this.providerOrder(options),
        signal,
      })
    );
  }

  /**
   * Summarize several texts. Results keep the input order; a failing item does not stop
   * the others.
   * @throws InvalidArgumentError for an empty list or an invalid maxLength
   */
  async summarizeBatch(
    texts: readonly SummarizeBatchItem[],
    maxLength: number,
    options: SummarizeRequestOptions & BatchOptions = {}
  ): Promise<BatchItemResult<SummaryResult>[]> {
    if (texts.length === 0) {
      throw new InvalidArgumentError('At least one text is required');
    }
    if (!Number.isInteger(maxLength) || maxLength < 1) {
      throw new InvalidArgumentError(`maxLength must be a positive integer, got ${maxLength}`);
    }

    return this.runBatch(texts, options.failFast, (item) => {
      const { text, ...preference } = typeof item === 'string' ? { text: item } : item;
      return this.summarize(text, maxLength, { ...options, ...this.override(preference) });
    });
  }

  /**
   * Providers with their availability. With `refresh`, health checks run first.
   */
  async listAvailableProviders(options: { refresh?: boolean } = {}): Promise<ProviderDescriptor[]> {
    if (options.refresh) {
      await this.registry.refreshAvailability();
    }
    return this.registry.listAvailable();
  }

  describeProviders(): ProviderDescriptor[] {
    return this.registry.describe();
  }

  health(): HealthReport {
    const available = this.registry.listAvailable();
    return {
      status: available.some((p) => p.kind === 'generation') ? 'ok' : 'degraded',
      documents: this.documents.count(),
      availableProviders: available.map((p) => p.name),
    };
  }

  exportSnapshot(): RagSnapshot {
    return this.persistence.exportSnapshot();
  }

  importSnapshot(snapshot: unknown): ImportSummary {
    return this.persistence.importSnapshot(snapshot);
  }

  exportToFile(filePath: string): Promise<RagSnapshot> {
    return this.persistence.exportToFile(filePath);
  }

  importFromFile(filePath: string): Promise<ImportSummary> {
    return this.persistence.importFromFile(filePath);
  }

  private providerOrder(preference: ProviderPreference): readonly string[] | undefined {
    return preference.provider !== undefined ? [preference.provider] : preference.providers;
  }

  /**
   * An item's own provider preference replaces the batch-wide one.
   */
  private override(preference: ProviderPreference): ProviderPreference {
    return preference.provider !== undefined || preference.providers !== undefined
      ? { provider: preference.provider, providers: preference.providers }
      : {};
  }

  private runBatch<T, R>(
    items: readonly T[],
    failFast: boolean | undefined,
    fn: (item: T) => Promise<R>
  ): Promise<BatchItemResult<R>[]> {
    const limit = this.config.rag.batchConcurrency;
    if (failFast) {
      return mapWithConcurrency(items, limit, async (item) => ({
        ok: true as const,
        value: await fn(item),
      }));
    }
    return settleWithConcurrency(items, limit, fn);
  }

  private async withTimeout<T>(
    timeoutMs: number | undefined,
    op: (signal?: AbortSignal) => Promise<T>
  ): Promise<T> {
    if (timeoutMs === undefined) {
      return op(undefined);
    }
    if (!Number.isInteger(timeoutMs) || timeoutMs < 1) {
      throw new InvalidArgumentError(`timeoutMs must be a positive integer, got ${timeoutMs}`);
    }
    const control = linkedAbort(undefined, timeoutMs, 'Request timed out');
    try {
      return await op(control.signal);
    } finally {
      control.dispose();
    }
  }
}
