import { Injectable } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  DOCUMENT_STATUSES,
  InvalidStateTransitionError,
  NotFoundError,
  logger,
  type Chunk,
  type DocumentRecord,
  type DocumentStatus,
  type DocumentSummary,
} from '@docqa/core';
import { KeyedMutex } from '../utils/concurrency.js';
import { VectorStoreService } from '../vector-store/vector-store.service.js';

export interface NewDocument {
  filename: string;
  mimeType: string;
  size: number;
}

const TERMINAL: ReadonlySet<DocumentStatus> = new Set(['ready', 'failed']);

export function isTerminal(status: DocumentStatus): boolean {
  return TERMINAL.has(status);
}

/**
 * Whether a document may move from `from` to `to`: forward only, `failed` from any
 * non-terminal status, nothing out of `ready` or `failed`.
 */
export function canTransition(from: DocumentStatus, to: DocumentStatus): boolean {
  if (isTerminal(from)) {
    return false;
  }
  return to === 'failed' || DOCUMENT_STATUSES.indexOf(to) > DOCUMENT_STATUSES.indexOf(from);
}

const copyDocument = (doc: DocumentRecord): DocumentRecord => ({
  ...doc,
  chunkIds: [...doc.chunkIds],
});

/**
 * Owns document records and the chunk arena. Deletion cascades to the vector index.
 */
@Injectable()
export class DocumentStoreService {
  private readonly documents = new Map<string, DocumentRecord>();
  private readonly chunks = new Map<string, Chunk>();
  private readonly locks = new KeyedMutex();

  constructor(private readonly vectorStore: VectorStoreService) {}

  create(input: NewDocument): DocumentRecord {
    const now = new Date().toISOString();
    const doc: DocumentRecord = {
      id: uuidv4(),
      filename: input.filename,
      mimeType: input.mimeType,
      size: input.size,
      status: 'uploading',
      chunkIds: [],
      createdAt: now,
      updatedAt: now,
    };
    this.documents.set(doc.id, doc);
    logger.debug(`Document ${doc.id} (${doc.filename}) created`);
    return copyDocument(doc);
  }

  /**
   * @throws NotFoundError
   */
  get(id: string): DocumentRecord {
    return copyDocument(this.require(id));
  }

  find(id: string): DocumentRecord | undefined {
    const doc = this.documents.get(id);
    return doc ? copyDocument(doc) : undefined;
  }

  has(id: string): boolean {
    return this.documents.has(id);
  }

  count(): number {
    return this.documents.size;
  }

  /**
   * Documents in creation order.
   */
  list(): DocumentSummary[] {
    return [...this.documents.values()].map((doc) => ({
      id: doc.id,
      filename: doc.filename,
      mimeType: doc.mimeType,
      size: doc.size,
      status: doc.status,
      ...(doc.error !== undefined ? { error: doc.error } : {}),
      chunkCount: doc.chunkIds.length,
      createdAt: doc.createdAt,
    }));
  }

  records(): DocumentRecord[] {
    return [...this.documents.values()].map(copyDocument);
  }

  /**
   * @throws NotFoundError, InvalidStateTransitionError
   */
  updateStatus(id: string, status: DocumentStatus, error?: string): DocumentRecord {
    const doc = this.require(id);
    if (!canTransition(doc.status, status)) {
      throw new InvalidStateTransitionError(id, doc.status, status);
    }
    doc.status = status;
    doc.updatedAt = new Date().toISOString();
    if (error !== undefined) {
      doc.error = error;
    }
    logger.debug(`Document ${id} -> ${status}${error ? `: ${error}` : ''}`);
    return copyDocument(doc);
  }

  /**
   * Store a document's chunks and publish their vectors to the index in one step.
   * Chunks must be ordered by `sequenceIndex`.
   */
  attachChunks(id: string, chunks: readonly Chunk[], embeddingConfigId: string): void {
    const doc = this.require(id);
    this.vectorStore.upsertMany(
      chunks.map((chunk) => ({
        chunkId: chunk.id,
        documentId: id,
        vector: chunk.vector,
        embeddingConfigId,
      }))
    );
    for (const chunk of chunks) {
      this.chunks.set(chunk.id, chunk);
    }
    doc.chunkIds = chunks.map((chunk) => chunk.id);
    doc.embeddingConfigId = embeddingConfigId;
    doc.updatedAt = new Date().toISOString();
  }

  /**
   * @throws NotFoundError
   */
  getChunk(chunkId: string): Chunk {
    const chunk = this.chunks.get(chunkId);
    if (!chunk) {
      throw new NotFoundError('chunk', chunkId);
    }
    return chunk;
  }

  getChunks(chunkIds: readonly string[]): Chunk[] {
    return chunkIds.map((chunkId) => this.getChunk(chunkId));
  }

  /**
   * Chunks of a document in sequence order.
   */
  chunksOf(id: string): Chunk[] {
    return this.getChunks(this.require(id).chunkIds);
  }

  /**
   * Remove a document, its chunks and its index entries. Synchronous, so no reader sees a
   * partial deletion.
   * @throws NotFoundError
   */
  delete(id: string): void {
    const doc = this.require(id);
    const removed = this.vectorStore.deleteByDocument(id);
    for (const chunkId of doc.chunkIds) {
      this.chunks.delete(chunkId);
    }
    this.documents.delete(id);
    logger.info(`Document ${id} deleted (${removed} index entries)`);
  }

  /**
   * Put back a document that was exported as ready, with its chunks.
   */
  restore(record: DocumentRecord, chunks: readonly Chunk[], embeddingConfigId: string): void {
    this.documents.set(record.id, copyDocument(record));
    this.attachChunks(record.id, chunks, embeddingConfigId);
  }

  /**
   * Run `op` while holding the document's lock. Other documents are not blocked.
   */
  withLock<T>(id: string, op: () => Promise<T>): Promise<T> {
    return this.locks.runExclusive(id, op);
  }

  private require(id: string): DocumentRecord {
    const doc = this.documents.get(id);
    if (!doc) {
      throw new NotFoundError('document', id);
    }
    return doc;
  }
}
