import { Injectable } from '@nestjs/common';
import {
  DimensionMismatchError,
  InvalidArgumentError,
  type IndexEntry,
  type SearchHit,
  type SearchOptions,
} from '@docqa/core';

interface StoredEntry extends IndexEntry {
  /** Insertion sequence, kept when a chunk is upserted again. */
  seq: number;
  norm: number;
}

function norm(vector: readonly number[]): number {
  let sum = 0;
  for (const value of vector) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

/**
 * In-memory cosine similarity index over chunk vectors.
 *
 * Every operation is synchronous, so a write is fully visible or not visible at all to any
 * concurrent reader. Texts are not stored here; hits reference chunks by id.
 */
@Injectable()
export class VectorStoreService {
  private readonly entries = new Map<string, StoredEntry>();
  private readonly byDocument = new Map<string, Set<string>>();
  private nextSeq = 0;

  upsert(entry: IndexEntry): void {
    this.upsertMany([entry]);
  }

  /**
   * Insert or replace entries in one step. A replaced chunk keeps its insertion position.
   */
  upsertMany(entries: readonly IndexEntry[]): void {
    for (const entry of entries) {
      if (entry.vector.length === 0) {
        throw new InvalidArgumentError(`Chunk ${entry.chunkId} has an empty vector`);
      }
    }

    for (const entry of entries) {
      const existing = this.entries.get(entry.chunkId);
      if (existing && existing.documentId !== entry.documentId) {
        this.byDocument.get(existing.documentId)?.delete(entry.chunkId);
      }
      this.entries.set(entry.chunkId, {
        chunkId: entry.chunkId,
        documentId: entry.documentId,
        vector: [...entry.vector],
        embeddingConfigId: entry.embeddingConfigId,
        seq: existing ? existing.seq : this.nextSeq++,
        norm: norm(entry.vector),
      });
      let ids = this.byDocument.get(entry.documentId);
      if (!ids) {
        ids = new Set();
        this.byDocument.set(entry.documentId, ids);
      }
      ids.add(entry.chunkId);
    }
  }

  /**
   * Top-k entries by descending cosine similarity; ties go to the earlier insertion.
   * @throws InvalidArgumentError when k is not a positive integer
   * @throws DimensionMismatchError when a candidate's dimension differs from the query
   */
  search(query: readonly number[], options: SearchOptions): SearchHit[] {
    const { k, documentIds } = options;
    if (!Number.isInteger(k) || k < 1) {
      throw new InvalidArgumentError(`k must be a positive integer, got ${k}`);
    }

    const candidates = documentIds ? this.candidatesFor(documentIds) : this.entries.values();
    const queryNorm = norm(query);
    const scored: { hit: SearchHit; seq: number }[] = [];

    for (const entry of candidates) {
      if (entry.vector.length !== query.length) {
        throw new DimensionMismatchError(
          `Query has ${query.length} dimensions but chunk ${entry.chunkId} has ${entry.vector.length}`,
          { expected: entry.vector.length, actual: query.length }
        );
      }
      scored.push({
        hit: {
          chunkId: entry.chunkId,
          documentId: entry.documentId,
          score: this.cosine(query, queryNorm, entry),
        },
        seq: entry.seq,
      });
    }

    return scored
      .sort((a, b) => b.hit.score - a.hit.score || a.seq - b.seq)
      .slice(0, k)
      .map(({ hit }) => hit);
  }

  /**
   * Remove every entry of a document. Returns the number removed.
   */
  deleteByDocument(documentId: string): number {
    const ids = this.byDocument.get(documentId);
    if (!ids) {
      return 0;
    }
    for (const id of ids) {
      this.entries.delete(id);
    }
    this.byDocument.delete(documentId);
    return ids.size;
  }

  /**
   * Ids of indexed documents, in the order their first entry was inserted.
   */
  documentOrder(): string[] {
    return [...this.byDocument.keys()];
  }

  has(chunkId: string): boolean {
    return this.entries.has(chunkId);
  }

  size(): number {
    return this.entries.size;
  }

  /**
   * Entries of one document in insertion order.
   */
  entriesForDocument(documentId: string): IndexEntry[] {
    return [...this.candidatesFor([documentId])]
      .sort((a, b) => a.seq - b.seq)
      .map(({ chunkId, documentId: docId, vector, embeddingConfigId }) => ({
        chunkId,
        documentId: docId,
        vector: [...vector],
        embeddingConfigId,
      }));
  }

  private *candidatesFor(documentIds: readonly string[]): Generator<StoredEntry> {
    for (const documentId of new Set(documentIds)) {
      for (const chunkId of this.byDocument.get(documentId) ?? []) {
        const entry = this.entries.get(chunkId);
        if (entry) {
          yield entry;
        }
      }
    }
  }

  private cosine(query: readonly number[], queryNorm: number, entry: StoredEntry): number {
    if (queryNorm === 0 || entry.norm === 0) {
      return 0;
    }
    let dot = 0;
    for (let i = 0; i < query.length; i++) {
      dot += query[i] * entry.vector[i];
    }
    return Math.max(-1, Math.min(1, dot / (queryNorm * entry.norm)));
  }
}
