import { Injectable } from '@nestjs/common';
import { mkdir, readFile, writeFile } from 'fs/promises';
import * as path from 'path';
import {
  DimensionMismatchError,
  InvalidArgumentError,
  logger,
  type Chunk,
} from '@docqa/core';
import { DocumentStoreService } from '../documents/document-store.service.js';
import { EmbeddingsService } from '../embeddings/embeddings.service.js';
import { VectorStoreService } from '../vector-store/vector-store.service.js';
import {
  SNAPSHOT_VERSION,
  SnapshotSchema,
  type RagSnapshot,
  type SnapshotChunk,
} from './snapshot.schema.js';

export interface ImportSummary {
  documents: number;
  chunks: number;
}

/**
 * Exports ready documents with their chunks and vectors, and loads them back so that
 * retrieval, including tie-breaks, behaves as before the export.
 */
@Injectable()
export class PersistenceService {
  constructor(
    private readonly documents: DocumentStoreService,
    private readonly vectorStore: VectorStoreService,
    private readonly embeddings: EmbeddingsService
  ) {}

  /**
   * Ready documents in the order they were published to the index, each followed by its
   * chunks in sequence order.
   */
  exportSnapshot(): RagSnapshot {
    const rank = new Map(this.vectorStore.documentOrder().map((id, i) => [id, i]));
    const ready = this.documents
      .records()
      .filter((doc) => doc.status === 'ready')
      .sort(
        (a, b) =>
          (rank.get(a.id) ?? Number.MAX_SAFE_INTEGER) - (rank.get(b.id) ?? Number.MAX_SAFE_INTEGER)
      );
    return {
      version: SNAPSHOT_VERSION,
      embeddingConfigId: this.embeddings.configId,
      exportedAt: new Date().toISOString(),
      documents: ready.map((doc) => ({
        id: doc.id,
        filename: doc.filename,
        mimeType: doc.mimeType,
        size: doc.size,
        createdAt: doc.createdAt,
        updatedAt: doc.updatedAt,
      })),
      chunks: ready.flatMap((doc) =>
        this.documents.chunksOf(doc.id).map((chunk) => ({
          id: chunk.id,
          documentId: chunk.documentId,
          sequenceIndex: chunk.sequenceIndex,
          text: chunk.text,
          start: chunk.start,
          end: chunk.end,
          tokenEstimate: chunk.tokenEstimate,
          vector: [...chunk.vector],
        }))
      ),
    };
  }

  /**
   * Validate a snapshot and publish its documents. Nothing is published if any check fails.
   * @throws InvalidArgumentError, DimensionMismatchError
   */
  importSnapshot(input: unknown): ImportSummary {
    const parsed = SnapshotSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`
      );
      throw new InvalidArgumentError(`Invalid snapshot:\n${issues.join('\n')}`);
    }
    const snapshot = parsed.data;

    const active = this.embeddings.configId;
    if (snapshot.embeddingConfigId !== active) {
      throw new DimensionMismatchError(
        `Snapshot was embedded with ${snapshot.embeddingConfigId}, active embedding configuration is ${active}`,
        { snapshot: snapshot.embeddingConfigId, active }
      );
    }

    const byDocument = this.groupChunks(snapshot);
    this.checkDimensions(snapshot.chunks);

    for (const doc of snapshot.documents) {
      const chunks: Chunk[] = (byDocument.get(doc.id) ?? []).map((chunk) => ({ ...chunk }));
      this.documents.restore(
        {
          ...doc,
          status: 'ready',
          chunkIds: [],
          embeddingConfigId: active,
        },
        chunks,
        active
      );
    }

    logger.info(
      `Imported ${snapshot.documents.length} documents and ${snapshot.chunks.length} chunks`
    );
    return { documents: snapshot.documents.length, chunks: snapshot.chunks.length };
  }

  async exportToFile(filePath: string): Promise<RagSnapshot> {
    const snapshot = this.exportSnapshot();
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, JSON.stringify(snapshot, null, 2), 'utf8');
    logger.info(`Snapshot with ${snapshot.documents.length} documents written to ${filePath}`);
    return snapshot;
  }

  async importFromFile(filePath: string): Promise<ImportSummary> {
    const content = await readFile(filePath, 'utf8');
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new InvalidArgumentError(
        `Snapshot file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return this.importSnapshot(raw);
  }

  /**
   * Chunks per document in sequence order, after checking ids and ownership.
   */
  private groupChunks(snapshot: RagSnapshot): Map<string, SnapshotChunk[]> {
    const byDocument = new Map<string, SnapshotChunk[]>();
    for (const doc of snapshot.documents) {
      if (byDocument.has(doc.id) || this.documents.has(doc.id)) {
        throw new InvalidArgumentError(`Duplicate document id ${doc.id}`);
      }
      byDocument.set(doc.id, []);
    }

    const seen = new Set<string>();
    for (const chunk of snapshot.chunks) {
      if (seen.has(chunk.id) || this.vectorStore.has(chunk.id)) {
        throw new InvalidArgumentError(`Duplicate chunk id ${chunk.id}`);
      }
      seen.add(chunk.id);
      const list = byDocument.get(chunk.documentId);
      if (!list) {
        throw new InvalidArgumentError(
          `Chunk ${chunk.id} belongs to unknown document ${chunk.documentId}`
        );
      }
      list.push(chunk);
    }

    for (const [documentId, list] of byDocument) {
      list.sort((a, b) => a.sequenceIndex - b.sequenceIndex);
      for (let i = 1; i < list.length; i++) {
        if (list[i].sequenceIndex === list[i - 1].sequenceIndex) {
          throw new InvalidArgumentError(
            `Document ${documentId} has two chunks with sequence index ${list[i].sequenceIndex}`
          );
        }
      }
    }
    return byDocument;
  }

  private checkDimensions(chunks: readonly SnapshotChunk[]): void {
    const expected = this.embeddings.dimensions ?? chunks[0]?.vector.length;
    for (const chunk of chunks) {
      if (chunk.vector.length !== expected) {
        throw new DimensionMismatchError(
          `Chunk ${chunk.id} has ${chunk.vector.length} dimensions, expected ${expected}`,
          { expected, actual: chunk.vector.length }
        );
      }
    }
  }
}
