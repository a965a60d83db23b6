/**
 * A contiguous span of a document's extracted text: `text === source.slice(start, end)`.
 */
export interface ChunkSegment {
  index: number;
  text: string;
  start: number;
  end: number;
}

export interface Chunk {
  id: string;
  documentId: string;
  sequenceIndex: number;
  text: string;
  start: number;
  end: number;
  tokenEstimate: number;
  vector: number[];
}

export interface IndexEntry {
  chunkId: string;
  documentId: string;
  vector: number[];
  embeddingConfigId: string;
}

export interface SearchHit {
  chunkId: string;
  documentId: string;
  score: number;
}

export interface SearchOptions {
  k: number;
  documentIds?: readonly string[];
}
