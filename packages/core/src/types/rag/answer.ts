import type { ErrorPayload } from '../../common/errors/error.type.js';

export interface Citation {
  chunkId: string;
  documentId: string;
  filename: string;
  sequenceIndex: number;
  score: number;
}

export interface Answer {
  question: string;
  documentIds: string[];
  /** Every retrieved chunk, by descending score. */
  retrievedChunkIds: string[];
  /** Chunks actually placed in the prompt context, by descending score. */
  citedChunkIds: string[];
  citations: Citation[];
  answer: string;
  providerUsed: string;
  noContext: boolean;
  confidence: number;
  timestamp: string;
}

export type SummaryStrategy = 'single-pass' | 'map-reduce';

export interface SummaryResult {
  summary: string;
  providerUsed: string;
  originalLength: number;
  summaryLength: number;
  strategy: SummaryStrategy;
  partCount: number;
}

export type BatchItemResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ErrorPayload };

export interface HealthReport {
  status: 'ok' | 'degraded';
  documents: number;
  availableProviders: string[];
}
