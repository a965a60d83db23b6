export interface ChunkingSettings {
  maxChunkChars: number;
  overlapChars: number;
}

export interface QaSettings {
  topK: number;
  maxContextChars: number;
  minScore: number;
  minPartialChars: number;
}

export interface LlmSettings {
  timeoutMs: number;
  maxTotalMs: number;
  /** How long a provider that failed as unavailable is skipped. */
  retryAfterMs: number;
}

export interface SummarySettings {
  singlePassChars: number;
  maxRounds: number;
}

export interface IngestionSettings {
  maxUploadBytes: number;
  timeoutMs: number;
}

/**
 * Settings consumed by the pipeline services, resolved once at startup.
 */
export interface RagSettings {
  chunking: ChunkingSettings;
  embeddingBatchSize: number;
  qa: QaSettings;
  llm: LlmSettings;
  summary: SummarySettings;
  ingestion: IngestionSettings;
  batchConcurrency: number;
  healthCheckIntervalMs: number;
}
