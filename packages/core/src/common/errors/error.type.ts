export enum ErrorType {
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  EMPTY_DOCUMENT = 'EMPTY_DOCUMENT',
  EXTRACTION_FAILED = 'EXTRACTION_FAILED',
  INVALID_CHUNK_CONFIG = 'INVALID_CHUNK_CONFIG',
  EMBEDDING_FAILURE = 'EMBEDDING_FAILURE',
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
  INVALID_STATE_TRANSITION = 'INVALID_STATE_TRANSITION',
  ALL_PROVIDERS_EXHAUSTED = 'ALL_PROVIDERS_EXHAUSTED',
  NOT_FOUND = 'NOT_FOUND',
  CANCELLED = 'CANCELLED',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  UNKNOWN = 'UNKNOWN',
}

export type ErrorMetadata = Record<string, unknown>;

/**
 * Serializable form of an error, used in batch results.
 */
export interface ErrorPayload {
  type: ErrorType;
  message: string;
  metadata?: ErrorMetadata;
}
