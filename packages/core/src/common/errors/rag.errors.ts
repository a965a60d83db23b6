import { BaseError } from './base.error.js';
import { ErrorType } from './error.type.js';
import type { ProviderFailure } from '../../types/rag/provider.js';
import type { DocumentStatus } from '../../types/rag/document.js';

export class UnsupportedFormatError extends BaseError {
  constructor(public readonly declaredType: string) {
    super(
      ErrorType.UNSUPPORTED_FORMAT,
      `Unsupported document format: ${declaredType || '(none)'}`,
      { declaredType }
    );
  }
}

export class EmptyDocumentError extends BaseError {
  constructor(public readonly filename?: string) {
    super(
      ErrorType.EMPTY_DOCUMENT,
      filename
        ? `Document ${filename} contains no extractable text`
        : 'Document contains no extractable text',
      filename ? { filename } : undefined
    );
  }
}

export class ExtractionFailedError extends BaseError {
  constructor(
    public readonly format: string,
    reason: string
  ) {
    super(
      ErrorType.EXTRACTION_FAILED,
      `Failed to extract ${format} text: ${reason}`,
      { format }
    );
  }
}

export class InvalidChunkConfigError extends BaseError {
  constructor(
    public readonly maxChunkChars: number,
    public readonly overlapChars: number,
    reason: string
  ) {
    super(ErrorType.INVALID_CHUNK_CONFIG, `Invalid chunk configuration: ${reason}`, {
      maxChunkChars,
      overlapChars,
    });
  }
}

export class EmbeddingFailureError extends BaseError {
  constructor(
    public readonly index: number,
    reason: string
  ) {
    super(
      ErrorType.EMBEDDING_FAILURE,
      `Embedding failed for item ${index}: ${reason}`,
      { index }
    );
  }
}

export class DimensionMismatchError extends BaseError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(ErrorType.DIMENSION_MISMATCH, message, metadata);
  }
}

export class InvalidStateTransitionError extends BaseError {
  constructor(
    public readonly documentId: string,
    public readonly from: DocumentStatus,
    public readonly to: DocumentStatus
  ) {
    super(
      ErrorType.INVALID_STATE_TRANSITION,
      `Document ${documentId} cannot move from ${from} to ${to}`,
      { documentId, from, to }
    );
  }
}

export class AllProvidersExhaustedError extends BaseError {
  constructor(public readonly failures: ProviderFailure[]) {
    super(
      ErrorType.ALL_PROVIDERS_EXHAUSTED,
      failures.length > 0
        ? `All providers failed: ${failures
            .map((f) => `${f.provider} (${f.kind}: ${f.message})`)
            .join('; ')}`
        : 'No generation provider to try',
      { failures }
    );
  }
}

export class NotFoundError extends BaseError {
  constructor(
    public readonly resource: 'document' | 'chunk',
    public readonly id: string
  ) {
    super(ErrorType.NOT_FOUND, `${resource} ${id} not found`, { resource, id });
  }
}

export class CancelledError extends BaseError {
  constructor(public readonly reason: string = 'Operation cancelled') {
    super(ErrorType.CANCELLED, `Cancelled: ${reason}`, { reason });
  }
}

export class InvalidArgumentError extends BaseError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(ErrorType.INVALID_ARGUMENT, message, metadata);
  }
}

export class ConfigurationError extends BaseError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(ErrorType.CONFIGURATION_ERROR, message, metadata);
  }
}
