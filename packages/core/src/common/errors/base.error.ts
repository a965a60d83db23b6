import { ErrorMetadata, ErrorPayload, ErrorType } from './error.type.js';

/**
 * Root of every error raised by the document QA core.
 */
export class BaseError extends Error {
  constructor(
    public readonly type: ErrorType,
    message: string,
    public readonly metadata?: ErrorMetadata
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): ErrorPayload {
    return {
      type: this.type,
      message: this.message,
      ...(this.metadata ? { metadata: this.metadata } : {}),
    };
  }
}

/**
 * Converts any thrown value into a serializable payload.
 * @param error - The caught value
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof BaseError) {
    return error.toJSON();
  }
  if (error instanceof Error) {
    return { type: ErrorType.UNKNOWN, message: error.message };
  }
  return { type: ErrorType.UNKNOWN, message: String(error) };
}

export function isErrorOfType(error: unknown, type: ErrorType): boolean {
  return error instanceof BaseError && error.type === type;
}
