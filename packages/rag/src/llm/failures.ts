import {
  ConfigurationError,
  type ProviderFailure,
  type ProviderFailureKind,
} from '@docqa/core';
import type { MessageContent } from '@langchain/core/messages';

/**
 * Raised when a provider answers with something that is not usable text.
 */
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

const AUTH_PATTERN = /api[ _-]?key|unauthori[sz]ed|authenticat|permission denied|forbidden/i;
const RATE_LIMIT_PATTERN = /rate[ _-]?limit|too many requests|quota/i;
const UNREACHABLE_PATTERN =
  /ECONNREFUSED|ENOTFOUND|ECONNRESET|EAI_AGAIN|EHOSTUNREACH|fetch failed|socket hang up|network error|service unavailable|overloaded/i;
const TIMEOUT_PATTERN = /ETIMEDOUT|timed? ?out/i;

function statusOf(error: object): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  return undefined;
}

function codeOf(error: object): string {
  return 'code' in error && typeof error.code === 'string' ? error.code : '';
}

/**
 * Map a provider error to a failure kind. `timedOut` is true when the attempt's own
 * deadline fired.
 */
export function classifyFailure(error: unknown, timedOut: boolean): ProviderFailureKind {
  if (timedOut) {
    return 'timeout';
  }
  if (error instanceof MalformedResponseError) {
    return 'malformed_response';
  }
  if (error instanceof ConfigurationError) {
    return 'not_configured';
  }
  if (typeof error !== 'object' || error === null) {
    return 'unknown';
  }

  const status = statusOf(error);
  if (status === 401 || status === 403) return 'authentication';
  if (status === 429) return 'rate_limit';
  if (status === 502 || status === 503 || status === 504 || status === 529) return 'unavailable';
  if (status === 408) return 'timeout';

  const text = `${codeOf(error)} ${error instanceof Error ? error.message : ''}`;
  if (AUTH_PATTERN.test(text)) return 'authentication';
  if (RATE_LIMIT_PATTERN.test(text)) return 'rate_limit';
  if (UNREACHABLE_PATTERN.test(text)) return 'unavailable';
  if (TIMEOUT_PATTERN.test(text)) return 'timeout';
  return 'unknown';
}

export function failureOf(
  provider: string,
  kind: ProviderFailureKind,
  message: string,
  durationMs = 0
): ProviderFailure {
  return { provider, kind, message, durationMs };
}

/**
 * Plain text of a chat model reply. Non-text parts are ignored.
 */
export function contentToText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content.trim();
  }
  if (!Array.isArray(content)) {
    return '';
  }
  return content
    .map((part) =>
      typeof part === 'object' &&
      part !== null &&
      'text' in part &&
      typeof part.text === 'string'
        ? part.text
        : ''
    )
    .join('')
    .trim();
}
