export type ProviderKind = 'embedding' | 'generation';

export type ProviderType = 'ollama' | 'openai' | 'anthropic' | 'gemini' | 'local';

/**
 * One provider entry as declared in the providers configuration file.
 */
export interface ProviderConfig {
  name: string;
  kind: ProviderKind;
  type: ProviderType;
  model: string;
  priority: number;
  enabled: boolean;
  baseUrl?: string;
  temperature?: number;
  maxOutputTokens?: number;
  dimensions?: number;
}

export interface ProviderAvailability {
  available: boolean;
  checkedAt: string;
  reason?: string;
  /** When an unavailable provider may be tried again. Absent: only a health check or success clears it. */
  retryAt?: string;
}

/**
 * Provider as reported to callers, with the availability seen at call time.
 */
export interface ProviderDescriptor extends ProviderAvailability {
  name: string;
  kind: ProviderKind;
  type: ProviderType;
  model: string;
  priority: number;
}

export type ProviderFailureKind =
  | 'timeout'
  | 'authentication'
  | 'rate_limit'
  | 'malformed_response'
  | 'unavailable'
  | 'not_configured'
  | 'unknown';

export interface ProviderFailure {
  provider: string;
  kind: ProviderFailureKind;
  message: string;
  durationMs: number;
}
