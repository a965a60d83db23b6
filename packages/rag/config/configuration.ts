import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ConfigurationError,
  loadProvidersConfig,
  parseProvidersConfig,
  type ProviderConfig,
  type ProviderType,
  type RagSettings,
} from '@docqa/core';
import { envSchema, ENV_KEYS, type EnvConfig } from './env.validation.js';

@Injectable()
export class ConfigurationService {
  private readonly logger = new Logger(ConfigurationService.name);
  private readonly config: EnvConfig;
  private readonly providerConfigs: ProviderConfig[];
  private readonly ragSettings: RagSettings;

  constructor(private configService: ConfigService) {
    // Collect all env variables specified in the schema
    const envVariables: Record<string, string | undefined> = {};
    for (const key of ENV_KEYS) {
      envVariables[key] = this.configService.get<string>(key);
    }

    const result = envSchema.safeParse(envVariables);

    if (!result.success) {
      const errorMessages = result.error.issues.map(
        (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
      );
      this.logger.error(
        `\n\nMissing or invalid environment variables:\n${errorMessages.join('\n')}\n\nPlease check your .env file and ensure all required variables are set.\n`
      );
      throw new ConfigurationError(
        'Invalid environment variables. Check logs above for details.',
        { issues: errorMessages }
      );
    }

    this.config = result.data;
    this.providerConfigs = this.resolveProviders();
    this.ragSettings = {
      chunking: {
        maxChunkChars: this.config.CHUNK_MAX_CHARS,
        overlapChars: this.config.CHUNK_OVERLAP_CHARS,
      },
      embeddingBatchSize: this.config.EMBEDDING_BATCH_SIZE,
      qa: {
        topK: this.config.QA_TOP_K,
        maxContextChars: this.config.QA_MAX_CONTEXT_CHARS,
        minScore: this.config.QA_MIN_SCORE,
        minPartialChars: this.config.QA_MIN_PARTIAL_CHARS,
      },
      llm: {
        timeoutMs: this.config.LLM_TIMEOUT_MS,
        maxTotalMs: this.config.LLM_MAX_TOTAL_MS,
        retryAfterMs: this.config.PROVIDER_RETRY_AFTER_MS,
      },
      summary: {
        singlePassChars: this.config.SUMMARY_SINGLE_PASS_CHARS,
        maxRounds: this.config.SUMMARY_MAX_ROUNDS,
      },
      ingestion: {
        maxUploadBytes: this.config.MAX_UPLOAD_BYTES,
        timeoutMs: this.config.INGESTION_TIMEOUT_MS,
      },
      batchConcurrency: this.config.BATCH_CONCURRENCY,
      healthCheckIntervalMs: this.config.HEALTH_CHECK_INTERVAL_MS,
    };
  }

  private resolveProviders(): ProviderConfig[] {
    const inline = this.config.RAG_PROVIDERS_JSON;
    if (!inline) {
      return loadProvidersConfig(this.config.RAG_PROVIDERS_CONFIG_PATH);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(inline);
    } catch {
      throw new ConfigurationError('RAG_PROVIDERS_JSON is not valid JSON');
    }
    return parseProvidersConfig(raw, 'RAG_PROVIDERS_JSON');
  }

  get nodeEnv(): string {
    return this.config.NODE_ENV;
  }

  get rag(): RagSettings {
    return this.ragSettings;
  }

  /**
   * Enabled providers, by ascending priority.
   */
  get providers(): ProviderConfig[] {
    return this.providerConfigs;
  }

  get ollamaBaseUrl(): string {
    return this.config.OLLAMA_BASE_URL;
  }

  /**
   * API key for a remote provider type, if configured.
   */
  apiKeyFor(type: ProviderType): string | undefined {
    const key =
      type === 'openai'
        ? this.config.OPENAI_API_KEY
        : type === 'anthropic'
          ? this.config.ANTHROPIC_API_KEY
          : type === 'gemini'
            ? this.config.GEMINI_API_KEY
            : undefined;
    return key && key.trim() !== '' ? key : undefined;
  }

  get isProduction(): boolean {
    return this.config.NODE_ENV === 'production';
  }

  get isTest(): boolean {
    return this.config.NODE_ENV === 'test';
  }
}
