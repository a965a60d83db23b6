import { z } from 'zod';

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) =>
  z.coerce.number().int().min(0).default(fallback);

export const envSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'production', 'test'])
      .default('development'),
    RAG_PROVIDERS_CONFIG_PATH: z.string().min(1).default('config/providers.json'),
    RAG_PROVIDERS_JSON: z.string().min(1).optional(),
    OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),
    OPENAI_API_KEY: z.string().optional(),
    ANTHROPIC_API_KEY: z.string().optional(),
    GEMINI_API_KEY: z.string().optional(),
    CHUNK_MAX_CHARS: positiveInt(2000),
    CHUNK_OVERLAP_CHARS: nonNegativeInt(200),
    EMBEDDING_BATCH_SIZE: positiveInt(32),
    QA_TOP_K: positiveInt(4),
    QA_MAX_CONTEXT_CHARS: positiveInt(8000),
    QA_MIN_SCORE: z.coerce.number().min(-1).max(1).default(0.1),
    QA_MIN_PARTIAL_CHARS: nonNegativeInt(200),
    LLM_TIMEOUT_MS: positiveInt(30_000),
    LLM_MAX_TOTAL_MS: positiveInt(90_000),
    PROVIDER_RETRY_AFTER_MS: nonNegativeInt(30_000),
    SUMMARY_SINGLE_PASS_CHARS: positiveInt(6000),
    SUMMARY_MAX_ROUNDS: positiveInt(3),
    BATCH_CONCURRENCY: positiveInt(4),
    INGESTION_TIMEOUT_MS: positiveInt(300_000),
    MAX_UPLOAD_BYTES: positiveInt(10 * 1024 * 1024),
    HEALTH_CHECK_INTERVAL_MS: nonNegativeInt(0),
  })
  .refine((env) => env.CHUNK_OVERLAP_CHARS < env.CHUNK_MAX_CHARS, {
    message: 'must be lower than CHUNK_MAX_CHARS',
    path: ['CHUNK_OVERLAP_CHARS'],
  })
  .refine((env) => env.LLM_TIMEOUT_MS <= env.LLM_MAX_TOTAL_MS, {
    message: 'must not exceed LLM_MAX_TOTAL_MS',
    path: ['LLM_TIMEOUT_MS'],
  });

export type EnvConfig = z.infer<typeof envSchema>;

export const ENV_KEYS = [
  'NODE_ENV',
  'RAG_PROVIDERS_CONFIG_PATH',
  'RAG_PROVIDERS_JSON',
  'OLLAMA_BASE_URL',
  'OPENAI_API_KEY',
  'ANTHROPIC_API_KEY',
  'GEMINI_API_KEY',
  'CHUNK_MAX_CHARS',
  'CHUNK_OVERLAP_CHARS',
  'EMBEDDING_BATCH_SIZE',
  'QA_TOP_K',
  'QA_MAX_CONTEXT_CHARS',
  'QA_MIN_SCORE',
  'QA_MIN_PARTIAL_CHARS',
  'LLM_TIMEOUT_MS',
  'LLM_MAX_TOTAL_MS',
  'PROVIDER_RETRY_AFTER_MS',
  'SUMMARY_SINGLE_PASS_CHARS',
  'SUMMARY_MAX_ROUNDS',
  'BATCH_CONCURRENCY',
  'INGESTION_TIMEOUT_MS',
  'MAX_UPLOAD_BYTES',
  'HEALTH_CHECK_INTERVAL_MS',
] as const satisfies ReadonlyArray<keyof EnvConfig>;
