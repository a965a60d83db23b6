import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigService } from '@nestjs/config';
import { ConfigurationError, DEFAULT_EMBEDDING_PROVIDER } from '@docqa/core';
import { ConfigurationService } from '../configuration.js';

const build = (env: Record<string, string>) =>
  new ConfigurationService(new ConfigService(env));

const INLINE_PROVIDERS = JSON.stringify({
  providers: [
    { name: 'gpt', kind: 'generation', type: 'openai', model: 'gpt-4o-mini', priority: 2 },
    { name: 'llama', kind: 'generation', type: 'ollama', model: 'llama3', priority: 1 },
  ],
});

describe('ConfigurationService', () => {
  const originalEnv = { ...process.env };
  let dir: string;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of [
      'OPENAI_API_KEY',
      'ANTHROPIC_API_KEY',
      'GEMINI_API_KEY',
      'CHUNK_MAX_CHARS',
      'CHUNK_OVERLAP_CHARS',
      'RAG_PROVIDERS_JSON',
      'RAG_PROVIDERS_CONFIG_PATH',
    ]) {
      delete process.env[key];
    }
    dir = mkdtempSync(path.join(os.tmpdir(), 'docqa-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('applies defaults', () => {
    const config = build({ RAG_PROVIDERS_JSON: INLINE_PROVIDERS });

    expect(config.rag.chunking).toEqual({ maxChunkChars: 2000, overlapChars: 200 });
    expect(config.rag.embeddingBatchSize).toBe(32);
    expect(config.rag.qa.topK).toBe(4);
    expect(config.rag.llm).toEqual({ timeoutMs: 30000, maxTotalMs: 90000, retryAfterMs: 30000 });
    expect(config.rag.healthCheckIntervalMs).toBe(0);
    expect(config.ollamaBaseUrl).toBe('http://localhost:11434');
    expect(config.nodeEnv).toBe('test');
    expect(config.isTest).toBe(true);
    expect(config.isProduction).toBe(false);
  });

  it('coerces numeric variables', () => {
    const config = build({
      RAG_PROVIDERS_JSON: INLINE_PROVIDERS,
      CHUNK_MAX_CHARS: '800',
      CHUNK_OVERLAP_CHARS: '80',
      QA_MIN_SCORE: '0.25',
    });

    expect(config.rag.chunking).toEqual({ maxChunkChars: 800, overlapChars: 80 });
    expect(config.rag.qa.minScore).toBe(0.25);
  });

  it.each([
    [{ CHUNK_MAX_CHARS: '100', CHUNK_OVERLAP_CHARS: '100' }],
    [{ QA_MIN_SCORE: '2' }],
    [{ LLM_TIMEOUT_MS: '5000', LLM_MAX_TOTAL_MS: '1000' }],
    [{ BATCH_CONCURRENCY: 'many' }],
  ])('rejects invalid settings %p', (env) => {
    expect(() => build({ RAG_PROVIDERS_JSON: INLINE_PROVIDERS, ...env })).toThrow(
      ConfigurationError
    );
  });

  it('orders inline providers by priority', () => {
    const config = build({ RAG_PROVIDERS_JSON: INLINE_PROVIDERS });

    expect(config.providers.map((p) => p.name)).toEqual(['llama', 'gpt']);
  });

  it('rejects inline providers that are not JSON', () => {
    expect(() => build({ RAG_PROVIDERS_JSON: '{' })).toThrow(
      'RAG_PROVIDERS_JSON is not valid JSON'
    );
  });

  it('reads providers from the configured file', () => {
    const file = path.join(dir, 'providers.json');
    writeFileSync(file, INLINE_PROVIDERS, 'utf-8');

    const config = build({ RAG_PROVIDERS_CONFIG_PATH: file });

    expect(config.providers.map((p) => p.name)).toEqual(['local-hash', 'llama', 'gpt']);
  });

  it('falls back to the local embedding provider without a providers file', () => {
    const config = build({ RAG_PROVIDERS_CONFIG_PATH: path.join(dir, 'missing.json') });

    expect(config.providers).toEqual([DEFAULT_EMBEDDING_PROVIDER]);
  });

  it('treats blank API keys as missing', () => {
    const config = build({
      RAG_PROVIDERS_JSON: INLINE_PROVIDERS,
      OPENAI_API_KEY: 'test-secret',
      ANTHROPIC_API_KEY: '   ',
    });

    expect(config.apiKeyFor('openai')).toBe('test-secret');
    expect(config.apiKeyFor('anthropic')).toBeUndefined();
    expect(config.apiKeyFor('gemini')).toBeUndefined();
    expect(config.apiKeyFor('ollama')).toBeUndefined();
  });
});
