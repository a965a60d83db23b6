import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { ProvidersConfigSchema } from './providersSchema.js';
import { ConfigurationError } from '../../common/errors/rag.errors.js';
import type { ProviderConfig } from '../../types/rag/provider.js';
import logger from '../../logger/logger.js';

export const DEFAULT_EMBEDDING_PROVIDER: ProviderConfig = {
  name: 'local-hash',
  kind: 'embedding',
  type: 'local',
  model: 'feature-hash-384',
  priority: 0,
  enabled: true,
  dimensions: 384,
};

/**
 * Validates a parsed providers document and returns the enabled entries by priority.
 * @param raw - Parsed JSON content
 * @param source - Label used in error messages
 */
export function parseProvidersConfig(
  raw: unknown,
  source = 'providers config'
): ProviderConfig[] {
  const result = ProvidersConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError(
      `Invalid ${source}:\n${issues.join('\n')}`,
      { source }
    );
  }

  return result.data.providers
    .filter((p) => p.enabled)
    .sort((a, b) => a.priority - b.priority);
}

/**
 * Loads the providers configuration file. A missing file yields the local embedding provider only.
 * @param configPath - Path to the JSON file, resolved against the working directory
 */
export function loadProvidersConfig(configPath: string): ProviderConfig[] {
  const absolutePath = path.resolve(configPath);
  if (!existsSync(absolutePath)) {
    logger.warn(
      `Providers configuration not found at ${absolutePath}; using the local embedding provider only`
    );
    return [DEFAULT_EMBEDDING_PROVIDER];
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(
        `Invalid JSON format in providers configuration ${absolutePath}`,
        { path: absolutePath }
      );
    }
    throw error;
  }

  const providers = parseProvidersConfig(raw, absolutePath);
  if (!providers.some((p) => p.kind === 'embedding')) {
    logger.warn(
      `No embedding provider enabled in ${absolutePath}; adding ${DEFAULT_EMBEDDING_PROVIDER.name}`
    );
    return [DEFAULT_EMBEDDING_PROVIDER, ...providers];
  }
  return providers;
}
