import { z } from 'zod';

/**
 * Zod schema for validating the providers configuration file.
 */

const providerKind = z.enum(['embedding', 'generation']);
const providerType = z.enum(['ollama', 'openai', 'anthropic', 'gemini', 'local']);

export const ProviderConfigSchema = z
  .object({
    name: z.string().min(1).max(64),
    kind: providerKind,
    type: providerType,
    model: z.string().min(1),
    priority: z.number().int().min(0),
    enabled: z.boolean().default(true),
    baseUrl: z.string().url().optional(),
    temperature: z.number().min(0).max(2).optional(),
    maxOutputTokens: z.number().int().positive().optional(),
    dimensions: z.number().int().positive().optional(),
  })
  .strict()
  .refine((p) => p.type !== 'anthropic' || p.kind === 'generation', {
    message: 'anthropic providers only support generation',
  })
  .refine((p) => p.type !== 'local' || p.kind === 'embedding', {
    message: 'local providers only support embedding',
  });

export const ProvidersConfigSchema = z
  .object({
    providers: z.array(ProviderConfigSchema),
  })
  .strict()
  .refine(
    (cfg) =>
      new Set(cfg.providers.map((p) => p.name)).size === cfg.providers.length,
    { message: 'provider names must be unique' }
  );

export type ProvidersConfigInput = z.input<typeof ProvidersConfigSchema>;
