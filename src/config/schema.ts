// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMA — Validated Catalog Configuration
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

export const DEFAULT_API_BASE_URL = 'https://pokeapi.co/api/v2';

export const EnvironmentSchema = z.enum(['development', 'test', 'staging', 'production']);

export type Environment = z.infer<typeof EnvironmentSchema>;

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

export const ApiConfigSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_API_BASE_URL),
  listPath: z.string().startsWith('/').default('/pokemon/'),
  /** First-generation catalog size */
  listLimit: z.number().int().positive().default(151),
  timeoutMs: z.number().int().positive().max(120_000).default(15_000),
  userAgent: z.string().min(1).default('creature-catalog/1.0'),
});

export const PresentationConfigSchema = z.object({
  /** Practical ceiling of a base metric, used only to scale bars */
  metricCeiling: z.number().positive().default(255),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  format: z.enum(['pretty', 'json']).optional(),
});

export const CatalogConfigSchema = z.object({
  environment: EnvironmentSchema.default('development'),
  api: ApiConfigSchema.default({}),
  presentation: PresentationConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type CatalogConfig = z.infer<typeof CatalogConfigSchema>;
export type ApiConfig = z.infer<typeof ApiConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function formatConfigErrors(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate raw configuration, throwing ConfigError with every issue found.
 */
export function validateConfig(raw: unknown): CatalogConfig {
  const result = CatalogConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatConfigErrors(result.error));
  }
  return result.data;
}

export function getDefaultConfig(): CatalogConfig {
  return CatalogConfigSchema.parse({});
}
