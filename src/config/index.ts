// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment Loading for the Catalog Client
// ═══════════════════════════════════════════════════════════════════════════════

import { validateConfig, type CatalogConfig } from './schema.js';

export {
  CatalogConfigSchema,
  ConfigError,
  DEFAULT_API_BASE_URL,
  formatConfigErrors,
  getDefaultConfig,
  validateConfig,
  type ApiConfig,
  type CatalogConfig,
  type Environment,
  type LoggingConfig,
} from './schema.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────
//
// Unset variables come back undefined so the schema defaults apply. A value
// that does not parse is passed through as NaN and rejected by the schema.

function envBool(key: string, defaultValue: boolean = false): boolean {
  const value = process.env[key]?.toLowerCase();
  if (value === undefined) return defaultValue;
  return value === 'true' || value === '1' || value === 'yes';
}

function envNumber(key: string): number | undefined {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function envString(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? undefined : value;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Read every recognised variable into the raw config shape.
 */
export function readEnvironment(): Record<string, unknown> {
  return {
    environment: envString('NODE_ENV'),
    api: {
      baseUrl: envString('CATALOG_API_BASE_URL'),
      listPath: envString('CATALOG_LIST_PATH'),
      listLimit: envNumber('CATALOG_LIST_LIMIT'),
      timeoutMs: envNumber('CATALOG_TIMEOUT_MS'),
      userAgent: envString('CATALOG_USER_AGENT'),
    },
    presentation: {
      metricCeiling: envNumber('CATALOG_METRIC_CEILING'),
    },
    logging: {
      level: envString('LOG_LEVEL')?.toLowerCase() ?? (envBool('DEBUG') ? 'debug' : undefined),
      format: envString('LOG_FORMAT')?.toLowerCase(),
    },
  };
}

let cachedConfig: CatalogConfig | null = null;

export function loadConfig(): CatalogConfig {
  if (cachedConfig) return cachedConfig;
  cachedConfig = validateConfig(readEnvironment());
  return cachedConfig;
}

export function reloadConfig(): CatalogConfig {
  cachedConfig = null;
  return loadConfig();
}

export function isProduction(): boolean {
  return loadConfig().environment === 'production';
}
