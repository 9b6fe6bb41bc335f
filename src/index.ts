// ═══════════════════════════════════════════════════════════════════════════════
// CREATURE CATALOG — Public Entry Point
// ═══════════════════════════════════════════════════════════════════════════════

export * from './core/catalog/index.js';

export {
  CatalogInputError,
  fetchFailure,
  isFetchFailure,
  isProcessingFailure,
  processingFailure,
  type CatalogFailure,
  type CatalogInputErrorCode,
  type CatalogOperation,
  type FetchFailure,
  type FetchFailureCode,
  type ProcessingFailure,
  type ProcessingFailureCode,
} from './types/failures.js';

export { ok, err, type Result, type AsyncResult } from './types/result.js';

export { memoizeByKey, type Memoized, type MemoizeOptions } from './infrastructure/memo/memoize.js';

export {
  ConfigError,
  loadConfig,
  reloadConfig,
  validateConfig,
  type CatalogConfig,
} from './config/index.js';

export { Logger, getLogger, type LogLevel } from './logging/index.js';

export { JsonFetchClient, createFetchClient, type FetchImpl, type JsonSource } from './services/web/index.js';
