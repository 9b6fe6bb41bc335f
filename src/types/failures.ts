// ═══════════════════════════════════════════════════════════════════════════════
// CATALOG FAILURES — Recoverable Failure Values and Caller Errors
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Which upstream call a failure belongs to.
 */
export type CatalogOperation = 'list' | 'detail';

export const FetchFailureCode = {
  INVALID_URL: 'INVALID_URL',
  NETWORK_ERROR: 'NETWORK_ERROR',
  TIMEOUT: 'TIMEOUT',
  HTTP_STATUS: 'HTTP_STATUS',
  INVALID_RESPONSE: 'INVALID_RESPONSE',
} as const;

export type FetchFailureCode = typeof FetchFailureCode[keyof typeof FetchFailureCode];

export const ProcessingFailureCode = {
  INVALID_JSON: 'INVALID_JSON',
  UNEXPECTED_SHAPE: 'UNEXPECTED_SHAPE',
  FIELD_EXTRACTION: 'FIELD_EXTRACTION',
} as const;

export type ProcessingFailureCode = typeof ProcessingFailureCode[keyof typeof ProcessingFailureCode];

/**
 * The request could not be completed, or the upstream answered with a
 * non-success status. For the listing call an unusable body is also reported
 * as a fetch failure.
 */
export interface FetchFailure {
  readonly kind: 'fetch';
  readonly code: FetchFailureCode;
  readonly operation: CatalogOperation;
  readonly url: string;
  readonly message: string;
  readonly statusCode?: number;
  readonly cause?: Error;
}

/**
 * The body arrived but could not be interpreted as the expected payload.
 */
export interface ProcessingFailure {
  readonly kind: 'processing';
  readonly code: ProcessingFailureCode;
  readonly operation: CatalogOperation;
  readonly url: string;
  readonly message: string;
  /** Creature fields left unset because their payload value was malformed */
  readonly fields?: readonly string[];
  readonly cause?: Error;
}

export type CatalogFailure = FetchFailure | ProcessingFailure;

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTRUCTORS
// ─────────────────────────────────────────────────────────────────────────────────

export function fetchFailure(
  code: FetchFailureCode,
  operation: CatalogOperation,
  url: string,
  message: string,
  options?: { statusCode?: number; cause?: Error }
): FetchFailure {
  return {
    kind: 'fetch',
    code,
    operation,
    url,
    message,
    statusCode: options?.statusCode,
    cause: options?.cause,
  };
}

export function processingFailure(
  code: ProcessingFailureCode,
  operation: CatalogOperation,
  url: string,
  message: string,
  options?: { fields?: readonly string[]; cause?: Error }
): ProcessingFailure {
  return {
    kind: 'processing',
    code,
    operation,
    url,
    message,
    fields: options?.fields,
    cause: options?.cause,
  };
}

export function isFetchFailure(failure: CatalogFailure): failure is FetchFailure {
  return failure.kind === 'fetch';
}

export function isProcessingFailure(failure: CatalogFailure): failure is ProcessingFailure {
  return failure.kind === 'processing';
}

// ─────────────────────────────────────────────────────────────────────────────────
// CALLER ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

export type CatalogInputErrorCode = 'INVALID_LIMIT' | 'ALREADY_POPULATED';

/**
 * Thrown for misuse of the library, never for upstream problems.
 */
export class CatalogInputError extends Error {
  readonly code: CatalogInputErrorCode;

  constructor(code: CatalogInputErrorCode, message: string) {
    super(message);
    this.name = 'CatalogInputError';
    this.code = code;
  }
}
