// ═══════════════════════════════════════════════════════════════════════════════
// JSON FETCH CLIENT — Single-Shot GET with Timeout and Failure Classification
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig } from '../../config/index.js';
import { loggers, type Logger } from '../../logging/index.js';
import { err, ok, tryCatch, type AsyncResult } from '../../types/result.js';
import {
  fetchFailure,
  processingFailure,
  type CatalogFailure,
  type CatalogOperation,
} from '../../types/failures.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface HttpSettings {
  timeoutMs: number;
  userAgent: string;
  acceptHeader: string;
}

export type FetchImpl = (input: string, init: RequestInit) => Promise<Response>;

export interface JsonFetchClientOptions {
  settings?: Partial<HttpSettings>;
  /** Transport, the global fetch unless replaced */
  fetchImpl?: FetchImpl;
  logger?: Logger;
}

/**
 * Anything that can turn a URL into parsed JSON or a classified failure.
 */
export interface JsonSource {
  getJson(url: string, operation: CatalogOperation): AsyncResult<unknown, CatalogFailure>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// URL VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

export interface URLValidation {
  valid: boolean;
  error?: string;
  parsed?: URL;
}

export function validateUrl(url: string): URLValidation {
  try {
    const parsed = new URL(url);

    if (!['http:', 'https:'].includes(parsed.protocol)) {
      return { valid: false, error: 'Only HTTP/HTTPS protocols allowed' };
    }

    return { valid: true, parsed };
  } catch {
    return { valid: false, error: 'Invalid URL format' };
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// CLIENT
// ─────────────────────────────────────────────────────────────────────────────────

export class JsonFetchClient implements JsonSource {
  private readonly settings: HttpSettings;
  private readonly fetchImpl: FetchImpl;
  private readonly logger: Logger;

  constructor(options: JsonFetchClientOptions = {}) {
    const { timeoutMs, userAgent, acceptHeader = 'application/json' } = options.settings ?? {};
    if (timeoutMs !== undefined && userAgent !== undefined) {
      this.settings = { timeoutMs, userAgent, acceptHeader };
    } else {
      const api = loadConfig().api;
      this.settings = {
        timeoutMs: timeoutMs ?? api.timeoutMs,
        userAgent: userAgent ?? api.userAgent,
        acceptHeader,
      };
    }
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? loggers.http();
  }

  async getJson(url: string, operation: CatalogOperation): AsyncResult<unknown, CatalogFailure> {
    const startTime = Date.now();

    const validation = validateUrl(url);
    if (!validation.valid) {
      return err(fetchFailure('INVALID_URL', operation, url, validation.error ?? 'Invalid URL'));
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.settings.timeoutMs);

    let body: string;
    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.settings.userAgent,
          'Accept': this.settings.acceptHeader,
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        this.logger.time(`GET ${url} ${response.status}`, startTime);
        return err(fetchFailure(
          'HTTP_STATUS',
          operation,
          url,
          `Upstream responded with status ${response.status}`,
          { statusCode: response.status }
        ));
      }

      body = await response.text();
      this.logger.time(`GET ${url} ${response.status}`, startTime, { bytes: body.length });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));

      if (controller.signal.aborted) {
        return err(fetchFailure(
          'TIMEOUT',
          operation,
          url,
          `Request timed out after ${this.settings.timeoutMs}ms`,
          { cause }
        ));
      }

      return err(fetchFailure('NETWORK_ERROR', operation, url, cause.message, { cause }));
    } finally {
      clearTimeout(timeoutId);
    }

    const parsed = tryCatch((): unknown => JSON.parse(body));
    if (!parsed.ok) {
      return err(processingFailure(
        'INVALID_JSON',
        operation,
        url,
        `Response body is not valid JSON: ${parsed.error.message}`,
        { cause: parsed.error }
      ));
    }

    return ok(parsed.value);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// FACTORY
// ─────────────────────────────────────────────────────────────────────────────────

export function createFetchClient(options?: JsonFetchClientOptions): JsonFetchClient {
  return new JsonFetchClient(options);
}
