// ═══════════════════════════════════════════════════════════════════════════════
// FAILURE REPORTING — Structured Notifications to the Caller
// ═══════════════════════════════════════════════════════════════════════════════

import { loggers, type Logger } from '../../logging/index.js';
import { isFetchFailure, isProcessingFailure, type CatalogFailure } from '../../types/failures.js';

/**
 * Receives every recoverable failure. Lister and resolver call `report`
 * once per failure and carry on.
 */
export interface FailureReporter {
  report(failure: CatalogFailure): void;
}

/**
 * Default reporter: one warn line per failure.
 */
export function createLoggingReporter(logger: Logger = loggers.catalog()): FailureReporter {
  return {
    report(failure: CatalogFailure): void {
      logger.warn(`${failure.operation} ${failure.kind} failure: ${failure.message}`, {
        code: failure.code,
        url: failure.url,
        ...(isFetchFailure(failure) && failure.statusCode !== undefined && { statusCode: failure.statusCode }),
        ...(isProcessingFailure(failure) && failure.fields && { fields: failure.fields }),
      });
    },
  };
}

/**
 * Keeps failures for a UI to display after the call returns.
 */
export class CollectingReporter implements FailureReporter {
  private readonly collected: CatalogFailure[] = [];

  report(failure: CatalogFailure): void {
    this.collected.push(failure);
  }

  get failures(): readonly CatalogFailure[] {
    return this.collected;
  }

  /**
   * Hand back everything collected so far and start empty.
   */
  drain(): CatalogFailure[] {
    return this.collected.splice(0, this.collected.length);
  }
}

/**
 * Fan one failure out to several reporters.
 */
export function combineReporters(...reporters: FailureReporter[]): FailureReporter {
  return {
    report(failure: CatalogFailure): void {
      for (const reporter of reporters) {
        reporter.report(failure);
      }
    },
  };
}
