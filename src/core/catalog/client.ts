// ═══════════════════════════════════════════════════════════════════════════════
// CREATURE CATALOG CLIENT — Lister, Resolver and View Behind One Object
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig, type CatalogConfig } from '../../config/index.js';
import { memoizeByKey, type Memoized } from '../../infrastructure/memo/memoize.js';
import { Logger, settingsFromConfig } from '../../logging/index.js';
import { JsonFetchClient, type FetchImpl, type JsonSource } from '../../services/web/index.js';
import type { Creature } from './creature.js';
import { listCatalog, type ListingDeps } from './lister.js';
import { describeCreature, type CreatureView } from './presentation.js';
import { createLoggingReporter, type FailureReporter } from './reporter.js';
import { resolveDetails } from './resolver.js';
import type { CatalogEntry } from './types.js';

export interface CatalogClientOptions {
  config?: CatalogConfig;
  /** Replaces the HTTP client entirely */
  http?: JsonSource;
  /** Transport for the default HTTP client */
  fetchImpl?: FetchImpl;
  reporter?: FailureReporter;
  logger?: Logger;
}

export class CreatureCatalogClient {
  private readonly config: CatalogConfig;
  private readonly deps: ListingDeps;
  private readonly cachedListing: Memoized<[number], readonly CatalogEntry[]>;

  constructor(options: CatalogClientOptions = {}) {
    this.config = options.config ?? loadConfig();
    const logger = options.logger ?? new Logger({ component: 'catalog' }, settingsFromConfig(this.config));

    this.deps = {
      http: options.http ?? new JsonFetchClient({
        settings: {
          timeoutMs: this.config.api.timeoutMs,
          userAgent: this.config.api.userAgent,
        },
        fetchImpl: options.fetchImpl,
        logger: logger.child({ component: 'http' }),
      }),
      reporter: options.reporter ?? createLoggingReporter(logger),
      logger,
      baseUrl: this.config.api.baseUrl,
      listPath: this.config.api.listPath,
    };

    // The upstream catalog is static; an empty listing is a failure and is
    // not kept, so the next call asks again.
    this.cachedListing = memoizeByKey(
      async (limit: number): Promise<readonly CatalogEntry[]> =>
        Object.freeze(await listCatalog(limit, this.deps)),
      {
        key: limit => String(limit),
        cacheIf: entries => entries.length > 0,
      }
    );
  }

  /**
   * Catalog entries, cached per limit for the life of this client.
   */
  listCatalog(limit: number = this.config.api.listLimit): Promise<readonly CatalogEntry[]> {
    return this.cachedListing(limit);
  }

  resolveDetails(entry: CatalogEntry): Promise<Creature> {
    return resolveDetails(entry, this.deps);
  }

  describe(creature: Creature): CreatureView {
    return describeCreature(creature, { metricCeiling: this.config.presentation.metricCeiling });
  }

  clearCache(): void {
    this.cachedListing.clear();
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// SINGLETON INSTANCE
// ─────────────────────────────────────────────────────────────────────────────────

let catalogClient: CreatureCatalogClient | null = null;

export function getCatalogClient(): CreatureCatalogClient {
  if (!catalogClient) {
    catalogClient = new CreatureCatalogClient();
  }
  return catalogClient;
}

export function createCatalogClient(options?: CatalogClientOptions): CreatureCatalogClient {
  return new CreatureCatalogClient(options);
}
