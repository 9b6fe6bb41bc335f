// ═══════════════════════════════════════════════════════════════════════════════
// CATALOG LISTER — One Bounded Listing Call
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';
import { loggers, type Logger } from '../../logging/index.js';
import type { JsonSource } from '../../services/web/index.js';
import { CatalogInputError, fetchFailure, isFetchFailure } from '../../types/failures.js';
import type { FailureReporter } from './reporter.js';
import { CatalogLimitSchema, ListingEnvelopeSchema, ListingItemSchema } from './schemas.js';
import type { CatalogEntry } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface CatalogDeps {
  readonly http: JsonSource;
  readonly reporter: FailureReporter;
  readonly logger?: Logger;
}

export interface ListingDeps extends CatalogDeps {
  readonly baseUrl: string;
  readonly listPath: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// URL
// ─────────────────────────────────────────────────────────────────────────────────

export function buildListingUrl(baseUrl: string, listPath: string, limit: number): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, '')}${listPath}`);
  url.searchParams.set('limit', String(limit));
  return url.toString();
}

// ─────────────────────────────────────────────────────────────────────────────────
// LISTER
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Fetch at most `limit` catalog entries in upstream order.
 *
 * Upstream problems never escape: the result is then empty and exactly one
 * FetchFailure goes to `deps.reporter`. Items without a usable name or url
 * are dropped.
 *
 * @throws CatalogInputError when `limit` is not a positive integer
 */
export async function listCatalog(limit: number, deps: ListingDeps): Promise<CatalogEntry[]> {
  const checked = CatalogLimitSchema.safeParse(limit);
  if (!checked.success) {
    throw new CatalogInputError('INVALID_LIMIT', checked.error.issues.map(i => i.message).join('; '));
  }

  const logger = (deps.logger ?? loggers.catalog()).child({ operationId: uuidv4() });
  const url = buildListingUrl(deps.baseUrl, deps.listPath, limit);
  logger.debug('Listing catalog', { limit, url });

  const fetched = await deps.http.getJson(url, 'list');
  if (!fetched.ok) {
    const failure = fetched.error;
    // An unreadable body means the listing could not be fetched.
    deps.reporter.report(
      isFetchFailure(failure)
        ? failure
        : fetchFailure('INVALID_RESPONSE', 'list', url, failure.message, { cause: failure.cause })
    );
    return [];
  }

  const envelope = ListingEnvelopeSchema.safeParse(fetched.value);
  if (!envelope.success) {
    deps.reporter.report(
      fetchFailure('INVALID_RESPONSE', 'list', url, 'Listing response has no results array')
    );
    return [];
  }

  const entries: CatalogEntry[] = [];
  let dropped = 0;
  for (const raw of envelope.data.results) {
    const item = ListingItemSchema.safeParse(raw);
    if (!item.success) {
      dropped++;
      continue;
    }
    entries.push({ name: item.data.name, reference: item.data.url });
  }

  if (dropped > 0) {
    logger.warn('Dropped malformed listing items', { dropped });
  }
  if (entries.length > limit) {
    logger.warn('Upstream returned more entries than requested', { limit, received: entries.length });
  }

  const bounded = entries.slice(0, limit);
  logger.info('Catalog listed', { count: bounded.length });
  return bounded;
}
