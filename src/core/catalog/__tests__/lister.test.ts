// ═══════════════════════════════════════════════════════════════════════════════
// CATALOG LISTER TESTS — Bounded Listing and Failure Reporting
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import { CatalogInputError } from '../../../types/failures.js';
import { buildListingUrl, listCatalog, type ListingDeps } from '../lister.js';
import { CollectingReporter } from '../reporter.js';
import {
  TEST_BASE_URL,
  createStubFetch,
  detailUrl,
  jsonResponse,
  listingPayload,
  listingUrl,
  quietLogger,
  stubClient,
  textResponse,
  type RouteHandler,
} from '../../../tests/fixtures.js';

let reporter: CollectingReporter;

function depsFor(routes: Record<string, RouteHandler>) {
  const fetchImpl = createStubFetch(routes);
  const deps: ListingDeps = {
    http: stubClient(fetchImpl),
    reporter,
    logger: quietLogger(),
    baseUrl: TEST_BASE_URL,
    listPath: '/pokemon/',
  };
  return { deps, fetchImpl };
}

beforeEach(() => {
  reporter = new CollectingReporter();
});

describe('buildListingUrl', () => {
  it('should join base, path and limit', () => {
    expect(buildListingUrl('https://api.example.test/v2', '/pokemon/', 151))
      .toBe('https://api.example.test/v2/pokemon/?limit=151');
  });

  it('should not double a trailing slash on the base', () => {
    expect(buildListingUrl('https://api.example.test/v2/', '/pokemon/', 3))
      .toBe('https://api.example.test/v2/pokemon/?limit=3');
  });
});

describe('listCatalog', () => {
  describe('successful listing', () => {
    it('should return entries verbatim in upstream order', async () => {
      const { deps, fetchImpl } = depsFor({
        [listingUrl(2)]: () => jsonResponse(listingPayload(['sproutling', 'emberkit'])),
      });

      const entries = await listCatalog(2, deps);

      expect(entries).toEqual([
        { name: 'sproutling', reference: detailUrl(1) },
        { name: 'emberkit', reference: detailUrl(2) },
      ]);
      expect(reporter.failures).toEqual([]);
      expect(fetchImpl).toHaveBeenCalledTimes(1);
      expect(fetchImpl.mock.calls[0]?.[0]).toBe(listingUrl(2));
    });

    it('should never return more than the limit', async () => {
      const { deps } = depsFor({
        [listingUrl(2)]: () => jsonResponse(listingPayload(['a', 'b', 'c', 'd'])),
      });

      const entries = await listCatalog(2, deps);

      expect(entries.map(e => e.name)).toEqual(['a', 'b']);
    });

    it('should keep every element non-empty for any limit', async () => {
      const names = ['sproutling', 'emberkit', 'puddlepup', 'voltmouse', 'pebblet'];
      for (let limit = 1; limit <= 6; limit++) {
        const { deps } = depsFor({
          [listingUrl(limit)]: () => jsonResponse(listingPayload(names.slice(0, limit))),
        });

        const entries = await listCatalog(limit, deps);

        expect(entries.length).toBeLessThanOrEqual(limit);
        for (const entry of entries) {
          expect(entry.name.length).toBeGreaterThan(0);
          expect(entry.reference.length).toBeGreaterThan(0);
        }
      }
    });

    it('should drop items without a usable name or url', async () => {
      const { deps } = depsFor({
        [listingUrl(5)]: () => jsonResponse({
          results: [
            { name: '', url: detailUrl(1) },
            { name: 'emberkit' },
            'puddlepup',
            { name: 'voltmouse', url: detailUrl(4) },
          ],
        }),
      });

      const entries = await listCatalog(5, deps);

      expect(entries).toEqual([{ name: 'voltmouse', reference: detailUrl(4) }]);
      expect(reporter.failures).toEqual([]);
    });

    it('should return an empty list without a failure for an empty catalog', async () => {
      const { deps } = depsFor({
        [listingUrl(3)]: () => jsonResponse({ results: [] }),
      });

      expect(await listCatalog(3, deps)).toEqual([]);
      expect(reporter.failures).toEqual([]);
    });
  });

  describe('upstream failures', () => {
    it('should report one fetch failure when the transport fails', async () => {
      const { deps } = depsFor({});

      const entries = await listCatalog(3, deps);

      expect(entries).toEqual([]);
      expect(reporter.failures).toHaveLength(1);
      expect(reporter.failures[0]).toMatchObject({
        kind: 'fetch',
        code: 'NETWORK_ERROR',
        operation: 'list',
        url: listingUrl(3),
      });
    });

    it('should report a non-success status', async () => {
      const { deps } = depsFor({
        [listingUrl(3)]: () => jsonResponse({ detail: 'unavailable' }, 503),
      });

      expect(await listCatalog(3, deps)).toEqual([]);
      expect(reporter.failures).toHaveLength(1);
      expect(reporter.failures[0]).toMatchObject({ kind: 'fetch', code: 'HTTP_STATUS', statusCode: 503 });
    });

    it('should report an unreadable body as a fetch failure', async () => {
      const { deps } = depsFor({
        [listingUrl(3)]: () => textResponse('<html>maintenance</html>'),
      });

      expect(await listCatalog(3, deps)).toEqual([]);
      expect(reporter.failures).toHaveLength(1);
      expect(reporter.failures[0]).toMatchObject({ kind: 'fetch', code: 'INVALID_RESPONSE', operation: 'list' });
    });

    it('should report a body without a results array', async () => {
      const { deps } = depsFor({
        [listingUrl(3)]: () => jsonResponse({ count: 3 }),
      });

      expect(await listCatalog(3, deps)).toEqual([]);
      expect(reporter.failures).toHaveLength(1);
      expect(reporter.failures[0]).toMatchObject({
        kind: 'fetch',
        code: 'INVALID_RESPONSE',
        message: 'Listing response has no results array',
      });
    });
  });

  describe('limit validation', () => {
    it.each([0, -1, 1.5, Number.NaN])('should reject limit %s before any request', async (limit) => {
      const { deps, fetchImpl } = depsFor({});

      await expect(listCatalog(limit, deps)).rejects.toBeInstanceOf(CatalogInputError);
      expect(fetchImpl).not.toHaveBeenCalled();
      expect(reporter.failures).toEqual([]);
    });
  });
});
