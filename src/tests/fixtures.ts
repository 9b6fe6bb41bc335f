// ═══════════════════════════════════════════════════════════════════════════════
// TEST FIXTURES — In-Process Upstream Stand-In and Sample Payloads
// ═══════════════════════════════════════════════════════════════════════════════

import { vi } from 'vitest';
import { validateConfig, type CatalogConfig } from '../config/index.js';
import { Logger } from '../logging/index.js';
import { JsonFetchClient, type FetchImpl } from '../services/web/index.js';

export const TEST_BASE_URL = 'https://api.example.test/v2';

export function detailUrl(id: number): string {
  return `${TEST_BASE_URL}/pokemon/${id}/`;
}

export function listingUrl(limit: number): string {
  return `${TEST_BASE_URL}/pokemon/?limit=${limit}`;
}

export function testConfig(): CatalogConfig {
  return validateConfig({ api: { baseUrl: TEST_BASE_URL, timeoutMs: 1000 } });
}

/**
 * Logger that discards everything unless a sink is given.
 */
export function quietLogger(write: (line: string) => void = () => {}): Logger {
  return new Logger({}, { minLevel: 'fatal', format: 'json', write });
}

// ─────────────────────────────────────────────────────────────────────────────────
// UPSTREAM STAND-IN
// ─────────────────────────────────────────────────────────────────────────────────

export type RouteHandler = () => Response | Promise<Response>;

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function textResponse(body: string, status: number = 200): Response {
  return new Response(body, { status, headers: { 'content-type': 'text/plain' } });
}

/**
 * A fetch that answers from `routes` by exact URL and fails like a refused
 * connection for anything else.
 */
export function createStubFetch(routes: Record<string, RouteHandler>) {
  return vi.fn(async (input: string, _init: RequestInit): Promise<Response> => {
    const handler = routes[input];
    if (!handler) {
      throw new TypeError(`fetch failed: connect ECONNREFUSED for ${input}`);
    }
    return handler();
  });
}

export function stubClient(fetchImpl: FetchImpl): JsonFetchClient {
  return new JsonFetchClient({
    settings: { timeoutMs: 1000, userAgent: 'creature-catalog-tests' },
    fetchImpl,
    logger: quietLogger(),
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// PAYLOADS
// ─────────────────────────────────────────────────────────────────────────────────

export function listingPayload(names: readonly string[]): Record<string, unknown> {
  return {
    count: names.length,
    next: null,
    previous: null,
    results: names.map((name, index) => ({ name, url: detailUrl(index + 1) })),
  };
}

export function detailPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 1,
    name: 'sproutling',
    height: 7,
    weight: 69,
    sprites: {
      front_default: 'https://img.example.test/sprites/1.png',
      other: {
        'official-artwork': { front_default: 'https://img.example.test/artwork/1.png' },
      },
    },
    types: [
      { slot: 1, type: { name: 'grass', url: `${TEST_BASE_URL}/type/12/` } },
      { slot: 2, type: { name: 'poison', url: `${TEST_BASE_URL}/type/4/` } },
    ],
    abilities: [
      { ability: { name: 'overgrow' }, is_hidden: false },
      { ability: { name: 'leaf-guard' }, is_hidden: true },
    ],
    stats: [
      { base_stat: 45, effort: 0, stat: { name: 'hp' } },
      { base_stat: 49, effort: 0, stat: { name: 'attack' } },
      { base_stat: 65, effort: 1, stat: { name: 'special-attack' } },
    ],
    ...overrides,
  };
}
