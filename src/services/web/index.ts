// ═══════════════════════════════════════════════════════════════════════════════
// WEB SERVICES — Upstream JSON Transport
// ═══════════════════════════════════════════════════════════════════════════════

export {
  JsonFetchClient,
  createFetchClient,
  validateUrl,
  type FetchImpl,
  type HttpSettings,
  type JsonFetchClientOptions,
  type JsonSource,
  type URLValidation,
} from './fetch-client.js';
