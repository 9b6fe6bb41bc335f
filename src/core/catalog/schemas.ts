// ═══════════════════════════════════════════════════════════════════════════════
// CATALOG SCHEMAS — Listing Input and Response Validation
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

export const CatalogLimitSchema = z
  .number({ invalid_type_error: 'Limit must be a number' })
  .int('Limit must be an integer')
  .positive('Limit must be positive');

/**
 * Listing body. Only `results` is required; the rest of the envelope
 * (count, next, previous) is ignored.
 */
export const ListingEnvelopeSchema = z.object({
  results: z.array(z.unknown()),
});

export const ListingItemSchema = z.object({
  name: z.string().min(1),
  url: z.string().min(1),
});

export type ListingItem = z.infer<typeof ListingItemSchema>;
