// ═══════════════════════════════════════════════════════════════════════════════
// CATALOG CORE — Listing, Detail Resolution, Creature Model
// ═══════════════════════════════════════════════════════════════════════════════

export type { CatalogEntry, CreatureDetails, CreatureField, CreatureSnapshot } from './types.js';

export { Creature, createCreature } from './creature.js';

export { titleCase, normalizeMetricName } from './text.js';

export { isAbsent, isRecord, lookupPath, lookupStep, type JsonRecord } from './lookup.js';

export {
  buildDetails,
  extractCategories,
  extractHeightMeters,
  extractIdentifier,
  extractImageUrl,
  extractMetrics,
  extractTraits,
  extractWeightKilograms,
  type DetailExtraction,
  type Extraction,
  type FieldProblem,
} from './extractors.js';

export {
  CatalogLimitSchema,
  ListingEnvelopeSchema,
  ListingItemSchema,
  type ListingItem,
} from './schemas.js';

export {
  CollectingReporter,
  combineReporters,
  createLoggingReporter,
  type FailureReporter,
} from './reporter.js';

export { buildListingUrl, listCatalog, type CatalogDeps, type ListingDeps } from './lister.js';

export { resolveDetails } from './resolver.js';

export {
  DEFAULT_METRIC_CEILING,
  buildSelectionOptions,
  describeCreature,
  findSelection,
  formatIdentifier,
  formatMeasurement,
  joinNames,
  metricBars,
  splitIntoColumns,
  type CreatureView,
  type DetailRow,
  type MetricBar,
  type SelectionOption,
  type ViewOptions,
} from './presentation.js';

export {
  CreatureCatalogClient,
  createCatalogClient,
  getCatalogClient,
  type CatalogClientOptions,
} from './client.js';
