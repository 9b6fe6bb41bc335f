// ═══════════════════════════════════════════════════════════════════════════════
// DETAIL RESOLVER — Catalog Entry to Populated Creature
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';
import { loggers } from '../../logging/index.js';
import { processingFailure } from '../../types/failures.js';
import { createCreature, type Creature } from './creature.js';
import { buildDetails } from './extractors.js';
import type { CatalogDeps } from './lister.js';
import { isRecord } from './lookup.js';
import type { CatalogEntry } from './types.js';

/**
 * Fetch and normalize the details behind `entry`.
 *
 * Always resolves to a Creature carrying at least its display name and
 * reference. A failed request leaves the details unset; a payload with
 * malformed fields commits every other field and reports the bad ones.
 */
export async function resolveDetails(entry: CatalogEntry, deps: CatalogDeps): Promise<Creature> {
  const creature = createCreature(entry);
  const logger = (deps.logger ?? loggers.resolver()).child({ operationId: uuidv4() });
  logger.debug('Resolving creature', { name: creature.displayName, url: entry.reference });

  const fetched = await deps.http.getJson(entry.reference, 'detail');
  if (!fetched.ok) {
    deps.reporter.report(fetched.error);
    return creature;
  }

  const payload = fetched.value;
  if (!isRecord(payload)) {
    deps.reporter.report(processingFailure(
      'UNEXPECTED_SHAPE',
      'detail',
      entry.reference,
      'Detail response is not a JSON object'
    ));
    return creature;
  }

  const { details, problems } = buildDetails(payload);
  creature.applyDetails(details);

  if (problems.length > 0) {
    deps.reporter.report(processingFailure(
      'FIELD_EXTRACTION',
      'detail',
      entry.reference,
      problems.map(p => p.reason).join('; '),
      { fields: problems.map(p => p.field) }
    ));
  }

  logger.info('Creature resolved', {
    name: creature.displayName,
    identifier: creature.identifier,
    skippedFields: problems.length,
  });
  return creature;
}
