// ═══════════════════════════════════════════════════════════════════════════════
// DETAIL EXTRACTORS — Per-Field Extraction from a Detail Payload
// ═══════════════════════════════════════════════════════════════════════════════
//
// Each extractor reads one field and never looks at another. An absent key
// is not an error: it yields the field's default. A key whose value has the
// wrong shape fails that field only.

import { err, ok, unwrapOr, type Result } from '../../types/result.js';
import { isAbsent, isRecord, lookupPath, type JsonRecord } from './lookup.js';
import { normalizeMetricName, titleCase } from './text.js';
import type { CreatureDetails, CreatureField } from './types.js';

export type Extraction<T> = Result<T, string>;

const IMAGE_PATH = ['sprites', 'other', 'official-artwork', 'front_default'] as const;

// Upstream measures in decimeters and hectograms.
const TENTHS = 10;

// ─────────────────────────────────────────────────────────────────────────────────
// SCALARS
// ─────────────────────────────────────────────────────────────────────────────────

export function extractIdentifier(payload: JsonRecord): Extraction<number | undefined> {
  const raw = payload['id'];
  if (isAbsent(raw)) return ok(undefined);
  if (typeof raw === 'number' && Number.isInteger(raw)) return ok(raw);
  return err('id is not an integer');
}

function extractTenths(payload: JsonRecord, key: string): Extraction<number> {
  const raw = payload[key] ?? 0;
  if (typeof raw === 'number' && Number.isFinite(raw)) return ok(raw / TENTHS);
  return err(`${key} is not a number`);
}

export function extractHeightMeters(payload: JsonRecord): Extraction<number> {
  return extractTenths(payload, 'height');
}

export function extractWeightKilograms(payload: JsonRecord): Extraction<number> {
  return extractTenths(payload, 'weight');
}

export function extractImageUrl(payload: JsonRecord): Extraction<string | undefined> {
  const raw = lookupPath(payload, IMAGE_PATH);
  if (isAbsent(raw)) return ok(undefined);
  if (typeof raw === 'string') return ok(raw);
  return err(`${IMAGE_PATH.join('.')} is not a string`);
}

// ─────────────────────────────────────────────────────────────────────────────────
// LISTS
// ─────────────────────────────────────────────────────────────────────────────────

function extractList(payload: JsonRecord, key: string): Extraction<readonly unknown[]> {
  const raw = payload[key];
  if (isAbsent(raw)) return ok([]);
  if (Array.isArray(raw)) return ok(raw);
  return err(`${key} is not a list`);
}

/**
 * Pull `element.<wrapper>.name` out of every element of `payload[key]`,
 * title-cased, in order.
 */
function extractNames(payload: JsonRecord, key: string, wrapper: string): Extraction<readonly string[]> {
  const list = extractList(payload, key);
  if (!list.ok) return list;

  const names: string[] = [];
  for (const [index, element] of list.value.entries()) {
    const name = lookupPath(element, [wrapper, 'name']);
    if (typeof name !== 'string') {
      return err(`${key}[${index}].${wrapper}.name is not a string`);
    }
    names.push(titleCase(name));
  }
  return ok(names);
}

export function extractCategories(payload: JsonRecord): Extraction<readonly string[]> {
  return extractNames(payload, 'types', 'type');
}

export function extractTraits(payload: JsonRecord): Extraction<readonly string[]> {
  return extractNames(payload, 'abilities', 'ability');
}

/**
 * A repeated metric name overwrites the earlier value and keeps the position
 * where the name was first seen.
 */
export function extractMetrics(payload: JsonRecord): Extraction<ReadonlyMap<string, number>> {
  const list = extractList(payload, 'stats');
  if (!list.ok) return list;

  const metrics = new Map<string, number>();
  for (const [index, element] of list.value.entries()) {
    const name = lookupPath(element, ['stat', 'name']);
    if (typeof name !== 'string') {
      return err(`stats[${index}].stat.name is not a string`);
    }
    const score = isRecord(element) ? element['base_stat'] : undefined;
    if (typeof score !== 'number' || !Number.isInteger(score)) {
      return err(`stats[${index}].base_stat is not an integer`);
    }
    metrics.set(normalizeMetricName(name), score);
  }
  return ok(metrics);
}

// ─────────────────────────────────────────────────────────────────────────────────
// RECORD BUILDER
// ─────────────────────────────────────────────────────────────────────────────────

export interface FieldProblem {
  readonly field: CreatureField;
  readonly reason: string;
}

export interface DetailExtraction {
  readonly details: CreatureDetails;
  readonly problems: readonly FieldProblem[];
}

/**
 * Run every extractor against the payload. Failed fields fall back to their
 * unset/empty value and are listed in `problems`.
 */
export function buildDetails(payload: JsonRecord): DetailExtraction {
  const problems: FieldProblem[] = [];

  const take = <T>(field: CreatureField, extraction: Extraction<T>, fallback: T): T => {
    if (!extraction.ok) {
      problems.push({ field, reason: extraction.error });
    }
    return unwrapOr(extraction, fallback);
  };

  const details: CreatureDetails = {
    identifier: take<number | undefined>('identifier', extractIdentifier(payload), undefined),
    heightMeters: take<number | undefined>('heightMeters', extractHeightMeters(payload), undefined),
    weightKilograms: take<number | undefined>('weightKilograms', extractWeightKilograms(payload), undefined),
    imageUrl: take<string | undefined>('imageUrl', extractImageUrl(payload), undefined),
    categories: take<readonly string[]>('categories', extractCategories(payload), []),
    traits: take<readonly string[]>('traits', extractTraits(payload), []),
    metrics: take<ReadonlyMap<string, number>>('metrics', extractMetrics(payload), new Map<string, number>()),
  };

  return { details, problems };
}
