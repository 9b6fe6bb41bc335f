// ═══════════════════════════════════════════════════════════════════════════════
// PRESENTATION — Display Strings and Bar Ratios for a Renderer
// ═══════════════════════════════════════════════════════════════════════════════
//
// Pure helpers; nothing here renders. A UI feeds a Creature in and lays the
// returned strings and ratios out however it likes.

import type { Creature } from './creature.js';
import { titleCase } from './text.js';
import type { CatalogEntry } from './types.js';

export const DEFAULT_METRIC_CEILING = 255;

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface SelectionOption {
  readonly label: string;
  readonly entry: CatalogEntry;
}

export interface DetailRow {
  readonly label: string;
  readonly value: string;
}

export interface MetricBar {
  readonly name: string;
  readonly value: number;
  /** value / ceiling, clamped to [0, 1] */
  readonly ratio: number;
}

export interface CreatureView {
  readonly title: string;
  readonly imageUrl?: string;
  readonly imageCaption: string;
  readonly rows: readonly DetailRow[];
  readonly metricColumns: readonly (readonly MetricBar[])[];
}

export interface ViewOptions {
  metricCeiling?: number;
  metricColumnCount?: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SELECTION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Numbered labels in listing order: `1 - Bulbasaur`, `2 - Ivysaur`, ...
 */
export function buildSelectionOptions(entries: readonly CatalogEntry[]): SelectionOption[] {
  return entries.map((entry, index) => ({
    label: `${index + 1} - ${titleCase(entry.name)}`,
    entry,
  }));
}

export function findSelection(
  options: readonly SelectionOption[],
  label: string
): CatalogEntry | undefined {
  return options.find(option => option.label === label)?.entry;
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * `#001` style; empty when the identifier is unknown.
 */
export function formatIdentifier(identifier: number | undefined): string {
  if (identifier === undefined) return '';
  return `#${String(identifier).padStart(3, '0')}`;
}

/**
 * Whole numbers keep one decimal (`7.0 m`), fractions print as they are
 * (`0.7 m`).
 */
export function formatMeasurement(value: number | undefined, unit: string): string | undefined {
  if (value === undefined) return undefined;
  const text = Number.isInteger(value) ? value.toFixed(1) : String(value);
  return `${text} ${unit}`;
}

export function joinNames(names: readonly string[]): string {
  return names.join(', ');
}

export function metricBars(
  metrics: ReadonlyMap<string, number>,
  ceiling: number = DEFAULT_METRIC_CEILING
): MetricBar[] {
  return [...metrics].map(([name, value]) => ({
    name,
    value,
    ratio: Math.min(1, Math.max(0, value / ceiling)),
  }));
}

/**
 * Deal items across columns by alternating index: 0, 2, 4... in the first.
 */
export function splitIntoColumns<T>(items: readonly T[], columnCount: number = 2): T[][] {
  const columns: T[][] = Array.from({ length: Math.max(1, columnCount) }, () => []);
  items.forEach((item, index) => {
    columns[index % columns.length]?.push(item);
  });
  return columns;
}

// ─────────────────────────────────────────────────────────────────────────────────
// VIEW
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Everything a detail page shows. Rows with nothing to show are left out, so
 * an unpopulated creature degrades to its title.
 */
export function describeCreature(creature: Creature, options: ViewOptions = {}): CreatureView {
  const rows: DetailRow[] = [];
  const addRow = (label: string, value: string | undefined): void => {
    if (value !== undefined && value !== '') rows.push({ label, value });
  };

  addRow('Type', joinNames(creature.categories));
  addRow('Height', formatMeasurement(creature.heightMeters, 'm'));
  addRow('Weight', formatMeasurement(creature.weightKilograms, 'kg'));
  addRow('Abilities', joinNames(creature.traits));

  const bars = metricBars(creature.metrics, options.metricCeiling);

  return {
    title: `${creature.displayName} ${formatIdentifier(creature.identifier)}`.trim(),
    imageUrl: creature.imageUrl,
    imageCaption: creature.displayName,
    rows,
    metricColumns: bars.length > 0 ? splitIntoColumns(bars, options.metricColumnCount) : [],
  };
}
