// ═══════════════════════════════════════════════════════════════════════════════
// CATALOG TYPES — Listing Entries and Creature Details
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Raw listing item. `reference` is the upstream detail URL, passed through
 * untouched; `name` is stored as the upstream spells it.
 */
export interface CatalogEntry {
  readonly name: string;
  readonly reference: string;
}

/**
 * Detail fields committed to a Creature in one step.
 */
export interface CreatureDetails {
  readonly identifier?: number;
  readonly categories: readonly string[];
  readonly traits: readonly string[];
  readonly heightMeters?: number;
  readonly weightKilograms?: number;
  readonly imageUrl?: string;
  /** Insertion order is the order the metrics appeared upstream */
  readonly metrics: ReadonlyMap<string, number>;
}

export type CreatureField = keyof CreatureDetails;

/**
 * Plain-object form of a Creature, for handing to a renderer or serializing.
 */
export interface CreatureSnapshot {
  readonly displayName: string;
  readonly sourceReference: string;
  readonly populated: boolean;
  readonly identifier?: number;
  readonly categories: readonly string[];
  readonly traits: readonly string[];
  readonly heightMeters?: number;
  readonly weightKilograms?: number;
  readonly imageUrl?: string;
  readonly metrics: ReadonlyArray<readonly [string, number]>;
}
