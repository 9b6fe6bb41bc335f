// ═══════════════════════════════════════════════════════════════════════════════
// CREATURE — Normalized, Display-Ready Catalog Item
// ═══════════════════════════════════════════════════════════════════════════════

import { CatalogInputError } from '../../types/failures.js';
import { titleCase } from './text.js';
import type { CatalogEntry, CreatureDetails, CreatureSnapshot } from './types.js';

const NO_NAMES: readonly string[] = Object.freeze([]);

/**
 * A creature starts with only its name and reference. Detail fields are
 * committed at most once, all together, by `applyDetails`.
 */
export class Creature {
  readonly displayName: string;
  readonly sourceReference: string;
  private details: CreatureDetails | null = null;

  constructor(entry: CatalogEntry) {
    this.displayName = titleCase(entry.name);
    this.sourceReference = entry.reference;
  }

  get populated(): boolean {
    return this.details !== null;
  }

  get identifier(): number | undefined {
    return this.details?.identifier;
  }

  get categories(): readonly string[] {
    return this.details?.categories ?? NO_NAMES;
  }

  get traits(): readonly string[] {
    return this.details?.traits ?? NO_NAMES;
  }

  get heightMeters(): number | undefined {
    return this.details?.heightMeters;
  }

  get weightKilograms(): number | undefined {
    return this.details?.weightKilograms;
  }

  get imageUrl(): string | undefined {
    return this.details?.imageUrl;
  }

  get metrics(): ReadonlyMap<string, number> {
    return this.details?.metrics ?? new Map<string, number>();
  }

  /**
   * Commit detail fields. Copies are taken so later changes to the caller's
   * arrays or map do not leak in.
   *
   * @throws CatalogInputError when the creature already carries details
   */
  applyDetails(details: CreatureDetails): void {
    if (this.details !== null) {
      throw new CatalogInputError(
        'ALREADY_POPULATED',
        `Details for ${this.displayName} have already been applied`
      );
    }

    this.details = Object.freeze({
      identifier: details.identifier,
      categories: Object.freeze([...details.categories]),
      traits: Object.freeze([...details.traits]),
      heightMeters: details.heightMeters,
      weightKilograms: details.weightKilograms,
      imageUrl: details.imageUrl,
      metrics: new Map(details.metrics),
    });
  }

  toSnapshot(): CreatureSnapshot {
    return {
      displayName: this.displayName,
      sourceReference: this.sourceReference,
      populated: this.populated,
      identifier: this.identifier,
      categories: this.categories,
      traits: this.traits,
      heightMeters: this.heightMeters,
      weightKilograms: this.weightKilograms,
      imageUrl: this.imageUrl,
      metrics: [...this.metrics.entries()],
    };
  }
}

export function createCreature(entry: CatalogEntry): Creature {
  return new Creature(entry);
}
