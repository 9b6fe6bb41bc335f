// ═══════════════════════════════════════════════════════════════════════════════
// TEXT NORMALIZATION — Display Casing for Upstream Identifiers
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Upper-case the first character of every whitespace-separated word and
 * lower-case the rest of it. Whitespace is preserved as given.
 *
 * @example
 * titleCase('bulbasaur')      // 'Bulbasaur'
 * titleCase('special attack') // 'Special Attack'
 * titleCase('mr-mime')        // 'Mr-mime'
 */
export function titleCase(value: string): string {
  return value.replace(/\S+/g, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Metric names arrive hyphenated (`special-attack`); display keys are spaced
 * and title-cased (`Special Attack`).
 */
export function normalizeMetricName(rawName: string): string {
  return titleCase(rawName.replace(/-/g, ' '));
}
