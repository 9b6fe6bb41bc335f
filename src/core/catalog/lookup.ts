// ═══════════════════════════════════════════════════════════════════════════════
// PATH LOOKUP — Optional Access into Loosely-Typed JSON
// ═══════════════════════════════════════════════════════════════════════════════

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * One step of a lookup. Anything that is not a plain object has no keys.
 */
export function lookupStep(value: unknown, key: string): unknown {
  if (!isRecord(value) || !Object.prototype.hasOwnProperty.call(value, key)) {
    return undefined;
  }
  return value[key];
}

/**
 * Follow `path` from `value`, yielding undefined as soon as a step is missing.
 *
 * @example
 * lookupPath(payload, ['sprites', 'other', 'official-artwork', 'front_default'])
 */
export function lookupPath(value: unknown, path: readonly string[]): unknown {
  let current = value;
  for (const key of path) {
    current = lookupStep(current, key);
    if (current === undefined) return undefined;
  }
  return current;
}

/**
 * Missing keys and explicit nulls are both "absent" in upstream payloads.
 */
export function isAbsent(value: unknown): value is null | undefined {
  return value === undefined || value === null;
}
