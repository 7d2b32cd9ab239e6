/**
 * Layer Merge Utility
 *
 * Shallow, key-by-key merge of configuration tiers.
 * Later layers win; `undefined` falls through to the layer below.
 */

/**
 * Check if a value is a plain object (not null, array, or other types)
 */
export function isPlainObject(obj: unknown): obj is Record<string, unknown> {
  return obj !== null && typeof obj === 'object' && !Array.isArray(obj);
}

/**
 * Merge layers over a base mapping without mutating any input.
 * - Defined values from a later layer replace earlier ones
 * - `undefined` (or a missing key) keeps the value from below
 */
export function mergeLayers<T extends object>(base: T, ...layers: Partial<T>[]): T {
  const result: T = { ...base };

  for (const layer of layers) {
    const defined = Object.fromEntries(Object.entries(layer).filter(([, value]) => value !== undefined));
    Object.assign(result, defined);
  }

  return result;
}
