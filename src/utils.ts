/**
 * Looks up a user-supplied setting keyed by element path.
 *
 * Tries an exact match first, then a case-insensitive match, then the longest
 * key that is a dot-boundary suffix of `path`, so `Item.Price` and `Price`
 * both address `Order.Item.Price`. Attribute (`@`) and choice (`#`) segments
 * are part of the final component and must match as written.
 *
 * @param map  - Settings keyed by full or partial path.
 * @param path - The canonical path produced by the schema walker.
 * @returns The matching value, or `undefined` if none found.
 */
export function lookupPath<T>(map: ReadonlyMap<string, T>, path: string): T | undefined {
  if (map.size === 0) return undefined;

  // Fast path: exact match
  const exact = map.get(path);
  if (exact !== undefined) return exact;

  const lowerPath = path.toLowerCase();
  let best: { value: T; length: number } | undefined;
  for (const [key, value] of map) {
    const lowerKey = key.toLowerCase();
    if (lowerKey === lowerPath) return value;
    if (lowerPath.endsWith(`.${lowerKey}`) && (!best || key.length > best.length)) {
      best = { value, length: key.length };
    }
  }
  return best?.value;
}

/**
 * Builds a Map from either a Map or a plain record, so options may be given
 * in whichever form is handier for the caller.
 */
export function toMap<T>(source: Map<string, T> | Record<string, T> | undefined): Map<string, T> {
  if (!source) return new Map();
  if (source instanceof Map) return new Map(source);
  return new Map(Object.entries(source));
}

/** Lowercase substring test against a list of hints. */
export function nameHas(name: string, hints: readonly string[]): boolean {
  const lower = name.toLowerCase();
  return hints.some((h) => lower.includes(h));
}
