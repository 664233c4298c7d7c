/**
 * Token map helpers
 * A token map is an ordered marker → replacement mapping; insertion order is
 * the priority order used when two markers start at the same offset.
 */

export type TokenMap = ReadonlyMap<string, string>;

export type TokenMapSource =
  | Readonly<Record<string, string>>
  | Iterable<readonly [string, string]>;

function isEntryIterable(
  source: TokenMapSource
): source is Iterable<readonly [string, string]> {
  return Symbol.iterator in source;
}

export function createTokenMap(source: TokenMapSource): TokenMap {
  const entries = isEntryIterable(source) ? source : Object.entries(source);
  const map = new Map<string, string>();

  for (const [key, value] of entries) {
    if (key.length === 0) {
      throw new Error("Token map keys must not be empty");
    }
    map.set(key, value);
  }

  return map;
}

/**
 * Appends entries whose keys are not present yet; existing keys keep their
 * position and value.
 */
export function extendTokenMap(base: TokenMap, extra: TokenMapSource): TokenMap {
  const merged = new Map(base);
  for (const [key, value] of createTokenMap(extra)) {
    if (!merged.has(key)) {
      merged.set(key, value);
    }
  }
  return merged;
}

/**
 * Pairs of [key, containedKey] where the replacement for `key` contains the
 * literal text of `containedKey`. Such a map re-expands on the next pass.
 */
export function findSelfReferencingTokens(map: TokenMap): Array<[string, string]> {
  const hazards: Array<[string, string]> = [];
  for (const [key, value] of map) {
    for (const candidate of map.keys()) {
      if (value.includes(candidate)) {
        hazards.push([key, candidate]);
      }
    }
  }
  return hazards;
}
