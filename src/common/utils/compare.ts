/**
 * Ordering helpers shared by the schema builder and the similarity ranker.
 *
 * Location labels are compared by Unicode code point so that ordering does not
 * depend on the host locale or on UTF-16 surrogate layout.
 */

/**
 * Compares two strings code point by code point.
 */
export const compareCodePoints = (a: string, b: string): number => {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const x = left[i]?.codePointAt(0) ?? 0;
    const y = right[i]?.codePointAt(0) ?? 0;
    if (x !== y) {
      return x < y ? -1 : 1;
    }
  }

  return left.length - right.length;
};

/**
 * Location identity of a village.
 */
export interface VillageKey {
  county: string;
  town: string;
  village: string;
}

/**
 * Orders villages by county, then town, then village.
 */
export const compareVillageKeys = (a: VillageKey, b: VillageKey): number =>
  compareCodePoints(a.county, b.county) ||
  compareCodePoints(a.town, b.town) ||
  compareCodePoints(a.village, b.village);

/**
 * Stable string key for map lookups. Uses a separator that cannot appear in a
 * spreadsheet label.
 */
export const villageKeyId = (key: VillageKey): string =>
  `${key.county}\u0000${key.town}\u0000${key.village}`;
