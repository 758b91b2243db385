/**
 * Grouping of keyword strings by shared prefixes.
 *
 * Field names of one metadata block usually share characteristic prefixes
 * (e.g. `author`, `authorName`, `authorAffiliation`). Grouping by those
 * prefixes is what the typo heuristics in ./typos.ts compare.
 */

export const DEFAULT_MIN_PREFIX_LENGTH = 3;

/**
 * Prefix → keywords sharing it, in discovery order.
 */
export type PrefixGroups = Map<string, string[]>;

/**
 * Longest common prefix of two strings.
 */
export function commonPrefix(a: string, b: string): string {
  const limit = Math.min(a.length, b.length);
  let i = 0;
  while (i < limit && a.charAt(i) === b.charAt(i)) {
    i++;
  }
  return a.slice(0, i);
}

/**
 * Split keywords into groups by their common prefixes.
 *
 * Greedily binds to the longest common prefix, with a worst case of O(n^2)
 * comparisons when no prefix is shared. For
 *
 *   - "FooBarLong"
 *   - "FooBarShort"
 *   - "FooBarLonger"
 *
 * this yields the group "FooBarLong" (FooBarLong, FooBarLonger) and the
 * singleton "FooBarShort". Entries sharing a slightly longer prefix by chance
 * are split the same way, so "FooBarBaz", "FooBarBest", "FooBarTest1" end up
 * as "FooBarB" plus a singleton even though a reader would see one family.
 */
export function splitByCommonPrefixes(
  keywords: readonly string[],
  minPrefixLength = DEFAULT_MIN_PREFIX_LENGTH
): PrefixGroups {
  const groups: PrefixGroups = new Map();
  let pool = [...keywords];

  while (pool.length > 0) {
    // Each pass consumes the reference keyword, so this terminates after at most n passes
    const [reference, ...rest] = pool;
    if (reference === undefined) break;
    pool = rest;

    let group = [reference];
    let prefix: string | null = null;

    for (const keyword of pool) {
      const shared = commonPrefix(reference, keyword);

      if (prefix === null) {
        if (shared.length >= minPrefixLength) {
          prefix = shared;
          group.push(keyword);
        }
      } else if (shared === prefix) {
        group.push(keyword);
      } else if (shared.startsWith(prefix)) {
        // Longer prefix found: members that only matched the shorter one go back to the pool
        group.push(keyword);
        const longer: string = shared;
        prefix = longer;
        group = group.filter(member => member.startsWith(longer));
      }
    }

    const grouped = new Set(group);
    pool = pool.filter(keyword => !grouped.has(keyword));
    groups.set(prefix ?? reference, group);
  }

  return groups;
}
