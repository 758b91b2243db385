/**
 * Heuristics that guess whether a field name contains a typo.
 *
 * Two names are likely typos of each other when few edits turn one into the
 * other; replaced, missing and transposed letters are the common cases, so
 * prefixes are compared by Damerau-Levenshtein distance. The heuristics
 * produce false positives and miss typos, so findings built on them are
 * warnings, never errors.
 */

import { damerauLevenshteinDistance } from '../distance.js';
import { DEFAULT_MIN_PREFIX_LENGTH, splitByCommonPrefixes, type PrefixGroups } from './clusters.js';

export const DEFAULT_TYPO_THRESHOLD = 1;

export interface PrefixGroup {
  prefix: string;
  keywords: readonly string[];
}

/**
 * A singleton group that looks like a mistyped variant of another group.
 */
export interface TypoCandidate {
  suspect: PrefixGroup;
  likelyIntended: PrefixGroup;
}

export interface TypoEstimateOptions {
  minPrefixLength?: number | undefined;
  distanceThreshold?: number | undefined;
}

/**
 * Flag singleton groups whose prefix, truncated to the length of another
 * group's prefix, is within `distanceThreshold` edits of it.
 *
 * Prefixes longer than the singleton are skipped: a singleton cannot be a
 * mistyped version of a longer prefix.
 */
export function singletonHeuristic(
  groups: ReadonlyMap<string, readonly string[]>,
  distanceThreshold: number
): TypoCandidate[] {
  const candidates: TypoCandidate[] = [];

  for (const [singletonPrefix, singletonKeywords] of groups) {
    if (singletonKeywords.length !== 1) continue;

    for (const [prefix, keywords] of groups) {
      if (prefix === singletonPrefix) continue;
      if (singletonPrefix.length < prefix.length) continue;

      const truncated = singletonPrefix.slice(0, prefix.length);
      if (damerauLevenshteinDistance(truncated, prefix) <= distanceThreshold) {
        candidates.push({
          suspect: { prefix: singletonPrefix, keywords: singletonKeywords },
          likelyIntended: { prefix, keywords },
        });
      }
    }
  }

  return candidates;
}

/**
 * Compare multi-member groups with each other.
 *
 * Not implemented yet: groups of two or more members that diverge by a typo
 * are currently not detected, so this reports nothing.
 */
export function divergentGroupHeuristic(
  _groups: ReadonlyMap<string, readonly string[]>,
  _distanceThreshold: number
): TypoCandidate[] {
  return [];
}

/**
 * Group keywords by prefix and run every typo heuristic over the groups.
 */
export function estimateTypos(
  keywords: readonly string[],
  options: TypoEstimateOptions = {}
): TypoCandidate[] {
  const minPrefixLength = options.minPrefixLength ?? DEFAULT_MIN_PREFIX_LENGTH;
  const distanceThreshold = options.distanceThreshold ?? DEFAULT_TYPO_THRESHOLD;
  const groups: PrefixGroups = splitByCommonPrefixes(keywords, minPrefixLength);

  return [
    ...singletonHeuristic(groups, distanceThreshold),
    ...divergentGroupHeuristic(groups, distanceThreshold),
  ];
}
