/**
 * String distance and similarity measures used for typo detection and
 * "did you mean" suggestions.
 */

/**
 * Calculate the (unrestricted) Damerau-Levenshtein distance between two strings.
 *
 * Insertions, deletions, substitutions and transpositions of adjacent
 * characters each cost one edit.
 */
export function damerauLevenshteinDistance(a: string, b: string): number {
  const aLen = a.length;
  const bLen = b.length;
  const width = bLen + 2;
  const maxDist = aLen + bLen;

  // (aLen + 2) x (bLen + 2) matrix with a sentinel row and column
  const matrix = new Array<number>((aLen + 2) * width).fill(0);
  const at = (i: number, j: number): number => matrix[i * width + j] ?? maxDist;
  const set = (i: number, j: number, value: number): void => {
    matrix[i * width + j] = value;
  };

  set(0, 0, maxDist);
  for (let i = 0; i <= aLen; i++) {
    set(i + 1, 0, maxDist);
    set(i + 1, 1, i);
  }
  for (let j = 0; j <= bLen; j++) {
    set(0, j + 1, maxDist);
    set(1, j + 1, j);
  }

  // Last row in `a` where each character was seen
  const lastRow = new Map<string, number>();

  for (let i = 1; i <= aLen; i++) {
    const aChar = a.charAt(i - 1);
    let lastMatchCol = 0;

    for (let j = 1; j <= bLen; j++) {
      const bChar = b.charAt(j - 1);
      const i1 = lastRow.get(bChar) ?? 0;
      const j1 = lastMatchCol;

      let cost = 1;
      if (aChar === bChar) {
        cost = 0;
        lastMatchCol = j;
      }

      set(i + 1, j + 1, Math.min(
        at(i, j) + cost,
        at(i + 1, j) + 1,
        at(i, j + 1) + 1,
        at(i1, j1) + (i - i1 - 1) + 1 + (j - j1 - 1)
      ));
    }

    lastRow.set(aChar, i);
  }

  return at(aLen + 1, bLen + 1);
}

interface MatchingBlock {
  a: number;
  b: number;
  size: number;
}

/**
 * Longest common substring of a[aLo..aHi) and b[bLo..bHi).
 * Ties resolve to the earliest start in `a`, then in `b`.
 */
function findLongestMatch(
  a: string,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number,
  positionsInB: Map<string, number[]>
): MatchingBlock {
  let best: MatchingBlock = { a: aLo, b: bLo, size: 0 };
  let runs = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const nextRuns = new Map<number, number>();
    for (const j of positionsInB.get(a.charAt(i)) ?? []) {
      if (j < bLo) continue;
      if (j >= bHi) break;
      const size = (runs.get(j - 1) ?? 0) + 1;
      nextRuns.set(j, size);
      if (size > best.size) {
        best = { a: i - size + 1, b: j - size + 1, size };
      }
    }
    runs = nextRuns;
  }

  return best;
}

/**
 * Total length of the Ratcliff/Obershelp matching blocks of two strings.
 */
function countMatches(a: string, b: string): number {
  const positionsInB = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const char = b.charAt(j);
    const positions = positionsInB.get(char);
    if (positions) {
      positions.push(j);
    } else {
      positionsInB.set(char, [j]);
    }
  }

  let matched = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;
    const match = findLongestMatch(a, aLo, aHi, bLo, bHi, positionsInB);
    if (match.size === 0) continue;

    matched += match.size;
    if (aLo < match.a && bLo < match.b) {
      queue.push([aLo, match.a, bLo, match.b]);
    }
    if (match.a + match.size < aHi && match.b + match.size < bHi) {
      queue.push([match.a + match.size, aHi, match.b + match.size, bHi]);
    }
  }

  return matched;
}

/**
 * Similarity ratio in [0, 1]: twice the number of matched characters over
 * the combined length. Two empty strings are identical (1.0).
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * countMatches(a, b)) / total;
}

/**
 * Best-rated candidate for `value`. The first candidate wins ties.
 */
export function closestMatch(
  value: string,
  candidates: readonly string[]
): { candidate: string; ratio: number } | null {
  let best: { candidate: string; ratio: number } | null = null;
  for (const candidate of candidates) {
    const ratio = similarityRatio(value, candidate);
    if (!best || ratio > best.ratio) {
      best = { candidate, ratio };
    }
  }
  return best;
}
