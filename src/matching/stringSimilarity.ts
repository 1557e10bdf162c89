/**
 * String similarity metrics used by the matching strategies.
 *
 * Both metrics are built on Levenshtein edit distance and return a value in
 * [0, 1] rounded to two decimal places:
 * - similarityRatio: whole-string similarity, 1 - distance / longer length
 * - partialRatio: the shorter string against its best-aligned window of the
 *   longer one ("best-matching substring")
 */

import natural from 'natural';

const round2 = (value: number): number => Math.round(value * 100) / 100;

/**
 * Whole-string similarity.
 *
 * @example
 * similarityRatio('jane citizen', 'jane citizen') // 1
 * similarityRatio('kitten', 'sitting')            // 0.57
 * similarityRatio('', 'abc')                      // 0
 */
export function similarityRatio(a: string, b: string): number {
  if (!a || !b) {
    return 0;
  }

  if (a === b) {
    return 1;
  }

  const distance = natural.LevenshteinDistance(a, b);
  return round2(1 - distance / Math.max(a.length, b.length));
}

/**
 * Substring-aware similarity: slides the shorter string across the longer
 * one and keeps the best window score. Containment scores 1.
 *
 * @example
 * partialRatio('jane citizen', 'payment jane citizen ref 88') // 1
 * partialRatio('smith', 'pmt smyth')                          // 0.8
 */
export function partialRatio(a: string, b: string): number {
  if (!a || !b) {
    return 0;
  }

  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];

  if (longer.includes(shorter)) {
    return 1;
  }

  let best = 0;
  for (let offset = 0; offset + shorter.length <= longer.length; offset++) {
    const window = longer.slice(offset, offset + shorter.length);
    best = Math.max(best, similarityRatio(shorter, window));
  }

  return best;
}
