/**
 * @fileoverview Scratchpad: mutation vs. immutability
 *
 * Two versions of the same "double every score" routine. The first edits
 * the caller's array in place, so anything else holding that array sees the
 * change too. The second builds a new array and leaves the input alone,
 * which is the only style a functional language offers.
 *
 * ```typescript
 * const scores = [316, 320, 370];
 * doubleScoresInPlace(scores, 2);
 * scores; // [632, 640, 740]   <- surprise
 *
 * const fresh = [316, 320, 370];
 * doubleScores(fresh, 2);      // [632, 640, 740]
 * fresh;  // [316, 320, 370]
 * ```
 */

export const SAMPLE_SCORES: readonly number[] = [316, 320, 370, 337, 318, 314];

/**
 * Multiplies every score in place and returns the same array.
 */
export function doubleScoresInPlace(scores: number[], multiplier: number): number[] {
  for (let i = 0; i < scores.length; i++) {
    scores[i] = (scores[i] ?? 0) * multiplier;
  }

  return scores;
}

/**
 * Returns a new array of multiplied scores.
 */
export function doubleScores(scores: readonly number[], multiplier: number): number[] {
  return scores.map((score) => score * multiplier);
}

export function scoresLessThan(scores: readonly number[], limit: number): number[] {
  return scores.filter((score) => score < limit);
}
