// packages/game-core/src/frequency.ts
//
// Relative frequency of each letter in general English text (percent of all
// letters). Used directly by the frequency strategy and as the tie-breaker
// when the regex strategy scores letters over its candidates.

import { ALPHABET, type Letter } from './letters.js';

export type LetterWeights = Readonly<Record<Letter, number>>;

export const ENGLISH_LETTER_WEIGHTS: LetterWeights = Object.freeze({
  A: 8.167, B: 1.492, C: 2.782, D: 4.253, E: 12.702, F: 2.228, G: 2.015,
  H: 6.094, I: 6.966, J: 0.153, K: 0.772, L: 4.025, M: 2.406, N: 6.749,
  O: 7.507, P: 1.929, Q: 0.095, R: 5.987, S: 6.327, T: 9.056, U: 2.758,
  V: 0.978, W: 2.360, X: 0.150, Y: 1.974, Z: 0.074,
});

export interface FrequencyTable {
  weight(letter: Letter): number;
  /** Negative when `a` should be guessed before `b`. */
  compare(a: Letter, b: Letter): number;
  /** Every letter not in `excluding`, most frequent first. */
  orderedByFrequency(excluding?: ReadonlySet<Letter>): Letter[];
}

/**
 * createFrequencyTable builds an immutable table over the given weights.
 * Equal weights fall back to alphabetical order so the ordering is total.
 */
export function createFrequencyTable(weights: LetterWeights = ENGLISH_LETTER_WEIGHTS): FrequencyTable {
  const snapshot: LetterWeights = Object.freeze({ ...weights });
  const compare = (a: Letter, b: Letter): number =>
    snapshot[b] - snapshot[a] || a.localeCompare(b);
  const ordered: readonly Letter[] = Object.freeze([...ALPHABET].sort(compare));

  return Object.freeze({
    weight: (letter: Letter) => snapshot[letter],
    compare,
    orderedByFrequency: (excluding: ReadonlySet<Letter> = new Set()) =>
      ordered.filter((l) => !excluding.has(l)),
  });
}

export const ENGLISH_FREQUENCIES: FrequencyTable = createFrequencyTable();
