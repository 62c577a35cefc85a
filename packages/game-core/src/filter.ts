// packages/game-core/src/filter.ts
//
// Candidate filtering for the regex strategy.
//
// A candidate word is consistent with a segment of the board when:
//   • at every revealed cell it has exactly the revealed character, and
//   • at every hidden cell it has a letter that has not been guessed yet.
//
// The second rule covers both cases that matter: a missed letter appears
// nowhere in the answer, and a hit letter is already revealed at all of its
// true positions, so neither can sit behind a hidden cell. Misses are never
// revealed, so a consistent candidate contains no missed letter at all.
//
// This is the position-wise equivalent of matching each word against
// ^(revealed char | [unguessed letters])+$ without building a RegExp.

import { isLetter, type Letter } from './letters.js';
import type { FrequencyTable } from './frequency.js';
import type { Cell } from './types.js';

export function isConsistent(
  word: string,
  pattern: readonly Cell[],
  guessed: ReadonlySet<Letter>,
): boolean {
  if (word.length !== pattern.length) return false;
  for (let i = 0; i < pattern.length; i++) {
    const cell = pattern[i];
    const ch = word[i];
    if (cell === null) {
      if (!isLetter(ch) || guessed.has(ch)) return false;
    } else if (ch !== cell) {
      return false;
    }
  }
  return true;
}

/** Subset of `candidates` consistent with the pattern; order is preserved. */
export function filterCandidates(
  candidates: readonly string[],
  pattern: readonly Cell[],
  guessed: ReadonlySet<Letter>,
): string[] {
  return candidates.filter((w) => isConsistent(w, pattern, guessed));
}

/** Occurrences of each unguessed letter across all candidates, at any position. */
export function countLetters(
  candidates: readonly string[],
  guessed: ReadonlySet<Letter>,
): Map<Letter, number> {
  const counts = new Map<Letter, number>();
  for (const word of candidates) {
    for (const ch of word) {
      if (isLetter(ch) && !guessed.has(ch)) counts.set(ch, (counts.get(ch) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * bestLetter picks the unguessed letter occurring most often in the
 * candidates. Equal counts go to the more frequent English letter, then
 * alphabetical order. Returns null when no unguessed letter occurs.
 */
export function bestLetter(
  candidates: readonly string[],
  guessed: ReadonlySet<Letter>,
  table: FrequencyTable,
): Letter | null {
  let best: Letter | null = null;
  let bestCount = 0;
  for (const [letter, count] of countLetters(candidates, guessed)) {
    if (
      best === null ||
      count > bestCount ||
      (count === bestCount && table.compare(letter, best) < 0)
    ) {
      best = letter;
      bestCount = count;
    }
  }
  return best;
}
