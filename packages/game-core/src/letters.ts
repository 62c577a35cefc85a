// packages/game-core/src/letters.ts
//
// The guessable alphabet. Phrases and dictionary words are upper-cased on
// entry, so every comparison in the core happens on 'A'..'Z'.

export const ALPHABET = [
  'A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'I', 'J', 'K', 'L', 'M',
  'N', 'O', 'P', 'Q', 'R', 'S', 'T', 'U', 'V', 'W', 'X', 'Y', 'Z',
] as const;

export type Letter = (typeof ALPHABET)[number];

/** Rendered in place of a hidden cell. */
export const PLACEHOLDER = '_';

const LETTERS: ReadonlySet<string> = new Set(ALPHABET);

export function isLetter(ch: string): ch is Letter {
  return LETTERS.has(ch);
}

/** Letters of the alphabet not yet in `guessed`, in alphabetical order. */
export function remainingLetters(guessed: ReadonlySet<Letter>): Letter[] {
  return ALPHABET.filter((l) => !guessed.has(l));
}
