// packages/game-core/src/dictionary.ts
//
// In-memory word list consumed read-only by the regex strategy.
//
// Words are normalized to upper case. A word may carry apostrophes or
// hyphens ("DON'T", "X-RAY"); those characters have to line up with the
// phrase because the engine reveals them from the start.

const WHITESPACE = /\s/;
const HAS_LETTER = /[A-Z]/;

export interface Dictionary {
  readonly size: number;
  readonly words: readonly string[];
  wordsOfLength(length: number): readonly string[];
}

/** normalizeWord upper-cases a raw entry, or returns null if it is not usable. */
export function normalizeWord(raw: string): string | null {
  const word = raw.trim().toUpperCase();
  if (!word || WHITESPACE.test(word) || !HAS_LETTER.test(word)) return null;
  return word;
}

/**
 * parseWordList splits a text file into raw entries, one per line.
 * Blank lines and lines starting with '#' are skipped.
 */
export function parseWordList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

export function createDictionary(entries: Iterable<string>): Dictionary {
  const seen = new Set<string>();
  const byLength = new Map<number, string[]>();

  for (const entry of entries) {
    const word = normalizeWord(entry);
    if (word === null || seen.has(word)) continue;
    seen.add(word);
    const bucket = byLength.get(word.length) ?? [];
    bucket.push(word);
    byLength.set(word.length, bucket);
  }

  const words: readonly string[] = Object.freeze([...seen]);
  for (const bucket of byLength.values()) Object.freeze(bucket);

  return Object.freeze({
    size: words.length,
    words,
    wordsOfLength: (length: number): readonly string[] => byLength.get(length) ?? [],
  });
}
