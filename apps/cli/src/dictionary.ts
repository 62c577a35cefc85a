// apps/cli/src/dictionary.ts
//
// Word lists can come from two sources, tried in order:
//   1. DICTIONARY_FILE from the environment
//   2. data/words.txt shipped with the CLI
//
// A source that cannot be read is logged and skipped. When none loads the
// regex strategy gets no dictionary and guesses by letter frequency.

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  DictionaryUnavailableError,
  createDictionary,
  parseWordList,
  type Dictionary,
} from '@hangman/game-core';
import type { Logger } from './logger.js';

export const BUNDLED_WORDS_FILE = fileURLToPath(new URL('../data/words.txt', import.meta.url));

export function readDictionary(path: string): Dictionary {
  let text: string;
  try {
    text = fs.readFileSync(path, 'utf8');
  } catch (err) {
    throw new DictionaryUnavailableError(path, { cause: err });
  }
  const dictionary = createDictionary(parseWordList(text));
  if (dictionary.size === 0) throw new DictionaryUnavailableError(path);
  return dictionary;
}

export function resolveDictionary(sources: readonly string[], log: Logger): Dictionary | null {
  for (const source of sources) {
    try {
      const dictionary = readDictionary(source);
      log.debug({ source, words: dictionary.size }, 'dictionary loaded');
      return dictionary;
    } catch (err) {
      if (!(err instanceof DictionaryUnavailableError)) throw err;
      log.warn({ source, cause: String(err.cause ?? 'no usable words') }, err.message);
    }
  }
  log.warn('no dictionary available, falling back to letter frequency');
  return null;
}
