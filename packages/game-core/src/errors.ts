// packages/game-core/src/errors.ts
//
// Error kinds raised by the core. Callers branch on `code` (or instanceof):
//   • INVALID_ARGUMENT       → bad user input; the CLI prints usage.
//   • DICTIONARY_UNAVAILABLE → recovered by falling back to letter frequency.
//   • EXHAUSTED_ALPHABET     → a strategy was asked for a guess with no letters left.
//   • INVALID_GUESS          → a strategy produced a non-letter or repeated letter.

export type HangmanErrorCode =
  | 'INVALID_ARGUMENT'
  | 'DICTIONARY_UNAVAILABLE'
  | 'EXHAUSTED_ALPHABET'
  | 'INVALID_GUESS';

export class HangmanError extends Error {
  readonly code: HangmanErrorCode;

  constructor(code: HangmanErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidArgumentError extends HangmanError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

export class DictionaryUnavailableError extends HangmanError {
  constructor(source: string, options?: { cause?: unknown }) {
    super('DICTIONARY_UNAVAILABLE', `dictionary unavailable: ${source}`, options);
  }
}

export class ExhaustedAlphabetError extends HangmanError {
  constructor() {
    super('EXHAUSTED_ALPHABET', 'no letters left to guess');
  }
}

export class InvalidGuessError extends HangmanError {
  constructor(message: string) {
    super('INVALID_GUESS', message);
  }
}
