// packages/game-core/src/game.ts
//
// Hangman engine.
//
// State is immutable: applyGuess returns a new GameState plus a record of
// the turn. play() drives a strategy against a phrase until the board is
// fully revealed (won) or the attempt budget hits zero (lost).
//
// Rules:
//   • Only A–Z are guessable; every other character starts revealed.
//   • A miss costs one attempt; a hit reveals every position of the letter.
//   • "won" is checked before "lost", so a phrase with nothing to guess is
//     won immediately even with a zero budget.

import {
  ExhaustedAlphabetError,
  InvalidArgumentError,
  InvalidGuessError,
} from './errors.js';
import { ALPHABET, PLACEHOLDER, isLetter, type Letter } from './letters.js';
import type {
  Cell,
  GameState,
  GameStatus,
  GuessRecord,
  GuessingStrategy,
  Outcome,
} from './types.js';

export const DEFAULT_MAX_ATTEMPTS = 6;

export interface PlayHooks {
  /** Called once with the initial state, before any guess. */
  onStart?(state: GameState): void;
  /** Called before the strategy is asked for each guess. */
  onTurnStart?(state: GameState): void;
  /** Called after each guess has been applied and fed back to the strategy. */
  onTurn?(record: GuessRecord, state: GameState): void;
}

export function formatRevealed(revealed: readonly Cell[]): string {
  return revealed.map((c) => c ?? PLACEHOLDER).join('');
}

function statusOf(revealed: readonly Cell[], attemptsRemaining: number): GameStatus {
  if (!revealed.includes(null)) return 'won';
  if (attemptsRemaining <= 0) return 'lost';
  return 'playing';
}

/**
 * createGame validates the inputs and builds the initial state.
 * Throws InvalidArgumentError for a blank phrase or a bad attempt budget.
 */
export function createGame(phrase: string, maxAttempts: number = DEFAULT_MAX_ATTEMPTS): GameState {
  const normalized = phrase.trim().toUpperCase();
  if (!normalized) throw new InvalidArgumentError('phrase must not be empty');
  if (!Number.isInteger(maxAttempts) || maxAttempts < 0) {
    throw new InvalidArgumentError(`maxAttempts must be a non-negative integer, got ${maxAttempts}`);
  }

  const revealed: Cell[] = [...normalized].map((ch) => (isLetter(ch) ? null : ch));
  return {
    phrase: normalized,
    revealed,
    guessed: new Set(),
    attemptsRemaining: maxAttempts,
    maxAttempts,
    history: [],
    status: statusOf(revealed, maxAttempts),
  };
}

/**
 * applyGuess checks `letter` against the phrase and returns the next state.
 * Throws InvalidGuessError for a non-letter, a repeated letter, or a guess
 * on a finished game.
 */
export function applyGuess(
  state: GameState,
  letter: string,
): { state: GameState; record: GuessRecord } {
  if (state.status !== 'playing') {
    throw new InvalidGuessError(`game is already ${state.status}`);
  }
  if (!isLetter(letter)) throw new InvalidGuessError(`not a letter: ${JSON.stringify(letter)}`);
  if (state.guessed.has(letter)) throw new InvalidGuessError(`already guessed: ${letter}`);

  const chars = [...state.phrase];
  const positions: number[] = [];
  chars.forEach((ch, i) => {
    if (ch === letter) positions.push(i);
  });

  const hit = positions.length > 0;
  const revealed = hit
    ? state.revealed.map((cell, i) => (chars[i] === letter ? letter : cell))
    : state.revealed;
  const attemptsRemaining = hit ? state.attemptsRemaining : state.attemptsRemaining - 1;
  const guessed = new Set(state.guessed).add(letter);

  const record: GuessRecord = {
    letter,
    hit,
    positions,
    revealed: formatRevealed(revealed),
    attemptsRemaining,
  };

  return {
    state: {
      ...state,
      revealed,
      guessed,
      attemptsRemaining,
      history: [...state.history, record],
      status: statusOf(revealed, attemptsRemaining),
    },
    record,
  };
}

export function toOutcome(state: GameState): Outcome {
  if (state.status === 'playing') throw new Error('game is still in progress');
  return {
    status: state.status,
    phrase: state.phrase,
    revealed: formatRevealed(state.revealed),
    guesses: state.history,
    attemptsRemaining: state.attemptsRemaining,
    wrongGuesses: state.history.filter((g) => !g.hit).length,
  };
}

/**
 * play runs one full game. The strategy is told the result of every guess
 * through update() before it is asked for the next one.
 */
export function play(
  phrase: string,
  strategy: GuessingStrategy,
  maxAttempts: number = DEFAULT_MAX_ATTEMPTS,
  hooks: PlayHooks = {},
): Outcome {
  let state = createGame(phrase, maxAttempts);
  hooks.onStart?.(state);

  while (state.status === 'playing') {
    // Unreachable while the rules hold: guessing all 26 letters reveals everything.
    if (state.guessed.size >= ALPHABET.length) throw new ExhaustedAlphabetError();

    hooks.onTurnStart?.(state);
    const letter: Letter = strategy.nextGuess(state);
    const next = applyGuess(state, letter);
    state = next.state;
    strategy.update({
      letter: next.record.letter,
      hit: next.record.hit,
      positions: next.record.positions,
      state,
    });
    hooks.onTurn?.(next.record, state);
  }

  return toOutcome(state);
}
