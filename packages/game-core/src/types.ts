// packages/game-core/src/types.ts
//
// Shapes shared by the engine and the strategies.

import type { Letter } from './letters.js';

export type GameStatus = 'playing' | 'won' | 'lost';

/** Closed set of guessing strategies. */
export type StrategyKind = 'random' | 'frequency' | 'regex';

export const STRATEGY_KINDS: readonly StrategyKind[] = ['random', 'frequency', 'regex'];

/** A revealed cell holds its character; a hidden cell is null. */
export type Cell = string | null;

export interface GameState {
  /** Upper-cased secret phrase. */
  readonly phrase: string;
  /** One cell per phrase character. */
  readonly revealed: readonly Cell[];
  readonly guessed: ReadonlySet<Letter>;
  readonly attemptsRemaining: number;
  readonly maxAttempts: number;
  readonly history: readonly GuessRecord[];
  readonly status: GameStatus;
}

export interface GuessRecord {
  readonly letter: Letter;
  readonly hit: boolean;
  /** Phrase indices the letter was revealed at (empty on a miss). */
  readonly positions: readonly number[];
  /** Board after the guess, hidden cells rendered as '_'. */
  readonly revealed: string;
  readonly attemptsRemaining: number;
}

export interface GuessFeedback {
  readonly letter: Letter;
  readonly hit: boolean;
  readonly positions: readonly number[];
  /** Game state after the guess was applied. */
  readonly state: GameState;
}

export interface GuessingStrategy {
  readonly kind: StrategyKind;
  nextGuess(state: GameState): Letter;
  /** Called by the engine after every guess with its outcome. */
  update(feedback: GuessFeedback): void;
}

export interface Outcome {
  readonly status: Exclude<GameStatus, 'playing'>;
  readonly phrase: string;
  readonly revealed: string;
  readonly guesses: readonly GuessRecord[];
  readonly attemptsRemaining: number;
  readonly wrongGuesses: number;
}
