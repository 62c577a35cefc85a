// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports the hangman engine and strategies so consumers import from one place.
//
// Includes:
//   • letters.ts / frequency.ts → alphabet and English letter-frequency table
//   • dictionary.ts             → word list model used by the regex strategy
//   • filter.ts                 → candidate filtering and letter scoring
//   • *Strategy.ts, strategy.ts → the three strategies and createStrategy
//   • game.ts                   → createGame, applyGuess, play
//
// Example usage:
//   import { play, createStrategy } from '@hangman/game-core';

export * from './letters.js';
export * from './errors.js';
export * from './frequency.js';
export * from './rng.js';
export * from './dictionary.js';
export * from './types.js';
export * from './filter.js';
export * from './randomStrategy.js';
export * from './frequencyStrategy.js';
export * from './regexStrategy.js';
export * from './strategy.js';
export * from './game.js';
