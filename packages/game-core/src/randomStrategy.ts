// packages/game-core/src/randomStrategy.ts
//
// Uniform choice among the letters not guessed yet. Pass a seeded source
// (see rng.ts) for a reproducible sequence.

import { ExhaustedAlphabetError } from './errors.js';
import { remainingLetters, type Letter } from './letters.js';
import type { RandomSource } from './rng.js';
import type { GameState, GuessFeedback, GuessingStrategy } from './types.js';

export class RandomStrategy implements GuessingStrategy {
  readonly kind = 'random' as const;

  constructor(private readonly random: RandomSource = Math.random) {}

  nextGuess(state: GameState): Letter {
    const choices = remainingLetters(state.guessed);
    if (choices.length === 0) throw new ExhaustedAlphabetError();
    const index = Math.min(Math.floor(this.random() * choices.length), choices.length - 1);
    return choices[index];
  }

  update(_feedback: GuessFeedback): void {
    // stateless
  }
}
