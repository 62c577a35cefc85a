// packages/game-core/src/frequencyStrategy.ts

import { ExhaustedAlphabetError } from './errors.js';
import { ENGLISH_FREQUENCIES, type FrequencyTable } from './frequency.js';
import type { Letter } from './letters.js';
import type { GameState, GuessFeedback, GuessingStrategy } from './types.js';

/** Always guesses the most frequent English letter not tried yet. */
export class FrequencyStrategy implements GuessingStrategy {
  readonly kind = 'frequency' as const;

  constructor(private readonly table: FrequencyTable = ENGLISH_FREQUENCIES) {}

  nextGuess(state: GameState): Letter {
    const [first] = this.table.orderedByFrequency(state.guessed);
    if (first === undefined) throw new ExhaustedAlphabetError();
    return first;
  }

  update(_feedback: GuessFeedback): void {
    // stateless
  }
}
