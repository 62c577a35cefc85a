// packages/game-core/src/strategy.ts
//
// Strategy selection. The set of strategies is closed: each StrategyKind maps
// to exactly one implementation, and the switch below is exhaustive.

import type { Dictionary } from './dictionary.js';
import { ENGLISH_FREQUENCIES, type FrequencyTable } from './frequency.js';
import { FrequencyStrategy } from './frequencyStrategy.js';
import { RandomStrategy } from './randomStrategy.js';
import { RegexStrategy } from './regexStrategy.js';
import type { RandomSource } from './rng.js';
import type { StrategyKind } from './types.js';

export type Strategy = RandomStrategy | FrequencyStrategy | RegexStrategy;

export interface StrategyDeps {
  table?: FrequencyTable;
  /** Only read by the regex strategy. */
  dictionary?: Dictionary | null;
  /** Only read by the random strategy. */
  random?: RandomSource;
}

export function createStrategy(kind: StrategyKind, deps: StrategyDeps = {}): Strategy {
  const table = deps.table ?? ENGLISH_FREQUENCIES;
  switch (kind) {
    case 'random':
      return new RandomStrategy(deps.random);
    case 'frequency':
      return new FrequencyStrategy(table);
    case 'regex':
      return new RegexStrategy({ dictionary: deps.dictionary ?? null, table });
    default: {
      const unknown: never = kind;
      throw new Error(`unknown strategy: ${String(unknown)}`);
    }
  }
}
