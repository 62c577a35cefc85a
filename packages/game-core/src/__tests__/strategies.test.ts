// packages/game-core/src/__tests__/strategies.test.ts
//
// Random and frequency strategies, the seeded random source, and the
// strategy factory.

import {
  ALPHABET,
  ExhaustedAlphabetError,
  FrequencyStrategy,
  RandomStrategy,
  RegexStrategy,
  STRATEGY_KINDS,
  createDictionary,
  createGame,
  createRng,
  createStrategy,
  play,
  type GameState,
  type Letter,
} from '../index.js';

function stateWith(...guessed: Letter[]): GameState {
  return { ...createGame('quiz'), guessed: new Set(guessed) };
}

describe('createRng', () => {
  it('repeats the same sequence for the same seed', () => {
    const a = createRng('test-seed');
    const b = createRng('test-seed');
    const seqA = Array.from({ length: 5 }, () => a());
    const seqB = Array.from({ length: 5 }, () => b());
    expect(seqA).toEqual(seqB);
    for (const n of seqA) {
      expect(n).toBeGreaterThanOrEqual(0);
      expect(n).toBeLessThan(1);
    }
  });

  it('differs between seeds', () => {
    expect(createRng('seed-a')()).not.toBe(createRng('seed-b')());
  });
});

describe('RandomStrategy', () => {
  it('maps the random number onto the untried letters in alphabetical order', () => {
    expect(new RandomStrategy(() => 0).nextGuess(stateWith('A'))).toBe('B');
    expect(new RandomStrategy(() => 0.9999).nextGuess(stateWith('A'))).toBe('Z');
    expect(new RandomStrategy(() => 0.5).nextGuess(stateWith())).toBe('N');
  });

  it('never repeats a guessed letter', () => {
    const strategy = new RandomStrategy(createRng('repeat-check'));
    const state = stateWith(...ALPHABET.filter((l) => l !== 'Q'));
    expect(strategy.nextGuess(state)).toBe('Q');
  });

  it('fails once the alphabet is exhausted', () => {
    const strategy = new RandomStrategy(() => 0);
    expect(() => strategy.nextGuess(stateWith(...ALPHABET))).toThrow(ExhaustedAlphabetError);
  });

  it('plays a reproducible game from a fixed seed', () => {
    const first = play('ab', new RandomStrategy(createRng('test-seed')), 26);
    const second = play('ab', new RandomStrategy(createRng('test-seed')), 26);

    expect(first.status).toBe('won');
    expect(second.guesses.map((g) => g.letter)).toEqual(first.guesses.map((g) => g.letter));
    const letters = first.guesses.map((g) => g.letter);
    expect(new Set(letters).size).toBe(letters.length);
  });
});

describe('FrequencyStrategy', () => {
  const strategy = new FrequencyStrategy();

  it('guesses the most frequent untried letter', () => {
    expect(strategy.nextGuess(stateWith())).toBe('E');
    expect(strategy.nextGuess(stateWith('E', 'T'))).toBe('A');
  });

  it('fails once the alphabet is exhausted', () => {
    expect(() => strategy.nextGuess(stateWith(...ALPHABET))).toThrow(ExhaustedAlphabetError);
  });

  it('plays "cat" with a two-miss budget', () => {
    const outcome = play('cat', new FrequencyStrategy(), 2);
    expect(outcome.guesses.map((g) => g.letter)).toEqual(['E', 'T', 'A', 'O']);
    expect(outcome.status).toBe('lost');
    expect(outcome.revealed).toBe('_AT');
    expect(outcome.wrongGuesses).toBe(2);
  });
});

describe('createStrategy', () => {
  it('builds one implementation per kind', () => {
    const built = STRATEGY_KINDS.map((kind) => createStrategy(kind));
    expect(built.map((s) => s.kind)).toEqual(['random', 'frequency', 'regex']);
    expect(built[0]).toBeInstanceOf(RandomStrategy);
    expect(built[1]).toBeInstanceOf(FrequencyStrategy);
    expect(built[2]).toBeInstanceOf(RegexStrategy);
  });

  it('passes the random source to the random strategy', () => {
    const strategy = createStrategy('random', { random: () => 0 });
    expect(strategy.nextGuess(stateWith())).toBe('A');
  });

  it('passes the dictionary to the regex strategy', () => {
    const strategy = createStrategy('regex', { dictionary: createDictionary(['quiz']) });
    expect(strategy.nextGuess(stateWith())).toBe('I');
  });
});
