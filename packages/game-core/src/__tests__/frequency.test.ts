// packages/game-core/src/__tests__/frequency.test.ts
//
// The English table orders letters by descending weight; equal weights
// fall back to alphabetical order.

import {
  ENGLISH_FREQUENCIES,
  ENGLISH_LETTER_WEIGHTS,
  createFrequencyTable,
  type Letter,
} from '../index.js';

describe('orderedByFrequency', () => {
  it('lists all 26 letters, most frequent first', () => {
    expect(ENGLISH_FREQUENCIES.orderedByFrequency().join('')).toBe(
      'ETAOINSHRDLCUMWFGYPBVKJXQZ',
    );
  });

  it('skips letters that were already tried', () => {
    const tried = new Set<Letter>(['E', 'A', 'Z']);
    expect(ENGLISH_FREQUENCIES.orderedByFrequency(tried).slice(0, 4)).toEqual([
      'T',
      'O',
      'I',
      'N',
    ]);
    expect(ENGLISH_FREQUENCIES.orderedByFrequency(tried)).toHaveLength(23);
  });

  it('breaks equal weights alphabetically', () => {
    const table = createFrequencyTable({ ...ENGLISH_LETTER_WEIGHTS, T: ENGLISH_LETTER_WEIGHTS.E });
    expect(table.orderedByFrequency().slice(0, 3)).toEqual(['E', 'T', 'A']);

    const tied = createFrequencyTable({ ...ENGLISH_LETTER_WEIGHTS, A: ENGLISH_LETTER_WEIGHTS.E });
    expect(tied.orderedByFrequency().slice(0, 3)).toEqual(['A', 'E', 'T']);
  });

  it('uses injected weights without touching the default table', () => {
    const table = createFrequencyTable({ ...ENGLISH_LETTER_WEIGHTS, B: 20 });
    expect(table.orderedByFrequency()[0]).toBe('B');
    expect(table.weight('B')).toBe(20);
    expect(ENGLISH_FREQUENCIES.weight('B')).toBe(1.492);
  });

  it('returns nothing once every letter is excluded', () => {
    const all = new Set<Letter>(ENGLISH_FREQUENCIES.orderedByFrequency());
    expect(ENGLISH_FREQUENCIES.orderedByFrequency(all)).toEqual([]);
  });
});
