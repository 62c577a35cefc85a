// packages/game-core/src/regexStrategy.ts
//
// Dictionary-driven strategy. The phrase is solved one segment (whitespace-
// delimited word) at a time:
//
//   1. Init:     at the start of each game, every segment starts with the
//                dictionary words of its length.
//   2. Filter:   after every guess, each segment's candidates are narrowed to
//                the words still consistent with the board (see filter.ts).
//                Sets only ever shrink.
//   3. Select:   the first segment with a hidden cell is active; guess the
//                unguessed letter occurring most often across its candidates.
//   4. Fallback: no dictionary, or an active segment with no candidates left,
//                guesses by plain letter frequency until that segment is done.
//
// Punctuation at the ends of a word is not part of its segment. The guessed
// set and the attempt budget are shared by all segments; only the candidate
// sets are per segment.

import type { Dictionary } from './dictionary.js';
import { bestLetter, filterCandidates } from './filter.js';
import { ENGLISH_FREQUENCIES, type FrequencyTable } from './frequency.js';
import { FrequencyStrategy } from './frequencyStrategy.js';
import { isLetter, type Letter } from './letters.js';
import type { Cell, GameState, GuessFeedback, GuessingStrategy } from './types.js';

export interface Segment {
  /** Index of the segment's first cell in the board. */
  readonly start: number;
  /** Index one past the segment's last cell. */
  readonly end: number;
  candidates: readonly string[];
}

const WHITESPACE = /\s/;

const isPunctuation = (cell: Cell) => cell !== null && !isLetter(cell);

/**
 * Splits a board into whitespace-delimited [start, end) ranges. Punctuation
 * at either end of a word ("HELLO," or "(HI)") is trimmed off; inner
 * apostrophes and hyphens stay. Ranges with no letter cell are dropped.
 */
export function segmentBounds(revealed: readonly Cell[]): Array<[number, number]> {
  const words: Array<[number, number]> = [];
  let start = -1;
  revealed.forEach((cell, i) => {
    const isGap = cell !== null && WHITESPACE.test(cell);
    if (isGap && start >= 0) {
      words.push([start, i]);
      start = -1;
    } else if (!isGap && start < 0) {
      start = i;
    }
  });
  if (start >= 0) words.push([start, revealed.length]);

  const bounds: Array<[number, number]> = [];
  for (let [from, to] of words) {
    while (from < to && isPunctuation(revealed[from])) from++;
    while (to > from && isPunctuation(revealed[to - 1])) to--;
    if (from < to) bounds.push([from, to]);
  }
  return bounds;
}

export interface RegexStrategyOptions {
  /** null when no word list could be loaded. */
  dictionary: Dictionary | null;
  table?: FrequencyTable;
}

export class RegexStrategy implements GuessingStrategy {
  readonly kind = 'regex' as const;

  private readonly dictionary: Dictionary | null;
  private readonly table: FrequencyTable;
  private readonly fallback: FrequencyStrategy;
  /** Rebuilt from the dictionary at the start of every game. */
  private segments: Segment[] | null = null;

  constructor(options: RegexStrategyOptions) {
    this.dictionary = options.dictionary;
    this.table = options.table ?? ENGLISH_FREQUENCIES;
    this.fallback = new FrequencyStrategy(this.table);
  }

  nextGuess(state: GameState): Letter {
    const active = this.activeSegment(state);
    const letter = active ? bestLetter(active.candidates, state.guessed, this.table) : null;
    return letter ?? this.fallback.nextGuess(state);
  }

  update(feedback: GuessFeedback): void {
    const { revealed, guessed } = feedback.state;
    for (const segment of this.segmentsFor(feedback.state)) {
      segment.candidates = filterCandidates(
        segment.candidates,
        revealed.slice(segment.start, segment.end),
        guessed,
      );
    }
  }

  /** Candidates of the segment currently being solved (empty when none). */
  candidates(state: GameState): readonly string[] {
    return this.activeSegment(state)?.candidates ?? [];
  }

  /** Every segment with its current candidates, in board order. */
  segmentsOf(state: GameState): readonly Readonly<Segment>[] {
    return this.segmentsFor(state);
  }

  private activeSegment(state: GameState): Segment | undefined {
    return this.segmentsFor(state).find((s) =>
      state.revealed.slice(s.start, s.end).includes(null),
    );
  }

  private segmentsFor(state: GameState): Segment[] {
    if (this.segments === null || state.history.length === 0) {
      this.segments = segmentBounds(state.revealed).map(([start, end]) => ({
        start,
        end,
        candidates: filterCandidates(
          this.dictionary?.wordsOfLength(end - start) ?? [],
          state.revealed.slice(start, end),
          state.guessed,
        ),
      }));
    }
    return this.segments;
  }
}
