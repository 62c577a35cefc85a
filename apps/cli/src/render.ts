// apps/cli/src/render.ts
//
// Text output. Every function returns lines; the caller decides where
// they go. Boards are spaced out one cell apart: "C _ T".

import type { GameReport, StrategyKind, TurnReport } from '@hangman/protocol';

/** Candidate lists longer than this are summarized by count only. */
export const MAX_LISTED_CANDIDATES = 20;

export function spaced(board: string): string {
  return [...board].join(' ');
}

function attempts(n: number): string {
  return `${n} attempt${n === 1 ? '' : 's'}`;
}

export function renderIntro(phrase: string, strategy: StrategyKind, maxAttempts: number, board: string): string[] {
  return [
    `Phrase: ${phrase}`,
    `Strategy: ${strategy} (${attempts(maxAttempts)})`,
    `Board: ${spaced(board)}`,
  ];
}

/** Nothing to say once the candidates are down to one word or none. */
export function renderCandidates(candidates: readonly string[]): string[] {
  if (candidates.length <= 1) return [];
  let line = `Evaluating ${candidates.length} candidates`;
  if (candidates.length <= MAX_LISTED_CANDIDATES) {
    line += ` (${[...candidates].sort().join(', ')})`;
  }
  return [line];
}

export function renderTurn(turn: TurnReport): string {
  const result = turn.hit ? 'hit' : 'miss';
  return `Guess ${turn.turn}: ${turn.letter} (${result}) -> ${spaced(turn.revealed)} [${attempts(turn.attemptsRemaining)} left]`;
}

export function renderSummary(report: GameReport): string[] {
  const headline =
    report.status === 'won'
      ? `Solved! The phrase was: ${report.phrase}`
      : `Out of attempts. The phrase was: ${report.phrase}`;
  return [headline, `Letters guessed: ${report.lettersGuessed}, wrong guesses: ${report.wrongGuesses}`];
}
