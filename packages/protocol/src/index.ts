// packages/protocol/src/index.ts
//
// Shared shapes between the hangman CLI and whatever renders its results.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - StrategyKind: "random" | "frequency" | "regex".
//   - playReq:      validated command-line input (strategy + phrase words).
//   - turnReport / gameReport: the per-turn and final report the CLI prints.

import { z } from 'zod';

/**
 * Strategy schema:
 *  - "random"    → uniform choice among untried letters
 *  - "frequency" → most frequent English letter first
 *  - "regex"     → dictionary candidates filtered against the board
 *
 * Input is matched case-insensitively.
 */
export const strategyKindSchema = z.enum(['random', 'frequency', 'regex']);
export type StrategyKind = z.infer<typeof strategyKindSchema>;

export const DEFAULT_STRATEGY: StrategyKind = 'regex';

const strategyInput = z.preprocess(
  (v) => (typeof v === 'string' ? v.trim().toLowerCase() : v),
  strategyKindSchema.default(DEFAULT_STRATEGY),
);

/* -------------------------------------------------------------------------- */
/*                                  CLI input                                 */
/* -------------------------------------------------------------------------- */

/**
 * Request to play one game.
 *  - strategy: optional, defaults to "regex"
 *  - phrase:   one or more words, joined with single spaces
 */
export const playReq = z.object({
  strategy: strategyInput,
  phrase: z
    .array(z.string())
    .min(1, 'phrase is required')
    .transform((words) => words.map((w) => w.trim()).filter(Boolean).join(' '))
    .pipe(z.string().min(1, 'phrase must contain at least one non-blank word')),
});
export type PlayReq = z.infer<typeof playReq>;

/* -------------------------------------------------------------------------- */
/*                                   Reports                                  */
/* -------------------------------------------------------------------------- */

/**
 * One guess as shown to the user.
 *  - turn:     1-based
 *  - revealed: board after the guess, hidden cells as "_"
 */
export const turnReport = z.object({
  turn: z.number().int().min(1),
  letter: z.string().regex(/^[A-Z]$/),
  hit: z.boolean(),
  positions: z.array(z.number().int().min(0)),
  revealed: z.string(),
  attemptsRemaining: z.number().int().min(0),
});
export type TurnReport = z.infer<typeof turnReport>;

export const gameReport = z.object({
  status: z.enum(['won', 'lost']),
  strategy: strategyKindSchema,
  phrase: z.string().min(1),
  revealed: z.string(),
  turns: z.array(turnReport),
  lettersGuessed: z.number().int().min(0),
  wrongGuesses: z.number().int().min(0),
});
export type GameReport = z.infer<typeof gameReport>;
