// apps/cli/src/cli.ts
//
// `hangman [-s random|frequency|regex] <phrase...>`
//
// Parses the command line, wires configuration into the chosen strategy,
// plays one game and prints it. Returns the process exit code:
//   0 → the game ran to completion (won or lost)
//   1 → bad arguments or environment, or an engine invariant failed

import { parseArgs } from 'node:util';
import {
  ENGLISH_FREQUENCIES,
  InvalidArgumentError,
  createRng,
  createStrategy,
  formatRevealed,
  play,
  type GuessRecord,
  type Outcome,
} from '@hangman/game-core';
import {
  gameReport,
  playReq,
  turnReport,
  type GameReport,
  type PlayReq,
  type StrategyKind,
  type TurnReport,
} from '@hangman/protocol';
import { loadConfig } from './config.js';
import { BUNDLED_WORDS_FILE, resolveDictionary } from './dictionary.js';
import { createLogger, type Logger } from './logger.js';
import { renderCandidates, renderIntro, renderSummary, renderTurn } from './render.js';

export const USAGE = 'Usage: hangman [-s random|frequency|regex] <phrase...>';

export interface CliIo {
  env: NodeJS.ProcessEnv;
  stdout(line: string): void;
  stderr(line: string): void;
  /** Overrides the logger built from LOG_LEVEL. */
  logger?: Logger;
}

export function parseCommandLine(argv: readonly string[]): PlayReq {
  let parsed: ReturnType<typeof parseOptions>;
  try {
    parsed = parseOptions(argv);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }

  const req = playReq.safeParse({ strategy: parsed.values.strategy, phrase: parsed.positionals });
  if (!req.success) {
    const issue = req.error.issues[0];
    throw new InvalidArgumentError(issue ? issue.message : 'invalid arguments');
  }
  return req.data;
}

function parseOptions(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    options: { strategy: { type: 'string', short: 's' } },
    allowPositionals: true,
    strict: true,
  });
}

export function toTurnReport(record: GuessRecord, turn: number): TurnReport {
  return turnReport.parse({ turn, ...record, positions: [...record.positions] });
}

export function toGameReport(outcome: Outcome, strategy: StrategyKind): GameReport {
  return gameReport.parse({
    status: outcome.status,
    strategy,
    phrase: outcome.phrase,
    revealed: outcome.revealed,
    turns: outcome.guesses.map((g, i) => toTurnReport(g, i + 1)),
    lettersGuessed: outcome.guesses.length,
    wrongGuesses: outcome.wrongGuesses,
  });
}

export function run(argv: readonly string[], io: CliIo): number {
  let req: PlayReq;
  let config: ReturnType<typeof loadConfig>;
  try {
    req = parseCommandLine(argv);
    config = loadConfig(io.env);
  } catch (err) {
    if (!(err instanceof InvalidArgumentError)) throw err;
    io.stderr(`error: ${err.message}`);
    io.stderr(USAGE);
    return 1;
  }

  const log = io.logger ?? createLogger(config.logLevel);
  const sources = [config.dictionaryFile, BUNDLED_WORDS_FILE].filter(
    (s): s is string => s !== undefined,
  );
  const dictionary = req.strategy === 'regex' ? resolveDictionary(sources, log) : null;

  const strategy = createStrategy(req.strategy, {
    table: ENGLISH_FREQUENCIES,
    dictionary,
    random: config.seed === undefined ? undefined : createRng(config.seed),
  });
  log.info({ strategy: req.strategy, maxAttempts: config.maxAttempts }, 'starting game');

  try {
    const outcome = play(req.phrase, strategy, config.maxAttempts, {
      onStart: (state) => {
        const intro = renderIntro(state.phrase, req.strategy, state.maxAttempts, formatRevealed(state.revealed));
        intro.forEach((line) => io.stdout(line));
      },
      onTurnStart: (state) => {
        if (strategy.kind !== 'regex') return;
        renderCandidates(strategy.candidates(state)).forEach((line) => io.stdout(line));
      },
      onTurn: (record, state) => {
        log.debug({ letter: record.letter, hit: record.hit, attemptsRemaining: record.attemptsRemaining }, 'guess');
        io.stdout(renderTurn(toTurnReport(record, state.history.length)));
      },
    });

    const report = toGameReport(outcome, req.strategy);
    renderSummary(report).forEach((line) => io.stdout(line));
    log.info({ status: report.status, turns: report.turns.length }, 'game finished');
    return 0;
  } catch (err) {
    log.error({ err }, 'game aborted');
    io.stderr(`internal error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
