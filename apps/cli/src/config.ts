// apps/cli/src/config.ts
//
// Environment configuration, validated with zod. The entry point loads
// `.env` through dotenv before this runs; tests pass their own env object.
//
//   LOG_LEVEL        pino level for diagnostics on stderr (default "warn")
//   MAX_ATTEMPTS     misses allowed before the game is lost (default 6)
//   DICTIONARY_FILE  word list for the regex strategy, one word per line
//   HANGMAN_SEED     seed for the random strategy; unseeded when absent

import { z } from 'zod';
import { DEFAULT_MAX_ATTEMPTS, InvalidArgumentError } from '@hangman/game-core';

const envSchema = z.object({
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('warn'),
  MAX_ATTEMPTS: z.coerce.number().int().min(0).default(DEFAULT_MAX_ATTEMPTS),
  DICTIONARY_FILE: z.string().min(1).optional(),
  HANGMAN_SEED: z.string().min(1).optional(),
});

export interface CliConfig {
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  maxAttempts: number;
  dictionaryFile?: string;
  seed?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv): CliConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidArgumentError(
      issue ? `invalid ${issue.path.join('.')}: ${issue.message}` : 'invalid environment',
    );
  }
  const { LOG_LEVEL, MAX_ATTEMPTS, DICTIONARY_FILE, HANGMAN_SEED } = parsed.data;
  return {
    logLevel: LOG_LEVEL,
    maxAttempts: MAX_ATTEMPTS,
    dictionaryFile: DICTIONARY_FILE,
    seed: HANGMAN_SEED,
  };
}
