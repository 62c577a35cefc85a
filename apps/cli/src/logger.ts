// apps/cli/src/logger.ts
//
// pino logger for diagnostics. Output goes to stderr (fd 2) so stdout only
// carries the game transcript.

import { pino, destination, type Logger } from 'pino';

export function createLogger(level: string): Logger {
  return pino({ name: 'hangman', level }, destination(2));
}

export type { Logger };
