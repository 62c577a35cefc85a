// apps/cli/src/index.ts
//
// Process entry point: loads `.env`, runs the CLI against the real argv and
// streams, and hands the exit code back to Node.

import 'dotenv/config';
import { run } from './cli.js';

process.exitCode = run(process.argv.slice(2), {
  env: process.env,
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
});
