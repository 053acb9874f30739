#!/usr/bin/env node
import { CommanderError } from 'commander';
import { runCli } from './app.js';
import { EXIT_CODES } from './services/run.service.js';
import { createLogger } from './utils/logger.js';

// committed pages are durable: the first signal lets the run close the database,
// a second one exits at once and the next run resumes from the stored candles
const ac = new AbortController();
function shutdown(sig: string) {
  if (ac.signal.aborted) process.exit(EXIT_CODES.interrupted);
  ac.abort(sig);
}
process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

runCli(process.argv.slice(2), process.env, { signal: ac.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    if (e instanceof CommanderError) {
      process.exitCode = e.exitCode;
      return;
    }
    createLogger({ level: 'error', pretty: false }).fatal({ err: e }, 'candle-sync failed');
    process.exitCode = EXIT_CODES.fatal;
  });
