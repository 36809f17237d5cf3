#!/usr/bin/env node
import { main } from './cli';
import { errorMessage, logError } from './log';

process.on('unhandledRejection', (reason: unknown) => {
  logError('unhandledRejection', reason);
  process.exit(1);
});

main(process.argv.slice(2)).then(
  code => { process.exitCode = code; },
  (e: unknown) => {
    logError(errorMessage(e));
    process.exitCode = 1;
  },
);
