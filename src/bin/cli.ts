#!/usr/bin/env node
import { formatError } from '../utils/format';
import { createLogger } from '../utils/log';
import { runCli } from './cli-core';

const log = createLogger();

process.on('uncaughtException', (err) => {
  log.error(`Uncaught exception: ${err.message}`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  log.error(`Unhandled rejection: ${formatError(reason, false)}`);
  process.exit(1);
});

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.error(formatError(err, false));
    process.exitCode = 1;
  }
);
