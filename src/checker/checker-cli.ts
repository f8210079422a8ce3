#!/usr/bin/env node
import log from 'loglevel';
import { createProgram } from './program.js';
import { errorMessage } from './session.js';

const program = createProgram({
  env: process.env,
  output: { write: line => log.info(line) },
  exit: code => process.exit(code),
});

program.parseAsync(process.argv).catch((e: unknown) => {
  log.error(`Unexpected error: ${errorMessage(e)}`);
  process.exit(1);
});
