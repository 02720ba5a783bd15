#!/usr/bin/env node
// src/index.ts is the main entry point to run CLI
import { runCli } from './cli/index.js';
import { logger } from './utils/index.js';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error(error);
    process.exitCode = 1;
  },
);
