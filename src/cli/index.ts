#!/usr/bin/env node
/**
 * @fileoverview docqa executable entry point
 */

import { runCli } from './main.js';
import { formatError } from './errors.js';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(formatError(error));
    process.exitCode = 1;
  },
);
