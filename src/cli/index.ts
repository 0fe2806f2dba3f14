#!/usr/bin/env node

import { isRequestError } from '../utils/errors.js';
import { cliLogger } from '../utils/logger.js';
import { printError } from './format.js';
import { createProgram } from './program.js';

createProgram().parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  cliLogger.error({
    kind: isRequestError(err) ? err.kind : err instanceof Error ? err.name : 'unknown',
    error: message,
  }, 'Sharpi target failed');
  printError(message);
  process.exitCode = 1;
});
