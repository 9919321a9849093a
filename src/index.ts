#!/usr/bin/env node
/**
 * smart-command entry point
 */

import { createProgram } from './cli/program.js';
import { getErrorMessage } from './errors/definition-error.js';
import { logger } from './utils/logger.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('Command failed', { error: getErrorMessage(error) });
    console.error(getErrorMessage(error));
    process.exit(1);
  });
