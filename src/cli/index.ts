#!/usr/bin/env node

import { logger } from '../logging/logger.js';
import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    logger.fatal('Unexpected failure', err instanceof Error ? err : { reason: String(err) });
    process.exitCode = 1;
  });
