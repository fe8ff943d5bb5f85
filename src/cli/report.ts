import { ConfigLoadError } from '../config/errors.js';
import type { Logger } from '../logging/logger.js';
import { DeepMergeError } from '../merge/errors.js';

/**
 * Log an expected failure and mark the process as failed. Anything that is
 * not a merge or config error is a bug and propagates.
 */
export function reportFailure(log: Logger, message: string, err: unknown): void {
  if (err instanceof DeepMergeError || err instanceof ConfigLoadError) {
    log.error(message, err);
    process.exitCode = 1;
    return;
  }
  throw err;
}
