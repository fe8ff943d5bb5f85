/**
 * Error types raised by the merge engine.
 */

export type DeepMergeErrorCode = 'INVALID_CONFIGURATION' | 'MERGE_DEPTH_EXCEEDED';

export class DeepMergeError extends Error {
  readonly code: DeepMergeErrorCode;

  constructor(code: DeepMergeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeepMergeError';
    this.code = code;
  }
}

/** Rejected merge options; raised before any traversal starts. */
export class InvalidConfigurationError extends DeepMergeError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIGURATION', `Invalid merge options: ${issues.join('; ')}`);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

export class MergeDepthError extends DeepMergeError {
  readonly maxDepth: number;

  constructor(maxDepth: number) {
    super('MERGE_DEPTH_EXCEEDED', `Merge exceeded the maximum depth of ${maxDepth} (cyclic input?)`);
    this.name = 'MergeDepthError';
    this.maxDepth = maxDepth;
  }
}
