/**
 * Merge options: validated once per top-level call, then frozen and
 * threaded through the recursion.
 */

import { z } from 'zod';
import { InvalidConfigurationError, MergeDepthError } from './errors.js';
import type { MergeTraceSink } from './trace.js';

export const DEFAULT_MAX_DEPTH = 1000;

export const mergePolicySchema = z
  .object({
    preserveUnmergeables: z.boolean().default(false),
    knockoutPrefix: z.string().min(1, 'cannot be an empty string').nullable().default(null),
    horizontalPrecedence: z.boolean().default(false),
    sortMergedArrays: z.boolean().default(false),
    unpackArrays: z.string().nullable().default(null),
    legacyArrayConcat: z.boolean().default(false),
    maxDepth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
  })
  .strict()
  .superRefine((policy, ctx) => {
    if (policy.knockoutPrefix !== null && policy.preserveUnmergeables) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['knockoutPrefix'],
        message: 'requires preserveUnmergeables to be false',
      });
    }
  });

export type MergePolicy = z.infer<typeof mergePolicySchema>;

export interface MergeOptions extends Partial<MergePolicy> {
  /** Receives a description of every merge step */
  trace?: MergeTraceSink;
}

export interface ResolvedMergeOptions extends Readonly<MergePolicy> {
  readonly trace: MergeTraceSink | null;
  /** Recursion level; the only field that changes between levels */
  readonly depth: number;
}

function issuePath(path: (string | number)[]): string {
  return path.length === 0 ? 'options' : path.join('.');
}

/**
 * Validate caller options. Throws InvalidConfigurationError for an empty
 * knockout prefix, a knockout prefix combined with preserveUnmergeables,
 * or any mistyped field.
 */
export function resolveMergeOptions(options: MergeOptions = {}): ResolvedMergeOptions {
  const { trace, ...policy } = options;
  const result = mergePolicySchema.safeParse(policy);
  if (!result.success) {
    throw new InvalidConfigurationError(
      result.error.issues.map((issue) => `${issuePath(issue.path)}: ${issue.message}`),
    );
  }
  return Object.freeze({ ...result.data, trace: trace ?? null, depth: 0 });
}

/** Options for the next recursion level down. */
export function descend(options: ResolvedMergeOptions): ResolvedMergeOptions {
  return Object.freeze({ ...options, depth: options.depth + 1 });
}

/** The part of the options that bounds recursion. */
export type DepthLimit = Pick<ResolvedMergeOptions, 'maxDepth' | 'depth'>;

export const DEFAULT_DEPTH_LIMIT: DepthLimit = Object.freeze({ maxDepth: DEFAULT_MAX_DEPTH, depth: 0 });

export function checkDepth(limit: DepthLimit): void {
  if (limit.depth > limit.maxDepth) {
    throw new MergeDepthError(limit.maxDepth);
  }
}

export function nested(limit: DepthLimit): DepthLimit {
  return { maxDepth: limit.maxDepth, depth: limit.depth + 1 };
}
