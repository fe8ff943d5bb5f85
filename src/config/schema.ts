/**
 * Zod schemas for settings files and configuration layer documents
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../logging/logger.js';
import { DEFAULT_MAX_DEPTH } from '../merge/options.js';
import type { MergeMap, MergeValue } from '../merge/value.js';

export const mergeValueSchema: z.ZodType<MergeValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(mergeValueSchema),
    z.record(z.string(), mergeValueSchema),
  ]),
);

/** A layer document must be a map at the top level. */
export const layerDocumentSchema: z.ZodType<MergeMap> = z.record(z.string(), mergeValueSchema);

export const mergeDefaultsSchema = z
  .object({
    preserveUnmergeables: z.boolean().optional(),
    knockoutPrefix: z.string().nullable().optional(),
    sortMergedArrays: z.boolean().optional(),
    unpackArrays: z.string().nullable().optional(),
  })
  .strict();

export const settingsSchema = z
  .object({
    legacyArrayConcat: z.boolean().default(false),
    maxDepth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
    logLevel: z.enum(LOG_LEVELS).default('info'),
    defaults: mergeDefaultsSchema.default({}),
  })
  .strict();

export type MergeDefaults = z.infer<typeof mergeDefaultsSchema>;
export type Settings = z.infer<typeof settingsSchema>;
