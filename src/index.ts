// ═══════════════════════════════════════════════════════════════════════════════
// MERGE ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export type { Absent, ClassifiedValue, MergeMap, MergeSequence, MergeValue, Scalar, ValueKind } from './merge/value.js';
export { classify, isMergeMap } from './merge/value.js';

export type { DepthLimit, MergeOptions, MergePolicy, ResolvedMergeOptions } from './merge/options.js';
export { DEFAULT_MAX_DEPTH, resolveMergeOptions } from './merge/options.js';

export type { MergeRuntime } from './merge/presets.js';
export {
  deepMerge,
  deepMergeInPlace,
  horizontalMerge,
  merge,
  roleMerge,
  ROLE_KNOCKOUT_PREFIX,
} from './merge/presets.js';

export type { DeepMergeErrorCode } from './merge/errors.js';
export { DeepMergeError, InvalidConfigurationError, MergeDepthError } from './merge/errors.js';

export type { MergeTraceEvent, MergeTraceSink, MergeTraceStage } from './merge/trace.js';
export { createLoggerTrace, formatTraceEvent } from './merge/trace.js';

export { compareValues, valuesEqual } from './merge/compare.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export type { MergeDefaults, Settings } from './config/schema.js';
export { loadSettings, settingsToRuntime } from './config/settings.js';
export type { LayerMergeMode, ResolveLayersOptions } from './config/layers.js';
export { loadLayer, mergeLayers, resolveLayers } from './config/layers.js';
export type { ConfigLoadErrorCode } from './config/errors.js';
export { ConfigLoadError } from './config/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

export type { LogEntry, LogLevel, Transport } from './logging/logger.js';
export { ConsoleTransport, Logger, logger, MemoryTransport } from './logging/logger.js';
