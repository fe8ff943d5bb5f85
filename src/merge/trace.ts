/**
 * Merge tracing: an optional side channel describing each merge step.
 * Sinks receive copies of the values involved, so nothing they do feeds
 * back into the result.
 */

import type { Logger } from '../logging/logger.js';
import type { MergeValue } from './value.js';

export type MergeTraceStage =
  | 'enter'
  | 'map-key'
  | 'map-new-key'
  | 'unpack'
  | 'knockout-clear'
  | 'knockout-item'
  | 'combine-sequences'
  | 'overwrite'
  | 'return';

export interface MergeTraceEvent {
  stage: MergeTraceStage;
  /** Recursion depth, 0 at the top-level call */
  depth: number;
  source?: MergeValue;
  destination?: MergeValue;
  key?: string;
}

export type MergeTraceSink = (event: MergeTraceEvent) => void;

function describe(value: MergeValue): string {
  if (value === undefined) return 'undefined';
  return JSON.stringify(value);
}

export function formatTraceEvent(event: MergeTraceEvent): string {
  const indent = '  '.repeat(event.depth);
  const key = event.key !== undefined ? ` ${JSON.stringify(event.key)}` : '';
  const parts: string[] = [];
  if ('source' in event) parts.push(describe(event.source));
  if ('destination' in event) parts.push(describe(event.destination));
  const detail = parts.length > 0 ? ` ${parts.join(' :: ')}` : '';
  return `${indent}${event.stage}${key}${detail}`;
}

/** Route trace events to a logger at debug level. */
export function createLoggerTrace(log: Logger): MergeTraceSink {
  return (event) => {
    if (!log.isLevelEnabled('debug')) return;
    log.debug(formatTraceEvent(event));
  };
}
