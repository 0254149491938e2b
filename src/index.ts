/**
 * cloud-slog: structured logs for Cloud Logging, one JSON record per line.
 */

export { Logger, createLogger } from './logger';
export { Entry } from './entry';
export { MemorySink } from './sinks';
export { SourceCache, sources, parseFrame } from './stack';
export { withContext, fromContext } from './context';
export type { EntryContext } from './context';
export {
  defaultLogger,
  setOutput,
  setProject,
  setIncludeSources,
  newEntry,
  withLabels,
  withDetail,
  withDetails,
  withError,
  withSpan,
  withOperation,
  startOperation,
  withStack,
  debug,
  debugf,
  info,
  infof,
  notice,
  noticef,
  warn,
  warnf,
  error,
  errorf,
  critical,
  criticalf,
  alert,
  alertf,
  emergency,
  emergencyf,
} from './core';
export { Severity } from './types';
export type {
  Fields,
  Output,
  SourceLocation,
  Operation,
  SpanContext,
  LocationResolver,
  LocationCache,
  LogRecord,
  LoggerOptions,
} from './types';
