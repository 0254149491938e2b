/**
 * Severity levels understood by Cloud Logging, in order of urgency.
 * Serialized as their literal name.
 */
export enum Severity {
  Debug = 'DEBUG',
  Info = 'INFO',
  Notice = 'NOTICE',
  Warning = 'WARNING',
  Error = 'ERROR',
  Critical = 'CRITICAL',
  Alert = 'ALERT',
  Emergency = 'EMERGENCY',
}

/** Arbitrary key-values attached to an entry. */
export type Fields = Record<string, unknown>;

/**
 * Destination for encoded records. Each call receives one complete line,
 * so `process.stdout`, any `Writable` or a `MemorySink` can be used as-is.
 */
export interface Output {
  write(chunk: string): unknown;
}

/** Code location that originated a log call. */
export interface SourceLocation {
  file?: string;
  line?: string;
  function?: string;
}

/** The logical operation a log entry is part of. */
export interface Operation {
  id: string;
  producer: string;
  first: boolean;
  last: boolean;
}

/**
 * Read-only view of a span, as handed out by a tracing library
 * (structurally compatible with OpenTelemetry's `SpanContext`).
 */
export interface SpanContext {
  traceId: string;
  spanId: string;
  traceFlags: number;
}

/** Resolves a captured stack frame into a source location. */
export type LocationResolver = (frame: string) => SourceLocation | undefined;

/**
 * One encoded log line.
 * See https://cloud.google.com/logging/docs/structured-logging#special-payload-fields
 */
export interface LogRecord {
  message: string;
  severity: Severity;
  'logging.googleapis.com/labels'?: Record<string, string>;
  'logging.googleapis.com/sourceLocation'?: SourceLocation;
  'logging.googleapis.com/operation'?: Partial<Operation>;
  'logging.googleapis.com/trace'?: string;
  'logging.googleapis.com/spanId'?: string;
  'logging.googleapis.com/trace_sampled'?: boolean;
  details?: Fields;
  error?: string;
  exception?: string;
}

/**
 * Logger configuration
 */
export interface LoggerOptions {
  /**
   * Where encoded records go. Default: `process.stdout`
   */
  output?: Output;
  /**
   * Where diagnostics go when a record cannot be encoded or written. Default: `process.stderr`
   */
  fallback?: Output;
  /**
   * Project used to qualify trace names.
   * If omitted, resolves from env: `GOOGLE_CLOUD_PROJECT` → `GCLOUD_PROJECT` → none.
   */
  project?: string;
  /**
   * Resolve file, line and function of every log call.
   * If omitted, resolves from env `LOG_INCLUDE_SOURCES`, else true.
   */
  includeSources?: boolean;
  /**
   * Cache used to resolve call sites. Default: the process-wide `sources` cache.
   */
  sources?: LocationCache;
  /**
   * Environment bag used to resolve defaults. Default: `process.env`
   */
  env?: Record<string, string | undefined>;
}

/** Anything that can turn a frame into a location, cached or not. */
export interface LocationCache {
  resolve(frame: string): SourceLocation | undefined;
}
