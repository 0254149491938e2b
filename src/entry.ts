import { labelValue, sprint, sprintf } from './format';
import type { Logger } from './logger';
import { captureFrames, formatStackTrace, STACK_DEPTH } from './stack';
import { Severity } from './types';
import type { Fields, LogRecord, Operation, SourceLocation, SpanContext } from './types';
import { errorMessage, errorName } from './utils';

const TRACE_FLAG_SAMPLED = 0x1;

/**
 * Accumulated context of a log record, before severity and message are fixed.
 *
 * Every `with*` call returns a new Entry with its own copies of labels, details
 * and operation, so a parent is never changed by its children. The operation
 * calls (`withOperation`, `startOperation`, `endOperation`) are the exception:
 * they change the entry they are called on, so that an operation started on an
 * entry can later be ended on that same entry.
 */
export class Entry {
  private labels?: Record<string, string>;
  private details?: Fields;
  private operation?: Operation;
  private trace = '';
  private spanId = '';
  private traceSampled = false;
  private err = '';
  private errName = '';
  private stack?: readonly string[];

  constructor(private readonly logger: Logger) {}

  /* ------------------------------ Attachers ------------------------------ */

  /** Labels included in all logs written for this entry. Values are stringified. */
  withLabels(labels: Fields): Entry {
    const c = this.clone();
    const merged = (c.labels ??= {});
    for (const [k, v] of Object.entries(labels)) merged[k] = labelValue(v);
    return c;
  }

  withDetail(key: string, value: unknown): Entry {
    const c = this.clone();
    (c.details ??= {})[key] = value;
    return c;
  }

  withDetails(details: Fields): Entry {
    const c = this.clone();
    Object.assign((c.details ??= {}), details);
    return c;
  }

  /** Attach the message of `err`; `null` or `undefined` clears it. */
  withError(err: unknown): Entry {
    const c = this.clone();
    c.err = err == null ? '' : errorMessage(err);
    c.errName = err == null ? '' : errorName(err);
    return c;
  }

  /**
   * Correlate with a trace. The trace name is qualified by the logger's project;
   * without a project no trace fields are set.
   */
  withSpan(span: SpanContext): Entry {
    const c = this.clone();
    const project = this.logger.getProject();
    if (!project) return c;
    c.trace = `projects/${project}/traces/${span.traceId}`;
    c.spanId = span.spanId;
    c.traceSampled = (span.traceFlags & TRACE_FLAG_SAMPLED) === TRACE_FLAG_SAMPLED;
    return c;
  }

  /** Capture the current stack; it is rendered as `exception` when the entry is logged. */
  withStack(): Entry {
    return this.captureStack(1);
  }

  /* ------------------------------ Operations ----------------------------- */

  /** Mark logs of this entry as part of an operation. Changes and returns this entry. */
  withOperation(id: string, producer: string): Entry {
    this.operation = { id, producer, first: false, last: false };
    return this;
  }

  /** Start an operation and log its start at NOTICE. Changes and returns this entry. */
  startOperation(id: string, producer: string): Entry {
    return this.beginOperation(id, producer, 2);
  }

  /** Log the end of the current operation at NOTICE and drop it. No-op without one. */
  endOperation(): void {
    const op = this.operation;
    if (!op) return;
    op.last = true;
    this.logger.emit(this, Severity.Notice, `${op.producer} ending operation ${op.id}`, 1);
    this.operation = undefined;
  }

  /* ------------------------------- Severities ---------------------------- */

  debug(...args: unknown[]): void {
    this.logger.emit(this, Severity.Debug, sprint(args), 1);
  }

  debugf(format: string, ...args: unknown[]): void {
    this.logger.emit(this, Severity.Debug, sprintf(format, args), 1);
  }

  info(...args: unknown[]): void {
    this.logger.emit(this, Severity.Info, sprint(args), 1);
  }

  infof(format: string, ...args: unknown[]): void {
    this.logger.emit(this, Severity.Info, sprintf(format, args), 1);
  }

  notice(...args: unknown[]): void {
    this.logger.emit(this, Severity.Notice, sprint(args), 1);
  }

  noticef(format: string, ...args: unknown[]): void {
    this.logger.emit(this, Severity.Notice, sprintf(format, args), 1);
  }

  warn(...args: unknown[]): void {
    this.logger.emit(this, Severity.Warning, sprint(args), 1);
  }

  warnf(format: string, ...args: unknown[]): void {
    this.logger.emit(this, Severity.Warning, sprintf(format, args), 1);
  }

  error(...args: unknown[]): void {
    this.logger.emit(this, Severity.Error, sprint(args), 1);
  }

  errorf(format: string, ...args: unknown[]): void {
    this.logger.emit(this, Severity.Error, sprintf(format, args), 1);
  }

  critical(...args: unknown[]): void {
    this.logger.emit(this, Severity.Critical, sprint(args), 1);
  }

  criticalf(format: string, ...args: unknown[]): void {
    this.logger.emit(this, Severity.Critical, sprintf(format, args), 1);
  }

  alert(...args: unknown[]): void {
    this.logger.emit(this, Severity.Alert, sprint(args), 1);
  }

  alertf(format: string, ...args: unknown[]): void {
    this.logger.emit(this, Severity.Alert, sprintf(format, args), 1);
  }

  emergency(...args: unknown[]): void {
    this.logger.emit(this, Severity.Emergency, sprint(args), 1);
  }

  emergencyf(format: string, ...args: unknown[]): void {
    this.logger.emit(this, Severity.Emergency, sprintf(format, args), 1);
  }

  /* ------------------------------- Internals ----------------------------- */

  /**
   * @internal
   * `skip` counts the library frames between this method and the user's call.
   */
  captureStack(skip: number): Entry {
    const c = this.clone();
    c.stack = captureFrames(skip + 1, STACK_DEPTH);
    return c;
  }

  /**
   * @internal
   * `skip` counts the library frames between `Logger.emit` and the user's call.
   */
  beginOperation(id: string, producer: string, skip: number): Entry {
    const op: Operation = { id, producer, first: true, last: false };
    this.operation = op;
    this.logger.emit(this, Severity.Notice, `${producer} starting operation ${id}`, skip);
    op.first = false;
    return this;
  }

  /**
   * @internal
   * Build the record to encode. `frames` replaces the captured stack when given.
   */
  toRecord(severity: Severity, message: string, source?: SourceLocation, frames?: readonly string[]): LogRecord {
    const record: LogRecord = { message, severity };
    if (this.labels) record['logging.googleapis.com/labels'] = this.labels;
    if (source) record['logging.googleapis.com/sourceLocation'] = source;
    if (this.operation) record['logging.googleapis.com/operation'] = operationRecord(this.operation);
    if (this.trace) record['logging.googleapis.com/trace'] = this.trace;
    if (this.spanId) record['logging.googleapis.com/spanId'] = this.spanId;
    if (this.traceSampled) record['logging.googleapis.com/trace_sampled'] = true;
    if (this.details) record.details = this.details;
    if (this.err) record.error = this.err;

    const stack = frames ?? this.stack;
    if (stack && stack.length > 0) record.exception = formatStackTrace(this.err || message, stack, this.errName || undefined);
    return record;
  }

  /** Copy with maps and operation of its own so that changes do not affect the parent. */
  private clone(): Entry {
    const next = new Entry(this.logger);
    next.labels = this.labels && { ...this.labels };
    next.details = this.details && { ...this.details };
    next.operation = this.operation && { ...this.operation };
    next.trace = this.trace;
    next.spanId = this.spanId;
    next.traceSampled = this.traceSampled;
    next.err = this.err;
    next.errName = this.errName;
    next.stack = this.stack;
    return next;
  }
}

/** Operation as written: false flags and empty strings are left out. */
function operationRecord(op: Operation): Partial<Operation> {
  const out: Partial<Operation> = {};
  if (op.id) out.id = op.id;
  if (op.producer) out.producer = op.producer;
  if (op.first) out.first = true;
  if (op.last) out.last = true;
  return out;
}
