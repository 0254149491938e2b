import { EventEmitter } from 'node:events';
import { Entry } from './entry';
import { encodeRecord, sprint, sprintf } from './format';
import { captureFrames, sources, STACK_DEPTH } from './stack';
import { Severity } from './types';
import type { Fields, LocationCache, LoggerOptions, Output, SourceLocation, SpanContext } from './types';
import { errorMessage, parseSwitch } from './utils';

/** Severities that always carry the stack of the log call. */
const STACK_SEVERITIES: ReadonlySet<Severity> = new Set([
  Severity.Error,
  Severity.Critical,
  Severity.Alert,
  Severity.Emergency,
]);

/**
 * Structured logger writing one Cloud Logging JSON record per line.
 *
 * Every record is encoded in full and handed to the output in a single
 * synchronous `write`, so lines from concurrent tasks never interleave.
 */
export class Logger {
  private output: Output;
  private readonly fallback: Output;
  private project: string;
  private includeSources: boolean;
  private readonly sources: LocationCache;
  private readonly base: Entry;

  constructor(options: LoggerOptions = {}) {
    const env = options.env ?? process.env;
    this.output = options.output ?? process.stdout;
    this.fallback = options.fallback ?? process.stderr;
    this.watch(this.output);
    this.project = options.project ?? env.GOOGLE_CLOUD_PROJECT ?? env.GCLOUD_PROJECT ?? '';
    this.includeSources = options.includeSources ?? parseSwitch(env.LOG_INCLUDE_SOURCES) ?? true;
    this.sources = options.sources ?? sources;
    this.base = new Entry(this);
  }

  /* ------------------------------- Settings ------------------------------ */

  /** Set the destination of encoded records. */
  setOutput(output: Output): void {
    if (output === this.output) return;
    this.unwatch(this.output);
    this.output = output;
    this.watch(output);
  }

  /** Set the project used to qualify trace names. */
  setProject(project: string): void {
    this.project = project;
  }

  getProject(): string {
    return this.project;
  }

  /** Include file, line and function of the log call in every record. */
  setIncludeSources(include: boolean): void {
    this.includeSources = include;
  }

  getIncludeSources(): boolean {
    return this.includeSources;
  }

  /* ------------------------------- Entries ------------------------------- */

  /** Create an empty entry for reusing details across multiple log calls. */
  newEntry(): Entry {
    return new Entry(this);
  }

  withLabels(labels: Fields): Entry {
    return this.newEntry().withLabels(labels);
  }

  withDetail(key: string, value: unknown): Entry {
    return this.newEntry().withDetail(key, value);
  }

  withDetails(details: Fields): Entry {
    return this.newEntry().withDetails(details);
  }

  withError(err: unknown): Entry {
    return this.newEntry().withError(err);
  }

  withSpan(span: SpanContext): Entry {
    return this.newEntry().withSpan(span);
  }

  withOperation(id: string, producer: string): Entry {
    return this.newEntry().withOperation(id, producer);
  }

  startOperation(id: string, producer: string): Entry {
    return this.newEntry().beginOperation(id, producer, 2);
  }

  withStack(): Entry {
    return this.newEntry().captureStack(1);
  }

  /* ------------------------------ Severities ----------------------------- */

  debug(...args: unknown[]): void {
    this.emit(this.base, Severity.Debug, sprint(args), 1);
  }

  debugf(format: string, ...args: unknown[]): void {
    this.emit(this.base, Severity.Debug, sprintf(format, args), 1);
  }

  info(...args: unknown[]): void {
    this.emit(this.base, Severity.Info, sprint(args), 1);
  }

  infof(format: string, ...args: unknown[]): void {
    this.emit(this.base, Severity.Info, sprintf(format, args), 1);
  }

  notice(...args: unknown[]): void {
    this.emit(this.base, Severity.Notice, sprint(args), 1);
  }

  noticef(format: string, ...args: unknown[]): void {
    this.emit(this.base, Severity.Notice, sprintf(format, args), 1);
  }

  warn(...args: unknown[]): void {
    this.emit(this.base, Severity.Warning, sprint(args), 1);
  }

  warnf(format: string, ...args: unknown[]): void {
    this.emit(this.base, Severity.Warning, sprintf(format, args), 1);
  }

  error(...args: unknown[]): void {
    this.emit(this.base, Severity.Error, sprint(args), 1);
  }

  errorf(format: string, ...args: unknown[]): void {
    this.emit(this.base, Severity.Error, sprintf(format, args), 1);
  }

  critical(...args: unknown[]): void {
    this.emit(this.base, Severity.Critical, sprint(args), 1);
  }

  criticalf(format: string, ...args: unknown[]): void {
    this.emit(this.base, Severity.Critical, sprintf(format, args), 1);
  }

  alert(...args: unknown[]): void {
    this.emit(this.base, Severity.Alert, sprint(args), 1);
  }

  alertf(format: string, ...args: unknown[]): void {
    this.emit(this.base, Severity.Alert, sprintf(format, args), 1);
  }

  emergency(...args: unknown[]): void {
    this.emit(this.base, Severity.Emergency, sprint(args), 1);
  }

  emergencyf(format: string, ...args: unknown[]): void {
    this.emit(this.base, Severity.Emergency, sprintf(format, args), 1);
  }

  /* ------------------------------- Emission ------------------------------ */

  /**
   * @internal
   * Write `entry` with the given severity and message.
   * `skip` counts the library frames between this method and the user's call,
   * so that the source location and stack start at the user's code.
   */
  emit(entry: Entry, severity: Severity, message: string, skip: number): void {
    // Do costly operations prior to encoding
    const withStack = STACK_SEVERITIES.has(severity);
    let source: SourceLocation | undefined;
    let frames: string[] | undefined;
    if (this.includeSources || withStack) {
      const captured = captureFrames(skip + 1, withStack ? STACK_DEPTH : 1);
      if (withStack) frames = captured;
      if (this.includeSources && captured.length > 0) {
        try {
          source = this.sources.resolve(captured[0]);
        } catch (err) {
          this.report('could not resolve source', err);
        }
      }
    }

    const output = this.output;
    let line: string;
    try {
      line = encodeRecord(entry.toRecord(severity, message, source, frames));
    } catch (err) {
      this.report('could not marshal log', err);
      return;
    }
    try {
      output.write(line);
    } catch (err) {
      this.report('could not write log', err);
    }
  }

  /* ----------------------------- Diagnostics ----------------------------- */

  /** Streams report failed writes through `'error'` events rather than by throwing. */
  private readonly onOutputError = (err: unknown): void => {
    this.report('could not write log', err);
  };

  private watch(output: Output): void {
    if (output instanceof EventEmitter) output.on('error', this.onOutputError);
  }

  private unwatch(output: Output): void {
    if (output instanceof EventEmitter) output.off('error', this.onOutputError);
  }

  /** Write one diagnostic line to the fallback output. Never throws. */
  private report(what: string, err: unknown): void {
    try {
      this.fallback.write(`${what}: ${oneLine(errorMessage(err))}\n`);
    } catch {
      // Nowhere left to report to.
    }
  }
}

/** Diagnostics are single lines, whatever the error says. */
function oneLine(s: string): string {
  return s.replace(/\s*\n\s*/g, ' ');
}

/**
 * Create a new logger instance
 */
export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}
