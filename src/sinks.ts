import { Severity } from './types';
import type { LogRecord, Output } from './types';

const SEVERITIES: ReadonlySet<string> = new Set(Object.values(Severity));

/**
 * Memory output for testing or inspecting logs
 */
export class MemorySink implements Output {
  private chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  /** Number of `write` calls received. */
  get writes(): number {
    return this.chunks.length;
  }

  /** Written lines, without their line breaks. */
  lines(): string[] {
    return this.chunks.join('').split('\n').filter((l) => l !== '');
  }

  /**
   * Written lines parsed back into records.
   * Only `message` and `severity` are checked; other fields are taken as written.
   */
  records(): LogRecord[] {
    return this.lines().map((l) => {
      const record: unknown = JSON.parse(l);
      if (!isLogRecord(record)) throw new Error(`not a log record: ${l}`);
      return record;
    });
  }

  /** The last record written, if any. */
  last(): LogRecord | undefined {
    const all = this.records();
    return all[all.length - 1];
  }

  clear(): void {
    this.chunks = [];
  }
}

function isLogRecord(v: unknown): v is LogRecord {
  return (
    typeof v === 'object' &&
    v !== null &&
    'message' in v &&
    typeof v.message === 'string' &&
    'severity' in v &&
    typeof v.severity === 'string' &&
    SEVERITIES.has(v.severity)
  );
}
