import { fileURLToPath } from 'node:url';
import type { LocationCache, LocationResolver, SourceLocation } from './types';

/** Maximum number of frames kept for a stack snapshot. */
export const STACK_DEPTH = 16;

const FRAME = /^\s*at\s+(?:(.*?)\s+\((.*)\)|(.*))$/;
const POSITION = /^(.*):(\d+):(\d+)$/;

/* ------------------------------ Frame capture ------------------------------ */

/**
 * Capture up to `depth` frames of the current stack, dropping the first `skip`.
 * Frame 0 is the caller of `captureFrames`. Frames are returned as `at ...` text.
 */
export function captureFrames(skip: number, depth: number): string[] {
    const holder: { stack?: string } = {};
    const limit = Error.stackTraceLimit;
    Error.stackTraceLimit = skip + depth;
    try {
        Error.captureStackTrace(holder, captureFrames);
    } finally {
        Error.stackTraceLimit = limit;
    }
    return frameLines(holder.stack ?? '').slice(skip, skip + depth);
}

/** The `at ...` lines of a V8 stack string, trimmed. */
export function frameLines(stack: string): string[] {
    const out: string[] = [];
    for (const line of stack.split('\n')) {
        const t = line.trim();
        if (t.startsWith('at ')) out.push(t);
    }
    return out;
}

/**
 * Parse a V8 frame (`at fn (file:line:col)`, `at file:line:col`, `at async fn (...)`).
 * Local `file:///` URLs are turned into paths; URLs naming a host are kept as they are.
 * Returns `undefined` for anything else.
 */
export function parseFrame(frame: string): SourceLocation | undefined {
    const m = FRAME.exec(frame);
    if (!m) return undefined;

    const out: SourceLocation = {};
    const fn = (m[1] ?? '').replace(/^async\s+/, '');
    if (fn) out.function = fn;

    const where = m[2] ?? m[3] ?? '';
    const pos = POSITION.exec(where);
    if (pos) {
        out.file = pos[1].startsWith('file:///') ? fileURLToPath(pos[1]) : pos[1];
        out.line = pos[2];
    }
    return out.file || out.function ? out : undefined;
}

/**
 * Format frames the way Node prints an error stack: a `Name: description` line,
 * then one indented line per frame.
 */
export function formatStackTrace(description: string, frames: readonly string[], name = 'Error'): string {
    let out = `${name}: ${description}`;
    for (const f of frames) out += `\n    ${f}`;
    return out;
}

/* ------------------------------ Source cache ------------------------------- */

/**
 * Call-site cache keyed by frame text (function, file, line and column),
 * which identifies a call site the way a return address does.
 * Entries are never evicted: call sites are bounded by the program's code.
 */
export class SourceCache implements LocationCache {
    private readonly entries = new Map<string, Readonly<SourceLocation> | undefined>();
    private misses = 0;

    constructor(private readonly resolver: LocationResolver = parseFrame) {}

    resolve(frame: string): SourceLocation | undefined {
        if (this.entries.has(frame)) return this.entries.get(frame);
        this.misses++;
        const found = this.resolver(frame);
        const location = found && Object.freeze({ ...found });
        this.entries.set(frame, location);
        return location;
    }

    /** Number of times the resolver ran. */
    get resolved(): number {
        return this.misses;
    }

    /** Number of cached call sites. */
    get size(): number {
        return this.entries.size;
    }
}

/** Process-wide cache shared by every logger not given its own. */
export const sources = new SourceCache();
