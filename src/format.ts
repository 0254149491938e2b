import { format } from 'node:util';
import type { LogRecord } from './types';
import { normalizeError } from './utils';

/* ------------------------------- Formatters -------------------------------- */

/**
 * Print-style join: strings are kept verbatim, everything else goes through `%s`,
 * operands are separated by a single space. Never substitutes format directives.
 */
export function sprint(args: readonly unknown[]): string {
    let out = '';
    for (let i = 0; i < args.length; i++) {
        const v = args[i];
        if (i > 0) out += ' ';
        out += typeof v === 'string' ? v : format('%s', v);
    }
    return out;
}

/** Printf-style substitution (`%s`, `%d`, `%i`, `%f`, `%j`, `%o`, `%O`, `%%`) as `util.format` does it. */
export function sprintf(fmt: string, args: readonly unknown[]): string {
    return format(fmt, ...args);
}

/** String form used for label values. */
export function labelValue(v: unknown): string {
    return typeof v === 'string' ? v : format('%s', v);
}

/* ----------------------------- Record encoding ----------------------------- */

/**
 * Encode a record as one JSON line (newline included).
 * - BigInt is stringified.
 * - Errors become `{ name, message, ...own fields }`.
 * Throws on values JSON cannot represent (e.g. cycles); the caller reports it.
 */
export function encodeRecord(record: LogRecord): string {
    return JSON.stringify(record, (_k, v: unknown) => {
        if (typeof v === 'bigint') return v.toString();
        if (v instanceof Error) return normalizeError(v);
        return v;
    }) + '\n';
}
