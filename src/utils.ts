/* ------------------------------ Error helpers ------------------------------ */

/** Fast-ish error-like detection */
export function isErrorLike(e: unknown): e is { message: string; name?: unknown } {
    return !!e && typeof e === 'object' && 'message' in e && typeof e.message === 'string';
}

/** Message of an error-like value, the string itself, or its string form. */
export function errorMessage(e: unknown): string {
    if (isErrorLike(e)) return e.message;
    return typeof e === 'string' ? e : String(e);
}

/** Name of an error-like value, `Error` when it has none. */
export function errorName(e: unknown): string {
    return isErrorLike(e) && typeof e.name === 'string' && e.name ? e.name : 'Error';
}

/**
 * Convert an Error into a small, JSON-friendly object.
 * - Always includes `name` and `message`.
 * - Copies own enumerable custom fields (if any) but never overrides `name|message|stack`.
 */
export function normalizeError(err: Error): Record<string, unknown> {
    const out: Record<string, unknown> = { name: err.name || 'Error', message: err.message };
    for (const [k, v] of Object.entries(err)) {
        if (k === 'name' || k === 'message' || k === 'stack') continue;
        out[k] = v;
    }
    return out;
}

/* ------------------------------- Env helpers ------------------------------- */

/**
 * Resolve a switch-like string into a boolean.
 * Accepts `1|true|yes|on` and `0|false|no|off` (case-insensitive, trimmed).
 * Returns `undefined` if unparsable; callers decide fallback behavior.
 */
export function parseSwitch(s?: string): boolean | undefined {
    switch (s?.trim().toLowerCase()) {
        case '1': case 'true': case 'yes': case 'on': return true;
        case '0': case 'false': case 'no': case 'off': return false;
    }
    return undefined;
}
