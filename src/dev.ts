// src/dev.ts
// Development helpers: fail fast on errors and a well defined "not implemented" error.

import { captureFrames, sources } from './stack';
import { errorMessage, isErrorLike } from './utils';

/** Throws `err` unless it is `null` or `undefined`. */
export function failFast(err: unknown): void {
    if (err == null) return;
    throw isErrorLike(err) ? err : new Error(errorMessage(err));
}

/**
 * Something still needs to be built. Should never reach production.
 * `file`, `line` and `fn` describe where it was created.
 */
export class NotImplementedError extends Error {
    constructor(readonly file: string, readonly line: number, readonly fn: string) {
        super(`not implemented: ${fn}`);
        this.name = 'NotImplementedError';
    }
}

/** Error detailing that the calling function is not implemented. Returned, never thrown. */
export function notImplemented(): NotImplementedError {
    const [frame] = captureFrames(1, 1);
    const location = frame === undefined ? undefined : sources.resolve(frame);
    return new NotImplementedError(
        location?.file ?? 'unknown',
        location?.line === undefined ? -1 : Number(location.line),
        location?.function ?? 'unknown',
    );
}
