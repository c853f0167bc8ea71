/**
 * src/utils/errors.ts
 *
 * Error taxonomy shared by every component.
 *
 *   transient   store unreachable, pool exhausted, fetch timeout: retry with backoff
 *   validation  a record is missing a required field: reject, count, continue
 *   detection   blocked verdict: not thrown, it feeds the controller and pools
 *   fatal       schema mismatch or a sink gone past its retry limit: the process exits
 *
 * Queue and pool methods never throw across their boundary; they return an
 * Outcome<T> instead.
 */

export type ErrorKind = 'transient' | 'validation' | 'detection' | 'fatal';

export class CrawlError extends Error {
    readonly kind: ErrorKind;

    constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.kind = kind;
        this.name = 'CrawlError';
    }
}

export class TransientError extends CrawlError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('transient', message, options);
        this.name = 'TransientError';
    }
}

export class FatalError extends CrawlError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('fatal', message, options);
        this.name = 'FatalError';
    }
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: CrawlError };

export function ok<T>(value: T): Outcome<T> {
    return { ok: true, value };
}

export function transientFailure<T>(context: string, cause: unknown): Outcome<T> {
    return {
        ok: false,
        error: new TransientError(`${context}: ${describeError(cause)}`, { cause }),
    };
}

export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    if (typeof err === 'string') return err;
    try {
        return JSON.stringify(err);
    } catch {
        return String(err);
    }
}

export function isFatal(err: unknown): err is FatalError {
    return err instanceof CrawlError && err.kind === 'fatal';
}
