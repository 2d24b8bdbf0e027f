export type ContentErrorKind = 'NotFound' | 'SourceUnavailable' | 'InvalidQuery';

export interface ContentError {
    kind: ContentErrorKind;
    message: string;
    cause?: unknown;
}

export interface Ok<T> {
    ok: true;
    value: T;
}

export interface Err<E> {
    ok: false;
    error: E;
}

/**
 * Outcome of a caller-facing content operation. Failures that callers must
 * tell apart (missing chapter, broken source, bad filter) travel as values,
 * not as thrown exceptions.
 */
export type Result<T, E = ContentError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
    return { ok: true, value };
}

export function fail(kind: ContentErrorKind, message: string, cause?: unknown): Err<ContentError> {
    return cause === undefined
        ? { ok: false, error: { kind, message } }
        : { ok: false, error: { kind, message, cause } };
}

export const notFound = (message: string): Err<ContentError> => fail('NotFound', message);
export const invalidQuery = (message: string): Err<ContentError> => fail('InvalidQuery', message);
export const sourceUnavailable = (message: string, cause?: unknown): Err<ContentError> =>
    fail('SourceUnavailable', message, cause);

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === 'string') return error;
    try {
        return JSON.stringify(error);
    } catch {
        return 'Unknown error';
    }
}
