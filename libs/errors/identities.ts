/**
 * An error identity is the Error instance itself: two errors are the same
 * only when they are the same object. Messages matter to pattern rules
 * alone.
 */
export type ErrorIdentity = Error;

/**
 * Raised when checkResult or checkAsync receives a trailing value that is
 * neither empty nor an Error.
 */
export const IMPROPER_USE_ERROR: ErrorIdentity = new Error('improper use of checkResult');

/**
 * Returned by the classifier in `unexpected` mode when no rule matched and
 * no fallback is set.
 */
export const UNEXPECTED_ERROR: ErrorIdentity = new Error('unexpected error');

export function isErrorIdentity(value: unknown): value is ErrorIdentity {
    return value instanceof Error;
}
