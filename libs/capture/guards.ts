/**
 * Failure capture: the calls that turn a failed check into a FailureSignal.
 *
 * None of these return on failure. The trace is taken here, at the failure
 * site, so the case file shows the stack that failed rather than the one
 * the guard sees after unwinding.
 */

import { logger } from '../logging/logger.js';
import { sanitizeMessage } from '../errors/sanitizer.js';
import { IMPROPER_USE_ERROR, isErrorIdentity, type ErrorIdentity } from '../errors/identities.js';
import { GuardContext } from '../context/guardContext.js';
import { captureTrace, createFailureRecord, FailureSignal, isFailureSignal } from './failure.js';

export type FailureMetadata = Record<string, unknown>;

/**
 * A value/error pair as produced by callback-style APIs.
 */
export interface ValueOrError<T> {
    readonly value: T;
    readonly error?: ErrorIdentity | null;
}

function raise(
    error: ErrorIdentity,
    trace: string,
    detected: boolean,
    metadata?: FailureMetadata
): never {
    const record = createFailureRecord(error, trace, detected, metadata);

    if (!GuardContext.isActive()) {
        logger.warn({
            errorMessage: sanitizeMessage(error.message),
            detected,
            metadata: record.metadata
        }, 'Failure raised outside any guarded call chain');
    }

    throw new FailureSignal(record);
}

/**
 * Ensure an invariant holds. A falsy condition unwinds to the nearest guard
 * with `detected = false`.
 *
 * @example
 * ```typescript
 * assert(user.active, ERR_INACTIVE, { userId: user.id });
 * ```
 */
export function assert(condition: unknown, error: ErrorIdentity, metadata?: FailureMetadata): asserts condition {
    if (!condition) {
        raise(error, captureTrace(assert), false, metadata);
    }
}

/**
 * Check the trailing error of a delegated call's results. An error unwinds
 * with `detected = true`; null or undefined is the success path.
 *
 * A FailureSignal in trailing position is an unwind already in flight and
 * is re-thrown as it is.
 *
 * A trailing value that is not an Error means the call site is wrong and
 * unwinds as IMPROPER_USE_ERROR with `detected = false`. The signature
 * already rules this out for typed callers.
 */
export function checkResult(...values: [...unknown[], ErrorIdentity | null | undefined]): void {
    const trailing: unknown = values[values.length - 1];
    if (trailing === null || trailing === undefined) {
        return;
    }

    if (isFailureSignal(trailing)) {
        throw trailing;
    }

    if (!isErrorIdentity(trailing)) {
        raise(IMPROPER_USE_ERROR, captureTrace(checkResult), false, { received: typeof trailing });
    }

    raise(trailing, captureTrace(checkResult), true);
}

/**
 * Await a delegated async operation. A rejection unwinds like checkResult;
 * otherwise the resolved value is returned. A failure raised inside the
 * operation itself keeps unwinding with its original record.
 */
export async function checkAsync<T>(operation: Promise<T>, metadata?: FailureMetadata): Promise<T> {
    // Taken before the await, while the caller's frames are still on the stack.
    const trace = captureTrace(checkAsync);

    try {
        return await operation;
    } catch (reason: unknown) {
        if (isFailureSignal(reason)) {
            throw reason;
        }
        if (isErrorIdentity(reason)) {
            raise(reason, trace, true, metadata);
        }
        raise(IMPROPER_USE_ERROR, trace, false, { ...metadata, received: typeof reason });
    }
}

/**
 * Return the value of a value/error pair, or unwind with its error.
 */
export function unwrap<T>(result: ValueOrError<T>, metadata?: FailureMetadata): T {
    if (isFailureSignal(result.error)) {
        throw result.error;
    }
    if (result.error) {
        raise(result.error, captureTrace(unwrap), true, metadata);
    }
    return result.value;
}
