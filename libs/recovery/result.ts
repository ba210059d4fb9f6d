import type { ErrorIdentity } from '../errors/identities.js';
import type { FailureRecord } from '../capture/failure.js';

/**
 * Outcome of a guarded call run through recover(): either the call's value,
 * or the classified failure that ended it.
 */
export type Recovered<T> =
    | { readonly ok: true; readonly value: T }
    | {
        readonly ok: false;
        /** Classified error */
        readonly error: ErrorIdentity;
        readonly detected: boolean;
        readonly record: FailureRecord;
    };

/**
 * Output slot written by catchInto() when a failure is recovered.
 */
export interface ErrorSlot {
    error: ErrorIdentity | null;
}
