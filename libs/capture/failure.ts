import type { ErrorIdentity } from '../errors/identities.js';

/**
 * Everything known about a failure at the moment it happened.
 */
export interface FailureRecord {
    readonly originalError: ErrorIdentity;
    /** Call stack at the failure site, capture frames removed */
    readonly capturedTrace: string;
    /**
     * false: an asserted invariant was violated (or the API was misused).
     * true: a delegated operation reported an error.
     */
    readonly detected: boolean;
    readonly metadata: Readonly<Record<string, unknown>>;
    /** ISO-8601 */
    readonly capturedAt: string;
}

/**
 * The thrown payload that carries a FailureRecord to the nearest guard.
 * Guards absorb these and re-throw everything else untouched.
 */
export class FailureSignal extends Error {
    public readonly record: FailureRecord;

    constructor(record: FailureRecord) {
        super(`failure: ${record.originalError.message}`);
        this.name = 'FailureSignal';
        this.record = record;
    }
}

export function isFailureSignal(value: unknown): value is FailureSignal {
    return value instanceof FailureSignal;
}

/**
 * Capture the current call stack, dropping `boundary` and every frame above
 * it. The header line V8 puts on every stack is removed as well.
 */
export function captureTrace(boundary: (...args: never[]) => unknown): string {
    const probe: { stack?: string } = {};
    Error.captureStackTrace(probe, boundary);
    const lines = (probe.stack ?? '').split('\n');
    return lines.slice(1).join('\n');
}

export function createFailureRecord(
    originalError: ErrorIdentity,
    capturedTrace: string,
    detected: boolean,
    metadata: Record<string, unknown> = {}
): FailureRecord {
    return Object.freeze({
        originalError,
        capturedTrace,
        detected,
        metadata: Object.freeze({ ...metadata }),
        capturedAt: new Date().toISOString()
    });
}
