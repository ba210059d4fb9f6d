import { getScopeLogger } from '../logging/logger.js';
import { sanitizeMessage } from '../errors/sanitizer.js';
import type { ErrorIdentity } from '../errors/identities.js';
import { isFailureSignal, type FailureRecord } from '../capture/failure.js';
import { explain } from '../classification/classifier.js';
import type { RuleRegistry } from '../classification/ruleRegistry.js';
import type { Classification, DiagnosticStream } from '../classification/types.js';
import type { DiagnosticSink } from '../sink/caseFileSink.js';

export type FailureCallback = (detected: boolean, error: ErrorIdentity) => void;

export interface DispatchContext {
    readonly scope: string;
    readonly registry: RuleRegistry;
    readonly sink: DiagnosticSink;
    readonly destination?: string;
    readonly callback?: FailureCallback;
    readonly diagnostics?: DiagnosticStream;
}

export interface DispatchOutcome {
    readonly record: FailureRecord;
    readonly classification: Classification;
    /** Where the sink stored the case file */
    readonly casePath: string;
}

/**
 * Recover a thrown value at a guard boundary.
 *
 * Only FailureSignals are handled; anything else is re-thrown unchanged.
 * A handled failure is classified, handed to the sink and then to the
 * callback. Errors from the sink or the callback propagate.
 */
export function dispatchFailure(thrown: unknown, context: DispatchContext): DispatchOutcome {
    if (!isFailureSignal(thrown)) {
        getScopeLogger(context.scope).debug({ err: thrown }, 'Re-raising unrecognized exception');
        throw thrown;
    }

    const { record } = thrown;
    const classification = explain(record.originalError, context.registry, {
        trace: record.capturedTrace,
        diagnostics: context.diagnostics
    });

    const casePath = context.sink.record(record, classification.error, context.destination);

    getScopeLogger(context.scope).info({
        tier: classification.tier,
        detected: record.detected,
        errorMessage: sanitizeMessage(record.originalError.message),
        classifiedMessage: sanitizeMessage(classification.error.message),
        metadata: record.metadata,
        casePath
    }, 'Failure recovered');

    context.callback?.(record.detected, classification.error);

    return { record, classification, casePath };
}
