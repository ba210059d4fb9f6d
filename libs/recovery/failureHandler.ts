/**
 * Failure Handler
 *
 * Owns the configuration of one recovery boundary (rules, case file
 * destination, callback) and installs guards around call chains. A failure
 * raised by assert/checkResult anywhere below a guard lands here; any other
 * exception passes through.
 *
 * @example
 * ```typescript
 * const handler = new FailureHandler({ scope: 'billing' })
 *     .registerMapping(ERR_GATEWAY_DOWN, ERR_TRY_LATER)
 *     .setCallback((detected, error) => report(error));
 *
 * handler.guard(() => {
 *     checkResult(gateway.charge(order));
 * });
 * ```
 */

import type { ErrorIdentity } from '../errors/identities.js';
import { loadCasefileConfig, type CasefileConfig } from '../bootstrap/config.js';
import { GuardContext } from '../context/guardContext.js';
import { RuleRegistry } from '../classification/ruleRegistry.js';
import type { DiagnosticStream } from '../classification/types.js';
import { FileCaseSink, type DiagnosticSink } from '../sink/caseFileSink.js';
import { dispatchFailure, type DispatchOutcome, type FailureCallback } from './dispatcher.js';
import type { ErrorSlot, Recovered } from './result.js';

/**
 * Supplies the registry at dispatch time, so rules registered through
 * another handle for the same scope are seen.
 */
export type RegistrySource = () => RuleRegistry;

export interface FailureHandlerOptions {
    /** Scope label for logs and guard frames */
    readonly scope?: string;
    readonly registry?: RuleRegistry | RegistrySource;
    readonly sink?: DiagnosticSink;
    readonly destination?: string;
    readonly callback?: FailureCallback;
    /** Stream for unclassified-error notices; defaults to process.stderr */
    readonly diagnostics?: DiagnosticStream;
    /** Defaults to loadCasefileConfig() */
    readonly config?: CasefileConfig;
}

export class FailureHandler {
    public readonly scope: string;

    private readonly registrySource: RegistrySource;
    private readonly sink: DiagnosticSink;
    private readonly diagnostics?: DiagnosticStream;
    private destination?: string;
    private callback?: FailureCallback;

    constructor(options: FailureHandlerOptions = {}) {
        const config = options.config ?? loadCasefileConfig();

        this.scope = options.scope ?? 'anonymous';
        this.registrySource = toRegistrySource(options.registry, config);
        this.sink = options.sink ?? new FileCaseSink({ fallbackDir: config.fallbackDir });
        this.diagnostics = options.diagnostics;
        this.destination = options.destination ?? config.destination;
        this.callback = options.callback;
    }

    get registry(): RuleRegistry {
        return this.registrySource();
    }

    registerExact(...errors: ErrorIdentity[]): this {
        this.registry.registerExact(...errors);
        return this;
    }

    registerMapping(from: ErrorIdentity, to: ErrorIdentity): this {
        this.registry.registerMapping(from, to);
        return this;
    }

    registerPattern(pattern: string | RegExp, to: ErrorIdentity): this {
        this.registry.registerPattern(pattern, to);
        return this;
    }

    setFallback(error: ErrorIdentity | undefined): this {
        this.registry.setFallback(error);
        return this;
    }

    /**
     * Path the case file is written to. If it cannot be written, the sink
     * falls back to a new file in the fallback directory.
     */
    setDestination(destination: string | undefined): this {
        this.destination = destination;
        return this;
    }

    setCallback(callback: FailureCallback | undefined): this {
        this.callback = callback;
        return this;
    }

    seal(): this {
        this.registry.seal();
        return this;
    }

    /**
     * Run a synchronous call chain. Returns its value, or undefined when a
     * failure was recovered (after the sink and callback have run).
     */
    guard<T>(fn: () => T): T | undefined {
        try {
            return GuardContext.run(this.scope, fn);
        } catch (thrown: unknown) {
            this.dispatch(thrown, this.callback);
            return undefined;
        }
    }

    async guardAsync<T>(fn: () => Promise<T>): Promise<T | undefined> {
        try {
            return await GuardContext.run(this.scope, fn);
        } catch (thrown: unknown) {
            this.dispatch(thrown, this.callback);
            return undefined;
        }
    }

    /**
     * Like guard(), but returns the classified failure instead of invoking
     * the callback.
     */
    recover<T>(fn: () => T): Recovered<T> {
        try {
            return { ok: true, value: GuardContext.run(this.scope, fn) };
        } catch (thrown: unknown) {
            return toRecovered(this.dispatch(thrown, undefined));
        }
    }

    async recoverAsync<T>(fn: () => Promise<T>): Promise<Recovered<T>> {
        try {
            return { ok: true, value: await GuardContext.run(this.scope, fn) };
        } catch (thrown: unknown) {
            return toRecovered(this.dispatch(thrown, undefined));
        }
    }

    /**
     * Convert a recovered failure back into an ordinary error: the classified
     * error is written to `slot.error`. The slot is left alone on success.
     */
    catchInto<T>(slot: ErrorSlot, fn: () => T): T | undefined {
        const result = this.recover(fn);
        if (result.ok) {
            return result.value;
        }
        slot.error = result.error;
        return undefined;
    }

    private dispatch(thrown: unknown, callback: FailureCallback | undefined): DispatchOutcome {
        return dispatchFailure(thrown, {
            scope: this.scope,
            registry: this.registry,
            sink: this.sink,
            destination: this.destination,
            callback,
            diagnostics: this.diagnostics
        });
    }
}

function toRegistrySource(
    registry: RuleRegistry | RegistrySource | undefined,
    config: CasefileConfig
): RegistrySource {
    if (registry instanceof RuleRegistry) {
        return () => registry;
    }
    if (registry) {
        return registry;
    }
    const owned = new RuleRegistry({ patternSyntax: config.patternSyntax, unmatched: config.unmatched });
    return () => owned;
}

function toRecovered<T>(outcome: DispatchOutcome): Recovered<T> {
    return {
        ok: false,
        error: outcome.classification.error,
        detected: outcome.record.detected,
        record: outcome.record
    };
}
