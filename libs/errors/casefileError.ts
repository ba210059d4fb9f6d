import { logger } from '../logging/logger.js';
import crypto from 'crypto';

export type CasefileErrorCategory = 'USAGE' | 'SINK' | 'CONFIG';

/**
 * Base class for faults of the library itself, as opposed to the
 * application errors it classifies. These are never classified: they
 * propagate out of the guard that hit them.
 *
 * Each instance carries an incidentId and logs its internal details once,
 * at construction, so the thrown message can stay short.
 */
export class CasefileError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly code: string,
        public readonly category: CasefileErrorCategory,
        public readonly internalDetails?: unknown,
        options?: { cause?: unknown }
    ) {
        super(publicMessage);
        this.name = 'CasefileError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            code: this.code,
            category: this.category,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

/**
 * Thrown by any registration on a sealed registry.
 */
export class RegistrySealedError extends CasefileError {
    constructor(operation: string) {
        super(
            `Rule registry is sealed; ${operation} rejected`,
            'REGISTRY_SEALED',
            'USAGE',
            { operation }
        );
        this.name = 'RegistrySealedError';
    }
}

/**
 * The diagnostic sink could not obtain any writable destination.
 * Fatal to the dispatch.
 */
export class SinkFaultError extends CasefileError {
    constructor(attempted: readonly string[], cause: unknown) {
        super(
            'Unable to write case file to any destination',
            'SINK_FAULT',
            'SINK',
            { attempted },
            { cause }
        );
        this.name = 'SinkFaultError';
    }
}

export class ConfigurationError extends CasefileError {
    constructor(public readonly errors: readonly string[]) {
        super(
            `Invalid casefile configuration: ${errors.join('; ')}`,
            'CONFIG_INVALID',
            'CONFIG',
            { errors }
        );
        this.name = 'ConfigurationError';
    }
}
