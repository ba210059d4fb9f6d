import fs from 'fs';
import path from 'path';
import crypto from 'crypto';
import { logger } from '../logging/logger.js';
import { SinkFaultError } from '../errors/casefileError.js';
import type { ErrorIdentity } from '../errors/identities.js';
import type { FailureRecord } from '../capture/failure.js';

/**
 * Receives finished failures from the dispatcher.
 *
 * Implementations write synchronously and throw when the record cannot be
 * persisted; the dispatcher does not catch sink errors.
 */
export interface DiagnosticSink {
    /**
     * @param destination Preferred location, if the handler configured one
     * @returns Where the record ended up
     */
    record(failure: FailureRecord, classified: ErrorIdentity, destination?: string): string;
}

export interface FileCaseSinkOptions {
    /** Directory for case files when the destination is missing or unwritable */
    readonly fallbackDir: string;
}

/**
 * Render a failure in case file form.
 */
export function formatCaseFile(failure: FailureRecord): string {
    return `FAILURE: ${failure.originalError.message}\n`
        + `STACK TRACE:\n${failure.capturedTrace}\n`;
}

/**
 * Writes one case file per failure. A configured destination is replaced on
 * each write; without one, or when it cannot be written, a new uniquely named
 * file is created in the fallback directory.
 */
export class FileCaseSink implements DiagnosticSink {
    constructor(private readonly options: FileCaseSinkOptions) { }

    record(failure: FailureRecord, _classified: ErrorIdentity, destination?: string): string {
        const content = formatCaseFile(failure);

        if (destination) {
            try {
                fs.writeFileSync(destination, content, { encoding: 'utf8', flag: 'w' });
                return destination;
            } catch (error) {
                logger.warn({ destination, err: error }, 'Case file destination unwritable, using fallback directory');
            }
        }

        const fallback = path.join(this.options.fallbackDir, `casefile-${crypto.randomUUID()}.log`);
        try {
            fs.writeFileSync(fallback, content, { encoding: 'utf8', flag: 'wx' });
        } catch (error) {
            throw new SinkFaultError(destination ? [destination, fallback] : [fallback], error);
        }

        logger.info({ path: fallback }, 'Case file written');
        return fallback;
    }
}
