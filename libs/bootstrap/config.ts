import os from 'node:os';
import { z } from 'zod';
import { logger } from '../logging/logger.js';
import { ConfigurationError } from '../errors/casefileError.js';

/**
 * Environment contract for the library. Every variable is optional;
 * values that are present must be valid.
 */
export const CasefileEnvSchema = z.object({
    CASEFILE_DESTINATION: z.string().trim().min(1).optional(),
    CASEFILE_FALLBACK_DIR: z.string().trim().min(1).optional(),
    CASEFILE_PATTERN_SYNTAX: z.enum(['prefix', 'regex']).default('prefix'),
    CASEFILE_UNMATCHED: z.enum(['passthrough', 'unexpected']).default('passthrough'),
});

export type PatternSyntax = 'prefix' | 'regex';
export type UnmatchedPolicy = 'passthrough' | 'unexpected';

export interface CasefileConfig {
    /** Default case file path for handlers that set none */
    readonly destination?: string;
    /** Directory for case files when the destination is unusable */
    readonly fallbackDir: string;
    readonly patternSyntax: PatternSyntax;
    readonly unmatched: UnmatchedPolicy;
}

/**
 * Parse and validate configuration from the environment.
 *
 * Fail-closed: all issues are collected and reported together, then thrown
 * as a single ConfigurationError.
 */
export function loadCasefileConfig(env: NodeJS.ProcessEnv = process.env): CasefileConfig {
    const parsed = CasefileEnvSchema.safeParse(env);

    if (!parsed.success) {
        const errors = parsed.error.issues.map(
            issue => `${issue.path.join('.')}: ${issue.message}`
        );

        logger.fatal({
            errors,
            remediation: "Check CASEFILE_* environment variables."
        }, "Casefile configuration invalid");

        throw new ConfigurationError(errors);
    }

    const values = parsed.data;
    return {
        destination: values.CASEFILE_DESTINATION,
        fallbackDir: values.CASEFILE_FALLBACK_DIR ?? os.tmpdir(),
        patternSyntax: values.CASEFILE_PATTERN_SYNTAX,
        unmatched: values.CASEFILE_UNMATCHED,
    };
}
