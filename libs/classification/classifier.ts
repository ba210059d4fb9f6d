/**
 * Rule-based error classifier.
 *
 * Misuse of the capture API keeps its fixed identity whatever the rules say.
 * After that, precedence is fixed: explicit registrations (exact, then mapping) always
 * beat pattern rules, and the fallback only applies when nothing else does.
 * An error that reaches the end without a match is announced on the
 * diagnostic stream so missing rules show up during development.
 */

import { logger } from '../logging/logger.js';
import { redactCredentials, sanitizeMessage } from '../errors/sanitizer.js';
import { IMPROPER_USE_ERROR, UNEXPECTED_ERROR, type ErrorIdentity } from '../errors/identities.js';
import { matchesRule, type RuleRegistry } from './ruleRegistry.js';
import type { Classification, ClassifyOptions, DiagnosticStream } from './types.js';

/**
 * Classify an error and report which tier matched.
 */
export function explain(
    error: ErrorIdentity,
    registry: RuleRegistry,
    options: ClassifyOptions = {}
): Classification {
    if (error === IMPROPER_USE_ERROR) {
        return { error, tier: 'misuse' };
    }

    if (registry.isExact(error)) {
        return { error, tier: 'exact' };
    }

    const mapped = registry.mappingFor(error);
    if (mapped) {
        return { error: mapped, tier: 'mapping' };
    }

    const pattern = registry.patternMappings().find(({ rule }) => matchesRule(rule, error.message));
    if (pattern) {
        return { error: pattern.target, tier: 'pattern' };
    }

    if (registry.fallback) {
        return { error: registry.fallback, tier: 'fallback' };
    }

    reportUnclassified(error, options);

    return registry.options.unmatched === 'unexpected'
        ? { error: UNEXPECTED_ERROR, tier: 'unexpected' }
        : { error, tier: 'passthrough' };
}

/**
 * Classify an error against a registry.
 */
export function classify(
    error: ErrorIdentity,
    registry: RuleRegistry,
    options: ClassifyOptions = {}
): ErrorIdentity {
    return explain(error, registry, options).error;
}

function reportUnclassified(error: ErrorIdentity, options: ClassifyOptions): void {
    const diagnostics: DiagnosticStream = options.diagnostics ?? process.stderr;
    const origin = firstFrame(options.trace);

    diagnostics.write(`UNCLASSIFIED: ${redactCredentials(error.message)}${origin ? ` (${origin})` : ''}\n`);

    logger.error({
        errorName: error.name,
        errorMessage: sanitizeMessage(error.message),
        trace: options.trace
    }, 'Error reached classifier with no matching rule');
}

/**
 * The failing call site, e.g. `at chargeCard (file:///srv/app/billing.ts:12:5)`.
 */
function firstFrame(trace: string | undefined): string | undefined {
    const line = trace?.split('\n').find(candidate => candidate.trim() !== '');
    return line?.trim();
}
