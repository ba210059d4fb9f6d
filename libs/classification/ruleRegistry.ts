import type { ErrorIdentity } from '../errors/identities.js';
import { RegistrySealedError } from '../errors/casefileError.js';
import type { PatternSyntax, UnmatchedPolicy } from '../bootstrap/config.js';

export interface RegistryOptions {
    /** How string patterns are read; RegExp patterns are always regular expressions */
    readonly patternSyntax: PatternSyntax;
    /** What the classifier returns when nothing matches and no fallback is set */
    readonly unmatched: UnmatchedPolicy;
}

export const DEFAULT_REGISTRY_OPTIONS: RegistryOptions = {
    patternSyntax: 'prefix',
    unmatched: 'passthrough',
};

/**
 * A registered pattern in matchable form.
 */
export type PatternRule =
    | { readonly kind: 'prefix'; readonly prefix: string }
    | { readonly kind: 'regex'; readonly regex: RegExp };

export interface PatternMapping {
    readonly rule: PatternRule;
    readonly target: ErrorIdentity;
}

/**
 * Classification rules for one scope.
 *
 * Registrations are plain inserts: registering the same key again replaces
 * the earlier target. Patterns keep registration order, and an equal
 * pattern registered again keeps its original position.
 *
 * Mutation is expected at startup only. Call seal() once the rules are
 * complete to turn any later registration into a RegistrySealedError.
 */
export class RuleRegistry {
    public readonly options: RegistryOptions;

    private readonly exact = new Set<ErrorIdentity>();
    private readonly mappings = new Map<ErrorIdentity, ErrorIdentity>();
    private readonly patterns: PatternMapping[] = [];
    private fallbackError: ErrorIdentity | undefined;
    private isSealed = false;

    constructor(options: Partial<RegistryOptions> = {}) {
        this.options = { ...DEFAULT_REGISTRY_OPTIONS, ...options };
    }

    registerExact(...errors: ErrorIdentity[]): this {
        this.ensureMutable('registerExact');
        for (const error of errors) {
            this.exact.add(error);
        }
        return this;
    }

    registerMapping(from: ErrorIdentity, to: ErrorIdentity): this {
        this.ensureMutable('registerMapping');
        this.mappings.set(from, to);
        return this;
    }

    registerPattern(pattern: string | RegExp, to: ErrorIdentity): this {
        this.ensureMutable('registerPattern');
        const rule = this.toRule(pattern);
        const index = this.patterns.findIndex(existing => sameRule(existing.rule, rule));

        if (index >= 0) {
            this.patterns[index] = { rule: this.patterns[index].rule, target: to };
        } else {
            this.patterns.push({ rule, target: to });
        }
        return this;
    }

    setFallback(error: ErrorIdentity | undefined): this {
        this.ensureMutable('setFallback');
        this.fallbackError = error;
        return this;
    }

    seal(): this {
        this.isSealed = true;
        return this;
    }

    get sealed(): boolean {
        return this.isSealed;
    }

    isExact(error: ErrorIdentity): boolean {
        return this.exact.has(error);
    }

    mappingFor(error: ErrorIdentity): ErrorIdentity | undefined {
        return this.mappings.get(error);
    }

    patternMappings(): readonly PatternMapping[] {
        return this.patterns;
    }

    get fallback(): ErrorIdentity | undefined {
        return this.fallbackError;
    }

    /**
     * True when no rule of any tier has been registered.
     */
    get isEmpty(): boolean {
        return this.exact.size === 0
            && this.mappings.size === 0
            && this.patterns.length === 0
            && this.fallbackError === undefined;
    }

    private toRule(pattern: string | RegExp): PatternRule {
        if (pattern instanceof RegExp) {
            return { kind: 'regex', regex: stripStatefulFlags(pattern) };
        }
        if (this.options.patternSyntax === 'regex') {
            return { kind: 'regex', regex: new RegExp(pattern) };
        }
        return { kind: 'prefix', prefix: pattern };
    }

    private ensureMutable(operation: string): void {
        if (this.isSealed) {
            throw new RegistrySealedError(operation);
        }
    }
}

/**
 * Global and sticky regexes carry lastIndex between test() calls; matching
 * must not depend on what was classified before.
 */
function stripStatefulFlags(regex: RegExp): RegExp {
    const flags = regex.flags.replace(/[gy]/g, '');
    return flags === regex.flags ? regex : new RegExp(regex.source, flags);
}

function sameRule(a: PatternRule, b: PatternRule): boolean {
    if (a.kind === 'prefix' && b.kind === 'prefix') {
        return a.prefix === b.prefix;
    }
    if (a.kind === 'regex' && b.kind === 'regex') {
        return a.regex.source === b.regex.source && a.regex.flags === b.regex.flags;
    }
    return false;
}

export function matchesRule(rule: PatternRule, message: string): boolean {
    return rule.kind === 'prefix'
        ? message.startsWith(rule.prefix)
        : rule.regex.test(message);
}
