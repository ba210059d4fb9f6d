import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { logger } from '../logging/logger.js';
import { loadCasefileConfig } from '../bootstrap/config.js';
import { RuleRegistry, type RegistryOptions } from '../classification/ruleRegistry.js';
import { FailureHandler, type FailureHandlerOptions } from '../recovery/failureHandler.js';

/**
 * Derive a scope key from a module URL (normally `import.meta.url`).
 * Modules in the same directory share a key; non-file URLs are used as-is.
 */
export function scopeKeyFor(moduleUrl: string): string {
    if (moduleUrl.startsWith('file:')) {
        return path.dirname(fileURLToPath(moduleUrl));
    }
    return moduleUrl;
}

/**
 * Keeps one RuleRegistry per scope key, created on first use.
 *
 * Registries are never removed. Like the registries themselves, the table
 * should only be written during startup.
 */
export class ScopeResolver {
    private readonly registries = new Map<string, RuleRegistry>();

    constructor(private readonly registryOptions: () => Partial<RegistryOptions> = () => ({})) { }

    resolve(key: string): RuleRegistry {
        let registry = this.registries.get(key);
        if (!registry) {
            registry = new RuleRegistry(this.registryOptions());
            this.registries.set(key, registry);
            logger.debug({ scope: key, options: registry.options }, 'Rule registry created');
        }
        return registry;
    }

    has(key: string): boolean {
        return this.registries.has(key);
    }

    scopes(): string[] {
        return [...this.registries.keys()];
    }

    /** Forget every registry. Intended for tests. */
    reset(): void {
        this.registries.clear();
    }
}

let defaultResolver: ScopeResolver | undefined;

/**
 * The process-wide resolver. New registries take their options from the
 * environment configuration.
 */
export function getDefaultResolver(): ScopeResolver {
    if (!defaultResolver) {
        defaultResolver = new ScopeResolver(() => {
            const config = loadCasefileConfig();
            return { patternSyntax: config.patternSyntax, unmatched: config.unmatched };
        });
    }
    return defaultResolver;
}

export function resolveRegistry(key: string, resolver: ScopeResolver = getDefaultResolver()): RuleRegistry {
    return resolver.resolve(key);
}

/**
 * Create a handler bound to a scope's shared registry. Handlers for the same
 * key see each other's registrations.
 *
 * @example
 * ```typescript
 * const handler = handlerFor(scopeKeyFor(import.meta.url));
 * ```
 */
export function handlerFor(
    key: string,
    options: Omit<FailureHandlerOptions, 'scope' | 'registry'> = {},
    resolver: ScopeResolver = getDefaultResolver()
): FailureHandler {
    return new FailureHandler({
        ...options,
        scope: key,
        registry: () => resolver.resolve(key)
    });
}
