import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * The guard currently protecting a call chain.
 */
export interface GuardFrame {
    /** Scope key of the handler that installed the guard */
    readonly scope: string;
    /** 1 for the outermost guard on this chain */
    readonly depth: number;
}

/**
 * Guard Context Container
 * AsyncLocalStorage-backed, so concurrent async chains each see their own
 * guard.
 *
 * Only handlers call run(). Capture code calls current() to tell whether a
 * failure has somewhere to land.
 */

const storage = new AsyncLocalStorage<GuardFrame>();

export class GuardContext {
    /**
     * Run fn with a new guard frame nested inside the current one.
     * Supports both sync and async functions.
     */
    public static run<T>(scope: string, fn: () => T): T {
        const parent = storage.getStore();
        const frame: GuardFrame = Object.freeze({ scope, depth: (parent?.depth ?? 0) + 1 });
        return storage.run(frame, fn);
    }

    public static current(): GuardFrame | undefined {
        return storage.getStore();
    }

    public static isActive(): boolean {
        return storage.getStore() !== undefined;
    }
}
