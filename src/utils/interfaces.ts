/**
 * @fileoverview Shared utility interfaces: disposables, the typed event
 * emitter contract, the module logger and the monotonic clock.
 * @module utils/interfaces
 * @version 1.0.0
 */

/**
 * Disposable interface for cleanup.
 * Used to unsubscribe from event handlers.
 */
export interface IDisposable {
    /**
     * Dispose of the resource, cleaning up any subscriptions or references.
     */
    dispose(): void;
}

/**
 * Type-safe event emitter interface with error isolation.
 * One handler's error does not prevent other handlers from executing.
 *
 * @template TEventMap - A record type mapping event names to payload types
 *
 * @example
 * ```typescript
 * interface StackEvents {
 *   modalPush: { depth: number };
 *   modalPop: { depth: number };
 * }
 *
 * const emitter: IEventEmitter<StackEvents> = new EventEmitter();
 * emitter.on('modalPush', (payload) => console.log(payload.depth));
 * emitter.emit('modalPush', { depth: 1 });
 * ```
 */
export interface IEventEmitter<TEventMap extends Record<string, unknown>> {
    /**
     * Register an event handler.
     * @returns A disposable to remove the handler
     */
    on<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable;

    /**
     * Unregister an event handler.
     */
    off<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): void;

    /**
     * Register a one-time event handler.
     * The handler will be automatically removed after it fires once.
     * @returns A disposable to remove the handler before it fires
     */
    once<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable;

    /**
     * Emit an event to all registered handlers.
     */
    emit<K extends keyof TEventMap>(event: K, payload: TEventMap[K]): void;

    /**
     * Remove all handlers for a specific event or all events.
     */
    removeAllListeners(event?: keyof TEventMap): void;

    /**
     * Get the count of handlers for an event.
     */
    listenerCount(event: keyof TEventMap): number;
}

/**
 * Minimal logger accepted by every module.
 * Modules fall back to a prefixed console logger when none is injected.
 */
export interface ILogger {
    /** Diagnostic output; callers gate it on `debugMode`. */
    debug(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
}

/**
 * Monotonic time source in microseconds.
 * Every animation derives progress from this instead of counting frames.
 */
export interface IClock {
    nowUs(): number;
}
