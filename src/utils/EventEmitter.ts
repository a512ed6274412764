/**
 * @fileoverview Type-safe event emitter with error isolation.
 * One handler's error does not prevent other handlers from executing,
 * and never escapes into the frame that emitted the event.
 * @module utils/EventEmitter
 * @version 1.1.0
 */

import { IEventEmitter, IDisposable, ILogger } from './interfaces';
import { consoleLogger } from './logger';

/**
 * Handler sets keyed by event name, each typed to its own payload.
 */
type HandlerTable<TEventMap> = {
    [K in keyof TEventMap]?: Set<(payload: TEventMap[K]) => void>;
};

/**
 * Type-safe event emitter with error isolation.
 *
 * @template TEventMap - A record type mapping event names to payload types
 *
 * @example
 * ```typescript
 * type StackEvents = { modalPush: { depth: number } };
 *
 * const emitter = new EventEmitter<StackEvents>();
 * emitter.on('modalPush', (payload) => console.log(payload.depth));
 * emitter.emit('modalPush', { depth: 1 });
 * ```
 */
export class EventEmitter<TEventMap extends Record<string, unknown>>
    implements IEventEmitter<TEventMap> {
    private _handlers: HandlerTable<TEventMap> = {};
    private readonly _emitterLogger: ILogger;

    /**
     * @param logger - Receives handler failures. Defaults to a console logger.
     */
    constructor(logger?: ILogger) {
        this._emitterLogger = logger ?? consoleLogger('EventEmitter');
    }

    /**
     * Register an event handler.
     * @param event - The event name to listen for
     * @param handler - The callback function to invoke when the event is emitted
     * @returns A disposable to remove the handler
     */
    public on<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable {
        let handlerSet = this._handlers[event];
        if (!handlerSet) {
            handlerSet = new Set<(payload: TEventMap[K]) => void>();
            this._handlers[event] = handlerSet;
        }
        handlerSet.add(handler);

        return {
            dispose: (): void => this.off(event, handler),
        };
    }

    /**
     * Unregister an event handler.
     * @param event - The event name
     * @param handler - The handler function to remove
     */
    public off<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): void {
        const handlerSet = this._handlers[event];
        if (handlerSet) {
            handlerSet.delete(handler);
        }
    }

    /**
     * Register a one-time event handler.
     * @returns A disposable to remove the handler before it fires
     */
    public once<K extends keyof TEventMap>(
        event: K,
        handler: (payload: TEventMap[K]) => void
    ): IDisposable {
        const wrappedHandler = (payload: TEventMap[K]): void => {
            this.off(event, wrappedHandler);
            handler(payload);
        };
        return this.on(event, wrappedHandler);
    }

    /**
     * Emit an event to all registered handlers.
     * Handler errors are logged, not propagated.
     */
    public emit<K extends keyof TEventMap>(
        event: K,
        payload: TEventMap[K]
    ): void {
        const handlerSet = this._handlers[event];
        if (!handlerSet) {
            return;
        }

        // Copy so handlers may unsubscribe while we iterate.
        Array.from(handlerSet).forEach((handler) => {
            try {
                handler(payload);
            } catch (error) {
                this._emitterLogger.error(
                    'Handler error for event \'' + String(event) + '\':',
                    error
                );
            }
        });
    }

    /**
     * Remove all handlers for a specific event or all events.
     * @param event - Optional event name. If omitted, removes all handlers.
     */
    public removeAllListeners(event?: keyof TEventMap): void {
        if (event !== undefined) {
            delete this._handlers[event];
        } else {
            this._handlers = {};
        }
    }

    public listenerCount(event: keyof TEventMap): number {
        const handlerSet = this._handlers[event];
        return handlerSet ? handlerSet.size : 0;
    }
}
