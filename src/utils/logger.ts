/**
 * @fileoverview Console-backed module logger with a `[Module]` prefix.
 * @module utils/logger
 * @version 1.0.0
 */

/* eslint-disable no-console -- This is the console sink for module logging */

import { ILogger } from './interfaces';

/**
 * Build a logger that writes to the console with a `[prefix]` tag.
 *
 * @param prefix - Module name shown in brackets, e.g. `FocusStack`
 * @param isDebugEnabled - Read on every debug call so runtime config changes apply
 *
 * @example
 * ```typescript
 * const logger = consoleLogger('NavCollapseAnimator', () => config.debugMode);
 * logger.debug('state', 'collapsing'); // [NavCollapseAnimator] state collapsing
 * ```
 */
export function consoleLogger(
    prefix: string,
    isDebugEnabled: () => boolean = (): boolean => false
): ILogger {
    const tag = '[' + prefix + ']';
    return {
        debug: (message: string, ...args: unknown[]): void => {
            if (isDebugEnabled()) {
                console.debug(tag + ' ' + message, ...args);
            }
        },
        warn: (message: string, ...args: unknown[]): void => {
            console.warn(tag + ' ' + message, ...args);
        },
        error: (message: string, ...args: unknown[]): void => {
            console.error(tag + ' ' + message, ...args);
        },
    };
}

/**
 * Logger that drops everything. Handy for tests and headless tools.
 */
export const silentLogger: ILogger = {
    debug: (): void => undefined,
    warn: (): void => undefined,
    error: (): void => undefined,
};
