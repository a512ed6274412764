/**
 * @fileoverview Public exports for the utils module.
 * @module utils
 * @version 1.1.0
 */

export { EventEmitter } from './EventEmitter';
export { consoleLogger, silentLogger } from './logger';
export { monotonicClock, ManualClock } from './clock';
export type { IEventEmitter, IDisposable, ILogger, IClock } from './interfaces';
