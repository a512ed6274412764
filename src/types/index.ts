/**
 * @fileoverview Shared application types.
 */

export { AppErrorCode, createAppError } from './app-errors';
export type { AppError } from './app-errors';
export { NAV_SCREENS } from './screens';
export type { Screen } from './screens';
