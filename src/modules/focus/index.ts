/**
 * @fileoverview Focus module public exports.
 * @module modules/focus
 * @version 1.0.0
 */

export { FocusStack, clampFocusIndex } from './FocusStack';
export type { FocusStackOptions } from './FocusStack';
export { zoneForScreen } from './zones';

export type {
    IFocusStack,
    FocusZone,
    FocusEntry,
    FocusStackEventMap,
} from './interfaces';

export {
    FOCUS_STACK_CAPACITY,
    INITIAL_FOCUS_ENTRY,
    SCREEN_CONTENT_ZONES,
} from './constants';
