/**
 * @fileoverview Gesture module public exports.
 * @module modules/gesture
 * @version 1.0.0
 */

export { GestureClassifier } from './GestureClassifier';
export { TAP_SWIPE_THRESHOLD_PX } from './constants';

export type {
    IGestureClassifier,
    GestureClassifierDeps,
    GestureResult,
    GestureKind,
    GestureState,
} from './interfaces';
