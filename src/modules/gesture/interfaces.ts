/**
 * @fileoverview Gesture module interfaces.
 * @module modules/gesture/interfaces
 * @version 1.0.0
 */

import { TouchSample } from '../input/interfaces';

/**
 * Per-contact classifier state.
 * @template TTarget - What a touch-down can land on (card index, grid cell)
 */
export interface GestureState<TTarget> {
    isDown: boolean;
    isSwipe: boolean;
    startX: number;
    startY: number;
    startTarget: TTarget | null;
    lastX: number;
    lastY: number;
}

/**
 * What the classifier decided for one frame.
 */
export type GestureResult<TTarget> =
    | { kind: 'idle' }
    | { kind: 'press'; x: number; y: number; target: TTarget | null }
    | { kind: 'hold'; x: number; y: number }
    | { kind: 'drag'; x: number; y: number; deltaX: number; deltaY: number }
    | { kind: 'tap'; x: number; y: number; target: TTarget | null }
    | { kind: 'swipe-end'; deltaX: number; deltaY: number };

export type GestureKind = GestureResult<unknown>['kind'];

export interface GestureClassifierDeps<TTarget> {
    /** Hit-test run once per contact, at touch-down. */
    resolveTarget?: (x: number, y: number) => TTarget | null;
    /** Swipe threshold in pixels; read at every classification. */
    getThresholdPx?: () => number;
}

export interface IGestureClassifier<TTarget> {
    update(sample: Readonly<TouchSample>): GestureResult<TTarget>;
    reset(): void;
    getState(): Readonly<GestureState<TTarget>>;
}
