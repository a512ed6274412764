/**
 * @fileoverview Gesture classifier - turns touch samples into tap or swipe
 * decisions plus a continuous drag delta.
 * @module modules/gesture/GestureClassifier
 * @version 1.0.0
 */

import { TouchSample } from '../input/interfaces';
import {
    GestureClassifierDeps,
    GestureResult,
    GestureState,
    IGestureClassifier,
} from './interfaces';
import { TAP_SWIPE_THRESHOLD_PX } from './constants';

/**
 * Classifies one contact at a time.
 *
 * Motion is classified while the finger is down; the action happens on
 * release. Once a contact crosses the threshold it stays a swipe, and a
 * swipe never produces a tap. A tap reports the touch-down position and
 * target, wherever the finger lifted.
 *
 * @example
 * ```typescript
 * const gestures = new GestureClassifier<number>({ resolveTarget: cardAt });
 * const result = gestures.update(input.getTouch());
 * if (result.kind === 'drag') scrollBy(result.deltaX);
 * if (result.kind === 'tap' && result.target !== null) openCard(result.target);
 * ```
 */
export class GestureClassifier<TTarget> implements IGestureClassifier<TTarget> {
    private _state: GestureState<TTarget> = GestureClassifier._emptyState<TTarget>();

    constructor(private readonly deps: GestureClassifierDeps<TTarget> = {}) {}

    public update(sample: Readonly<TouchSample>): GestureResult<TTarget> {
        const state = this._state;

        if (!sample.down) {
            if (!state.isDown) {
                return { kind: 'idle' };
            }
            const result: GestureResult<TTarget> = state.isSwipe
                ? {
                    kind: 'swipe-end',
                    deltaX: state.startX - state.lastX,
                    deltaY: state.startY - state.lastY,
                }
                : {
                    kind: 'tap',
                    x: state.startX,
                    y: state.startY,
                    target: state.startTarget,
                };
            this.reset();
            return result;
        }

        if (!state.isDown) {
            const target = this.deps.resolveTarget
                ? this.deps.resolveTarget(sample.x, sample.y)
                : null;
            this._state = {
                isDown: true,
                isSwipe: false,
                startX: sample.x,
                startY: sample.y,
                startTarget: target,
                lastX: sample.x,
                lastY: sample.y,
            };
            return { kind: 'press', x: sample.x, y: sample.y, target };
        }

        state.lastX = sample.x;
        state.lastY = sample.y;

        if (!state.isSwipe) {
            const dx = sample.x - state.startX;
            const dy = sample.y - state.startY;
            const threshold = this._threshold();
            if (dx * dx + dy * dy > threshold * threshold) {
                state.isSwipe = true;
            }
        }

        if (state.isSwipe) {
            return {
                kind: 'drag',
                x: sample.x,
                y: sample.y,
                deltaX: state.startX - sample.x,
                deltaY: state.startY - sample.y,
            };
        }
        return { kind: 'hold', x: sample.x, y: sample.y };
    }

    /**
     * Forget the current contact. Called when a touch block clears.
     */
    public reset(): void {
        this._state = GestureClassifier._emptyState<TTarget>();
    }

    /**
     * Snapshot of the current contact.
     */
    public getState(): Readonly<GestureState<TTarget>> {
        return { ...this._state };
    }

    public isSwipe(): boolean {
        return this._state.isSwipe;
    }

    private _threshold(): number {
        return this.deps.getThresholdPx ? this.deps.getThresholdPx() : TAP_SWIPE_THRESHOLD_PX;
    }

    private static _emptyState<T>(): GestureState<T> {
        return {
            isDown: false,
            isSwipe: false,
            startX: 0,
            startY: 0,
            startTarget: null,
            lastX: 0,
            lastY: 0,
        };
    }
}
