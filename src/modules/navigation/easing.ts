/**
 * @fileoverview Easing helpers for the sidebar animation.
 * @module modules/navigation/easing
 * @version 1.0.0
 */

export function clamp01(value: number): number {
    if (!(value > 0)) {
        return 0;
    }
    return value > 1 ? 1 : value;
}

/**
 * Cubic ease-in-out over t in [0, 1].
 */
export function easeInOutCubic(t: number): number {
    return t < 0.5 ? 4 * t * t * t : 1 - Math.pow(-2 * t + 2, 3) / 2;
}
