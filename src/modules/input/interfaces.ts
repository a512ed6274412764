/**
 * @fileoverview Input module interfaces - buttons, touch samples and frames.
 * @module modules/input/interfaces
 * @version 1.0.0
 */

/**
 * Controller buttons the UI reacts to.
 */
export type ControllerButton =
    | 'cross'
    | 'circle'
    | 'triangle'
    | 'square'
    | 'up'
    | 'down'
    | 'left'
    | 'right'
    | 'l-trigger'
    | 'r-trigger'
    | 'start'
    | 'select';

/**
 * One touch sample in logical screen space (960x544).
 */
export interface TouchSample {
    down: boolean;
    x: number;
    y: number;
}

/**
 * Raw input for one display frame, sampled once upstream.
 */
export interface InputFrame {
    buttons: ReadonlySet<ControllerButton>;
    previousButtons: ReadonlySet<ControllerButton>;
    touch: TouchSample;
}

/**
 * Axis-aligned rectangle, inclusive on every edge for hit testing.
 */
export interface Rect {
    x: number;
    y: number;
    w: number;
    h: number;
}

/**
 * Per-frame input view shared by every handler in the core.
 */
export interface IInputState {
    /** Button held this frame (ignores blocks). */
    isDown(button: ControllerButton): boolean;
    /** Button went down this frame and is neither blocked nor suppressed. */
    isPressed(button: ControllerButton): boolean;
    /** Button went up this frame; suppressed input reports false. */
    isReleased(button: ControllerButton): boolean;
    getTouch(): Readonly<TouchSample>;
    isTouchBlocked(): boolean;
    blockTouch(): void;
    /**
     * Drop the touch block once the finger is up.
     * @returns true when the block was cleared this call
     */
    clearTouchBlockIfReleased(): boolean;
    /** Block every held button and the current touch until released. */
    blockForTransition(): void;
}
