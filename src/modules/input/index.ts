/**
 * @fileoverview Input module public exports.
 * @module modules/input
 * @version 1.0.0
 */

export { InputState } from './InputState';
export type { InputStateDeps } from './InputState';
export { pointInRect, pointInCircle, padRect, scaleTouchSample } from './hitTest';

export type {
    IInputState,
    ControllerButton,
    TouchSample,
    InputFrame,
    Rect,
} from './interfaces';

export {
    SCREEN_WIDTH,
    SCREEN_HEIGHT,
    TOUCH_PANEL_WIDTH,
    TOUCH_PANEL_HEIGHT,
    DIRECTION_BUTTONS,
} from './constants';
