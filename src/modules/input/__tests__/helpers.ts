/**
 * @fileoverview Frame builders shared by input-driven tests.
 * @module modules/input/__tests__/helpers
 */

import { ControllerButton, InputFrame, TouchSample } from '../interfaces';

export const NO_TOUCH: TouchSample = { down: false, x: 0, y: 0 };

export function makeFrame(
    buttons: ControllerButton[] = [],
    previousButtons: ControllerButton[] = [],
    touch: TouchSample = NO_TOUCH
): InputFrame {
    return {
        buttons: new Set(buttons),
        previousButtons: new Set(previousButtons),
        touch,
    };
}

export function touchAt(x: number, y: number): TouchSample {
    return { down: true, x, y };
}
