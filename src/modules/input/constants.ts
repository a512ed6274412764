/**
 * @fileoverview Input module constants - display and touch panel geometry.
 * @module modules/input/constants
 * @version 1.0.0
 */

export const SCREEN_WIDTH = 960;
export const SCREEN_HEIGHT = 544;

/**
 * Front touch panel resolution. Samples are scaled down to the screen.
 */
export const TOUCH_PANEL_WIDTH = 1920;
export const TOUCH_PANEL_HEIGHT = 1088;

export const DIRECTION_BUTTONS = ['up', 'down', 'left', 'right'] as const;
