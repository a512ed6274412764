/**
 * @fileoverview Gesture module constants.
 * @module modules/gesture/constants
 * @version 1.0.0
 */

/**
 * Finger travel (px) beyond which a contact is a swipe rather than a tap.
 */
export const TAP_SWIPE_THRESHOLD_PX = 25;
