/**
 * @fileoverview Navigation module constants - sidebar, pill, toast and wave.
 * @module modules/navigation/constants
 * @version 2.0.0
 */

import { NAV_SCREENS } from '../../types/screens';
import { Rect } from '../input/interfaces';
import { NavCollapseState, NavIcon } from './interfaces';

/**
 * Sidebar width when fully expanded (px).
 */
export const WAVE_NAV_WIDTH = 130;

export const NAV_COLLAPSE_DURATION_MS = 280;

/**
 * Collapse: the pill stays hidden until this progress, then grows.
 */
export const COLLAPSE_PILL_START = 0.71;

/**
 * Expand: the pill shrinks away before this progress, then the sidebar grows.
 */
export const EXPAND_PILL_END = 0.29;

/**
 * Pill affordance shown while collapsed.
 */
export const NAV_PILL = {
    X: 16,
    Y: 16,
    WIDTH: 140,
    HEIGHT: 44,
    RADIUS: 22,
    /** Extra touch slop around the pill (px) */
    HIT_PADDING: 8,
} as const;

export const NAV_PILL_RECT: Readonly<Rect> = {
    x: NAV_PILL.X,
    y: NAV_PILL.Y,
    w: NAV_PILL.WIDTH,
    h: NAV_PILL.HEIGHT,
};

export const NAV_TOAST = {
    FADE_MS: 300,
    DURATION_MS: 2000,
    MESSAGE: 'Menu hidden - tap pill or press Triangle to reopen',
} as const;

export const WAVE_SPEED_BOTTOM = 0.7;
export const WAVE_SPEED_TOP = 1.1;

/**
 * Phases wrap at a large multiple of 2π to stay precise over long sessions.
 */
export const WAVE_PHASE_WRAP = 1000 * 2 * Math.PI;

export const NAV_ICON_LAYOUT = {
    X: 50,
    START_Y: 152,
    SPACING: 80,
    HIT_RADIUS: 30,
} as const;

/**
 * Sidebar icons, top to bottom.
 */
export const NAV_ICONS: readonly NavIcon[] = NAV_SCREENS.map((screen, i) => ({
    screen,
    x: NAV_ICON_LAYOUT.X,
    y: NAV_ICON_LAYOUT.START_Y + i * NAV_ICON_LAYOUT.SPACING,
}));

export const INITIAL_NAV_STATE: Readonly<NavCollapseState> = {
    state: 'collapsed',
    animStartUs: 0,
    animProgress: 0,
    storedWavePhaseBottom: 0,
    storedWavePhaseTop: 0,
    currentWidth: 0,
    pillWidth: NAV_PILL.WIDTH,
    pillOpacity: 1,
    toastShownOnce: false,
    toastActive: false,
    toastStartUs: 0,
};
