/**
 * @fileoverview Navigation module public exports.
 * @module modules/navigation
 * @version 2.0.0
 */

// Main classes
export { NavCollapseAnimator, sampleNavFrame } from './NavCollapseAnimator';
export { WaveAnimation } from './WaveAnimation';
export { ZoneCrossingRouter } from './ZoneCrossingRouter';
export { NavShortcutHandler } from './NavShortcutHandler';
export { easeInOutCubic, clamp01 } from './easing';

// Interfaces
export type {
    INavCollapseAnimator,
    IWaveAnimation,
    NavAnimatorDeps,
    NavAnimatorEventMap,
    NavCollapseState,
    NavFrame,
    NavIcon,
    NavShortcutDeps,
    NavSidebarState,
    WaveLayer,
    WavePhases,
    ZoneCrossingDeps,
} from './interfaces';

// Constants
export {
    WAVE_NAV_WIDTH,
    NAV_COLLAPSE_DURATION_MS,
    COLLAPSE_PILL_START,
    EXPAND_PILL_END,
    NAV_PILL,
    NAV_PILL_RECT,
    NAV_TOAST,
    NAV_ICONS,
    NAV_ICON_LAYOUT,
    WAVE_SPEED_BOTTOM,
    WAVE_SPEED_TOP,
    WAVE_PHASE_WRAP,
    INITIAL_NAV_STATE,
} from './constants';
