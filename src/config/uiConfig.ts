/**
 * @fileoverview Runtime UI configuration and its defaults.
 * @module config/uiConfig
 * @version 1.0.0
 */

/**
 * Settings the UI core reads every frame through a getter, so a settings
 * screen can flip them while the app runs.
 */
export interface UiConfig {
    /** When true, leaving the sidebar for content does not collapse it. */
    keepNavPinned: boolean;
    /** Enable verbose console logging */
    debugMode: boolean;
    /** Duration of a sidebar collapse or expand animation (ms). */
    navCollapseDurationMs: number;
    /** Finger travel beyond which a touch becomes a swipe (px). */
    tapSwipeThresholdPx: number;
}

export const DEFAULT_UI_CONFIG: UiConfig = {
    keepNavPinned: false,
    debugMode: false,
    navCollapseDurationMs: 280,
    tapSwipeThresholdPx: 25,
};

function positiveOr(value: number | undefined, fallback: number): number {
    if (value === undefined || !Number.isFinite(value) || value <= 0) {
        return fallback;
    }
    return value;
}

/**
 * Merge a partial config over the defaults.
 * Non-finite or non-positive numbers fall back to the default value.
 */
export function normalizeUiConfig(partial: Partial<UiConfig> = {}): UiConfig {
    return {
        keepNavPinned: partial.keepNavPinned ?? DEFAULT_UI_CONFIG.keepNavPinned,
        debugMode: partial.debugMode ?? DEFAULT_UI_CONFIG.debugMode,
        navCollapseDurationMs: positiveOr(
            partial.navCollapseDurationMs,
            DEFAULT_UI_CONFIG.navCollapseDurationMs
        ),
        tapSwipeThresholdPx: positiveOr(
            partial.tapSwipeThresholdPx,
            DEFAULT_UI_CONFIG.tapSwipeThresholdPx
        ),
    };
}
