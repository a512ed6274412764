/**
 * @fileoverview Navigation module interfaces - sidebar animation, wave
 * layers, shortcuts and zone crossing.
 * @module modules/navigation/interfaces
 * @version 2.0.0
 */

import { UiConfig } from '../../config/uiConfig';
import { Screen } from '../../types/screens';
import { IClock, ILogger } from '../../utils/interfaces';
import { IFocusStack } from '../focus/interfaces';
import { IInputState } from '../input/interfaces';

/**
 * Sidebar lifecycle. Only `expanded` and `collapsed` accept requests.
 */
export type NavSidebarState = 'expanded' | 'collapsing' | 'collapsed' | 'expanding';

/**
 * Everything the animator tracks between frames.
 */
export interface NavCollapseState {
    state: NavSidebarState;
    animStartUs: number;
    /** 0..1 through the running transition */
    animProgress: number;
    storedWavePhaseBottom: number;
    storedWavePhaseTop: number;
    /** 0..WAVE_NAV_WIDTH */
    currentWidth: number;
    pillWidth: number;
    /** 0..1 */
    pillOpacity: number;
    toastShownOnce: boolean;
    toastActive: boolean;
    toastStartUs: number;
}

/**
 * Interpolated geometry for one progress value.
 */
export interface NavFrame {
    currentWidth: number;
    pillWidth: number;
    pillOpacity: number;
}

export interface WaveLayer {
    /** Radians, wrapped to [0, WAVE_PHASE_WRAP) */
    phase: number;
    /** Radians per second */
    speed: number;
}

export interface WavePhases {
    bottom: number;
    top: number;
}

/**
 * Decorative wave behind the sidebar. Advances by real elapsed time.
 */
export interface IWaveAnimation {
    update(): void;
    /** Next update measures from now, so hidden time is not replayed. */
    resetDeltaTimer(): void;
    getPhases(): WavePhases;
    setPhases(phases: WavePhases): void;
}

/**
 * Navigation animator events.
 * NOTE: The index signature is required for EventEmitter<T> generic constraint.
 */
export interface NavAnimatorEventMap {
    [key: string]: unknown;
    stateChange: { from: NavSidebarState; to: NavSidebarState };
    toastShown: { message: string };
}

export interface NavAnimatorDeps {
    clock: IClock;
    wave: IWaveAnimation;
    getConfig: () => UiConfig;
    logger?: ILogger;
}

/**
 * Collapsible sidebar with a pill affordance when collapsed.
 */
export interface INavCollapseAnimator {
    /**
     * Start collapsing from `expanded`.
     * @param fromContent - Incidental collapse caused by using content;
     *   ignored while the sidebar is pinned
     */
    requestCollapse(fromContent: boolean): void;
    /** Start expanding from `collapsed`. */
    requestExpand(): void;
    /** Collapse or expand; ignored mid-animation. */
    toggle(): void;
    /** Snap to `collapsed` without animating. */
    resetCollapsed(): void;
    /** Recompute progress from the clock; commits the terminal state at p = 1. */
    update(): void;
    updateToast(): void;
    /** update, updateToast, then the wave while expanded. */
    advanceFrame(): void;

    getState(): NavSidebarState;
    isExpanded(): boolean;
    isCollapsed(): boolean;
    isAnimating(): boolean;
    getCurrentWidth(): number;
    getPillWidth(): number;
    getPillOpacity(): number;
    isToastActive(): boolean;
    getToastOpacity(): number;
    /** Content is dimmed behind a fully expanded sidebar. */
    shouldDimContent(): boolean;
    getSnapshot(): Readonly<NavCollapseState>;
}

/**
 * Sidebar icon position and target screen.
 */
export interface NavIcon {
    screen: Screen;
    x: number;
    y: number;
}

export interface ZoneCrossingDeps {
    focus: IFocusStack;
    input: IInputState;
    nav: Pick<INavCollapseAnimator, 'requestCollapse'>;
    logger?: ILogger;
}

export interface NavShortcutDeps {
    focus: IFocusStack;
    input: IInputState;
    nav: INavCollapseAnimator;
    logger?: ILogger;
}
