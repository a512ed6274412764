/**
 * @fileoverview Navigation collapse animator - time-based state machine for
 * the sidebar and its pill affordance, plus the one-shot collapse toast.
 * @module modules/navigation/NavCollapseAnimator
 * @version 1.0.0
 */

import { EventEmitter } from '../../utils/EventEmitter';
import { ILogger } from '../../utils/interfaces';
import { consoleLogger } from '../../utils/logger';
import {
    INavCollapseAnimator,
    NavAnimatorDeps,
    NavAnimatorEventMap,
    NavCollapseState,
    NavFrame,
    NavSidebarState,
} from './interfaces';
import {
    COLLAPSE_PILL_START,
    EXPAND_PILL_END,
    INITIAL_NAV_STATE,
    NAV_PILL,
    NAV_TOAST,
    WAVE_NAV_WIDTH,
} from './constants';
import { clamp01, easeInOutCubic } from './easing';

const PILL_GROWTH = NAV_PILL.WIDTH - NAV_PILL.HEIGHT;

const COLLAPSED_FRAME: Readonly<NavFrame> = {
    currentWidth: 0,
    pillWidth: NAV_PILL.WIDTH,
    pillOpacity: 1,
};

const EXPANDED_FRAME: Readonly<NavFrame> = {
    currentWidth: WAVE_NAV_WIDTH,
    pillWidth: NAV_PILL.HEIGHT,
    pillOpacity: 0,
};

/**
 * Sidebar and pill geometry for a state at a given progress.
 *
 * Collapsing eases the sidebar out over the whole transition while the pill
 * only grows after {@link COLLAPSE_PILL_START}. Expanding shrinks the pill
 * first, until {@link EXPAND_PILL_END}, then widens the sidebar linearly.
 * Progress 0 of a transition equals its source state and progress 1 its
 * terminal state.
 */
export function sampleNavFrame(state: NavSidebarState, progress: number): NavFrame {
    const p = clamp01(progress);

    switch (state) {
        case 'collapsed':
            return { ...COLLAPSED_FRAME };
        case 'expanded':
            return { ...EXPANDED_FRAME };
        case 'collapsing': {
            if (p >= 1) {
                return { ...COLLAPSED_FRAME };
            }
            const currentWidth = WAVE_NAV_WIDTH * (1 - easeInOutCubic(p));
            if (p <= COLLAPSE_PILL_START) {
                return { currentWidth, pillWidth: NAV_PILL.HEIGHT, pillOpacity: 0 };
            }
            const pill = clamp01((p - COLLAPSE_PILL_START) / (1 - COLLAPSE_PILL_START));
            return {
                currentWidth,
                pillWidth: NAV_PILL.HEIGHT + PILL_GROWTH * pill,
                pillOpacity: pill,
            };
        }
        case 'expanding': {
            if (p >= 1) {
                return { ...EXPANDED_FRAME };
            }
            if (p < EXPAND_PILL_END) {
                const pill = clamp01(1 - p / EXPAND_PILL_END);
                return {
                    currentWidth: 0,
                    pillWidth: NAV_PILL.HEIGHT + PILL_GROWTH * pill,
                    pillOpacity: pill,
                };
            }
            return {
                currentWidth: WAVE_NAV_WIDTH * clamp01((p - EXPAND_PILL_END) / (1 - EXPAND_PILL_END)),
                pillWidth: NAV_PILL.HEIGHT,
                pillOpacity: 0,
            };
        }
    }
}

/**
 * Drives the sidebar through expanded, collapsing, collapsed and expanding.
 *
 * Requests are accepted only in the matching resting state, so repeated
 * triggers in one frame collapse into one transition and nothing reverses
 * mid-animation. Progress is recomputed from the clock on every
 * {@link update}; a late frame jumps ahead instead of drifting.
 *
 * @example
 * ```typescript
 * const nav = new NavCollapseAnimator({ clock, wave, getConfig });
 * nav.requestExpand();
 * // every frame
 * nav.advanceFrame();
 * layoutContent(nav.getCurrentWidth());
 * ```
 */
export class NavCollapseAnimator
    extends EventEmitter<NavAnimatorEventMap>
    implements INavCollapseAnimator {
    private _state: NavCollapseState = { ...INITIAL_NAV_STATE };
    private readonly _logger: ILogger;

    constructor(private readonly deps: NavAnimatorDeps) {
        const logger = deps.logger
            ?? consoleLogger('NavCollapseAnimator', () => deps.getConfig().debugMode);
        super(logger);
        this._logger = logger;
    }

    // ==========================================
    // Transition requests
    // ==========================================

    public requestCollapse(fromContent: boolean): void {
        if (fromContent && this.deps.getConfig().keepNavPinned) {
            this._logger.debug('collapse ignored: sidebar pinned');
            return;
        }
        if (this._state.state !== 'expanded') {
            return;
        }

        const phases = this.deps.wave.getPhases();
        this._state.storedWavePhaseBottom = phases.bottom;
        this._state.storedWavePhaseTop = phases.top;
        this._startTransition('collapsing');
    }

    public requestExpand(): void {
        if (this._state.state !== 'collapsed') {
            return;
        }

        this.deps.wave.setPhases({
            bottom: this._state.storedWavePhaseBottom,
            top: this._state.storedWavePhaseTop,
        });
        this.deps.wave.resetDeltaTimer();
        this._startTransition('expanding');
    }

    public toggle(): void {
        if (this._state.state === 'expanded') {
            this.requestCollapse(false);
        } else if (this._state.state === 'collapsed') {
            this.requestExpand();
        }
    }

    public resetCollapsed(): void {
        const from = this._state.state;
        this._state.state = 'collapsed';
        this._state.animProgress = 0;
        this._applyFrame(COLLAPSED_FRAME);
        if (from !== 'collapsed') {
            this.emit('stateChange', { from, to: 'collapsed' });
        }
    }

    // ==========================================
    // Per-frame update
    // ==========================================

    public update(): void {
        const from = this._state.state;
        if (from !== 'collapsing' && from !== 'expanding') {
            return;
        }

        const elapsedUs = Math.max(0, this.deps.clock.nowUs() - this._state.animStartUs);
        const durationMs = this._durationMs();
        // A zero or invalid duration snaps straight to the terminal state.
        let progress = Number.isFinite(durationMs) && durationMs > 0
            ? elapsedUs / 1000 / durationMs
            : 1;

        if (progress >= 1) {
            progress = 1;
            this._state.state = from === 'collapsing' ? 'collapsed' : 'expanded';
        }

        this._state.animProgress = progress;
        this._applyFrame(sampleNavFrame(this._state.state, progress));

        if (this._state.state !== from) {
            this._logger.debug('state', from, '->', this._state.state);
            this.emit('stateChange', { from, to: this._state.state });
            if (this._state.state === 'collapsed') {
                this._showToastOnce();
            }
        }
    }

    public updateToast(): void {
        if (!this._state.toastActive) {
            return;
        }
        if (this._toastElapsedMs() >= NAV_TOAST.FADE_MS * 2 + NAV_TOAST.DURATION_MS) {
            this._state.toastActive = false;
        }
    }

    public advanceFrame(): void {
        this.update();
        this.updateToast();
        if (this._state.state === 'expanded') {
            this.deps.wave.update();
        }
    }

    // ==========================================
    // Queries
    // ==========================================

    public getState(): NavSidebarState {
        return this._state.state;
    }

    public isExpanded(): boolean {
        return this._state.state === 'expanded';
    }

    public isCollapsed(): boolean {
        return this._state.state === 'collapsed';
    }

    public isAnimating(): boolean {
        return this._state.state === 'collapsing' || this._state.state === 'expanding';
    }

    public getCurrentWidth(): number {
        return this._state.currentWidth;
    }

    public getPillWidth(): number {
        return this._state.pillWidth;
    }

    public getPillOpacity(): number {
        return this._state.pillOpacity;
    }

    public isToastActive(): boolean {
        return this._state.toastActive;
    }

    /**
     * Fade in, hold, fade out. 0 when no toast is showing.
     */
    public getToastOpacity(): number {
        if (!this._state.toastActive) {
            return 0;
        }
        const elapsedMs = this._toastElapsedMs();
        if (elapsedMs < NAV_TOAST.FADE_MS) {
            return elapsedMs / NAV_TOAST.FADE_MS;
        }
        const fadeOutStart = NAV_TOAST.FADE_MS + NAV_TOAST.DURATION_MS;
        if (elapsedMs > fadeOutStart) {
            return clamp01(1 - (elapsedMs - fadeOutStart) / NAV_TOAST.FADE_MS);
        }
        return 1;
    }

    public shouldDimContent(): boolean {
        return this._state.state === 'expanded';
    }

    public getSnapshot(): Readonly<NavCollapseState> {
        return { ...this._state };
    }

    // ==========================================
    // Internals
    // ==========================================

    private _startTransition(to: 'collapsing' | 'expanding'): void {
        const from = this._state.state;
        this._state.state = to;
        this._state.animStartUs = this.deps.clock.nowUs();
        this._state.animProgress = 0;
        this._logger.debug('state', from, '->', to);
        this.emit('stateChange', { from, to });
    }

    private _applyFrame(frame: Readonly<NavFrame>): void {
        this._state.currentWidth = frame.currentWidth;
        this._state.pillWidth = frame.pillWidth;
        this._state.pillOpacity = frame.pillOpacity;
    }

    private _showToastOnce(): void {
        if (this._state.toastShownOnce) {
            return;
        }
        this._state.toastShownOnce = true;
        this._state.toastActive = true;
        this._state.toastStartUs = this.deps.clock.nowUs();
        this.emit('toastShown', { message: NAV_TOAST.MESSAGE });
    }

    private _toastElapsedMs(): number {
        return Math.max(0, this.deps.clock.nowUs() - this._state.toastStartUs) / 1000;
    }

    private _durationMs(): number {
        return this.deps.getConfig().navCollapseDurationMs;
    }
}
