/**
 * @fileoverview UI coordinator - owns focus, sidebar animation, input and
 * the selection engines, and exposes them to screens and renderers.
 * @module core/ui-coordinator/UiCoordinator
 * @version 1.0.0
 */

import { ILogger } from '../../utils/interfaces';
import { consoleLogger } from '../../utils/logger';
import { monotonicClock } from '../../utils/clock';
import { UiConfig, normalizeUiConfig } from '../../config/uiConfig';
import { Screen } from '../../types/screens';
import { FocusStack, FocusZone } from '../../modules/focus';
import { GestureClassifier, GestureResult } from '../../modules/gesture';
import { InputFrame, InputState } from '../../modules/input';
import {
    NavCollapseAnimator,
    NavShortcutHandler,
    WaveAnimation,
    ZoneCrossingRouter,
} from '../../modules/navigation';
import { ModalGuard, OverlayName } from '../../modules/overlays';
import { SelectionGrid } from '../../modules/selection';
import {
    ControllerMappingCoordinator,
    FRONT_GRID_CELLS,
    MappingGridId,
    REAR_GRID_CELLS,
} from '../../modules/controller-mapping';
import { UiCoordinatorDeps, UiCoordinatorState } from './types';

const NO_FRAME: InputFrame = {
    buttons: new Set(),
    previousButtons: new Set(),
    touch: { down: false, x: 0, y: 0 },
};

/**
 * Single owner of the UI core.
 *
 * Per frame: {@link beginFrame}, then {@link handleZoneCrossing} (skip the
 * screen's own input when it returns true), then the screen's input, with
 * {@link handleNavShortcuts} for sidebar screens, then
 * {@link advanceAnimations} before drawing.
 *
 * @example
 * ```typescript
 * const ui = new UiCoordinator({ getConfig: () => config });
 * ui.beginFrame(frame);
 * if (!ui.handleZoneCrossing('settings')) {
 *     const next = ui.handleNavShortcuts('settings', true);
 *     if (next !== null) switchScreen(next);
 * }
 * ui.advanceAnimations();
 * ```
 */
export class UiCoordinator {
    private readonly _state: UiCoordinatorState;
    private readonly _router: ZoneCrossingRouter;
    private readonly _shortcuts: NavShortcutHandler;
    private readonly _mapping: ControllerMappingCoordinator;
    private _frame: InputFrame = NO_FRAME;

    constructor(deps: UiCoordinatorDeps) {
        const clock = deps.clock ?? monotonicClock;
        const getConfig = (): UiConfig => normalizeUiConfig(deps.getConfig());
        const isDebugEnabled = (): boolean => getConfig().debugMode;
        const loggerFor = (name: string): ILogger =>
            deps.logger ?? consoleLogger(name, isDebugEnabled);

        const focus = new FocusStack({ logger: loggerFor('FocusStack') });
        const overlays: Record<OverlayName, ModalGuard> = {
            'error-popup': new ModalGuard('error-popup', { focus, logger: loggerFor('ErrorPopup') }),
            'debug-menu': new ModalGuard('debug-menu', { focus, logger: loggerFor('DebugMenu') }),
            'connection-overlay': new ModalGuard('connection-overlay', {
                focus,
                logger: loggerFor('ConnectionOverlay'),
            }),
        };
        const input = new InputState({
            isInputSuppressed: () =>
                overlays['error-popup'].isActive() || overlays['debug-menu'].isActive(),
        });
        const wave = new WaveAnimation(clock);
        const nav = new NavCollapseAnimator({
            clock,
            wave,
            getConfig,
            logger: loggerFor('NavCollapseAnimator'),
        });
        const frontGrid = new SelectionGrid(FRONT_GRID_CELLS, {
            name: 'front',
            logger: loggerFor('SelectionGrid'),
        });
        const rearGrid = new SelectionGrid(REAR_GRID_CELLS, {
            name: 'rear',
            logger: loggerFor('SelectionGrid'),
        });
        const gesture = new GestureClassifier<number>({
            resolveTarget: deps.resolveTouchTarget,
            getThresholdPx: () => getConfig().tapSwipeThresholdPx,
        });

        this._state = { focus, nav, wave, input, frontGrid, rearGrid, gesture, overlays };
        this._router = new ZoneCrossingRouter({
            focus,
            input,
            nav,
            logger: loggerFor('ZoneCrossingRouter'),
        });
        this._shortcuts = new NavShortcutHandler({
            focus,
            input,
            nav,
            logger: loggerFor('NavShortcutHandler'),
        });
        this._mapping = new ControllerMappingCoordinator({
            input,
            focus,
            grids: { front: frontGrid, rear: rearGrid },
            getNavWidth: () => nav.getCurrentWidth(),
            isPopupActive: deps.isMappingPopupActive,
            logger: loggerFor('ControllerMappingCoordinator'),
        });
    }

    // ==========================================
    // Frame
    // ==========================================

    public beginFrame(frame: InputFrame): void {
        this._frame = frame;
        this._state.input.beginFrame(frame);
    }

    /**
     * The frame as sampled, ignoring suppression and blocks. Overlays that
     * suppress input read their own buttons from here.
     */
    public getRawFrame(): Readonly<InputFrame> {
        return this._frame;
    }

    /**
     * Must run first, every frame.
     * @returns true when the frame's input was consumed
     */
    public handleZoneCrossing(screen: Screen): boolean {
        return this._router.handleZoneCrossing(screen);
    }

    /**
     * Sidebar shortcuts for screens that show the sidebar.
     * @returns the screen to switch to, or null
     */
    public handleNavShortcuts(screen: Screen, allowDpad: boolean): Screen | null {
        const { input, gesture } = this._state;
        const wasTouchBlocked = input.isTouchBlocked();
        const next = this._shortcuts.handleShortcuts(screen, allowDpad);
        if (wasTouchBlocked && !input.isTouchBlocked()) {
            // The blocked contact must not surface as a tap.
            gesture.reset();
        }
        return next;
    }

    /**
     * Classify this frame's touch. A blocked contact reads as idle until
     * the finger lifts.
     */
    public classifyTouch(): GestureResult<number> {
        const { input, gesture } = this._state;
        if (input.isTouchBlocked()) {
            if (input.clearTouchBlockIfReleased()) {
                gesture.reset();
            }
            return { kind: 'idle' };
        }
        return gesture.update(input.getTouch());
    }

    /**
     * Controller screen input: touch and D-pad selection on the grids.
     */
    public handleControllerInput(): void {
        this._mapping.handleInput();
    }

    public advanceAnimations(): void {
        this._state.nav.advanceFrame();
    }

    /**
     * Reset per-screen input state after a screen switch. The button that
     * caused the switch stays blocked until released.
     */
    public enterScreen(screen: Screen): void {
        const { focus, input, gesture } = this._state;
        input.blockForTransition();
        gesture.reset();
        this._shortcuts.selectIconForScreen(screen);
        if (focus.isContent()) {
            focus.moveToContent(screen);
        }
        if (screen === 'controller') {
            this._mapping.exitToSummary();
        }
    }

    // ==========================================
    // Focus
    // ==========================================

    public getZone(): FocusZone {
        return this._state.focus.getZone();
    }

    public getIndex(): number {
        return this._state.focus.getIndex();
    }

    public setIndex(index: number): void {
        this._state.focus.setIndex(index);
    }

    public isNavBar(): boolean {
        return this._state.focus.isNavBar();
    }

    public isContent(): boolean {
        return this._state.focus.isContent();
    }

    public pushModal(): boolean {
        return this._state.focus.pushModal();
    }

    public popModal(): boolean {
        return this._state.focus.popModal();
    }

    public hasModal(): boolean {
        return this._state.focus.hasModal();
    }

    // ==========================================
    // Sidebar
    // ==========================================

    public navIsExpanded(): boolean {
        return this._state.nav.isExpanded();
    }

    public isCollapsed(): boolean {
        return this._state.nav.isCollapsed();
    }

    public isAnimating(): boolean {
        return this._state.nav.isAnimating();
    }

    public getCurrentWidth(): number {
        return this._state.nav.getCurrentWidth();
    }

    public requestCollapse(fromContent: boolean): void {
        this._state.nav.requestCollapse(fromContent);
    }

    public requestExpand(): void {
        this._state.nav.requestExpand();
    }

    public toggle(): void {
        this._state.nav.toggle();
    }

    public getSelectedNavIcon(): number {
        return this._shortcuts.getSelectedIcon();
    }

    // ==========================================
    // Engines and overlays
    // ==========================================

    public getGrid(grid: MappingGridId): SelectionGrid {
        return grid === 'front' ? this._state.frontGrid : this._state.rearGrid;
    }

    public getGesture(): GestureClassifier<number> {
        return this._state.gesture;
    }

    public getOverlay(name: OverlayName): ModalGuard {
        return this._state.overlays[name];
    }

    public getControllerMapping(): ControllerMappingCoordinator {
        return this._mapping;
    }

    public getNav(): NavCollapseAnimator {
        return this._state.nav;
    }

    public getState(): Readonly<UiCoordinatorState> {
        return this._state;
    }
}
