/**
 * @fileoverview Focus module interfaces - zones, stack entries and events.
 * @module modules/focus/interfaces
 * @version 1.0.0
 */

import { AppError } from '../../types/app-errors';
import { Screen } from '../../types/screens';

/**
 * Logical region that owns input.
 */
export type FocusZone =
    | 'nav-bar'
    | 'main-content'
    | 'settings-items'
    | 'profile-cards'
    | 'controller-content'
    | 'modal';

/**
 * One level of the focus stack.
 * `index` is interpreted by the screen that owns `zone`.
 */
export interface FocusEntry {
    zone: FocusZone;
    index: number;
}

/**
 * Focus stack event map.
 */
export interface FocusStackEventMap {
    [key: string]: unknown;
    modalPush: { depth: number };
    modalPop: { depth: number };
    zoneChange: { from: FocusZone; to: FocusZone };
    error: AppError;
}

/**
 * Bounded LIFO of focus entries. The top entry owns input this frame.
 */
export interface IFocusStack {
    getZone(): FocusZone;
    getIndex(): number;
    /** Mutates the top entry only. */
    setZone(zone: FocusZone): void;
    /** Clamped to >= 0; non-finite values become 0. */
    setIndex(index: number): void;

    /**
     * Push a modal entry `{ modal, 0 }`.
     * @returns false when the stack is full (state unchanged)
     */
    pushModal(): boolean;

    /**
     * Pop the top modal entry.
     * @returns false when no modal is on the stack (state unchanged)
     */
    popModal(): boolean;

    hasModal(): boolean;
    getDepth(): number;
    isNavBar(): boolean;
    /** True when the top zone is neither the nav bar nor a modal. */
    isContent(): boolean;
    moveToNavBar(): void;
    moveToContent(screen: Screen): void;
    getEntries(): readonly FocusEntry[];
}
