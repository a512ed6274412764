/**
 * @fileoverview Focus Stack - bounded stack of (zone, index) entries deciding
 * which region owns input each frame.
 * @module modules/focus/FocusStack
 * @version 1.0.0
 */

import { EventEmitter } from '../../utils/EventEmitter';
import { ILogger } from '../../utils/interfaces';
import { consoleLogger } from '../../utils/logger';
import { AppErrorCode, createAppError } from '../../types/app-errors';
import { Screen } from '../../types/screens';
import {
    FocusEntry,
    FocusStackEventMap,
    FocusZone,
    IFocusStack,
} from './interfaces';
import { FOCUS_STACK_CAPACITY, INITIAL_FOCUS_ENTRY } from './constants';
import { zoneForScreen } from './zones';

export interface FocusStackOptions {
    logger?: ILogger;
    /** Read on every debug log call. */
    isDebugEnabled?: () => boolean;
}

/**
 * Clamp a focus index to a non-negative integer.
 */
export function clampFocusIndex(index: number): number {
    if (!Number.isFinite(index) || index <= 0) {
        return 0;
    }
    return Math.trunc(index);
}

/**
 * FocusStack owns the fixed-capacity entry array and the depth cursor.
 *
 * Entry 0 belongs to the screen layer (nav bar or content). Every entry
 * above it is a modal pushed by a popup or overlay; while one is on top,
 * screens and the zone router see {@link hasModal} and stay out of the way.
 *
 * @example
 * ```typescript
 * const focus = new FocusStack();
 * focus.moveToNavBar();
 * focus.pushModal();      // error popup opens
 * focus.hasModal();       // true
 * focus.popModal();
 * focus.getZone();        // 'nav-bar'
 * ```
 */
export class FocusStack
    extends EventEmitter<FocusStackEventMap>
    implements IFocusStack {
    private readonly _entries: FocusEntry[];
    private _depth: number = 0;
    private readonly _logger: ILogger;

    constructor(options: FocusStackOptions = {}) {
        const logger = options.logger ?? consoleLogger('FocusStack', options.isDebugEnabled);
        super(logger);
        this._logger = logger;
        this._entries = [];
        for (let i = 0; i < FOCUS_STACK_CAPACITY; i++) {
            this._entries.push({ ...INITIAL_FOCUS_ENTRY });
        }
    }

    // ==========================================
    // Top-of-stack access
    // ==========================================

    public getZone(): FocusZone {
        return this._top().zone;
    }

    public getIndex(): number {
        return this._top().index;
    }

    /**
     * Set the top entry's zone. While a modal is on top only `modal` is
     * accepted; anything else is logged and ignored.
     */
    public setZone(zone: FocusZone): void {
        if (this._depth > 0 && zone !== 'modal') {
            this._logger.warn('Ignoring zone change under a modal', {
                zone,
                depth: this._depth,
            });
            return;
        }
        const top = this._top();
        const from = top.zone;
        top.zone = zone;
        if (from !== zone) {
            this._logger.debug('zone', from, '->', zone);
            this.emit('zoneChange', { from, to: zone });
        }
    }

    public setIndex(index: number): void {
        this._top().index = clampFocusIndex(index);
    }

    public isNavBar(): boolean {
        return this._top().zone === 'nav-bar';
    }

    public isContent(): boolean {
        const zone = this._top().zone;
        return zone !== 'nav-bar' && zone !== 'modal';
    }

    public moveToNavBar(): void {
        this.setZone('nav-bar');
    }

    public moveToContent(screen: Screen): void {
        this.setZone(zoneForScreen(screen));
    }

    // ==========================================
    // Modal Handling
    // ==========================================

    public pushModal(): boolean {
        if (this._depth >= FOCUS_STACK_CAPACITY - 1) {
            const error = createAppError(
                AppErrorCode.FOCUS_STACK_OVERFLOW,
                'Focus stack overflow',
                { depth: this._depth, capacity: FOCUS_STACK_CAPACITY }
            );
            this._logger.error(error.message, error.context);
            this.emit('error', error);
            return false;
        }

        this._depth++;
        const top = this._top();
        top.zone = 'modal';
        top.index = 0;
        this.emit('modalPush', { depth: this._depth });
        this._logger.debug('pushModal depth', this._depth);
        return true;
    }

    public popModal(): boolean {
        if (this._depth <= 0) {
            const error = createAppError(
                AppErrorCode.FOCUS_STACK_UNDERFLOW,
                'Focus stack underflow',
                { depth: this._depth }
            );
            this._logger.error(error.message, error.context);
            this.emit('error', error);
            return false;
        }

        this._depth--;
        this.emit('modalPop', { depth: this._depth });
        this._logger.debug('popModal depth', this._depth);
        return true;
    }

    public hasModal(): boolean {
        return this._depth > 0 && this._top().zone === 'modal';
    }

    public getDepth(): number {
        return this._depth;
    }

    /**
     * Snapshot of the live entries, bottom first.
     */
    public getEntries(): readonly FocusEntry[] {
        return this._entries
            .slice(0, this._depth + 1)
            .map((entry) => ({ ...entry }));
    }

    private _top(): FocusEntry {
        const entry = this._entries[this._depth];
        if (entry === undefined) {
            // Unreachable while _depth stays within capacity.
            throw new RangeError('Focus stack depth out of range: ' + this._depth);
        }
        return entry;
    }
}
