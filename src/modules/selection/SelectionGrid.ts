/**
 * @fileoverview Fixed-capacity selection grid with a backtrackable drag path.
 * @module modules/selection/SelectionGrid
 * @version 1.0.0
 */

import { ILogger } from '../../utils/interfaces';
import { consoleLogger } from '../../utils/logger';
import { AppErrorCode, createAppError } from '../../types/app-errors';
import { ISelectionGrid, SelectionGridOptions } from './interfaces';

/**
 * Selection state for one grid (front touch zones or rear pad zones).
 *
 * `_path` holds the selected cells in visit order and never holds a cell
 * twice or a cell that is not selected. `_selectedCount` always equals the
 * number of `true` entries in `_selected`.
 *
 * @example
 * ```typescript
 * const grid = new SelectionGrid(18);
 * [3, 7, 12].forEach((cell) => grid.visit(cell));
 * grid.visit(7);          // finger moved back: 12 is deselected
 * grid.getDragPath();     // [3, 7]
 * grid.collect();         // [3, 7]
 * ```
 */
export class SelectionGrid implements ISelectionGrid {
    public readonly cellCount: number;
    private readonly _selected: boolean[];
    private readonly _path: number[];
    private _pathLen: number = 0;
    private _selectedCount: number = 0;
    private readonly _name: string;

    private readonly _logger: ILogger;

    constructor(cellCount: number, options: SelectionGridOptions = {}) {
        if (!Number.isInteger(cellCount) || cellCount <= 0) {
            throw new RangeError('SelectionGrid cellCount must be a positive integer: ' + cellCount);
        }
        this.cellCount = cellCount;
        this._selected = new Array<boolean>(cellCount).fill(false);
        this._path = new Array<number>(cellCount).fill(-1);
        this._name = options.name ?? 'grid';
        this._logger = options.logger ?? consoleLogger('SelectionGrid');
    }

    // ==========================================
    // Drag
    // ==========================================

    public visit(index: number): void {
        if (!this._isValid(index)) {
            return;
        }

        if (this._pathLen > 0 && this._path[this._pathLen - 1] === index) {
            return;
        }

        if (this._pathLen > 1 && this._path[this._pathLen - 2] === index) {
            const last = this._path[this._pathLen - 1];
            if (last !== undefined) {
                this._deselect(last);
            }
            this._pathLen--;
            return;
        }

        if (!this._selected[index]) {
            this._select(index);
            this._path[this._pathLen] = index;
            this._pathLen++;
        }
    }

    public add(index: number): void {
        if (this._isValid(index) && !this._selected[index]) {
            this._select(index);
        }
    }

    public remove(index: number): void {
        if (!this._isValid(index) || !this._selected[index]) {
            return;
        }
        this._deselect(index);

        let write = 0;
        for (let read = 0; read < this._pathLen; read++) {
            const cell = this._path[read];
            if (cell !== undefined && cell !== index) {
                this._path[write] = cell;
                write++;
            }
        }
        this._pathLen = write;
    }

    // ==========================================
    // Queries
    // ==========================================

    public collect(): number[];
    public collect(out: number[]): number;
    public collect(out?: number[]): number[] | number {
        const target = out ?? [];
        target.length = 0;
        for (let i = 0; i < this.cellCount; i++) {
            if (this._selected[i]) {
                target.push(i);
            }
        }
        return out ? target.length : target;
    }

    public isSelected(index: number): boolean {
        return this._selected[index] === true;
    }

    public getSelectedCount(): number {
        return this._selectedCount;
    }

    public getDragPath(): number[] {
        return this._path.slice(0, this._pathLen);
    }

    // ==========================================
    // Reset
    // ==========================================

    public clear(): void {
        this._selected.fill(false);
        this._selectedCount = 0;
        this.resetPath();
    }

    /**
     * Start a new drag path while keeping the selection.
     */
    public resetPath(): void {
        this._pathLen = 0;
    }

    private _select(index: number): void {
        this._selected[index] = true;
        this._selectedCount++;
    }

    private _deselect(index: number): void {
        if (this._selected[index]) {
            this._selected[index] = false;
            this._selectedCount--;
        }
    }

    private _isValid(index: number): boolean {
        if (Number.isInteger(index) && index >= 0 && index < this.cellCount) {
            return true;
        }
        const error = createAppError(
            AppErrorCode.INVALID_GRID_INDEX,
            'Ignoring out-of-range cell',
            { grid: this._name, index, cellCount: this.cellCount }
        );
        this._logger.warn(error.message, error.context);
        return false;
    }
}
