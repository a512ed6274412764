/**
 * @fileoverview Selection module interfaces.
 * @module modules/selection/interfaces
 * @version 1.0.0
 */

import { ILogger } from '../../utils/interfaces';

/**
 * Multi-cell selection driven by a continuous drag.
 */
export interface ISelectionGrid {
    readonly cellCount: number;

    /**
     * Feed the cell under the finger. Resting is a no-op, stepping back one
     * cell undoes the last one, a new cell is selected and appended.
     */
    visit(index: number): void;

    /** Select without recording a path step. */
    add(index: number): void;

    /** Deselect and drop the cell from the path. */
    remove(index: number): void;

    /** Selected indices in ascending order. */
    collect(): number[];
    /**
     * Write selected indices, ascending, into `out` (replacing its contents).
     * @returns the number of indices written
     */
    collect(out: number[]): number;

    clear(): void;
    resetPath(): void;
    isSelected(index: number): boolean;
    getSelectedCount(): number;
    getDragPath(): number[];
}

export interface SelectionGridOptions {
    /** Label used in logs, e.g. `front`. */
    name?: string;
    logger?: ILogger;
}
