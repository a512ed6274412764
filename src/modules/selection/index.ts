/**
 * @fileoverview Selection module public exports.
 * @module modules/selection
 * @version 1.0.0
 */

export { SelectionGrid } from './SelectionGrid';
export type { ISelectionGrid, SelectionGridOptions } from './interfaces';
