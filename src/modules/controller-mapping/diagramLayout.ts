/**
 * @fileoverview Controller diagram geometry and point-to-cell mapping.
 * @module modules/controller-mapping/diagramLayout
 * @version 1.0.0
 */

import { Rect } from '../input/interfaces';
import { SCREEN_WIDTH } from '../input/constants';
import { GridLayout } from './interfaces';
import { CONTENT_START_Y, DIAGRAM_LAYOUT } from './constants';

/**
 * Diagram rect in the space right of the sidebar, centred horizontally.
 * Follows the sidebar while it animates.
 */
export function computeDiagramRect(navWidth: number): Rect {
    let nav = navWidth > 0 ? Math.trunc(navWidth) : 0;
    let available = SCREEN_WIDTH - nav;
    if (available <= 0) {
        nav = 0;
        available = SCREEN_WIDTH;
    }

    const usable = Math.max(available - DIAGRAM_LAYOUT.HORIZONTAL_PADDING, 0);
    let width = Math.min(DIAGRAM_LAYOUT.MAX_WIDTH, usable);
    if (width <= 0) {
        width = Math.min(available, DIAGRAM_LAYOUT.MAX_WIDTH);
    }
    width = Math.min(width, available);

    return {
        x: nav + Math.trunc((available - width) / 2),
        y: CONTENT_START_Y + DIAGRAM_LAYOUT.TOP_OFFSET,
        w: width,
        h: DIAGRAM_LAYOUT.HEIGHT,
    };
}

/**
 * The grid's touch area inside the diagram, in whole pixels, at least 1x1.
 */
export function gridAreaRect(layout: Readonly<GridLayout>, diagram: Readonly<Rect>): Rect {
    return {
        x: diagram.x + Math.trunc(diagram.w * layout.area.x),
        y: diagram.y + Math.trunc(diagram.h * layout.area.y),
        w: Math.max(1, Math.trunc(diagram.w * layout.area.w)),
        h: Math.max(1, Math.trunc(diagram.h * layout.area.h)),
    };
}

/**
 * Row-major cell index under a point, or -1 outside the grid area.
 * The right and bottom edges are outside.
 */
export function cellFromPoint(
    layout: Readonly<GridLayout>,
    diagram: Readonly<Rect>,
    x: number,
    y: number
): number {
    const area = gridAreaRect(layout, diagram);
    if (x < area.x || x >= area.x + area.w || y < area.y || y >= area.y + area.h) {
        return -1;
    }

    const col = Math.min(layout.cols - 1, Math.max(0, Math.trunc(((x - area.x) / area.w) * layout.cols)));
    const row = Math.min(layout.rows - 1, Math.max(0, Math.trunc(((y - area.y) / area.h) * layout.rows)));
    return row * layout.cols + col;
}

/**
 * Move a row-major cursor, wrapping on both axes.
 */
export function moveGridCursor(
    layout: Readonly<GridLayout>,
    index: number,
    deltaRow: number,
    deltaCol: number
): number {
    const row = Math.trunc(index / layout.cols);
    const col = index % layout.cols;
    const nextRow = (((row + deltaRow) % layout.rows) + layout.rows) % layout.rows;
    const nextCol = (((col + deltaCol) % layout.cols) + layout.cols) % layout.cols;
    return nextRow * layout.cols + nextCol;
}
