/**
 * @fileoverview Controller mapping constants - grid sizes and diagram layout.
 * @module modules/controller-mapping/constants
 * @version 1.0.0
 */

import { GridLayout, MappingGridId } from './interfaces';

/**
 * Y where screen content starts below the title row.
 */
export const CONTENT_START_Y = 60;

export const DIAGRAM_LAYOUT = {
    MAX_WIDTH: 720,
    HEIGHT: 330,
    HORIZONTAL_PADDING: 40,
    /** Offset below CONTENT_START_Y, leaving room for title and preset name */
    TOP_OFFSET: 60,
} as const;

/**
 * Front touch grid over the screen area of the diagram.
 */
export const FRONT_GRID_LAYOUT: Readonly<GridLayout> = {
    id: 'front',
    cols: 6,
    rows: 3,
    area: { x: 0.25, y: 0.125, w: 0.5, h: 0.75 },
};

/**
 * Rear touch grid over the rear pad area of the diagram.
 */
export const REAR_GRID_LAYOUT: Readonly<GridLayout> = {
    id: 'rear',
    cols: 4,
    rows: 3,
    area: { x: 0.125, y: 0.25, w: 0.75, h: 0.5 },
};

export const GRID_LAYOUTS: Readonly<Record<MappingGridId, Readonly<GridLayout>>> = {
    front: FRONT_GRID_LAYOUT,
    rear: REAR_GRID_LAYOUT,
};

export const FRONT_GRID_CELLS = FRONT_GRID_LAYOUT.cols * FRONT_GRID_LAYOUT.rows;
export const REAR_GRID_CELLS = REAR_GRID_LAYOUT.cols * REAR_GRID_LAYOUT.rows;
