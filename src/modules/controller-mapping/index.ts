/**
 * @fileoverview Controller mapping module public exports.
 * @module modules/controller-mapping
 * @version 1.0.0
 */

export { ControllerMappingCoordinator } from './ControllerMappingCoordinator';
export {
    computeDiagramRect,
    gridAreaRect,
    cellFromPoint,
    moveGridCursor,
} from './diagramLayout';

export type {
    MappingGridId,
    ControllerDetailView,
    AreaRatios,
    GridLayout,
    ControllerMappingEventMap,
    ControllerMappingDeps,
} from './interfaces';

export {
    CONTENT_START_Y,
    DIAGRAM_LAYOUT,
    FRONT_GRID_LAYOUT,
    REAR_GRID_LAYOUT,
    GRID_LAYOUTS,
    FRONT_GRID_CELLS,
    REAR_GRID_CELLS,
} from './constants';
