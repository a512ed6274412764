/**
 * @fileoverview Controller mapping module interfaces.
 * @module modules/controller-mapping/interfaces
 * @version 1.0.0
 */

import { ILogger } from '../../utils/interfaces';
import { IFocusStack } from '../focus/interfaces';
import { IInputState } from '../input/interfaces';
import { ISelectionGrid } from '../selection/interfaces';

/**
 * Touch surface a selection grid covers.
 */
export type MappingGridId = 'front' | 'rear';

export type ControllerDetailView = 'summary' | 'front-mapping' | 'rear-mapping';

/**
 * Sub-rectangle of the diagram as fractions of its width and height.
 */
export interface AreaRatios {
    x: number;
    y: number;
    w: number;
    h: number;
}

export interface GridLayout {
    id: MappingGridId;
    cols: number;
    rows: number;
    /** Where the grid sits inside the controller diagram */
    area: AreaRatios;
}

/**
 * Controller mapping events.
 * NOTE: The index signature is required for EventEmitter<T> generic constraint.
 */
export interface ControllerMappingEventMap {
    [key: string]: unknown;
    viewChange: { from: ControllerDetailView; to: ControllerDetailView };
    /**
     * Open the mapping popup for `cells`. `wholePanel` asks for a mapping
     * that applies to any touch on the panel; `cells` is then empty.
     */
    mappingRequested: { grid: MappingGridId; cells: readonly number[]; wholePanel: boolean };
    clearMappingsRequested: { grid: MappingGridId };
}

export interface ControllerMappingDeps {
    input: IInputState;
    focus: IFocusStack;
    grids: Readonly<Record<MappingGridId, ISelectionGrid>>;
    /** Animated sidebar width; the diagram centres in what is left. */
    getNavWidth: () => number;
    /** True while the mapping popup owns input. */
    isPopupActive?: () => boolean;
    logger?: ILogger;
}
