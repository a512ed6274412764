/**
 * @fileoverview Controller mapping coordinator - drives the front and rear
 * selection grids from touch drags and the "hold Cross and move" D-pad drag.
 * @module modules/controller-mapping/ControllerMappingCoordinator
 * @version 1.0.0
 */

import { EventEmitter } from '../../utils/EventEmitter';
import { ILogger } from '../../utils/interfaces';
import { consoleLogger } from '../../utils/logger';
import { pointInRect } from '../input/hitTest';
import { Rect } from '../input/interfaces';
import { ISelectionGrid } from '../selection/interfaces';
import {
    ControllerDetailView,
    ControllerMappingDeps,
    ControllerMappingEventMap,
    GridLayout,
    MappingGridId,
} from './interfaces';
import { GRID_LAYOUTS } from './constants';
import { cellFromPoint, computeDiagramRect, moveGridCursor } from './diagramLayout';

/**
 * Per-grid drag bookkeeping.
 */
interface GridDragState {
    cursor: number;
    /** A finger is dragging across the grid */
    touchActive: boolean;
    /** Cross is held and the cursor paints cells */
    dpadDragActive: boolean;
}

interface ControllerMappingInternalState {
    view: ControllerDetailView;
    /** Grid the summary view opens when its diagram is touched */
    summaryPanel: MappingGridId;
    summaryTouchDown: boolean;
    drag: Record<MappingGridId, GridDragState>;
}

function gridForView(view: ControllerDetailView): MappingGridId | null {
    if (view === 'front-mapping') {
        return 'front';
    }
    if (view === 'rear-mapping') {
        return 'rear';
    }
    return null;
}

function idleDrag(): GridDragState {
    return { cursor: 0, touchActive: false, dpadDragActive: false };
}

/**
 * Runs the controller screen's selection input each frame.
 *
 * In a mapping view a touch drag feeds {@link ISelectionGrid.visit} with the
 * cell under the finger; lifting the finger hands the whole selection to the
 * mapping popup via `mappingRequested` and clears the grid. Pressing Cross
 * starts the same kind of selection at the D-pad cursor and every cell the
 * cursor reaches while Cross is held joins it.
 *
 * @example
 * ```typescript
 * const mapping = new ControllerMappingCoordinator({ input, focus, grids, getNavWidth });
 * mapping.on('mappingRequested', ({ grid, cells }) => popup.open(grid, cells));
 * mapping.enterView('front-mapping');
 * // every frame
 * mapping.handleInput();
 * ```
 */
export class ControllerMappingCoordinator extends EventEmitter<ControllerMappingEventMap> {
    private _state: ControllerMappingInternalState = {
        view: 'summary',
        summaryPanel: 'front',
        summaryTouchDown: false,
        drag: { front: idleDrag(), rear: idleDrag() },
    };
    private readonly _logger: ILogger;

    constructor(private readonly deps: ControllerMappingDeps) {
        const logger = deps.logger ?? consoleLogger('ControllerMappingCoordinator');
        super(logger);
        this._logger = logger;
    }

    // ==========================================
    // Views
    // ==========================================

    public getView(): ControllerDetailView {
        return this._state.view;
    }

    /**
     * Switch views. Selections and drags start fresh on every switch.
     */
    public enterView(view: ControllerDetailView): void {
        const from = this._state.view;
        this._resetSelections();
        this._state.view = view;
        const gridId = gridForView(view);
        if (gridId !== null) {
            this._state.drag[gridId].cursor = 0;
        }
        if (from !== view) {
            this._logger.debug('view', from, '->', view);
            this.emit('viewChange', { from, to: view });
        }
    }

    public exitToSummary(): void {
        this.enterView('summary');
    }

    /**
     * Choose which grid a touch on the summary diagram opens.
     */
    public setSummaryPanel(panel: MappingGridId): void {
        this._state.summaryPanel = panel;
    }

    /**
     * Call once the popup has applied a mapping.
     */
    public onMappingApplied(): void {
        this._resetSelections();
    }

    // ==========================================
    // Geometry
    // ==========================================

    public getDiagramRect(): Rect {
        return computeDiagramRect(this.deps.getNavWidth());
    }

    public getCursor(grid: MappingGridId): number {
        return this._state.drag[grid].cursor;
    }

    public moveCursor(grid: MappingGridId, deltaRow: number, deltaCol: number): void {
        const drag = this._state.drag[grid];
        drag.cursor = moveGridCursor(GRID_LAYOUTS[grid], drag.cursor, deltaRow, deltaCol);
    }

    // ==========================================
    // Per-frame input
    // ==========================================

    public handleInput(): void {
        if (this.deps.isPopupActive && this.deps.isPopupActive()) {
            return;
        }
        if (this.deps.focus.hasModal()) {
            return;
        }

        const diagram = this.getDiagramRect();

        if (this._state.view === 'summary') {
            this._handleSummaryTouch(diagram);
            return;
        }

        if (this.deps.input.isPressed('circle')) {
            this.exitToSummary();
            return;
        }

        const gridId = gridForView(this._state.view);
        if (gridId !== null) {
            this._handleMappingInput(gridId, diagram);
        }
    }

    private _handleSummaryTouch(diagram: Rect): void {
        const { input } = this.deps;
        if (input.isTouchBlocked() && !input.clearTouchBlockIfReleased()) {
            return;
        }
        const touch = input.getTouch();
        if (!touch.down) {
            this._state.summaryTouchDown = false;
            return;
        }
        if (this._state.summaryTouchDown) {
            return;
        }
        this._state.summaryTouchDown = true;

        if (pointInRect(touch.x, touch.y, diagram)) {
            this.enterView(this._state.summaryPanel === 'rear' ? 'rear-mapping' : 'front-mapping');
            // The opening touch must not also start a selection.
            input.blockTouch();
        }
    }

    private _handleMappingInput(gridId: MappingGridId, diagram: Rect): void {
        const { input } = this.deps;
        const grid = this.deps.grids[gridId];
        const layout = GRID_LAYOUTS[gridId];
        const drag = this._state.drag[gridId];

        this._handleDragTouch(gridId, grid, layout, diagram);

        if (input.isPressed('right')) {
            this.moveCursor(gridId, 0, 1);
        } else if (input.isPressed('left')) {
            this.moveCursor(gridId, 0, -1);
        } else if (input.isPressed('down')) {
            this.moveCursor(gridId, 1, 0);
        } else if (input.isPressed('up')) {
            this.moveCursor(gridId, -1, 0);
        }

        if (drag.dpadDragActive && input.isDown('cross')) {
            grid.add(drag.cursor);
        }

        if (input.isPressed('triangle')) {
            this.emit('mappingRequested', { grid: gridId, cells: [], wholePanel: true });
        }

        if (input.isPressed('square')) {
            this.emit('clearMappingsRequested', { grid: gridId });
        }

        if (input.isPressed('cross')) {
            drag.dpadDragActive = true;
            grid.clear();
            grid.visit(drag.cursor);
        } else if (drag.dpadDragActive && input.isReleased('cross')) {
            drag.dpadDragActive = false;
            this._completeSelection(gridId, grid);
        }
    }

    private _handleDragTouch(
        gridId: MappingGridId,
        grid: ISelectionGrid,
        layout: Readonly<GridLayout>,
        diagram: Rect
    ): void {
        const { input } = this.deps;
        const drag = this._state.drag[gridId];

        if (input.isTouchBlocked() && !input.clearTouchBlockIfReleased()) {
            return;
        }

        const touch = input.getTouch();
        if (touch.down) {
            if (!drag.touchActive) {
                drag.touchActive = true;
                grid.clear();
            }
            const cell = cellFromPoint(layout, diagram, touch.x, touch.y);
            if (cell >= 0) {
                grid.visit(cell);
                drag.cursor = cell;
            }
        } else if (drag.touchActive) {
            drag.touchActive = false;
            this._completeSelection(gridId, grid);
        }
    }

    private _completeSelection(gridId: MappingGridId, grid: ISelectionGrid): void {
        const cells = grid.collect();
        grid.clear();
        if (cells.length > 0) {
            this._logger.debug('selection', gridId, cells);
            this.emit('mappingRequested', { grid: gridId, cells, wholePanel: false });
        }
    }

    private _resetSelections(): void {
        this.deps.grids.front.clear();
        this.deps.grids.rear.clear();
        this._state.drag.front.touchActive = false;
        this._state.drag.front.dpadDragActive = false;
        this._state.drag.rear.touchActive = false;
        this._state.drag.rear.dpadDragActive = false;
        this._state.summaryTouchDown = false;
    }
}
