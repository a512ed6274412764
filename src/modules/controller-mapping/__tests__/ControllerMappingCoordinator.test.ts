/**
 * @fileoverview Unit tests for ControllerMappingCoordinator.
 * @module modules/controller-mapping/__tests__/ControllerMappingCoordinator.test
 */

import { ControllerMappingCoordinator } from '../ControllerMappingCoordinator';
import { FRONT_GRID_CELLS, REAR_GRID_CELLS } from '../constants';
import { FocusStack } from '../../focus/FocusStack';
import { InputState } from '../../input/InputState';
import { ControllerButton, TouchSample } from '../../input/interfaces';
import { makeFrame, touchAt, NO_TOUCH } from '../../input/__tests__/helpers';
import { SelectionGrid } from '../../selection/SelectionGrid';
import { silentLogger } from '../../../utils/logger';

describe('ControllerMappingCoordinator', () => {
    let input: InputState;
    let focus: FocusStack;
    let front: SelectionGrid;
    let rear: SelectionGrid;
    let navWidth: number;
    let popupActive: boolean;
    let mapping: ControllerMappingCoordinator;
    let onMapping: jest.Mock;

    function step(
        buttons: ControllerButton[] = [],
        previous: ControllerButton[] = [],
        touch: TouchSample = NO_TOUCH
    ): void {
        input.beginFrame(makeFrame(buttons, previous, touch));
        mapping.handleInput();
    }

    beforeEach(() => {
        input = new InputState();
        focus = new FocusStack({ logger: silentLogger });
        front = new SelectionGrid(FRONT_GRID_CELLS, { name: 'front', logger: silentLogger });
        rear = new SelectionGrid(REAR_GRID_CELLS, { name: 'rear', logger: silentLogger });
        navWidth = 0;
        popupActive = false;
        mapping = new ControllerMappingCoordinator({
            input,
            focus,
            grids: { front, rear },
            getNavWidth: () => navWidth,
            isPopupActive: () => popupActive,
            logger: silentLogger,
        });
        onMapping = jest.fn();
        mapping.on('mappingRequested', onMapping);
    });

    describe('summary view', () => {
        it('should open the front mapping view on a diagram touch', () => {
            const onView = jest.fn();
            mapping.on('viewChange', onView);

            step([], [], touchAt(200, 200));

            expect(mapping.getView()).toBe('front-mapping');
            expect(onView).toHaveBeenCalledWith({ from: 'summary', to: 'front-mapping' });
            expect(input.isTouchBlocked()).toBe(true);
        });

        it('should open the rear mapping view when the summary shows the rear', () => {
            mapping.setSummaryPanel('rear');

            step([], [], touchAt(200, 200));

            expect(mapping.getView()).toBe('rear-mapping');
        });

        it('should ignore touches outside the diagram', () => {
            step([], [], touchAt(50, 500));

            expect(mapping.getView()).toBe('summary');
        });

        it('should not select with the touch that opened the view', () => {
            step([], [], touchAt(310, 170));
            step([], [], touchAt(310, 170));
            step();

            expect(front.getSelectedCount()).toBe(0);
            expect(onMapping).not.toHaveBeenCalled();
            expect(input.isTouchBlocked()).toBe(false);
        });
    });

    describe('touch drag', () => {
        beforeEach(() => {
            mapping.enterView('front-mapping');
        });

        it('should hand every touched cell to the popup on release', () => {
            step([], [], touchAt(300, 161));
            step([], [], touchAt(361, 170));
            step([], [], touchAt(361, 250));

            expect(front.getDragPath()).toEqual([0, 1, 7]);

            step();

            expect(onMapping).toHaveBeenCalledWith({
                grid: 'front',
                cells: [0, 1, 7],
                wholePanel: false,
            });
            expect(front.getSelectedCount()).toBe(0);
            expect(mapping.getCursor('front')).toBe(7);
        });

        it('should undo a cell when the finger steps back', () => {
            step([], [], touchAt(300, 161));
            step([], [], touchAt(361, 170));
            step([], [], touchAt(305, 165));
            step();

            expect(onMapping).toHaveBeenCalledWith({ grid: 'front', cells: [0], wholePanel: false });
        });

        it('should not request a mapping for a drag that missed the grid', () => {
            step([], [], touchAt(50, 50));
            step();

            expect(onMapping).not.toHaveBeenCalled();
        });

        it('should follow the sidebar width', () => {
            navWidth = 130;

            step([], [], touchAt(300, 161));
            expect(front.getSelectedCount()).toBe(0);

            step([], [], touchAt(366, 162));
            expect(front.isSelected(0)).toBe(true);
        });
    });

    describe('d-pad drag', () => {
        beforeEach(() => {
            mapping.enterView('front-mapping');
        });

        it('should add cells the cursor reaches while cross is held', () => {
            step(['cross'], []);
            expect(front.collect()).toEqual([0]);

            step(['cross', 'right'], ['cross']);
            step(['cross', 'down'], ['cross']);
            expect(front.collect()).toEqual([0, 1, 7]);

            step([], ['cross']);
            expect(onMapping).toHaveBeenCalledWith({
                grid: 'front',
                cells: [0, 1, 7],
                wholePanel: false,
            });
            expect(front.getSelectedCount()).toBe(0);
        });

        it('should move the cursor without selecting when cross is up', () => {
            step(['left'], []);

            expect(mapping.getCursor('front')).toBe(5);
            expect(front.getSelectedCount()).toBe(0);
        });
    });

    describe('mapping view buttons', () => {
        it('should ask for a whole-panel mapping on triangle', () => {
            mapping.enterView('rear-mapping');
            step(['triangle'], []);

            expect(onMapping).toHaveBeenCalledWith({ grid: 'rear', cells: [], wholePanel: true });
        });

        it('should ask to clear mappings on square', () => {
            const onClear = jest.fn();
            mapping.on('clearMappingsRequested', onClear);
            mapping.enterView('rear-mapping');

            step(['square'], []);

            expect(onClear).toHaveBeenCalledWith({ grid: 'rear' });
        });

        it('should return to summary on circle and drop the selection', () => {
            mapping.enterView('front-mapping');
            step([], [], touchAt(300, 161));

            step(['circle'], [], touchAt(300, 161));

            expect(mapping.getView()).toBe('summary');
            expect(front.getSelectedCount()).toBe(0);
        });
    });

    describe('input ownership', () => {
        beforeEach(() => {
            mapping.enterView('front-mapping');
        });

        it('should ignore input while the popup is open', () => {
            popupActive = true;

            step(['cross'], [], touchAt(300, 161));

            expect(front.getSelectedCount()).toBe(0);
        });

        it('should ignore input while a modal is on the focus stack', () => {
            focus.pushModal();

            step(['right'], []);

            expect(mapping.getCursor('front')).toBe(0);
        });
    });

    it('should clear both grids when a mapping is applied', () => {
        front.visit(3);
        rear.visit(2);

        mapping.onMappingApplied();

        expect(front.getSelectedCount()).toBe(0);
        expect(rear.getSelectedCount()).toBe(0);
    });
});
