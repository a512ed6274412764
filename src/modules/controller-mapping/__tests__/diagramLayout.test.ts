/**
 * @fileoverview Unit tests for controller diagram geometry.
 * @module modules/controller-mapping/__tests__/diagramLayout.test
 */

import {
    cellFromPoint,
    computeDiagramRect,
    gridAreaRect,
    moveGridCursor,
} from '../diagramLayout';
import { FRONT_GRID_LAYOUT, REAR_GRID_LAYOUT } from '../constants';

const DIAGRAM = { x: 120, y: 120, w: 720, h: 330 };

describe('computeDiagramRect', () => {
    it('should centre the diagram on a screen without sidebar', () => {
        expect(computeDiagramRect(0)).toEqual(DIAGRAM);
    });

    it('should centre the diagram right of an expanded sidebar', () => {
        expect(computeDiagramRect(130)).toEqual({ x: 185, y: 120, w: 720, h: 330 });
    });

    it('should follow a sidebar mid-animation in whole pixels', () => {
        expect(computeDiagramRect(65.7)).toEqual({ x: 152, y: 120, w: 720, h: 330 });
    });

    it('should treat a negative or oversized sidebar as absent', () => {
        expect(computeDiagramRect(-5)).toEqual(DIAGRAM);
        expect(computeDiagramRect(1200)).toEqual(DIAGRAM);
    });

    it('should shrink to the space left when padding does not fit', () => {
        expect(computeDiagramRect(930)).toEqual({ x: 930, y: 120, w: 30, h: 330 });
    });
});

describe('gridAreaRect', () => {
    it('should place the front grid over the screen area', () => {
        expect(gridAreaRect(FRONT_GRID_LAYOUT, DIAGRAM)).toEqual({ x: 300, y: 161, w: 360, h: 247 });
    });

    it('should place the rear grid over the pad area', () => {
        expect(gridAreaRect(REAR_GRID_LAYOUT, DIAGRAM)).toEqual({ x: 210, y: 202, w: 540, h: 165 });
    });
});

describe('cellFromPoint', () => {
    it('should map the top-left corner to cell 0', () => {
        expect(cellFromPoint(FRONT_GRID_LAYOUT, DIAGRAM, 300, 161)).toBe(0);
    });

    it('should map the last pixel inside to the last cell', () => {
        expect(cellFromPoint(FRONT_GRID_LAYOUT, DIAGRAM, 659.9, 407.9)).toBe(17);
    });

    it('should map row-major indices', () => {
        expect(cellFromPoint(FRONT_GRID_LAYOUT, DIAGRAM, 361, 250)).toBe(7);
        expect(cellFromPoint(REAR_GRID_LAYOUT, DIAGRAM, 481, 258)).toBe(6);
    });

    it('should return -1 outside the area, right and bottom edges included', () => {
        expect(cellFromPoint(FRONT_GRID_LAYOUT, DIAGRAM, 299, 200)).toBe(-1);
        expect(cellFromPoint(FRONT_GRID_LAYOUT, DIAGRAM, 660, 200)).toBe(-1);
        expect(cellFromPoint(FRONT_GRID_LAYOUT, DIAGRAM, 400, 408)).toBe(-1);
    });
});

describe('moveGridCursor', () => {
    it('should wrap columns and rows', () => {
        expect(moveGridCursor(FRONT_GRID_LAYOUT, 0, 0, -1)).toBe(5);
        expect(moveGridCursor(FRONT_GRID_LAYOUT, 5, 0, 1)).toBe(0);
        expect(moveGridCursor(FRONT_GRID_LAYOUT, 0, -1, 0)).toBe(12);
        expect(moveGridCursor(FRONT_GRID_LAYOUT, 14, 1, 0)).toBe(2);
    });

    it('should use the rear grid width', () => {
        expect(moveGridCursor(REAR_GRID_LAYOUT, 3, 0, 1)).toBe(0);
        expect(moveGridCursor(REAR_GRID_LAYOUT, 1, 1, 0)).toBe(5);
    });
});
