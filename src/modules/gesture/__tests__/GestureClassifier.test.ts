/**
 * @fileoverview Unit tests for GestureClassifier.
 * @module modules/gesture/__tests__/GestureClassifier.test
 */

import { GestureClassifier } from '../GestureClassifier';
import { TouchSample } from '../../input/interfaces';

const UP: TouchSample = { down: false, x: 0, y: 0 };

function down(x: number, y: number): TouchSample {
    return { down: true, x, y };
}

describe('GestureClassifier', () => {
    let gestures: GestureClassifier<number>;
    let resolveTarget: jest.Mock<number | null, [number, number]>;

    beforeEach(() => {
        resolveTarget = jest.fn((x: number, _y: number): number | null => (x < 480 ? 0 : 1));
        gestures = new GestureClassifier<number>({ resolveTarget });
    });

    it('should stay idle while the finger is up', () => {
        expect(gestures.update(UP)).toEqual({ kind: 'idle' });
    });

    it('should record the start and resolve the target once on touch-down', () => {
        expect(gestures.update(down(100, 200))).toEqual({
            kind: 'press',
            x: 100,
            y: 200,
            target: 0,
        });
        gestures.update(down(105, 200));

        expect(resolveTarget).toHaveBeenCalledTimes(1);
        expect(gestures.getState()).toEqual(
            expect.objectContaining({ isDown: true, startX: 100, startY: 200, startTarget: 0 })
        );
    });

    describe('threshold boundary', () => {
        it('should classify 24.99 px of travel as a tap', () => {
            gestures.update(down(100, 100));
            expect(gestures.update(down(124.99, 100)).kind).toBe('hold');

            expect(gestures.update(UP)).toEqual({ kind: 'tap', x: 100, y: 100, target: 0 });
        });

        it('should classify 25.01 px of travel as a swipe', () => {
            gestures.update(down(100, 100));
            const result = gestures.update(down(125.01, 100));

            expect(result.kind).toBe('drag');
            expect(gestures.update(UP).kind).toBe('swipe-end');
        });

        it('should measure diagonal travel', () => {
            gestures.update(down(100, 100));

            expect(gestures.update(down(115, 120)).kind).toBe('hold');
            expect(gestures.update(down(116, 120)).kind).toBe('drag');
        });
    });

    it('should fire a tap at touch-down coordinates when the finger lifts elsewhere', () => {
        gestures.update(down(300, 150));
        gestures.update(down(310, 160));

        expect(gestures.update(UP)).toEqual({ kind: 'tap', x: 300, y: 150, target: 0 });
    });

    it('should keep a contact a swipe after it returns to the start', () => {
        gestures.update(down(100, 100));
        gestures.update(down(200, 100));
        const back = gestures.update(down(100, 100));

        expect(back).toEqual({ kind: 'drag', x: 100, y: 100, deltaX: 0, deltaY: 0 });
        expect(gestures.update(UP)).toEqual({ kind: 'swipe-end', deltaX: 0, deltaY: 0 });
    });

    it('should report drag delta as start minus current', () => {
        gestures.update(down(400, 100));
        const result = gestures.update(down(340, 110));

        expect(result).toEqual({ kind: 'drag', x: 340, y: 110, deltaX: 60, deltaY: -10 });
    });

    it('should fire exactly one tap per contact', () => {
        gestures.update(down(600, 100));
        const first = gestures.update(UP);
        const second = gestures.update(UP);

        expect(first).toEqual({ kind: 'tap', x: 600, y: 100, target: 1 });
        expect(second).toEqual({ kind: 'idle' });
    });

    it('should forget the contact on reset', () => {
        gestures.update(down(100, 100));
        gestures.reset();

        expect(gestures.update(UP)).toEqual({ kind: 'idle' });
        expect(gestures.update(down(50, 60)).kind).toBe('press');
    });

    it('should hand out state snapshots that later frames do not change', () => {
        gestures.update(down(100, 100));
        const before = gestures.getState();

        gestures.update(down(140, 120));

        expect(before.lastX).toBe(100);
        expect(before.lastY).toBe(100);
        expect(before.isSwipe).toBe(false);
        expect(gestures.getState().lastX).toBe(140);
        expect(gestures.getState().isSwipe).toBe(true);
    });

    it('should read the threshold from the config getter', () => {
        const wide = new GestureClassifier<number>({ getThresholdPx: () => 50 });
        wide.update(down(0, 0));

        expect(wide.update(down(40, 0)).kind).toBe('hold');
        expect(wide.update(UP)).toEqual({ kind: 'tap', x: 0, y: 0, target: null });
    });
});
