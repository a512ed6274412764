/**
 * @fileoverview Unit tests for FocusStack.
 * @module modules/focus/__tests__/FocusStack.test
 */

import { FocusStack, clampFocusIndex } from '../FocusStack';
import { zoneForScreen } from '../zones';
import { FOCUS_STACK_CAPACITY } from '../constants';
import { AppErrorCode } from '../../../types/app-errors';
import { ILogger } from '../../../utils/interfaces';

function makeLogger(): jest.Mocked<ILogger> {
    return {
        debug: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    };
}

describe('FocusStack', () => {
    let logger: jest.Mocked<ILogger>;
    let focus: FocusStack;

    beforeEach(() => {
        logger = makeLogger();
        focus = new FocusStack({ logger });
    });

    describe('initial state', () => {
        it('should start on main content at depth 0', () => {
            expect(focus.getZone()).toBe('main-content');
            expect(focus.getIndex()).toBe(0);
            expect(focus.getDepth()).toBe(0);
            expect(focus.hasModal()).toBe(false);
        });
    });

    describe('top-of-stack mutation', () => {
        it('should set zone and index on the top entry', () => {
            focus.setZone('settings-items');
            focus.setIndex(5);

            expect(focus.getZone()).toBe('settings-items');
            expect(focus.getIndex()).toBe(5);
        });

        it('should clamp negative indices to 0', () => {
            focus.setIndex(-3);

            expect(focus.getIndex()).toBe(0);
        });

        it('should not touch entries below the top', () => {
            focus.setZone('profile-cards');
            focus.setIndex(2);
            focus.pushModal();
            focus.setIndex(4);

            expect(focus.getEntries()).toEqual([
                { zone: 'profile-cards', index: 2 },
                { zone: 'modal', index: 4 },
            ]);
        });

        it('should emit zoneChange only when the zone changes', () => {
            const handler = jest.fn();
            focus.on('zoneChange', handler);

            focus.moveToNavBar();
            focus.moveToNavBar();

            expect(handler).toHaveBeenCalledTimes(1);
            expect(handler).toHaveBeenCalledWith({ from: 'main-content', to: 'nav-bar' });
        });
    });

    describe('zone queries', () => {
        it('should report nav bar and content exclusively', () => {
            focus.moveToNavBar();
            expect(focus.isNavBar()).toBe(true);
            expect(focus.isContent()).toBe(false);

            focus.moveToContent('controller');
            expect(focus.isNavBar()).toBe(false);
            expect(focus.isContent()).toBe(true);
            expect(focus.getZone()).toBe('controller-content');
        });

        it('should not treat a modal as content', () => {
            focus.pushModal();

            expect(focus.isContent()).toBe(false);
            expect(focus.isNavBar()).toBe(false);
        });
    });

    describe('modal handling', () => {
        it('should push a fresh modal entry', () => {
            focus.setIndex(3);
            const pushed = focus.pushModal();

            expect(pushed).toBe(true);
            expect(focus.getDepth()).toBe(1);
            expect(focus.getZone()).toBe('modal');
            expect(focus.getIndex()).toBe(0);
            expect(focus.hasModal()).toBe(true);
        });

        it('should restore the screen entry on pop', () => {
            focus.moveToNavBar();
            focus.pushModal();
            focus.popModal();

            expect(focus.getZone()).toBe('nav-bar');
            expect(focus.hasModal()).toBe(false);
        });

        it('should keep the modal entry when a zone change arrives under it', () => {
            const onZoneChange = jest.fn();
            focus.on('zoneChange', onZoneChange);
            focus.pushModal();

            focus.moveToNavBar();
            focus.moveToContent('settings');

            expect(focus.getZone()).toBe('modal');
            expect(focus.hasModal()).toBe(true);
            expect(focus.hasModal()).toBe(focus.getDepth() > 0);
            expect(onZoneChange).not.toHaveBeenCalled();
            expect(logger.warn).toHaveBeenCalledWith('Ignoring zone change under a modal', {
                zone: 'nav-bar',
                depth: 1,
            });

            focus.popModal();
            expect(focus.getZone()).toBe('main-content');
        });

        it('should refuse a push beyond capacity and emit an overflow error', () => {
            const onError = jest.fn();
            focus.on('error', onError);

            for (let i = 0; i < FOCUS_STACK_CAPACITY - 1; i++) {
                expect(focus.pushModal()).toBe(true);
            }
            focus.setIndex(7);

            expect(focus.pushModal()).toBe(false);
            expect(focus.getDepth()).toBe(3);
            expect(focus.getIndex()).toBe(7);
            expect(onError).toHaveBeenCalledWith(
                expect.objectContaining({ code: AppErrorCode.FOCUS_STACK_OVERFLOW })
            );
            expect(logger.error).toHaveBeenCalledWith('Focus stack overflow', {
                depth: 3,
                capacity: 4,
            });
        });

        it('should refuse a pop at depth 0 and emit an underflow error', () => {
            const onError = jest.fn();
            focus.on('error', onError);

            expect(focus.popModal()).toBe(false);
            expect(focus.getDepth()).toBe(0);
            expect(focus.getZone()).toBe('main-content');
            expect(onError).toHaveBeenCalledWith(
                expect.objectContaining({
                    code: AppErrorCode.FOCUS_STACK_UNDERFLOW,
                    recoverable: true,
                })
            );
        });

        it('should keep depth in range and hasModal in step for any call sequence', () => {
            const ops = [1, 1, 0, 1, 1, 1, 1, 0, 0, 0, 0, 0, 1, 0];
            for (const op of ops) {
                if (op === 1) {
                    focus.pushModal();
                } else {
                    focus.popModal();
                }
                expect(focus.getDepth()).toBeGreaterThanOrEqual(0);
                expect(focus.getDepth()).toBeLessThanOrEqual(FOCUS_STACK_CAPACITY - 1);
                expect(focus.hasModal()).toBe(focus.getDepth() > 0);
            }
        });

        it('should emit push and pop events with the new depth', () => {
            const onPush = jest.fn();
            const onPop = jest.fn();
            focus.on('modalPush', onPush);
            focus.on('modalPop', onPop);

            focus.pushModal();
            focus.pushModal();
            focus.popModal();

            expect(onPush).toHaveBeenNthCalledWith(2, { depth: 2 });
            expect(onPop).toHaveBeenCalledWith({ depth: 1 });
        });
    });
});

describe('clampFocusIndex', () => {
    it('should truncate fractions and map non-finite values to 0', () => {
        expect(clampFocusIndex(2.9)).toBe(2);
        expect(clampFocusIndex(Number.NaN)).toBe(0);
        expect(clampFocusIndex(Number.POSITIVE_INFINITY)).toBe(0);
        expect(clampFocusIndex(-0.5)).toBe(0);
    });
});

describe('zoneForScreen', () => {
    it('should map screens with their own content zone', () => {
        expect(zoneForScreen('main')).toBe('main-content');
        expect(zoneForScreen('settings')).toBe('settings-items');
        expect(zoneForScreen('profile')).toBe('profile-cards');
        expect(zoneForScreen('controller')).toBe('controller-content');
    });

    it('should default other screens to main content', () => {
        expect(zoneForScreen('stream')).toBe('main-content');
        expect(zoneForScreen('register-host')).toBe('main-content');
    });
});
