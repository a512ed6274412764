/**
 * @fileoverview Monotonic clock implementations.
 * @module utils/clock
 * @version 1.0.0
 */

import { IClock } from './interfaces';

/**
 * Clock backed by `performance.now()`, reported in microseconds.
 */
export const monotonicClock: IClock = {
    nowUs: (): number => Math.floor(performance.now() * 1000),
};

/**
 * Clock whose time only moves when told to.
 * Used by tests and by replay tooling that feeds recorded timestamps.
 */
export class ManualClock implements IClock {
    private _nowUs: number;

    constructor(startUs: number = 0) {
        this._nowUs = startUs;
    }

    public nowUs(): number {
        return this._nowUs;
    }

    public set(us: number): void {
        this._nowUs = us;
    }

    public advanceMs(ms: number): void {
        this._nowUs += ms * 1000;
    }
}
