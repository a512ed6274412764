/**
 * @fileoverview Two-layer wave phase animation behind the sidebar.
 * @module modules/navigation/WaveAnimation
 * @version 1.0.0
 */

import { IClock } from '../../utils/interfaces';
import { IWaveAnimation, WaveLayer, WavePhases } from './interfaces';
import { WAVE_PHASE_WRAP, WAVE_SPEED_BOTTOM, WAVE_SPEED_TOP } from './constants';

export class WaveAnimation implements IWaveAnimation {
    private readonly _bottom: WaveLayer = { phase: 0, speed: WAVE_SPEED_BOTTOM };
    private readonly _top: WaveLayer = { phase: 0, speed: WAVE_SPEED_TOP };
    private _lastUpdateUs: number | null = null;

    constructor(private readonly _clock: IClock) {}

    /**
     * Advance both layers by the time since the previous update.
     * The first call only starts the timer.
     */
    public update(): void {
        const nowUs = this._clock.nowUs();
        if (this._lastUpdateUs === null) {
            this._lastUpdateUs = nowUs;
            return;
        }

        const deltaSec = Math.max(0, nowUs - this._lastUpdateUs) / 1000000;
        this._lastUpdateUs = nowUs;

        this._bottom.phase = (this._bottom.phase + this._bottom.speed * deltaSec) % WAVE_PHASE_WRAP;
        this._top.phase = (this._top.phase + this._top.speed * deltaSec) % WAVE_PHASE_WRAP;
    }

    public resetDeltaTimer(): void {
        this._lastUpdateUs = this._clock.nowUs();
    }

    public getPhases(): WavePhases {
        return { bottom: this._bottom.phase, top: this._top.phase };
    }

    public setPhases(phases: WavePhases): void {
        this._bottom.phase = phases.bottom;
        this._top.phase = phases.top;
    }
}
