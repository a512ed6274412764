/**
 * @fileoverview Shared wiring for sidebar input tests.
 * @module modules/navigation/__tests__/fixtures
 */

import { NavCollapseAnimator } from '../NavCollapseAnimator';
import { WaveAnimation } from '../WaveAnimation';
import { FocusStack } from '../../focus/FocusStack';
import { InputState } from '../../input/InputState';
import { InputFrame } from '../../input/interfaces';
import { DEFAULT_UI_CONFIG, UiConfig } from '../../../config/uiConfig';
import { ManualClock } from '../../../utils/clock';
import { silentLogger } from '../../../utils/logger';

export interface NavFixture {
    clock: ManualClock;
    config: UiConfig;
    focus: FocusStack;
    input: InputState;
    nav: NavCollapseAnimator;
    /** Feed a frame of input. */
    frame(frame: InputFrame): void;
    /** Run the sidebar straight to expanded. */
    expandNow(): void;
}

export function makeNavFixture(overrides: Partial<UiConfig> = {}): NavFixture {
    const clock = new ManualClock(1000000);
    const config: UiConfig = { ...DEFAULT_UI_CONFIG, ...overrides };
    const focus = new FocusStack({ logger: silentLogger });
    const input = new InputState();
    const nav = new NavCollapseAnimator({
        clock,
        wave: new WaveAnimation(clock),
        getConfig: () => config,
        logger: silentLogger,
    });

    return {
        clock,
        config,
        focus,
        input,
        nav,
        frame: (frame: InputFrame): void => input.beginFrame(frame),
        expandNow: (): void => {
            nav.requestExpand();
            clock.advanceMs(config.navCollapseDurationMs);
            nav.update();
        },
    };
}
