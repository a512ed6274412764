/**
 * @fileoverview Zone-crossing router - the first input handler of every frame.
 * @module modules/navigation/ZoneCrossingRouter
 * @version 1.0.0
 */

import { ILogger } from '../../utils/interfaces';
import { consoleLogger } from '../../utils/logger';
import { Screen } from '../../types/screens';
import { ZoneCrossingDeps } from './interfaces';

/**
 * Moves focus from the sidebar into the active screen's content.
 *
 * Must run before screen input handling. When it reports the frame
 * consumed, the screen skips its own input for that frame.
 */
export class ZoneCrossingRouter {
    private readonly _logger: ILogger;

    constructor(private readonly deps: ZoneCrossingDeps) {
        this._logger = deps.logger ?? consoleLogger('ZoneCrossingRouter');
    }

    /**
     * @returns true when the frame's input was consumed
     */
    public handleZoneCrossing(screen: Screen): boolean {
        const { focus, input, nav } = this.deps;

        if (focus.hasModal()) {
            return false;
        }

        if (focus.isNavBar() && input.isPressed('right')) {
            focus.moveToContent(screen);
            nav.requestCollapse(true);
            this._logger.debug('nav-bar ->', focus.getZone(), 'on', screen);
            return true;
        }

        return false;
    }
}
