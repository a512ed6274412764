/**
 * @fileoverview Global sidebar shortcuts - Triangle toggle, pill and icon
 * touches, and D-pad movement between the sidebar and content.
 * @module modules/navigation/NavShortcutHandler
 * @version 1.0.0
 */

import { ILogger } from '../../utils/interfaces';
import { consoleLogger } from '../../utils/logger';
import { Screen } from '../../types/screens';
import { padRect, pointInCircle, pointInRect } from '../input/hitTest';
import { NavIcon, NavShortcutDeps } from './interfaces';
import {
    NAV_ICONS,
    NAV_ICON_LAYOUT,
    NAV_PILL,
    WAVE_NAV_WIDTH,
} from './constants';

/**
 * Handles sidebar input shared by every screen that shows the sidebar.
 *
 * Call after {@link ZoneCrossingRouter.handleZoneCrossing}. A touch that
 * acts on the sidebar blocks touch until the finger lifts, so the same
 * contact never also lands on content.
 */
export class NavShortcutHandler {
    private _selectedIcon: number = 0;
    private readonly _logger: ILogger;

    constructor(private readonly deps: NavShortcutDeps) {
        this._logger = deps.logger ?? consoleLogger('NavShortcutHandler');
    }

    /**
     * Process this frame's sidebar shortcuts.
     * @param screen - Active screen, used when focus moves into content
     * @param allowDpad - False on screens that use the D-pad themselves
     * @returns the screen to navigate to, or null
     */
    public handleShortcuts(screen: Screen, allowDpad: boolean): Screen | null {
        const { focus, input, nav } = this.deps;

        if (focus.hasModal()) {
            return null;
        }

        if (input.isPressed('triangle')) {
            nav.toggle();
        }

        const touch = input.getTouch();
        if (input.isTouchBlocked() && !input.clearTouchBlockIfReleased()) {
            return null;
        }

        if (touch.down) {
            if (this._hitsPill(touch.x, touch.y)) {
                nav.requestExpand();
                input.blockTouch();
                return null;
            }

            if (nav.isExpanded()) {
                const iconIndex = this._iconAt(touch.x, touch.y);
                if (iconIndex !== -1) {
                    this._selectedIcon = iconIndex;
                    focus.moveToNavBar();
                    input.blockTouch();
                    return this._screenForIcon(iconIndex);
                }

                if (touch.x > WAVE_NAV_WIDTH) {
                    nav.requestCollapse(true);
                    input.blockTouch();
                }
            }
        }

        if (!allowDpad) {
            return null;
        }

        if (nav.isCollapsed()) {
            if (focus.isNavBar()) {
                if (input.isPressed('cross') || input.isPressed('left')) {
                    nav.requestExpand();
                    return null;
                }
                if (input.isPressed('right')) {
                    focus.moveToContent(screen);
                }
            } else if (input.isPressed('left')) {
                focus.moveToNavBar();
            }
            return null;
        }

        if (input.isPressed('left')) {
            focus.moveToNavBar();
        } else if (input.isPressed('right') && focus.isNavBar()) {
            focus.moveToContent(screen);
            nav.requestCollapse(true);
        }

        if (focus.isNavBar()) {
            if (input.isPressed('up')) {
                this._selectedIcon = (this._selectedIcon - 1 + NAV_ICONS.length) % NAV_ICONS.length;
            } else if (input.isPressed('down')) {
                this._selectedIcon = (this._selectedIcon + 1) % NAV_ICONS.length;
            }

            if (input.isPressed('cross')) {
                this._logger.debug('icon', this._selectedIcon, 'selected');
                return this._screenForIcon(this._selectedIcon);
            }
        }

        return null;
    }

    public getSelectedIcon(): number {
        return this._selectedIcon;
    }

    /**
     * Highlight the icon for `screen`, if the sidebar has one.
     */
    public selectIconForScreen(screen: Screen): void {
        const index = NAV_ICONS.findIndex((icon) => icon.screen === screen);
        if (index !== -1) {
            this._selectedIcon = index;
        }
    }

    public getIcons(): readonly NavIcon[] {
        return NAV_ICONS;
    }

    private _hitsPill(x: number, y: number): boolean {
        const { nav } = this.deps;
        if (!nav.isCollapsed()) {
            return false;
        }
        const pill = {
            x: NAV_PILL.X,
            y: NAV_PILL.Y,
            w: nav.getPillWidth(),
            h: NAV_PILL.HEIGHT,
        };
        return pointInRect(x, y, padRect(pill, NAV_PILL.HIT_PADDING));
    }

    private _iconAt(x: number, y: number): number {
        return NAV_ICONS.findIndex((icon) =>
            pointInCircle(x, y, icon.x, icon.y, NAV_ICON_LAYOUT.HIT_RADIUS)
        );
    }

    private _screenForIcon(index: number): Screen {
        const icon = NAV_ICONS[index];
        return icon ? icon.screen : 'main';
    }
}
