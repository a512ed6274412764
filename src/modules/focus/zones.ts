/**
 * @fileoverview Pure screen-to-zone mapping.
 * @module modules/focus/zones
 * @version 1.0.0
 */

import { Screen } from '../../types/screens';
import { SCREEN_CONTENT_ZONES } from './constants';
import { FocusZone } from './interfaces';

export function zoneForScreen(screen: Screen): FocusZone {
    return SCREEN_CONTENT_ZONES[screen];
}
