/**
 * @fileoverview Focus module constants.
 * @module modules/focus/constants
 * @version 1.0.0
 */

import { Screen } from '../../types/screens';
import { FocusEntry, FocusZone } from './interfaces';

/**
 * Stack slots including the base entry, so at most three nested modals.
 */
export const FOCUS_STACK_CAPACITY = 4;

export const INITIAL_FOCUS_ENTRY: Readonly<FocusEntry> = {
    zone: 'main-content',
    index: 0,
};

/**
 * Content zone a screen hands focus to when it leaves the nav bar.
 */
export const SCREEN_CONTENT_ZONES: Readonly<Record<Screen, FocusZone>> = {
    'main': 'main-content',
    'register': 'main-content',
    'register-host': 'main-content',
    'stream': 'main-content',
    'waking': 'main-content',
    'reconnecting': 'main-content',
    'settings': 'settings-items',
    'messages': 'main-content',
    'profile': 'profile-cards',
    'controller': 'controller-content',
};
