/**
 * @fileoverview Screen identifiers shared by focus, navigation and layout.
 * @module types/screens
 * @version 1.0.0
 */

/**
 * Every top-level screen the client can show.
 */
export type Screen =
    | 'main'
    | 'register'
    | 'register-host'
    | 'stream'
    | 'waking'
    | 'reconnecting'
    | 'settings'
    | 'messages'
    | 'profile'
    | 'controller';

/**
 * Screens reachable from the sidebar, in icon order (top to bottom).
 */
export const NAV_SCREENS: readonly Screen[] = ['main', 'settings', 'controller', 'profile'];
