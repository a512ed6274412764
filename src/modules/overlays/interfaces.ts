/**
 * @fileoverview Overlay module interfaces.
 * @module modules/overlays/interfaces
 * @version 1.0.0
 */

import { AppError } from '../../types/app-errors';
import { ILogger } from '../../utils/interfaces';
import { IFocusStack } from '../focus/interfaces';

/**
 * Overlays that take the whole input focus while shown.
 */
export type OverlayName = 'error-popup' | 'debug-menu' | 'connection-overlay';

export interface ModalGuardEventMap {
    [key: string]: unknown;
    activate: { name: OverlayName; ownsModal: boolean };
    deactivate: { name: OverlayName };
    error: AppError;
}

export interface ModalGuardDeps {
    focus: Pick<IFocusStack, 'pushModal' | 'popModal'>;
    logger?: ILogger;
}

export interface IModalGuard {
    readonly name: OverlayName;
    activate(): void;
    deactivate(): void;
    /** True from activate() until deactivate(), even if the push was refused. */
    isActive(): boolean;
    /** True while this guard holds a focus stack entry. */
    ownsModal(): boolean;
}
