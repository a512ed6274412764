/**
 * @fileoverview Public exports for the overlays module.
 * @module modules/overlays
 */

export { ModalGuard } from './ModalGuard';
export type {
    IModalGuard,
    ModalGuardDeps,
    ModalGuardEventMap,
    OverlayName,
} from './interfaces';
