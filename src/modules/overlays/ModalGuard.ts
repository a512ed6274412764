/**
 * @fileoverview Modal guard - ties one overlay's visibility to exactly one
 * focus stack entry.
 * @module modules/overlays/ModalGuard
 * @version 1.0.0
 */

import { EventEmitter } from '../../utils/EventEmitter';
import { ILogger } from '../../utils/interfaces';
import { consoleLogger } from '../../utils/logger';
import { AppErrorCode, createAppError } from '../../types/app-errors';
import { IModalGuard, ModalGuardDeps, ModalGuardEventMap, OverlayName } from './interfaces';

/**
 * Pushes a modal entry once per activation and pops it only if the push
 * succeeded. Repeated activate/deactivate calls are no-ops, so an overlay
 * can call them every frame from its own visibility flag.
 *
 * @example
 * ```typescript
 * const errorPopup = new ModalGuard('error-popup', { focus });
 * errorPopup.activate();
 * errorPopup.activate();   // still one entry
 * errorPopup.deactivate(); // entry popped
 * ```
 */
export class ModalGuard extends EventEmitter<ModalGuardEventMap> implements IModalGuard {
    private _active: boolean = false;
    private _ownsModal: boolean = false;
    private readonly _logger: ILogger;

    constructor(
        public readonly name: OverlayName,
        private readonly deps: ModalGuardDeps
    ) {
        const logger = deps.logger ?? consoleLogger('ModalGuard');
        super(logger);
        this._logger = logger;
    }

    public activate(): void {
        if (this._active) {
            return;
        }
        this._active = true;
        this._ownsModal = this.deps.focus.pushModal();

        if (!this._ownsModal) {
            // Shown without an entry: screens below keep receiving input.
            const error = createAppError(
                AppErrorCode.MODAL_OWNERSHIP_MISMATCH,
                'Overlay shown without a focus entry',
                { overlay: this.name }
            );
            this._logger.error(error.message, error.context);
            this.emit('error', error);
        }

        this._logger.debug('activate', this.name, this._ownsModal);
        this.emit('activate', { name: this.name, ownsModal: this._ownsModal });
    }

    public deactivate(): void {
        if (!this._active) {
            return;
        }
        this._active = false;
        if (this._ownsModal) {
            this._ownsModal = false;
            this.deps.focus.popModal();
        }
        this._logger.debug('deactivate', this.name);
        this.emit('deactivate', { name: this.name });
    }

    public isActive(): boolean {
        return this._active;
    }

    public ownsModal(): boolean {
        return this._ownsModal;
    }
}
