/**
 * @fileoverview Input state - per-frame button edges, transition blocks and
 * the touch block shared by every handler in a frame.
 * @module modules/input/InputState
 * @version 1.0.0
 */

import {
    ControllerButton,
    IInputState,
    InputFrame,
    TouchSample,
} from './interfaces';

export interface InputStateDeps {
    /**
     * True while an overlay (error popup, debug menu) swallows all input.
     * Read on every query.
     */
    isInputSuppressed?: () => boolean;
}

const EMPTY_BUTTONS: ReadonlySet<ControllerButton> = new Set();

/**
 * Holds the frame's raw input and answers edge queries against it.
 *
 * A screen transition calls {@link blockForTransition} so the button that
 * opened the new screen does not also act on it. Blocked buttons unblock
 * individually once released; the touch block lasts until the finger lifts.
 */
export class InputState implements IInputState {
    private _buttons: ReadonlySet<ControllerButton> = EMPTY_BUTTONS;
    private _previous: ReadonlySet<ControllerButton> = EMPTY_BUTTONS;
    private _blocked: Set<ControllerButton> = new Set();
    private _touch: TouchSample = { down: false, x: 0, y: 0 };
    private _touchBlocked: boolean = false;

    constructor(private readonly deps: InputStateDeps = {}) {}

    /**
     * Take the frame's input. Buttons released since the last frame leave
     * the block mask.
     */
    public beginFrame(frame: InputFrame): void {
        this._buttons = frame.buttons;
        this._previous = frame.previousButtons;
        this._touch = { ...frame.touch };
        this.clearButtonBlocks();
    }

    public isDown(button: ControllerButton): boolean {
        return this._buttons.has(button);
    }

    public isPressed(button: ControllerButton): boolean {
        if (this._isSuppressed() || this._blocked.has(button)) {
            return false;
        }
        return this._buttons.has(button) && !this._previous.has(button);
    }

    public isReleased(button: ControllerButton): boolean {
        if (this._isSuppressed()) {
            return false;
        }
        return !this._buttons.has(button) && this._previous.has(button);
    }

    public getTouch(): Readonly<TouchSample> {
        return this._touch;
    }

    // ==========================================
    // Blocks
    // ==========================================

    public blockForTransition(): void {
        this._buttons.forEach((button) => this._blocked.add(button));
        this._touchBlocked = true;
    }

    /**
     * Keep only blocks on buttons that are still held.
     */
    public clearButtonBlocks(): void {
        this._blocked.forEach((button) => {
            if (!this._buttons.has(button)) {
                this._blocked.delete(button);
            }
        });
    }

    public isBlocked(button: ControllerButton): boolean {
        return this._blocked.has(button);
    }

    public isTouchBlocked(): boolean {
        return this._touchBlocked;
    }

    public blockTouch(): void {
        this._touchBlocked = true;
    }

    public clearTouchBlockIfReleased(): boolean {
        if (this._touchBlocked && !this._touch.down) {
            this._touchBlocked = false;
            return true;
        }
        return false;
    }

    private _isSuppressed(): boolean {
        return this.deps.isInputSuppressed ? this.deps.isInputSuppressed() : false;
    }
}
