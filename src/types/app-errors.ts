/**
 * @fileoverview Canonical application error taxonomy and base error shape.
 * @module types/app-errors
 * @version 1.0.0
 */

/**
 * Unified error codes for the UI core.
 */
export enum AppErrorCode {
    // Focus / Modal Errors (1xx)
    FOCUS_STACK_OVERFLOW = 'FOCUS_STACK_OVERFLOW',
    FOCUS_STACK_UNDERFLOW = 'FOCUS_STACK_UNDERFLOW',
    MODAL_OWNERSHIP_MISMATCH = 'MODAL_OWNERSHIP_MISMATCH',

    // Selection Errors (2xx)
    INVALID_GRID_INDEX = 'INVALID_GRID_INDEX',
}

/**
 * Base application error structure.
 */
export interface AppError {
    /** Error code from canonical taxonomy */
    code: AppErrorCode;
    /** Technical error message */
    message: string;
    /** Whether recovery might succeed */
    recoverable: boolean;
    /** Additional context for debugging */
    context?: Record<string, unknown>;
}

/**
 * Build an {@link AppError}. Everything the UI core reports is recoverable
 * unless the caller says otherwise.
 */
export function createAppError(
    code: AppErrorCode,
    message: string,
    context?: Record<string, unknown>,
    recoverable: boolean = true
): AppError {
    const error: AppError = { code, message, recoverable };
    if (context !== undefined) {
        error.context = context;
    }
    return error;
}
