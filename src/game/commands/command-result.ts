/**
 * Structured results for build-related operations.
 *
 * Every recoverable failure is returned, never thrown, so callers can branch
 * on `error` and presentation code can show `message`.
 */

/** Recoverable failure kinds */
export type BuildErrorKind =
    | 'UnknownItem'
    | 'InsufficientResources'
    | 'InvalidPlacement'
    | 'NoActiveSession'
    /** Repair or damage aimed at an empty cell */
    | 'NoTileAtCell';

export interface CommandFailure {
    success: false;
    error: BuildErrorKind;
    /** Human-readable context for logs and UI */
    message: string;
}

export type CommandSuccess<T> = { success: true } & T;

export type CommandResult<T = object> = CommandSuccess<T> | CommandFailure;

/** Successful result with no payload */
export const COMMAND_OK: CommandSuccess<object> = { success: true };

export function commandSuccess<T extends object>(payload: T): CommandSuccess<T> {
    return { success: true, ...payload };
}

export function commandFailed(error: BuildErrorKind, message: string): CommandFailure {
    return { success: false, error, message };
}
