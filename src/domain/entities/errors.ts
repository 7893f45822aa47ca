/**
 * Error Entity
 */

export type AppErrorCode =
  | "CONFIG_INVALID"
  | "INVALID_ARGUMENT"
  | "ROOT_UNREADABLE"
  | "STORE_CORRUPT"
  | "STORE_UNREADABLE";

/**
 * Application-level error with a user-facing message.
 * The underlying failure, when there is one, is kept as `cause`.
 */
export class AppError extends Error {
  public readonly code: AppErrorCode;

  constructor(code: AppErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AppError";
    this.code = code;
  }
}

/**
 * Check whether a value is an AppError, optionally with a given code.
 */
export function isAppError(value: unknown, code?: AppErrorCode): value is AppError {
  return value instanceof AppError && (code === undefined || value.code === code);
}

/**
 * Message of any thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
