/**
 * Application Error Types
 *
 * Centralized error handling with typed error codes and safe messages.
 * Safe messages are user-facing and do not expose credentials or raw payloads.
 */

export type AppErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONFIG_INVALID'
  | 'DB_ERROR'
  | 'PERSISTENCE_FAILURE'
  | 'SOURCE_UNAVAILABLE'
  | 'NOT_FOUND_AT_SOURCE'
  | 'MALFORMED_FEED_ROW'
  | 'REQUEST_TIMEOUT';

/**
 * Application Error
 *
 * Extends Error with a typed error code and safe user-facing message.
 */
export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly safeMessage: string;
  /** Optional payload for observability (e.g. source id, row number) */
  public readonly details?: Record<string, unknown>;

  constructor(
    code: AppErrorCode,
    safeMessage: string,
    causeOrDetails?: unknown,
  ) {
    super(safeMessage);
    this.name = 'AppError';
    this.code = code;
    this.safeMessage = safeMessage;

    if (causeOrDetails instanceof Error) {
      // Preserve original error as cause (for debugging)
      this.cause = causeOrDetails;
    } else if (isPlainRecord(causeOrDetails)) {
      this.details = causeOrDetails;
    } else if (causeOrDetails != null) {
      this.cause = new Error(String(causeOrDetails));
    }
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): {
    code: AppErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.safeMessage,
      ...(this.details && { details: this.details }),
    };
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === 'object' && !Array.isArray(value);
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

/**
 * Reduce any thrown value to `{ code, message }` for per-item results.
 * Unknown errors are reported as the given fallback code.
 */
export function toErrorSummary(
  err: unknown,
  fallback: AppErrorCode,
): { code: AppErrorCode; message: string } {
  if (err instanceof AppError) {
    return { code: err.code, message: err.safeMessage };
  }
  return {
    code: fallback,
    message: err instanceof Error ? err.message : String(err),
  };
}
