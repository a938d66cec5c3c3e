/**
 * Result Type - explicit error handling without exceptions
 *
 * Library functions return `Result<T>` instead of throwing. Callers branch on
 * `result.ok` and read either `value` or `error`.
 */

/**
 * Machine-readable failure categories.
 *
 * - `IO_ERROR`: state or report file unreadable/unwritable
 * - `NOT_FOUND`: unknown stage name
 * - `INVALID_TRANSITION`: stage or run state machine violation
 * - `EXTERNAL_COMMAND_FAILURE`: invoked tool exited non-zero
 * - `PROBE_FAILURE`: health probe could not confirm the desired state
 * - `CONFIG_ERROR`: configuration or environment is unusable
 */
export type ErrorCode =
  | 'IO_ERROR'
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'EXTERNAL_COMMAND_FAILURE'
  | 'PROBE_FAILURE'
  | 'CONFIG_ERROR';

/**
 * Actionable context attached to a failure.
 */
export interface ErrorGuidance {
  /** Error category */
  code?: ErrorCode;
  /** Human-readable description */
  message?: string;
  /** Why it probably happened */
  hint?: string;
  /** What to do about it */
  resolution?: string;
  /** Structured extra data */
  details?: Record<string, unknown>;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; guidance?: ErrorGuidance };

/**
 * Create a successful result
 */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failed result, optionally with guidance
 */
export const Failure = <T>(error: string, guidance?: ErrorGuidance): Result<T> =>
  guidance ? { ok: false, error, guidance } : { ok: false, error };

/**
 * Type guard for failures
 */
export function isFailure<T>(
  result: Result<T>,
): result is { ok: false; error: string; guidance?: ErrorGuidance } {
  return !result.ok;
}

/**
 * Read the error code of a failure, if any
 */
export function failureCode<T>(result: Result<T>): ErrorCode | undefined {
  return result.ok ? undefined : result.guidance?.code;
}
