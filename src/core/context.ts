/**
 * Core Run Context
 *
 * Provides the RunContext interface and factory function. Every stage
 * operation receives one explicitly instead of reading shared process
 * environment.
 */

import type { Logger } from 'pino';

// ===== TYPES =====

/**
 * Progress reporting function for run feedback.
 *
 * The runner calls this once per stage. The implementation may forward
 * updates anywhere (console, CI annotations, test spies).
 *
 * @param message - Human-readable progress message
 * @param progress - Current progress value (optional)
 * @param total - Total progress value (optional)
 */
export type ProgressReporter = (
  message: string,
  progress?: number,
  total?: number,
) => Promise<void>;

/**
 * Run execution context.
 */
export interface RunContext {
  /**
   * Optional abort signal. An aborted signal stops the active command and
   * prevents further stages from starting.
   */
  signal?: AbortSignal;

  /**
   * Optional progress reporting function.
   */
  progress?: ProgressReporter;

  /**
   * Logger for structured logging. Use this instead of console.log.
   */
  logger: Logger;
}

// ===== CONTEXT OPTIONS =====

export interface ContextOptions {
  /** Optional abort signal for cancellation */
  signal?: AbortSignal;

  /** Optional progress reporter function */
  progress?: ProgressReporter;
}

// ===== CONTEXT FACTORY =====

/**
 * Create a RunContext.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: 'deploy' });
 * const ctx = createRunContext(logger, { signal: controller.signal });
 * await runStages(tracker, definitions, options, { executor, ctx });
 * ```
 */
export function createRunContext(logger: Logger, options: ContextOptions = {}): RunContext {
  const { signal, progress } = options;

  // Only include optional properties when defined
  const ctx: RunContext = { logger };

  if (signal !== undefined) ctx.signal = signal;
  if (progress !== undefined) ctx.progress = progress;

  return ctx;
}

/**
 * Report progress if the context has a reporter; reporter errors are logged
 * and otherwise ignored.
 */
export async function reportProgress(
  ctx: RunContext,
  message: string,
  progress?: number,
  total?: number,
): Promise<void> {
  if (!ctx.progress) return;
  try {
    await ctx.progress(message, progress, total);
  } catch (error) {
    ctx.logger.debug({ error }, 'Progress reporter failed');
  }
}
