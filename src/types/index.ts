/**
 * Core type definitions for the deployment stage system.
 * Provides the Result type for error handling and the run context.
 */

export * from './core';

/**
 * Run execution context
 *
 * @remarks
 * RunContext carries the per-invocation utilities:
 * - `logger`: Structured logging with Pino
 * - `signal`: Optional AbortSignal for cancellation
 * - `progress`: Optional progress reporting callback
 *
 * @public
 */
export type { RunContext, ProgressReporter } from '../core/context';
