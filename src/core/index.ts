/**
 * Core Module Exports
 *
 * Foundational types and utilities shared by the tracker, runner and app
 * layers. Import RunContext from here (via '@/core').
 */

// Context types and factory
export type { RunContext, ProgressReporter, ContextOptions } from './context';
export { createRunContext, reportProgress } from './context';
