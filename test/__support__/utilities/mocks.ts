/**
 * Test utilities for creating mock objects
 */

import { jest } from '@jest/globals';
import type { Logger } from 'pino';

import type {
  CommandExecutor,
  CommandOutcome,
  CommandRunOptions,
} from '@/infra/process/command-executor';
import type { CommandSpec } from '@/lib/command-log';
import type { RunContext } from '@/types';

export function createMockLogger(): Logger {
  const logger = {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    fatal: jest.fn(),
    trace: jest.fn(),
    child: jest.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger as unknown as Logger;
}

export function createMockContext(overrides: Partial<RunContext> = {}): RunContext {
  return {
    logger: createMockLogger(),
    ...overrides,
  };
}

/**
 * Clock that starts at `start` and advances `stepSeconds` on every call
 */
export function createFakeClock(start = '2024-05-01T10:00:00Z', stepSeconds = 1): () => Date {
  let current = new Date(start).getTime() - stepSeconds * 1000;
  return () => {
    current += stepSeconds * 1000;
    return new Date(current);
  };
}

export interface ExecutorCall {
  spec: CommandSpec;
  options: CommandRunOptions;
}

/**
 * Executor that records calls and answers with the exit code chosen by `exitCodeFor`
 */
export function createFakeExecutor(exitCodeFor: (spec: CommandSpec) => number): {
  executor: CommandExecutor;
  calls: ExecutorCall[];
} {
  const calls: ExecutorCall[] = [];
  const executor: CommandExecutor = {
    run: async (spec, options): Promise<CommandOutcome> => {
      calls.push({ spec, options });
      const exitCode = exitCodeFor(spec);
      return { exitCode, timedOut: exitCode === 124, durationMs: 5 };
    },
  };
  return { executor, calls };
}
