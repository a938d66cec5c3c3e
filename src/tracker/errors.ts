/**
 * Tracker failure constructors
 */

import { Failure, type Result } from '@/types';
import type { StageStatus } from './types';

export const TrackerErrors = {
  unknownStage: (name: string, declared: readonly string[]): Result<never> =>
    Failure(`Unknown stage: ${name}`, {
      code: 'NOT_FOUND',
      message: `Stage "${name}" is not declared for this deployment`,
      hint: 'Stage names are fixed when the deployment state is created',
      resolution: `Use one of: ${declared.join(', ')}`,
      details: { stage: name, declared: [...declared] },
    }),

  invalidTransition: (
    name: string,
    current: StageStatus,
    operation: string,
    expected: StageStatus,
  ): Result<never> =>
    Failure(`Cannot ${operation} stage ${name}: status is ${current}, expected ${expected}`, {
      code: 'INVALID_TRANSITION',
      message: `Stage "${name}" is ${current}`,
      hint: 'Stage status only moves pending → running → success/failure',
      details: { stage: name, current, expected, operation },
    }),

  runFinalized: (operation: string): Result<never> =>
    Failure(`Cannot ${operation}: deployment run is already finalized`, {
      code: 'INVALID_TRANSITION',
      message: 'The deployment run has already been finalized',
      hint: 'No stage may change after the run records its end time',
    }),

  invalidExitCode: (exitCode: number): Result<never> =>
    Failure(`Exit code must be an integer, got ${exitCode}`, {
      code: 'INVALID_TRANSITION',
      message: 'Exit codes are integers',
      details: { exitCode },
    }),

  invalidStageNames: (reason: string, names: readonly string[]): Result<never> =>
    Failure(`Invalid stage list: ${reason}`, {
      code: 'CONFIG_ERROR',
      message: reason,
      resolution: 'Provide a non-empty list of distinct, non-numeric stage names',
      details: { stages: [...names] },
    }),

  reservedConfigKey: (key: string): Result<never> =>
    Failure(`Invalid run config: key "${key}" is reserved`, {
      code: 'CONFIG_ERROR',
      message: `"${key}" cannot be stored in the state document`,
      details: { key },
    }),
};
