/**
 * Stage Runner
 *
 * Executes stage definitions in order against a StageTracker. Stage failures
 * are recorded, never thrown; the returned exit code and failed-stage list
 * are the run's outcome. Tracker failures (state file unwritable, unknown
 * stage, illegal transition) abort the run and are returned as a Failure.
 *
 * A stage whose command exits with the partial-failure code (2) and whose
 * definition carries a health probe gets a second opinion: after a settle
 * delay the probe runs, and a healthy result reclassifies the stage as
 * successful.
 */

import { access, constants } from 'node:fs/promises';
import { setTimeout as delay } from 'node:timers/promises';

import { EXIT_CODES } from '@/config/constants';
import { reportProgress } from '@/core/context';
import type { CommandExecutor } from '@/infra/process/command-executor';
import { extractErrorMessage } from '@/lib/errors';
import { createTimer } from '@/lib/logger';
import type { StageTracker } from '@/tracker/stage-tracker';
import type { DeploymentRun } from '@/tracker/types';
import { Success, type Result, type RunContext } from '@/types';
import type { StageDefinition } from './stage-definitions';

export interface RunnerOptions {
  /** Keep running later stages after a stage fails */
  continueOnFailure: boolean;
  /** Wait before probing a partially failed stage */
  probeSettleMs: number;
  stageTimeoutMs: number;
  /** Copy command output to stdout */
  echoOutput?: boolean;
}

export interface RunnerDependencies {
  executor: CommandExecutor;
  ctx: RunContext;
}

export interface RunOutcome {
  /** 0 iff no stage ended in failure */
  exitCode: number;
  failedStages: string[];
  /** Finalized run */
  run: DeploymentRun;
}

async function missingFiles(files: readonly string[]): Promise<string[]> {
  const missing: string[] = [];
  for (const file of files) {
    const exists = await access(file, constants.F_OK).then(
      () => true,
      () => false,
    );
    if (!exists) missing.push(file);
  }
  return missing;
}

async function invokeStage(
  stage: StageDefinition,
  options: RunnerOptions,
  deps: RunnerDependencies,
): Promise<number> {
  const { ctx } = deps;
  const missing = await missingFiles(stage.requiredFiles);
  if (missing.length > 0) {
    ctx.logger.error({ stage: stage.name, missing }, 'Required file not found, skipping command');
    return EXIT_CODES.FAILURE;
  }

  const outcome = await deps.executor.run(
    stage.command,
    {
      logFile: stage.logFile,
      timeoutMs: options.stageTimeoutMs,
      ...(options.echoOutput !== undefined && { echo: options.echoOutput }),
      ...(ctx.signal !== undefined && { signal: ctx.signal }),
    },
    ctx.logger,
  );
  return outcome.exitCode;
}

/**
 * Decide whether a partially failed stage actually reached its desired state
 */
async function confirmWithProbe(
  stage: StageDefinition,
  options: RunnerOptions,
  ctx: RunContext,
): Promise<boolean> {
  if (!stage.healthProbe) return false;

  ctx.logger.warn(
    { stage: stage.name, settleMs: options.probeSettleMs },
    'Partial task failure, checking whether the deployment succeeded anyway',
  );
  if (options.probeSettleMs > 0) {
    const settle = ctx.signal ? { signal: ctx.signal } : {};
    await delay(options.probeSettleMs, undefined, settle).catch((error: unknown) =>
      ctx.logger.debug({ error: extractErrorMessage(error) }, 'Settle wait interrupted'),
    );
  }
  if (ctx.signal?.aborted) {
    ctx.logger.warn({ stage: stage.name }, 'Run aborted, skipping health probe');
    return false;
  }

  try {
    const probed = await stage.healthProbe(ctx);
    if (!probed.ok) {
      ctx.logger.warn({ stage: stage.name, error: probed.error }, 'Health probe could not run');
      return false;
    }
    ctx.logger.info(
      { stage: stage.name, healthy: probed.value.healthy },
      `Health probe: ${probed.value.message}`,
    );
    return probed.value.healthy;
  } catch (error) {
    ctx.logger.warn({ stage: stage.name, error: extractErrorMessage(error) }, 'Health probe threw');
    return false;
  }
}

/**
 * Run every stage in order and finalize the tracker.
 */
export async function runStages(
  tracker: StageTracker,
  definitions: readonly StageDefinition[],
  options: RunnerOptions,
  deps: RunnerDependencies,
): Promise<Result<RunOutcome>> {
  const { ctx } = deps;
  const failedStages: string[] = [];
  let aborted = false;

  for (const [index, stage] of definitions.entries()) {
    if (ctx.signal?.aborted) {
      ctx.logger.warn({ stage: stage.name }, 'Run aborted before stage start');
      aborted = true;
      break;
    }

    await reportProgress(
      ctx,
      `Running stage ${index + 1}/${definitions.length}: ${stage.name}`,
      index + 1,
      definitions.length,
    );
    ctx.logger.info(
      { stage: stage.name, index: index + 1, total: definitions.length },
      `=== ${stage.description} ===`,
    );
    const timer = createTimer(ctx.logger, `stage ${stage.name}`);

    const started = await tracker.markStageStart(stage.name);
    if (!started.ok) return started;

    const exitCode = await invokeStage(stage, options, deps);

    const recorded = await tracker.markStageResult(stage.name, exitCode === 0, exitCode);
    if (!recorded.ok) return recorded;

    let succeeded = exitCode === 0;
    if (
      !succeeded &&
      exitCode === EXIT_CODES.PARTIAL_TASK_FAILURE &&
      (await confirmWithProbe(stage, options, ctx))
    ) {
      const reclassified = await tracker.reclassifyStageSuccess(stage.name);
      if (!reclassified.ok) return reclassified;
      ctx.logger.info({ stage: stage.name }, 'Stage reclassified as successful');
      succeeded = true;
    }

    if (succeeded) {
      timer.end({ exitCode });
      continue;
    }

    timer.error(`exit code ${exitCode}`, { exitCode });
    failedStages.push(stage.name);
    if (!options.continueOnFailure) {
      ctx.logger.error({ stage: stage.name }, 'Stopping after failed stage');
      break;
    }
  }

  const overallExitCode =
    failedStages.length === 0 && !aborted ? EXIT_CODES.SUCCESS : EXIT_CODES.FAILURE;
  const finalized = await tracker.finalize(overallExitCode);
  if (!finalized.ok) return finalized;

  if (failedStages.length > 0) {
    ctx.logger.error({ failedStages }, `Failed stages: ${failedStages.join(', ')}`);
  } else if (aborted) {
    ctx.logger.warn('Run aborted');
  } else {
    ctx.logger.info('All stages completed');
  }

  return Success({ exitCode: overallExitCode, failedStages, run: finalized.value });
}
