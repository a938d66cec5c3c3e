/**
 * Deployment application
 *
 * Wires configuration, the stage catalogue, the runner, the tracker and the
 * reporter into the three entry points used by the CLI: `init` validates
 * the environment, `deploy` runs stages and writes the summary, `summary`
 * re-renders the summary from an existing state file.
 */

import { mkdir } from 'node:fs/promises';
import type { Logger } from 'pino';

import {
  buildRunConfig,
  DEFAULT_TIMEOUTS,
  logConfigSummary,
  stateFilePath,
  summaryFilePath,
  type DeploymentConfig,
} from '@/config';
import { createRunContext } from '@/core/context';
import { createRancherProbe, createRke2Probe, type ProbeOptions } from '@/infra/kubernetes/probes';
import { createCommandExecutor, type CommandExecutor } from '@/infra/process/command-executor';
import { copyArtifacts } from '@/lib/artifacts';
import { extractErrorMessage } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { writeSummary } from '@/report/summary-reporter';
import { createStageDefinitions, type StageProbes } from '@/runner/stage-definitions';
import { runStages } from '@/runner/stage-runner';
import { StageTracker, type StageTrackerOptions } from '@/tracker/stage-tracker';
import type { DeploymentRun } from '@/tracker/types';
import { Failure, Success, type ProgressReporter, type Result } from '@/types';
import { validateEnvironment, type EnvironmentReport } from '@/validation/environment-validator';

export interface DeploymentAppOptions {
  config: DeploymentConfig;
  logger?: Logger;
  executor?: CommandExecutor;
  /** Defaults to the kubectl-backed RKE2 and Rancher probes */
  probes?: StageProbes;
  tracker?: Pick<StageTrackerOptions, 'now' | 'generateId'>;
  /** Copy playbook output to stdout */
  echoOutput?: boolean;
}

export interface DeployOptions {
  /** Custom stage list; defaults to every catalogue stage */
  stages?: readonly string[];
  signal?: AbortSignal;
  progress?: ProgressReporter;
}

export interface DeploymentReport {
  exitCode: number;
  failedStages: string[];
  run: DeploymentRun;
  statePath: string;
  summaryPath: string;
  summary: string;
}

export interface SummaryReport {
  run: DeploymentRun;
  summaryPath: string;
  summary: string;
}

export interface DeploymentApp {
  readonly config: DeploymentConfig;
  init(): Promise<Result<EnvironmentReport>>;
  deploy(options?: DeployOptions): Promise<Result<DeploymentReport>>;
  summary(): Promise<Result<SummaryReport>>;
}

export function createDefaultProbes(config: DeploymentConfig): StageProbes {
  const options: ProbeOptions = {
    kubeconfigPaths: config.kubeconfigPaths,
    inventoryFile: config.inventoryFile,
    rewriteServer: config.rewriteKubeconfigServer,
    kubectlTimeoutMs: DEFAULT_TIMEOUTS.kubectl,
  };
  return { rke2: createRke2Probe(options), rancher: createRancherProbe(options) };
}

export function createDeploymentApp(options: DeploymentAppOptions): DeploymentApp {
  const { config } = options;
  const logger = options.logger ?? createLogger({ name: 'cluster-deploy-stages' });
  const executor = options.executor ?? createCommandExecutor();
  const probes = options.probes ?? createDefaultProbes(config);
  const statePath = stateFilePath(config);
  const summaryPath = summaryFilePath(config);

  async function shareArtifacts(files: readonly string[]): Promise<Result<void>> {
    if (config.sharedDir === undefined) return Success(undefined);
    const copied = await copyArtifacts(files, config.sharedDir, logger);
    return copied.ok ? Success(undefined) : copied;
  }

  async function init(): Promise<Result<EnvironmentReport>> {
    logger.info({ workspace: config.workspaceDir }, 'Initializing deployment');
    logConfigSummary(config, logger);

    try {
      await mkdir(config.logDir, { recursive: true });
    } catch (error) {
      return Failure(`Cannot create log directory ${config.logDir}: ${extractErrorMessage(error)}`, {
        code: 'IO_ERROR',
        message: 'Log directory could not be created',
        resolution: `Check permissions on ${config.logDir} or set ANSIBLE_LOG_DIR`,
      });
    }

    return validateEnvironment(config, logger.child({ component: 'environment' }));
  }

  async function deploy(deployOptions: DeployOptions = {}): Promise<Result<DeploymentReport>> {
    const definitions = createStageDefinitions(config, probes, deployOptions.stages);
    if (!definitions.ok) return definitions;

    const initialized = await init();
    if (!initialized.ok) return initialized;

    const trackerLogger = logger.child({ component: 'tracker' });
    const created = await StageTracker.create(
      definitions.value.map((definition) => definition.name),
      buildRunConfig(config),
      statePath,
      { ...options.tracker, logger: trackerLogger },
    );
    if (!created.ok) return created;

    const contextOptions = {
      ...(deployOptions.signal !== undefined && { signal: deployOptions.signal }),
      ...(deployOptions.progress !== undefined && { progress: deployOptions.progress }),
    };
    const ctx = createRunContext(logger.child({ component: 'runner' }), contextOptions);

    const outcome = await runStages(
      created.value,
      definitions.value,
      {
        continueOnFailure: config.continueOnFailure,
        probeSettleMs: config.probeSettleMs,
        stageTimeoutMs: config.stageTimeoutMs,
        ...(options.echoOutput !== undefined && { echoOutput: options.echoOutput }),
      },
      { executor, ctx },
    );
    if (!outcome.ok) return outcome;

    const written = await writeSummary(outcome.value.run, summaryPath);
    if (!written.ok) return written;

    const shared = await shareArtifacts([
      ...definitions.value.map((definition) => definition.logFile),
      statePath,
      summaryPath,
    ]);
    if (!shared.ok) return shared;

    return Success({
      ...outcome.value,
      statePath,
      summaryPath,
      summary: written.value,
    });
  }

  async function summary(): Promise<Result<SummaryReport>> {
    const opened = await StageTracker.open(statePath);
    if (!opened.ok) return opened;

    const run = opened.value.snapshot();
    const written = await writeSummary(run, summaryPath);
    if (!written.ok) return written;

    const shared = await shareArtifacts([summaryPath]);
    if (!shared.ok) return shared;

    logger.info({ summaryPath }, 'Deployment summary generated');
    return Success({ run, summaryPath, summary: written.value });
  }

  return { config, init, deploy, summary };
}
