/**
 * cluster-deploy-stages public API
 *
 * @example
 * ```typescript
 * import { createDeploymentApp, loadConfig } from 'cluster-deploy-stages';
 *
 * const loaded = loadConfig();
 * if (loaded.ok) {
 *   const app = createDeploymentApp({ config: loaded.value.config });
 *   const result = await app.deploy({ stages: ['rke2-deploy', 'kubectl-setup'] });
 * }
 * ```
 */

// Application
export {
  createDefaultProbes,
  createDeploymentApp,
  type DeploymentApp,
  type DeploymentAppOptions,
  type DeploymentReport,
  type DeployOptions,
  type SummaryReport,
} from './app';

// Configuration
export {
  buildRunConfig,
  deploymentConfigSchema,
  ENV_VARS,
  loadConfig,
  stateFilePath,
  summaryFilePath,
  type ConfigOverrides,
  type DeploymentConfig,
  type LoadConfigOptions,
  type LoadedConfig,
} from './config';

// Tracking
export {
  StageTracker,
  parseRun,
  serializeRun,
  type DeploymentRun,
  type RunStatus,
  type StageRecord,
  type StageStatus,
  type StageTrackerOptions,
} from './tracker';

// Running
export {
  createStageDefinitions,
  DEFAULT_STAGE_ORDER,
  runStages,
  STAGE_CATALOGUE,
  type RunnerOptions,
  type RunOutcome,
  type StageDefinition,
  type StageProbes,
} from './runner';
export {
  createCommandExecutor,
  type CommandExecutor,
  type CommandOutcome,
  type CommandRunOptions,
} from './infra/process/command-executor';
export { formatCommandForLog, type CommandSpec } from './lib/command-log';

// Probes
export {
  createRancherProbe,
  createRke2Probe,
  type HealthProbe,
  type ProbeResult,
} from './infra/kubernetes';

// Reporting
export { renderSummary, writeSummary } from './report';

// Validation
export { validateEnvironment, type EnvironmentReport } from './validation/environment-validator';

// Core
export { createRunContext } from './core';
export { createLogger } from './lib/logger';
export { Failure, Success, isFailure, failureCode } from './types';
export type { ErrorCode, ErrorGuidance, Result, RunContext, ProgressReporter } from './types';
