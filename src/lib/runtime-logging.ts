/**
 * Shared Runtime Logging - consistent start/finish/failure output
 *
 * Every CLI mode logs through these helpers: a structured pino line for the
 * log stream and, unless quiet, a short human banner on stderr.
 */

import type { Logger } from 'pino';

/**
 * Run startup information
 */
export interface RunStartInfo {
  /** Mode being executed (init, deploy, deploy-custom, summary) */
  mode: string;
  version: string;
  workspace: string;
  logDir: string;
  logLevel: string;
  /** Stages to run, for deploy modes */
  stages?: readonly string[];
  /** Env file the configuration was read from */
  envFile?: string;
}

/**
 * Run completion information
 */
export interface RunOutcomeInfo {
  mode: string;
  exitCode: number;
  durationMs: number;
  failedStages?: readonly string[];
  summaryPath?: string;
}

export function logRunStart(info: RunStartInfo, logger: Logger, quiet = false): void {
  logger.info(
    {
      mode: info.mode,
      version: info.version,
      config: {
        workspace: info.workspace,
        logDir: info.logDir,
        logLevel: info.logLevel,
        envFile: info.envFile,
      },
      stages: info.stages,
    },
    `Starting ${info.mode}`,
  );

  if (!quiet) {
    console.error(`🚀 cluster-deploy-stages ${info.mode}`);
    console.error(`📦 Version: ${info.version}`);
    console.error(`🏠 Workspace: ${info.workspace}`);
    console.error(`📁 Logs: ${info.logDir}`);
    if (info.envFile) {
      console.error(`📄 Env file: ${info.envFile}`);
    }
    if (info.stages && info.stages.length > 0) {
      console.error(`🧩 Stages: ${info.stages.join(', ')}`);
    }
  }
}

export function logRunOutcome(info: RunOutcomeInfo, logger: Logger, quiet = false): void {
  const fields = {
    mode: info.mode,
    exitCode: info.exitCode,
    durationMs: info.durationMs,
    failedStages: info.failedStages,
    summaryPath: info.summaryPath,
  };

  if (info.exitCode === 0) {
    logger.info(fields, `Completed ${info.mode}`);
  } else {
    logger.error(fields, `Failed ${info.mode}`);
  }

  if (!quiet) {
    if (info.exitCode === 0) {
      console.error(`✅ ${info.mode} completed`);
    } else if (info.failedStages && info.failedStages.length > 0) {
      console.error(`❌ Failed stages: ${info.failedStages.join(', ')}`);
    } else {
      console.error(`❌ ${info.mode} failed with exit code ${info.exitCode}`);
    }
    if (info.summaryPath) {
      console.error(`📝 Summary: ${info.summaryPath}`);
    }
  }
}

/**
 * Log a fatal error that stopped a mode before it could finish
 */
export function logRunFailure(mode: string, error: string, logger: Logger, quiet = false): void {
  logger.error({ mode, error }, `Failed ${mode}`);

  if (!quiet) {
    console.error(`❌ ${mode} failed`);
  }
}

/**
 * Abort `controller` on SIGINT/SIGTERM so the running command is stopped and
 * no further stage starts; a second signal exits immediately.
 */
export function installAbortHandlers(
  controller: AbortController,
  logger: Logger,
  quiet = false,
): void {
  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      logger.error({ signal }, 'Second signal received, exiting');
      process.exit(130);
    }
    logger.warn({ signal }, 'Signal received, aborting run');
    if (!quiet) {
      console.error(`\n🛑 Received ${signal}, stopping after the current command...`);
    }
    controller.abort();
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  process.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    console.error('❌ Uncaught exception:', error.message);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.fatal({ reason }, 'Unhandled rejection');
    console.error('❌ Unhandled rejection:', reason);
    process.exit(1);
  });
}
