#!/usr/bin/env node
/**
 * cluster-deploy-stages CLI
 * Runs, validates and summarizes staged Ansible deployments
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { argv } from 'node:process';
import type { Logger } from 'pino';
import { z } from 'zod';

import { createDeploymentApp, type DeploymentApp } from '@/app';
import { loadConfig, type ConfigOverrides } from '@/config';
import { createLogger } from '@/lib/logger';
import {
  installAbortHandlers,
  logRunFailure,
  logRunOutcome,
  logRunStart,
} from '@/lib/runtime-logging';
import { STAGE_CATALOGUE } from '@/runner/stage-definitions';
import { EXIT_CODES } from '@/config/constants';
import { failureFromError, provideContextualGuidance } from './guidance';

const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8')));

const cliOptionsSchema = z.object({
  logLevel: z.string().optional(),
  workspace: z.string().optional(),
  logDir: z.string().optional(),
  inventory: z.string().optional(),
  infraRepo: z.string().optional(),
  sharedDir: z.string().optional(),
  rke2Version: z.string().optional(),
  rancherVersion: z.string().optional(),
  continueOnFailure: z.boolean().optional(),
  quiet: z.boolean().optional(),
  dev: z.boolean().optional(),
});

type CliOptions = z.infer<typeof cliOptionsSchema>;
type Mode = 'init' | 'deploy' | 'deploy-custom' | 'summary';

function toOverrides(options: CliOptions): Partial<ConfigOverrides> {
  const overrides: Partial<ConfigOverrides> = {};
  if (options.workspace !== undefined) overrides.workspaceDir = options.workspace;
  if (options.logDir !== undefined) overrides.logDir = options.logDir;
  if (options.inventory !== undefined) overrides.inventoryFile = options.inventory;
  if (options.infraRepo !== undefined) overrides.infraRepoPath = options.infraRepo;
  if (options.sharedDir !== undefined) overrides.sharedDir = options.sharedDir;
  if (options.rke2Version !== undefined) overrides.rke2Version = options.rke2Version;
  if (options.rancherVersion !== undefined) overrides.rancherVersion = options.rancherVersion;
  if (options.continueOnFailure !== undefined) {
    overrides.continueOnFailure = options.continueOnFailure;
  }
  return overrides;
}

async function runInit(app: DeploymentApp, options: CliOptions): Promise<number> {
  const quiet = options.quiet === true;
  const result = await app.init();
  if (!result.ok) {
    provideContextualGuidance(result, options);
    return EXIT_CODES.FAILURE;
  }

  if (!quiet) {
    console.error('\n🔍 Environment checks:');
    for (const check of result.value.checks) {
      if (check.severity === 'warning') console.error(`  ⚠️  ${check.message}`);
      else console.error(`  ✓ ${check.message}`);
    }
  }
  return EXIT_CODES.SUCCESS;
}

async function runDeploy(
  app: DeploymentApp,
  stages: readonly string[] | undefined,
  options: CliOptions,
  logger: Logger,
  startedAt: number,
  mode: Mode,
): Promise<number> {
  const quiet = options.quiet === true;
  const controller = new AbortController();
  installAbortHandlers(controller, logger, quiet);

  const result = await app.deploy({
    ...(stages !== undefined && { stages }),
    signal: controller.signal,
    progress: async (message) => {
      if (!quiet) console.error(`\n▶️  ${message}`);
    },
  });

  if (!result.ok) {
    logRunFailure(mode, result.error, logger, quiet);
    provideContextualGuidance(result, options);
    return EXIT_CODES.FAILURE;
  }

  process.stdout.write(result.value.summary);
  logRunOutcome(
    {
      mode,
      exitCode: result.value.exitCode,
      durationMs: Date.now() - startedAt,
      failedStages: result.value.failedStages,
      summaryPath: result.value.summaryPath,
    },
    logger,
    quiet,
  );
  return result.value.exitCode;
}

async function runSummary(app: DeploymentApp, options: CliOptions): Promise<number> {
  const result = await app.summary();
  if (!result.ok) {
    provideContextualGuidance(result, options);
    return EXIT_CODES.FAILURE;
  }
  process.stdout.write(result.value.summary);
  return EXIT_CODES.SUCCESS;
}

async function execute(
  mode: Mode,
  stages: readonly string[] | undefined,
  program: Command,
): Promise<number> {
  const startedAt = Date.now();
  const parsedOptions = cliOptionsSchema.safeParse(program.opts());
  if (!parsedOptions.success) {
    console.error('❌ Invalid command-line options');
    parsedOptions.error.issues.forEach((issue) =>
      console.error(`  • ${issue.path.join('.')}: ${issue.message}`),
    );
    return EXIT_CODES.FAILURE;
  }
  const options = parsedOptions.data;
  const quiet = options.quiet === true;
  const logger = createLogger({
    name: 'cli',
    ...(options.logLevel !== undefined && { level: options.logLevel }),
  });

  const loaded = loadConfig({ overrides: toOverrides(options), logger });
  if (!loaded.ok) {
    logRunFailure(mode, loaded.error, logger, quiet);
    provideContextualGuidance(loaded, options);
    return EXIT_CODES.FAILURE;
  }
  const { config, envFile } = loaded.value;

  logRunStart(
    {
      mode,
      version: packageJson.version,
      workspace: config.workspaceDir,
      logDir: config.logDir,
      logLevel: options.logLevel ?? process.env.LOG_LEVEL ?? 'info',
      ...(stages !== undefined && { stages }),
      ...(envFile !== undefined && { envFile }),
    },
    logger,
    quiet,
  );

  const app = createDeploymentApp({ config, logger, echoOutput: !quiet });

  if (mode === 'deploy' || mode === 'deploy-custom') {
    return runDeploy(app, stages, options, logger, startedAt, mode);
  }

  const code = mode === 'init' ? await runInit(app, options) : await runSummary(app, options);
  logRunOutcome({ mode, exitCode: code, durationMs: Date.now() - startedAt }, logger, quiet);
  return code;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('cluster-deploy-stages')
    .description('Run and track the staged Ansible deployment of an RKE2 test cluster')
    .version(packageJson.version)
    .option('--log-level <level>', 'logging level: debug, info, warn, error (default: info)')
    .option('--workspace <path>', 'workspace directory holding ansible_paths.env')
    .option('--log-dir <path>', 'directory for stage logs, state and summary')
    .option('--inventory <path>', 'Ansible inventory file')
    .option('--infra-repo <path>', 'infrastructure repository containing the playbooks')
    .option('--shared-dir <path>', 'copy logs, state and summary here after the run')
    .option('--rke2-version <version>', 'RKE2 version passed to the playbooks')
    .option('--rancher-version <version>', 'Rancher version passed to the playbooks')
    .option('--continue-on-failure', 'keep running stages after a failure')
    .option(
      '--no-continue-on-failure',
      'stop at the first failed stage, overriding CONTINUE_ON_FAILURE',
    )
    .option('--quiet', 'suppress banners and playbook output on the console')
    .option('--dev', 'show error details and stack traces')
    .addHelpText(
      'after',
      `

Examples:
  $ cluster-deploy-stages init                                Validate the deployment environment
  $ cluster-deploy-stages deploy                              Run every stage
  $ cluster-deploy-stages deploy-custom rke2-deploy kubectl-setup
  $ cluster-deploy-stages summary                             Rewrite the summary from the state file

Environment Variables:
  ANSIBLE_WORKSPACE, ANSIBLE_INVENTORY_FILE, ANSIBLE_GROUP_VARS_FILE, QA_INFRA_REPO_PATH,
  SSH_CONFIG_FILE, SSH_PRIVATE_KEY, SSH_PUBLIC_KEY, ANSIBLE_LOG_DIR, ANSIBLE_TIMEOUT,
  ANSIBLE_VERBOSITY, STAGE_TIMEOUT_MS, PROBE_SETTLE_MS, CONTINUE_ON_FAILURE,
  SHARED_ARTIFACT_DIR, KUBECONFIG_PATHS, REWRITE_KUBECONFIG_SERVER, RKE2_VERSION,
  RANCHER_VERSION, HOSTNAME_PREFIX, RANCHER_HOSTNAME, LOG_LEVEL
`,
    );

  const setExitCode = (code: number): void => {
    process.exitCode = code;
  };

  program
    .command('init')
    .description('validate files, directories, inventory and SSH key')
    .action(async () => setExitCode(await execute('init', undefined, program)));

  program
    .command('deploy', { isDefault: true })
    .description('run every stage in catalogue order')
    .action(async () => setExitCode(await execute('deploy', undefined, program)));

  program
    .command('deploy-custom')
    .description('run the named stages, in the given order')
    .argument('<stages...>', 'stage names')
    .action(async (stages: string[]) =>
      setExitCode(await execute('deploy-custom', stages, program)),
    );

  program
    .command('summary')
    .description('render the summary from the existing state file')
    .action(async () => setExitCode(await execute('summary', undefined, program)));

  program
    .command('stages')
    .description('list the known stages')
    .action(() => {
      for (const stage of STAGE_CATALOGUE) {
        const reclassifiable = stage.probe ? ' (reclassifiable)' : '';
        console.log(`${stage.name.padEnd(16)} ${stage.description}${reclassifiable}`);
      }
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(argv)
    .catch((error: unknown) => {
      provideContextualGuidance(failureFromError(error));
      process.exitCode = EXIT_CODES.FAILURE;
    });
}
