/**
 * Deployment Configuration
 *
 * Loads every setting once, at process start. Sources in increasing
 * precedence: built-in defaults, the workspace env file
 * (`<workspace>/ansible_paths.env`), the process environment, explicit
 * overrides (CLI flags). Nothing re-reads configuration mid-run.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseEnvFile } from 'dotenv';
import type { Logger } from 'pino';
import { z } from 'zod';

import { extractErrorMessage } from '@/lib/errors';
import { Failure, Success, type Result } from '@/types';
import { ANSIBLE, DEFAULT_PATHS, DEFAULT_TIMEOUTS, NOT_SET } from './constants';

export * from './constants';

// ===== SCHEMA =====

const booleanFlag = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  z
    .union([z.boolean(), z.enum(['true', 'false', '1', '0', 'yes', 'no'])])
    .transform((value) => value === true || value === 'true' || value === '1' || value === 'yes'),
);

const path = z.string().min(1);

export const deploymentConfigSchema = z
  .object({
    workspaceDir: path.default(DEFAULT_PATHS.workspace),
    inventoryFile: path.default(DEFAULT_PATHS.inventoryFile),
    groupVarsFile: path.default(DEFAULT_PATHS.groupVarsFile),
    infraRepoPath: path.default(DEFAULT_PATHS.infraRepoPath),
    sshConfigFile: path.default(DEFAULT_PATHS.sshConfigFile),
    sshPrivateKey: path.default(DEFAULT_PATHS.sshPrivateKey),
    sshPublicKey: path.default(DEFAULT_PATHS.sshPublicKey),
    logDir: path.default(DEFAULT_PATHS.logDir),

    /** ansible-playbook --timeout, in seconds */
    taskTimeoutSec: z.coerce.number().int().positive().default(ANSIBLE.DEFAULT_TASK_TIMEOUT),
    /** ansible-playbook verbosity flag (-v .. -vvvvv), empty for none */
    verbosity: z
      .string()
      .regex(/^(-v{1,5})?$/, 'Verbosity must be empty or -v through -vvvvv')
      .default(ANSIBLE.DEFAULT_VERBOSITY),
    stageTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.stage),
    probeSettleMs: z.coerce.number().int().nonnegative().default(DEFAULT_TIMEOUTS.probeSettle),
    continueOnFailure: booleanFlag.default(false),
    /** Copy logs, state and summary here after the run */
    sharedDir: path.optional(),
    kubeconfigPaths: z.array(path).min(1).default([...DEFAULT_PATHS.kubeconfigSearch]),
    /** Rewrite kubeconfig server URLs to the bastion before probing */
    rewriteKubeconfigServer: booleanFlag.default(true),

    rke2Version: z.string().min(1).optional(),
    rancherVersion: z.string().min(1).optional(),
    hostnamePrefix: z.string().min(1).optional(),
    rancherHostname: z.string().min(1).optional(),
  })
  .strict();

export type DeploymentConfig = z.infer<typeof deploymentConfigSchema>;
export type ConfigOverrides = z.input<typeof deploymentConfigSchema>;

/**
 * Environment variable backing each configuration key
 */
export const ENV_VARS = {
  workspaceDir: 'ANSIBLE_WORKSPACE',
  inventoryFile: 'ANSIBLE_INVENTORY_FILE',
  groupVarsFile: 'ANSIBLE_GROUP_VARS_FILE',
  infraRepoPath: 'QA_INFRA_REPO_PATH',
  sshConfigFile: 'SSH_CONFIG_FILE',
  sshPrivateKey: 'SSH_PRIVATE_KEY',
  sshPublicKey: 'SSH_PUBLIC_KEY',
  logDir: 'ANSIBLE_LOG_DIR',
  taskTimeoutSec: 'ANSIBLE_TIMEOUT',
  verbosity: 'ANSIBLE_VERBOSITY',
  stageTimeoutMs: 'STAGE_TIMEOUT_MS',
  probeSettleMs: 'PROBE_SETTLE_MS',
  continueOnFailure: 'CONTINUE_ON_FAILURE',
  sharedDir: 'SHARED_ARTIFACT_DIR',
  kubeconfigPaths: 'KUBECONFIG_PATHS',
  rewriteKubeconfigServer: 'REWRITE_KUBECONFIG_SERVER',
  rke2Version: 'RKE2_VERSION',
  rancherVersion: 'RANCHER_VERSION',
  hostnamePrefix: 'HOSTNAME_PREFIX',
  rancherHostname: 'RANCHER_HOSTNAME',
} as const satisfies Record<keyof DeploymentConfig, string>;

type ConfigKey = keyof typeof ENV_VARS;

function isConfigKey(key: string): key is ConfigKey {
  return key in ENV_VARS;
}

const CONFIG_KEYS: readonly ConfigKey[] = Object.keys(ENV_VARS).filter(isConfigKey);

// ===== LOADING =====

export interface LoadConfigOptions {
  /** Process environment; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence values, typically from CLI flags */
  overrides?: Partial<ConfigOverrides>;
  logger?: Logger;
}

export interface LoadedConfig {
  config: DeploymentConfig;
  /** Env file that was read, if one existed */
  envFile?: string;
}

function readEnvFile(file: string): Result<Record<string, string>> {
  try {
    return Success(parseEnvFile(readFileSync(file, 'utf-8')));
  } catch (error) {
    return Failure(`Cannot read env file ${file}: ${extractErrorMessage(error)}`, {
      code: 'CONFIG_ERROR',
      message: 'Workspace env file is unreadable',
      resolution: `Check permissions on ${file}`,
    });
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Load and validate the deployment configuration.
 */
export function loadConfig(options: LoadConfigOptions = {}): Result<LoadedConfig> {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  const workspaceDir =
    overrides.workspaceDir ?? nonEmpty(env[ENV_VARS.workspaceDir]) ?? DEFAULT_PATHS.workspace;
  const envFile = join(workspaceDir, DEFAULT_PATHS.envFileName);

  let fileVars: Record<string, string> = {};
  const hasEnvFile = existsSync(envFile);
  if (hasEnvFile) {
    const parsed = readEnvFile(envFile);
    if (!parsed.ok) return parsed;
    fileVars = parsed.value;
    options.logger?.info({ envFile }, 'Loaded workspace env file');
  } else {
    options.logger?.warn({ envFile }, 'Workspace env file not found, using defaults');
  }

  const raw: Record<string, unknown> = {};
  for (const key of CONFIG_KEYS) {
    const variable = ENV_VARS[key];
    const fromEnv = nonEmpty(env[variable]) ?? nonEmpty(fileVars[variable]);
    if (fromEnv === undefined) continue;
    raw[key] = key === 'kubeconfigPaths' ? fromEnv.split(':').filter(Boolean) : fromEnv;
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[key] = value;
  }
  raw.workspaceDir = workspaceDir;

  const parsed = deploymentConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const key = issue.path.join('.');
      const variable = isConfigKey(key) ? ENV_VARS[key] : key;
      return `${variable}: ${issue.message}`;
    });
    return Failure(`Invalid configuration: ${issues.join('; ')}`, {
      code: 'CONFIG_ERROR',
      message: 'Configuration validation failed',
      hint: 'A value from the environment, env file or CLI flags is malformed',
      resolution: 'Fix the listed variables and re-run',
      details: { issues },
    });
  }

  const loaded: LoadedConfig = { config: parsed.data };
  if (hasEnvFile) loaded.envFile = envFile;
  return Success(loaded);
}

// ===== DERIVED VALUES =====

export function stateFilePath(config: DeploymentConfig): string {
  return join(config.logDir, DEFAULT_PATHS.stateFileName);
}

export function summaryFilePath(config: DeploymentConfig): string {
  return join(config.logDir, DEFAULT_PATHS.summaryFileName);
}

/**
 * The config mapping recorded in the deployment state document
 */
export function buildRunConfig(config: DeploymentConfig): Record<string, string> {
  return {
    rke2_version: config.rke2Version ?? NOT_SET,
    rancher_version: config.rancherVersion ?? NOT_SET,
    hostname_prefix: config.hostnamePrefix ?? NOT_SET,
    rancher_hostname: config.rancherHostname ?? NOT_SET,
  };
}

/**
 * Log the effective configuration at debug level
 */
export function logConfigSummary(config: DeploymentConfig, logger: Logger): void {
  logger.debug(
    {
      workspaceDir: config.workspaceDir,
      inventoryFile: config.inventoryFile,
      infraRepoPath: config.infraRepoPath,
      logDir: config.logDir,
      taskTimeoutSec: config.taskTimeoutSec,
      stageTimeoutMs: config.stageTimeoutMs,
      continueOnFailure: config.continueOnFailure,
      sharedDir: config.sharedDir,
    },
    'Effective deployment configuration',
  );
}
