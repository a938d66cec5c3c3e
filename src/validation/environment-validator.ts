/**
 * Environment Validator
 *
 * Pre-flight checks run before any stage: required files and directories,
 * inventory layout and SSH key permissions. Missing files or directories
 * fail validation; everything else is reported as a warning.
 */

import { stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Logger } from 'pino';

import type { DeploymentConfig } from '@/config';
import { countGroupHosts, loadInventory } from '@/infra/ansible/inventory';
import { Failure, Success, type Result } from '@/types';

export type CheckSeverity = 'error' | 'warning' | 'info';

export interface EnvironmentCheck {
  name: string;
  severity: CheckSeverity;
  message: string;
}

export interface EnvironmentReport {
  checks: EnvironmentCheck[];
  /** Host counts per inventory group; absent groups are omitted */
  inventoryGroups: Record<string, number>;
  sshKeyMode?: string;
}

export const INVENTORY_GROUPS = ['rke2_servers', 'rke2_agents'] as const;

const EXPECTED_KEY_MODE = 0o600;

type EntryKind = 'file' | 'directory';

async function entryKind(path: string): Promise<EntryKind | 'other' | undefined> {
  return stat(path).then(
    (stats) => (stats.isFile() ? 'file' : stats.isDirectory() ? 'directory' : 'other'),
    () => undefined,
  );
}

function unique(paths: readonly string[]): string[] {
  return [...new Set(paths)];
}

export function requiredFiles(config: DeploymentConfig): string[] {
  return unique([
    config.inventoryFile,
    config.groupVarsFile,
    config.sshPrivateKey,
    config.sshConfigFile,
  ]);
}

export function requiredDirectories(config: DeploymentConfig): string[] {
  return unique([
    config.workspaceDir,
    dirname(config.inventoryFile),
    dirname(config.groupVarsFile),
    dirname(config.sshPrivateKey),
  ]);
}

async function checkPresence(
  paths: readonly string[],
  kind: EntryKind,
  checks: EnvironmentCheck[],
): Promise<void> {
  for (const path of paths) {
    const found = await entryKind(path);
    if (found === kind) {
      checks.push({ name: `${kind}:${path}`, severity: 'info', message: `Found ${path}` });
    } else {
      checks.push({
        name: `${kind}:${path}`,
        severity: 'error',
        message:
          found === undefined
            ? `Required ${kind} not found: ${path}`
            : `Required ${kind} is not a ${kind}: ${path}`,
      });
    }
  }
}

/**
 * Validate the deployment environment described by `config`
 */
export async function validateEnvironment(
  config: DeploymentConfig,
  logger: Logger,
): Promise<Result<EnvironmentReport>> {
  const checks: EnvironmentCheck[] = [];
  const report: EnvironmentReport = { checks, inventoryGroups: {} };

  await checkPresence(requiredFiles(config), 'file', checks);
  await checkPresence(requiredDirectories(config), 'directory', checks);

  const inventoryMissing = checks.some(
    (check) => check.name === `file:${config.inventoryFile}` && check.severity === 'error',
  );
  const inventory = await loadInventory(config.inventoryFile);
  if (inventory.ok) {
    for (const group of INVENTORY_GROUPS) {
      const count = countGroupHosts(inventory.value, group);
      if (count === undefined) {
        checks.push({
          name: `group:${group}`,
          severity: 'warning',
          message: `${group} group not found`,
        });
      } else {
        report.inventoryGroups[group] = count;
        checks.push({
          name: `group:${group}`,
          severity: 'info',
          message: `${group} group found (${count} hosts)`,
        });
      }
    }
  } else if (!inventoryMissing) {
    checks.push({ name: 'inventory', severity: 'error', message: inventory.error });
  }

  const key = await stat(config.sshPrivateKey).then(
    (stats) => stats.mode & 0o777,
    () => undefined,
  );
  if (key !== undefined) {
    report.sshKeyMode = key.toString(8);
    if (key !== EXPECTED_KEY_MODE) {
      checks.push({
        name: 'ssh-key-mode',
        severity: 'warning',
        message: `SSH key has unusual permissions: ${report.sshKeyMode} (expected: 600)`,
      });
    }
  }

  for (const check of checks) {
    if (check.severity === 'error') logger.error({ check: check.name }, check.message);
    else if (check.severity === 'warning') logger.warn({ check: check.name }, check.message);
    else logger.debug({ check: check.name }, check.message);
  }

  const errors = checks.filter((check) => check.severity === 'error');
  if (errors.length > 0) {
    const messages = errors.map((check) => check.message);
    return Failure(`Environment validation failed: ${messages.join('; ')}`, {
      code: 'CONFIG_ERROR',
      message: 'Deployment environment is incomplete',
      hint: 'Bastion preparation may not have completed',
      resolution: 'Create the missing files and directories, or point the configuration at them',
      details: { errors: messages },
    });
  }

  logger.info({ inventoryGroups: report.inventoryGroups }, 'Deployment environment validated');
  return Success(report);
}
