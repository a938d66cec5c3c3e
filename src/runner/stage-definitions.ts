/**
 * Stage catalogue
 *
 * The known deployment stages in their default pipeline order. Each stage
 * runs one playbook from `<infraRepoPath>/ansible/rke2/airgap`.
 */

import { join } from 'node:path';

import { ANSIBLE, type DeploymentConfig } from '@/config';
import type { HealthProbe } from '@/infra/kubernetes/probes';
import { buildPlaybookCommand, playbookPath } from '@/infra/ansible/playbook';
import type { CommandSpec } from '@/lib/command-log';
import { Failure, Success, type Result } from '@/types';

export interface StageDefinition {
  name: string;
  description: string;
  command: CommandSpec;
  /** Output capture file */
  logFile: string;
  /** Files that must exist before the command is started */
  requiredFiles: readonly string[];
  /** Read-only check run after a partial failure; its presence makes the stage reclassifiable */
  healthProbe?: HealthProbe;
}

type ProbeKind = 'rke2' | 'rancher';
type VersionKey = 'rke2Version' | 'rancherVersion';

interface CatalogueEntry {
  name: string;
  description: string;
  playbook: string;
  logName: string;
  versionVar: { name: string; key: VersionKey };
  probe?: ProbeKind;
}

export const STAGE_CATALOGUE: readonly CatalogueEntry[] = [
  {
    name: 'ssh-setup',
    description: 'Distribute SSH keys to the cluster nodes',
    playbook: 'playbooks/setup/setup-ssh-keys.yml',
    logName: 'ssh_setup',
    versionVar: { name: 'rke2_version', key: 'rke2Version' },
  },
  {
    name: 'rke2-deploy',
    description: 'Install RKE2 from the airgap tarball',
    playbook: 'playbooks/deploy/rke2-tarball-playbook.yml',
    logName: 'rke2_deployment',
    versionVar: { name: 'rke2_version', key: 'rke2Version' },
    probe: 'rke2',
  },
  {
    name: 'kubectl-setup',
    description: 'Configure kubectl access through the bastion',
    playbook: 'playbooks/setup/setup-kubectl-access.yml',
    logName: 'kubectl_access',
    versionVar: { name: 'rke2_version', key: 'rke2Version' },
  },
  {
    name: 'rancher-deploy',
    description: 'Deploy Rancher onto the cluster',
    playbook: 'playbooks/deploy/rancher-deployment.yml',
    logName: 'rancher_deployment',
    versionVar: { name: 'rancher_version', key: 'rancherVersion' },
    probe: 'rancher',
  },
];

export const DEFAULT_STAGE_ORDER: readonly string[] = STAGE_CATALOGUE.map((entry) => entry.name);

export type StageProbes = Partial<Record<ProbeKind, HealthProbe>>;

function unknownStages(names: readonly string[]): Result<never> {
  return Failure(`Unknown stage${names.length > 1 ? 's' : ''}: ${names.join(', ')}`, {
    code: 'NOT_FOUND',
    message: 'Custom stage list names stages that do not exist',
    resolution: `Available stages: ${DEFAULT_STAGE_ORDER.join(', ')}`,
    details: { unknown: [...names], available: [...DEFAULT_STAGE_ORDER] },
  });
}

function toDefinition(
  entry: CatalogueEntry,
  config: DeploymentConfig,
  probes: StageProbes,
): StageDefinition {
  const playbookRoot = join(config.infraRepoPath, ANSIBLE.PLAYBOOK_ROOT);
  const version = config[entry.versionVar.key];
  const extraVars: Record<string, string> = {};
  if (version !== undefined) extraVars[entry.versionVar.name] = version;

  const invocation = {
    playbookRoot,
    playbook: entry.playbook,
    inventoryFile: config.inventoryFile,
    verbosity: config.verbosity,
    taskTimeoutSec: config.taskTimeoutSec,
    extraVars,
  };

  const definition: StageDefinition = {
    name: entry.name,
    description: entry.description,
    command: buildPlaybookCommand(invocation),
    logFile: join(config.logDir, `${entry.logName}.log`),
    requiredFiles: [playbookPath(invocation)],
  };

  const probe = entry.probe === undefined ? undefined : probes[entry.probe];
  if (probe !== undefined) definition.healthProbe = probe;
  return definition;
}

/**
 * Resolve stage names (default: the full catalogue order) to runnable
 * definitions. Any unknown name rejects the whole list.
 */
export function createStageDefinitions(
  config: DeploymentConfig,
  probes: StageProbes = {},
  stageNames: readonly string[] = DEFAULT_STAGE_ORDER,
): Result<StageDefinition[]> {
  const unknown = stageNames.filter(
    (name) => !STAGE_CATALOGUE.some((entry) => entry.name === name),
  );
  if (unknown.length > 0) return unknownStages(unknown);

  const definitions: StageDefinition[] = [];
  for (const name of stageNames) {
    const entry = STAGE_CATALOGUE.find((candidate) => candidate.name === name);
    if (entry) definitions.push(toDefinition(entry, config, probes));
  }
  return Success(definitions);
}
