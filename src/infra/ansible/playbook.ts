/**
 * ansible-playbook command construction
 */

import { join } from 'node:path';

import { ANSIBLE } from '@/config/constants';
import type { CommandSpec } from '@/lib/command-log';

export interface PlaybookInvocation {
  /** Directory the playbook path is relative to; also the working directory */
  playbookRoot: string;
  /** Playbook path relative to playbookRoot */
  playbook: string;
  inventoryFile: string;
  /** `-v` .. `-vvvvv`, or empty */
  verbosity: string;
  /** Per-task connection timeout in seconds */
  taskTimeoutSec: number;
  extraVars?: Readonly<Record<string, string>>;
}

export function playbookPath(invocation: Pick<PlaybookInvocation, 'playbookRoot' | 'playbook'>): string {
  return join(invocation.playbookRoot, invocation.playbook);
}

/**
 * Build `ansible-playbook -i <inventory> <playbook> [<verbosity>] --timeout <sec> [-e k=v ...]`
 */
export function buildPlaybookCommand(invocation: PlaybookInvocation): CommandSpec {
  const args = ['-i', invocation.inventoryFile, invocation.playbook];
  if (invocation.verbosity !== '') args.push(invocation.verbosity);
  args.push('--timeout', String(invocation.taskTimeoutSec));

  for (const [key, value] of Object.entries(invocation.extraVars ?? {})) {
    args.push('-e', `${key}=${value}`);
  }

  return {
    command: 'ansible-playbook',
    args,
    cwd: invocation.playbookRoot,
    env: { ...ANSIBLE.ENVIRONMENT },
  };
}
