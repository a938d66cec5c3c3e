/**
 * Unit tests for ansible-playbook command construction
 */

import { describe, expect, it } from '@jest/globals';

import { buildPlaybookCommand, playbookPath } from '@/infra/ansible/playbook';

const base = {
  playbookRoot: '/infra/ansible/rke2/airgap',
  playbook: 'playbooks/setup/setup-ssh-keys.yml',
  inventoryFile: '/inventory.yml',
  verbosity: '-vv',
  taskTimeoutSec: 30,
};

describe('buildPlaybookCommand', () => {
  it('should run the relative playbook from the playbook root', () => {
    const spec = buildPlaybookCommand(base);

    expect(spec.command).toBe('ansible-playbook');
    expect(spec.cwd).toBe('/infra/ansible/rke2/airgap');
    expect(spec.args).toEqual([
      '-i',
      '/inventory.yml',
      'playbooks/setup/setup-ssh-keys.yml',
      '-vv',
      '--timeout',
      '30',
    ]);
  });

  it('should leave out the verbosity flag when empty', () => {
    const spec = buildPlaybookCommand({ ...base, verbosity: '' });

    expect(spec.args).toEqual([
      '-i',
      '/inventory.yml',
      'playbooks/setup/setup-ssh-keys.yml',
      '--timeout',
      '30',
    ]);
  });

  it('should pass each extra var as its own -e argument', () => {
    const spec = buildPlaybookCommand({
      ...base,
      extraVars: { rke2_version: 'v1.28.3+rke2r1', rancher_version: '2.8.2' },
    });

    expect(spec.args.slice(-4)).toEqual([
      '-e',
      'rke2_version=v1.28.3+rke2r1',
      '-e',
      'rancher_version=2.8.2',
    ]);
  });

  it('should disable host key checking in the environment', () => {
    expect(buildPlaybookCommand(base).env).toMatchObject({ ANSIBLE_HOST_KEY_CHECKING: 'False' });
  });
});

describe('playbookPath', () => {
  it('should join the root and the relative playbook', () => {
    expect(playbookPath(base)).toBe(
      '/infra/ansible/rke2/airgap/playbooks/setup/setup-ssh-keys.yml',
    );
  });
});
