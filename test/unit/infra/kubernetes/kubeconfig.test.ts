/**
 * Unit tests for kubeconfig discovery and rewriting
 */

import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { mkdirSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import yaml from 'js-yaml';

import {
  bastionServerUrl,
  findKubeconfig,
  loadBastionHost,
  rewriteKubeconfigServer,
} from '@/infra/kubernetes/kubeconfig';
import { failureCode } from '@/types';
import { createMockLogger } from '../../../__support__/utilities/mocks';
import { createTestTempDir, type TestTempDir } from '../../../__support__/utilities/tmp-helpers';

const KUBECONFIG = `apiVersion: v1
kind: Config
clusters:
  - name: default
    cluster:
      certificate-authority-data: dGVzdA==
      server: https://127.0.0.1:6443
contexts:
  - name: default
    context:
      cluster: default
      user: default
current-context: default
`;

describe('kubeconfig', () => {
  let tempDir: TestTempDir;

  beforeEach(() => {
    tempDir = createTestTempDir();
  });

  afterEach(() => {
    tempDir.cleanup();
  });

  describe('findKubeconfig', () => {
    it('should return the first candidate that is a regular file', async () => {
      const directory = join(tempDir.path, 'dir-config');
      mkdirSync(directory);
      const file = join(tempDir.path, 'rke2.yaml');
      writeFileSync(file, KUBECONFIG);

      const found = await findKubeconfig([join(tempDir.path, 'missing'), directory, file]);

      expect(found).toBe(file);
    });

    it('should warn and return undefined when nothing exists', async () => {
      const logger = createMockLogger();

      const found = await findKubeconfig([join(tempDir.path, 'missing')], logger);

      expect(found).toBeUndefined();
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('rewriteKubeconfigServer', () => {
    it('should point every cluster at the new server and keep other fields', async () => {
      const file = join(tempDir.path, 'config');
      writeFileSync(file, KUBECONFIG);

      const result = await rewriteKubeconfigServer(file, 'https://10.0.0.10:6443');

      expect(result).toEqual({ ok: true, value: 1 });
      expect(yaml.load(readFileSync(file, 'utf-8'))).toEqual({
        apiVersion: 'v1',
        kind: 'Config',
        clusters: [
          {
            name: 'default',
            cluster: {
              'certificate-authority-data': 'dGVzdA==',
              server: 'https://10.0.0.10:6443',
            },
          },
        ],
        contexts: [{ name: 'default', context: { cluster: 'default', user: 'default' } }],
        'current-context': 'default',
      });
    });

    it('should leave the file untouched when the server already matches', async () => {
      const file = join(tempDir.path, 'config');
      writeFileSync(file, KUBECONFIG);
      const before = statSync(file).mtimeMs;

      const result = await rewriteKubeconfigServer(file, 'https://127.0.0.1:6443');

      expect(result).toEqual({ ok: true, value: 0 });
      expect(readFileSync(file, 'utf-8')).toBe(KUBECONFIG);
      expect(statSync(file).mtimeMs).toBe(before);
    });

    it('should reject a kubeconfig without clusters', async () => {
      const file = join(tempDir.path, 'config');
      writeFileSync(file, 'apiVersion: v1\nclusters: []\n');

      const result = await rewriteKubeconfigServer(file, 'https://10.0.0.10:6443');

      expect(failureCode(result)).toBe('PROBE_FAILURE');
    });

    it('should fail for a missing file', async () => {
      const result = await rewriteKubeconfigServer(
        join(tempDir.path, 'missing'),
        'https://10.0.0.10:6443',
      );

      expect(failureCode(result)).toBe('PROBE_FAILURE');
    });
  });

  describe('loadBastionHost', () => {
    it('should read the bastion address from the inventory', async () => {
      const inventory = join(tempDir.path, 'inventory.yml');
      writeFileSync(
        inventory,
        'all:\n  children:\n    bastion:\n      hosts:\n        bastion-node:\n          ansible_host: 10.0.0.10\n',
      );

      expect(await loadBastionHost(inventory)).toEqual({ ok: true, value: '10.0.0.10' });
    });

    it('should fail as a probe failure when no bastion is found', async () => {
      const inventory = join(tempDir.path, 'inventory.yml');
      writeFileSync(inventory, 'all:\n  hosts:\n    node1: {}\n');

      expect(failureCode(await loadBastionHost(inventory))).toBe('PROBE_FAILURE');
    });

    it('should map an unreadable inventory to a probe failure', async () => {
      expect(failureCode(await loadBastionHost(join(tempDir.path, 'missing.yml')))).toBe(
        'PROBE_FAILURE',
      );
    });
  });

  it('should build the bastion API server URL', () => {
    expect(bastionServerUrl('10.0.0.10')).toBe('https://10.0.0.10:6443');
  });
});
