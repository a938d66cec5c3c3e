/**
 * Unit tests for artifact copying
 */

import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { copyArtifacts } from '@/lib/artifacts';
import { failureCode } from '@/types';
import { createMockLogger } from '../../__support__/utilities/mocks';
import { createTestTempDir, type TestTempDir } from '../../__support__/utilities/tmp-helpers';

describe('copyArtifacts', () => {
  let tempDir: TestTempDir;

  beforeEach(() => {
    tempDir = createTestTempDir();
  });

  afterEach(() => {
    tempDir.cleanup();
  });

  it('should copy existing files and skip missing ones', async () => {
    const state = join(tempDir.path, 'deployment_state.json');
    writeFileSync(state, '{}\n');
    const target = join(tempDir.path, 'shared', 'run');

    const result = await copyArtifacts(
      [state, join(tempDir.path, 'rke2_deployment.log')],
      target,
      createMockLogger(),
    );

    expect(result).toEqual({ ok: true, value: [join(target, 'deployment_state.json')] });
    expect(readFileSync(join(target, 'deployment_state.json'), 'utf-8')).toBe('{}\n');
  });

  it('should fail when the target directory cannot be created', async () => {
    const blocker = join(tempDir.path, 'blocker');
    writeFileSync(blocker, '');

    const result = await copyArtifacts([], join(blocker, 'shared'), createMockLogger());

    expect(failureCode(result)).toBe('IO_ERROR');
  });
});
