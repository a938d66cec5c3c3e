/**
 * Unit tests for the deployment summary
 */

import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { renderSummary, writeSummary } from '@/report/summary-reporter';
import type { DeploymentRun } from '@/tracker/types';
import { failureCode } from '@/types';
import { createTestTempDir, type TestTempDir } from '../../__support__/utilities/tmp-helpers';

const finishedRun: DeploymentRun = {
  id: 'test-run',
  startTime: '2024-05-01T10:00:00Z',
  endTime: '2024-05-01T10:05:00Z',
  exitCode: 1,
  status: 'failed',
  config: { rke2_version: 'v1.28.3+rke2r1', rancher_version: 'not_set' },
  stages: [
    {
      name: 'ssh-setup',
      status: 'success',
      startTime: '2024-05-01T10:00:01Z',
      endTime: '2024-05-01T10:00:30Z',
      exitCode: 0,
    },
    {
      name: 'rke2-deploy',
      status: 'failure',
      startTime: '2024-05-01T10:00:31Z',
      endTime: '2024-05-01T10:04:59Z',
      exitCode: 2,
    },
    { name: 'rancher-deploy', status: 'pending' },
  ],
};

const EXPECTED = [
  '====================================',
  'DEPLOYMENT SUMMARY',
  '====================================',
  'Deployment ID: test-run',
  'Start Time: 2024-05-01T10:00:00Z',
  'End Time: 2024-05-01T10:05:00Z',
  'Exit Code: 1',
  'Status: failed',
  '',
  'Configuration:',
  '- rke2_version: v1.28.3+rke2r1',
  '- rancher_version: not_set',
  '',
  'Stages:',
  '- ssh-setup: success (start: 2024-05-01T10:00:01Z, end: 2024-05-01T10:00:30Z, exit_code: 0)',
  '- rke2-deploy: failure (start: 2024-05-01T10:00:31Z, end: 2024-05-01T10:04:59Z, exit_code: 2)',
  '- rancher-deploy: pending (start: N/A, end: N/A, exit_code: N/A)',
  '',
  '====================================',
  'END DEPLOYMENT SUMMARY',
  '====================================',
  '',
].join('\n');

describe('renderSummary', () => {
  it('should render every field and stage in order', () => {
    expect(renderSummary(finishedRun)).toBe(EXPECTED);
  });

  it('should show N/A for a run that has not finished', () => {
    const running: DeploymentRun = {
      id: 'test-run',
      startTime: '2024-05-01T10:00:00Z',
      status: 'running',
      config: {},
      stages: [],
    };

    const lines = renderSummary(running).split('\n');

    expect(lines.slice(5, 8)).toEqual(['End Time: N/A', 'Exit Code: N/A', 'Status: running']);
    expect(lines.slice(8, 13)).toEqual(['', 'Configuration:', '', 'Stages:', '']);
  });
});

describe('writeSummary', () => {
  let tempDir: TestTempDir;

  beforeEach(() => {
    tempDir = createTestTempDir();
  });

  afterEach(() => {
    tempDir.cleanup();
  });

  it('should write the rendered summary, creating the directory', async () => {
    const path = join(tempDir.path, 'logs', 'deployment_summary.txt');

    const result = await writeSummary(finishedRun, path);

    expect(result).toEqual({ ok: true, value: EXPECTED });
    expect(readFileSync(path, 'utf-8')).toBe(EXPECTED);
  });

  it('should return an IO_ERROR when the target cannot be written', async () => {
    const blocker = join(tempDir.path, 'blocker');
    writeFileSync(blocker, '');

    const result = await writeSummary(finishedRun, join(blocker, 'deployment_summary.txt'));

    expect(failureCode(result)).toBe('IO_ERROR');
  });
});
