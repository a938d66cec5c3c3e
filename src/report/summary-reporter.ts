/**
 * Summary Reporter
 *
 * Renders a DeploymentRun as the plain-text deployment summary kept next to
 * the state document.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { extractErrorMessage } from '@/lib/errors';
import type { DeploymentRun, StageRecord } from '@/tracker/types';
import { Failure, Success, type Result } from '@/types';

const BANNER = '====================================';
const UNSET = 'N/A';

function orUnset(value: string | number | undefined): string {
  return value === undefined ? UNSET : String(value);
}

function stageLine(stage: StageRecord): string {
  return (
    `- ${stage.name}: ${stage.status} ` +
    `(start: ${orUnset(stage.startTime)}, end: ${orUnset(stage.endTime)}, ` +
    `exit_code: ${orUnset(stage.exitCode)})`
  );
}

export function renderSummary(run: DeploymentRun): string {
  const lines = [
    BANNER,
    'DEPLOYMENT SUMMARY',
    BANNER,
    `Deployment ID: ${run.id}`,
    `Start Time: ${run.startTime}`,
    `End Time: ${orUnset(run.endTime)}`,
    `Exit Code: ${orUnset(run.exitCode)}`,
    `Status: ${run.status}`,
    '',
    'Configuration:',
    ...Object.entries(run.config).map(([key, value]) => `- ${key}: ${value}`),
    '',
    'Stages:',
    ...run.stages.map(stageLine),
    '',
    BANNER,
    'END DEPLOYMENT SUMMARY',
    BANNER,
  ];
  return `${lines.join('\n')}\n`;
}

export async function writeSummary(run: DeploymentRun, path: string): Promise<Result<string>> {
  const text = renderSummary(run);
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, text, 'utf-8');
  } catch (error) {
    return Failure(`Failed to write summary ${path}: ${extractErrorMessage(error)}`, {
      code: 'IO_ERROR',
      message: 'Deployment summary could not be written',
      resolution: `Check that ${dirname(path)} is writable`,
      details: { path },
    });
  }
  return Success(text);
}
