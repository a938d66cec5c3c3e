/**
 * State document codec
 *
 * Converts a DeploymentRun to and from the on-disk JSON shape:
 *
 * ```json
 * {
 *   "deployment_id": "…",
 *   "start_time": "2024-05-01T10:00:00Z",
 *   "end_time": null,
 *   "exit_code": null,
 *   "status": "running",
 *   "config": { "rke2_version": "v1.28.3+rke2r1" },
 *   "stages": {
 *     "ssh-setup": { "status": "pending", "start_time": null, "end_time": null, "exit_code": null }
 *   }
 * }
 * ```
 *
 * Stage keys keep the declared pipeline order.
 */

import { z } from 'zod';

import { Failure, Success, type Result } from '@/types';
import type { DeploymentRun, StageRecord } from './types';

/** Object key that JSON parsing keeps but plain objects and zod records drop */
export const RESERVED_KEY = '__proto__';

const timestamp = z.string().min(1);

export const stageDocumentSchema = z
  .object({
    status: z.enum(['pending', 'running', 'success', 'failure']),
    start_time: timestamp.nullable(),
    end_time: timestamp.nullable(),
    exit_code: z.number().int().nullable(),
  })
  .strict();

export const stateDocumentSchema = z
  .object({
    deployment_id: z.string().min(1),
    start_time: timestamp,
    end_time: timestamp.nullable(),
    exit_code: z.number().int().nullable(),
    status: z.enum(['running', 'success', 'failed']),
    config: z.record(z.string()),
    stages: z.record(stageDocumentSchema),
  })
  .strict();

export type StageDocument = z.infer<typeof stageDocumentSchema>;
export type StateDocument = z.infer<typeof stateDocumentSchema>;

/**
 * Format a date as ISO-8601 UTC at second precision (2024-05-01T10:00:00Z)
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function toStageDocument(stage: StageRecord): StageDocument {
  return {
    status: stage.status,
    start_time: stage.startTime ?? null,
    end_time: stage.endTime ?? null,
    exit_code: stage.exitCode ?? null,
  };
}

export function toStateDocument(run: DeploymentRun): StateDocument {
  const stages: Record<string, StageDocument> = Object.fromEntries(
    run.stages.map((stage): [string, StageDocument] => [stage.name, toStageDocument(stage)]),
  );

  return {
    deployment_id: run.id,
    start_time: run.startTime,
    end_time: run.endTime ?? null,
    exit_code: run.exitCode ?? null,
    status: run.status,
    config: { ...run.config },
    stages,
  };
}

function fromStageDocument(name: string, doc: StageDocument): StageRecord {
  const stage: StageRecord = { name, status: doc.status };
  if (doc.start_time !== null) stage.startTime = doc.start_time;
  if (doc.end_time !== null) stage.endTime = doc.end_time;
  if (doc.exit_code !== null) stage.exitCode = doc.exit_code;
  return stage;
}

export function fromStateDocument(doc: StateDocument): DeploymentRun {
  const run: DeploymentRun = {
    id: doc.deployment_id,
    startTime: doc.start_time,
    status: doc.status,
    config: { ...doc.config },
    stages: Object.entries(doc.stages).map(([name, stage]) => fromStageDocument(name, stage)),
  };
  if (doc.end_time !== null) run.endTime = doc.end_time;
  if (doc.exit_code !== null) run.exitCode = doc.exit_code;
  return run;
}

/**
 * Serialize a run as pretty-printed JSON with a trailing newline
 */
export function serializeRun(run: DeploymentRun): string {
  return `${JSON.stringify(toStateDocument(run), null, 2)}\n`;
}

/**
 * Parse and validate a state document
 */
export function parseRun(text: string): Result<DeploymentRun> {
  let json: unknown;
  const reservedKeys: string[] = [];
  try {
    json = JSON.parse(text, (key, value: unknown) => {
      if (key === RESERVED_KEY) reservedKeys.push(key);
      return value;
    });
  } catch (error) {
    return Failure('State document is not valid JSON', {
      code: 'IO_ERROR',
      message: 'State document is not valid JSON',
      hint: 'The file may have been edited by hand or written by another tool',
      details: { error: error instanceof Error ? error.message : String(error) },
    });
  }

  if (reservedKeys.length > 0) {
    return Failure(`State document contains the reserved key "${RESERVED_KEY}"`, {
      code: 'IO_ERROR',
      message: 'State document failed validation',
      hint: `"${RESERVED_KEY}" is not a valid stage name or config key`,
      details: { key: RESERVED_KEY },
    });
  }

  const parsed = stateDocumentSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return Failure(`State document has an unexpected shape: ${issues.join('; ')}`, {
      code: 'IO_ERROR',
      message: 'State document failed validation',
      hint: 'The file does not match the deployment state format',
      details: { issues },
    });
  }

  return Success(fromStateDocument(parsed.data));
}
