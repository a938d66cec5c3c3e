/**
 * Stage Tracker
 *
 * Owns the DeploymentRun document for one deployment invocation. Every
 * mutation computes the next document, persists it atomically and only then
 * replaces the in-memory copy, so a failed write changes nothing.
 *
 * @example
 * ```typescript
 * const created = await StageTracker.create(['ssh-setup', 'rke2-deploy'], config, statePath);
 * if (!created.ok) return created;
 * const tracker = created.value;
 *
 * await tracker.markStageStart('ssh-setup');
 * await tracker.markStageResult('ssh-setup', true, 0);
 * await tracker.finalize(0);
 * ```
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';

import { Success, type Result } from '@/types';
import { TrackerErrors } from './errors';
import { formatTimestamp, RESERVED_KEY } from './state-document';
import { readStateFile, writeStateFile } from './state-store';
import { findStage, isFinalized, type DeploymentRun, type StageRecord, type StageStatus } from './types';

export interface StageTrackerOptions {
  /** Clock used for every timestamp */
  now?: () => Date;
  /** Deployment id generator */
  generateId?: () => string;
  logger?: Logger;
}

function copyRun(run: DeploymentRun): DeploymentRun {
  return {
    ...run,
    config: { ...run.config },
    stages: run.stages.map((stage) => ({ ...stage })),
  };
}

function validateStageNames(names: readonly string[]): Result<void> {
  if (names.length === 0) {
    return TrackerErrors.invalidStageNames('at least one stage is required', names);
  }
  const blank = names.find((name) => name.trim() === '');
  if (blank !== undefined) {
    return TrackerErrors.invalidStageNames('stage names must not be blank', names);
  }
  // Integer-like keys would be reordered inside the JSON document
  const numeric = names.find((name) => /^\d+$/.test(name));
  if (numeric !== undefined) {
    return TrackerErrors.invalidStageNames(`stage name "${numeric}" is purely numeric`, names);
  }
  if (names.includes(RESERVED_KEY)) {
    return TrackerErrors.invalidStageNames(`stage name "${RESERVED_KEY}" is reserved`, names);
  }
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      return TrackerErrors.invalidStageNames(`stage "${name}" is declared twice`, names);
    }
    seen.add(name);
  }
  return Success(undefined);
}

export class StageTracker {
  private run: DeploymentRun;
  private readonly now: () => Date;
  private readonly logger: Logger | undefined;

  private constructor(
    readonly statePath: string,
    run: DeploymentRun,
    options: StageTrackerOptions,
  ) {
    this.run = run;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger;
  }

  /**
   * Build a new run with every stage pending and persist it.
   */
  static async create(
    stageNames: readonly string[],
    config: Readonly<Record<string, string>>,
    statePath: string,
    options: StageTrackerOptions = {},
  ): Promise<Result<StageTracker>> {
    const valid = validateStageNames(stageNames);
    if (!valid.ok) return valid;
    if (Object.hasOwn(config, RESERVED_KEY)) {
      return TrackerErrors.reservedConfigKey(RESERVED_KEY);
    }

    const now = options.now ?? (() => new Date());
    const run: DeploymentRun = {
      id: (options.generateId ?? randomUUID)(),
      startTime: formatTimestamp(now()),
      status: 'running',
      config: { ...config },
      stages: stageNames.map((name): StageRecord => ({ name, status: 'pending' })),
    };

    const written = await writeStateFile(statePath, run);
    if (!written.ok) return written;

    options.logger?.info(
      { deploymentId: run.id, statePath, stages: stageNames },
      'Deployment state file created',
    );
    return Success(new StageTracker(statePath, run, options));
  }

  /**
   * Load an existing state file.
   */
  static async open(
    statePath: string,
    options: StageTrackerOptions = {},
  ): Promise<Result<StageTracker>> {
    const loaded = await readStateFile(statePath);
    if (!loaded.ok) return loaded;
    return Success(new StageTracker(statePath, loaded.value, options));
  }

  /** Copy of the current run */
  snapshot(): DeploymentRun {
    return copyRun(this.run);
  }

  get stageNames(): string[] {
    return this.run.stages.map((stage) => stage.name);
  }

  async markStageStart(name: string): Promise<Result<DeploymentRun>> {
    return this.transition(name, 'start', 'pending', (stage, timestamp) => ({
      ...stage,
      status: 'running',
      startTime: timestamp,
    }));
  }

  async markStageResult(
    name: string,
    success: boolean,
    exitCode: number,
  ): Promise<Result<DeploymentRun>> {
    if (!Number.isInteger(exitCode)) return TrackerErrors.invalidExitCode(exitCode);

    return this.transition(name, 'record result for', 'running', (stage, timestamp) => ({
      ...stage,
      status: success ? 'success' : 'failure',
      endTime: timestamp,
      exitCode,
    }));
  }

  /**
   * Overwrite a failed stage as successful. A stage that is already
   * successful is left untouched.
   */
  async reclassifyStageSuccess(name: string): Promise<Result<DeploymentRun>> {
    const stage = findStage(this.run, name);
    if (stage?.status === 'success' && !isFinalized(this.run)) {
      return Success(this.snapshot());
    }

    return this.transition(name, 'reclassify', 'failure', (current, timestamp) => ({
      ...current,
      status: 'success',
      endTime: timestamp,
      exitCode: 0,
    }));
  }

  /**
   * Record the run's end time, exit code and status. Only the first call
   * has any effect.
   */
  async finalize(exitCode: number): Promise<Result<DeploymentRun>> {
    if (isFinalized(this.run)) {
      return Success(this.snapshot());
    }
    if (!Number.isInteger(exitCode)) return TrackerErrors.invalidExitCode(exitCode);

    const next: DeploymentRun = {
      ...copyRun(this.run),
      endTime: formatTimestamp(this.now()),
      exitCode,
      status: exitCode === 0 ? 'success' : 'failed',
    };

    const committed = await this.commit(next);
    if (committed.ok) {
      this.logger?.info(
        { deploymentId: next.id, status: next.status, exitCode },
        'Deployment state finalized',
      );
    }
    return committed;
  }

  private async transition(
    name: string,
    operation: string,
    expected: StageStatus,
    apply: (stage: StageRecord, timestamp: string) => StageRecord,
  ): Promise<Result<DeploymentRun>> {
    if (isFinalized(this.run)) return TrackerErrors.runFinalized(`${operation} stage ${name}`);

    const index = this.run.stages.findIndex((stage) => stage.name === name);
    const stage = this.run.stages[index];
    if (index === -1 || stage === undefined) {
      return TrackerErrors.unknownStage(name, this.stageNames);
    }
    if (stage.status !== expected) {
      return TrackerErrors.invalidTransition(name, stage.status, operation, expected);
    }

    const next = copyRun(this.run);
    const updated = apply(stage, formatTimestamp(this.now()));
    next.stages = next.stages.map((candidate, position) =>
      position === index ? updated : candidate,
    );

    const committed = await this.commit(next);
    if (committed.ok) {
      this.logger?.debug({ stage: name, status: updated.status }, 'Stage status updated');
    }
    return committed;
  }

  private async commit(next: DeploymentRun): Promise<Result<DeploymentRun>> {
    const written = await writeStateFile(this.statePath, next);
    if (!written.ok) return written;
    this.run = next;
    return Success(this.snapshot());
  }
}
