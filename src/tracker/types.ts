/**
 * Deployment run and stage record types
 */

export type StageStatus = 'pending' | 'running' | 'success' | 'failure';

export type RunStatus = 'running' | 'success' | 'failed';

export interface StageRecord {
  name: string;
  status: StageStatus;
  startTime?: string;
  endTime?: string;
  exitCode?: number;
}

export interface DeploymentRun {
  id: string;
  startTime: string;
  endTime?: string;
  exitCode?: number;
  status: RunStatus;
  /** Free-form string settings fixed at creation (target versions, hostnames) */
  config: Readonly<Record<string, string>>;
  /** One record per declared stage, in pipeline order */
  stages: readonly StageRecord[];
}

/**
 * A run is finalized once its end time has been recorded
 */
export function isFinalized(run: DeploymentRun): boolean {
  return run.endTime !== undefined;
}

export function findStage(run: DeploymentRun, name: string): StageRecord | undefined {
  return run.stages.find((stage) => stage.name === name);
}
