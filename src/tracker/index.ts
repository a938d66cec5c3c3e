export { StageTracker, type StageTrackerOptions } from './stage-tracker';
export { TrackerErrors } from './errors';
export {
  formatTimestamp,
  parseRun,
  serializeRun,
  stateDocumentSchema,
  type StateDocument,
} from './state-document';
export { readStateFile, writeStateFile } from './state-store';
export {
  findStage,
  isFinalized,
  type DeploymentRun,
  type RunStatus,
  type StageRecord,
  type StageStatus,
} from './types';
