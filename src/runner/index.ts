export * from './stage-definitions';
export * from './stage-runner';
