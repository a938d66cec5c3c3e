export * from './kubeconfig';
export * from './kubectl';
export * from './probes';
