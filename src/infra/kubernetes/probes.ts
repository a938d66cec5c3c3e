/**
 * Health probes
 *
 * Read-only checks used to decide whether a stage that exited with a
 * partial-failure code actually reached its desired state. A probe returns a
 * Result: a failure (PROBE_FAILURE) means the state could not be determined,
 * which callers treat the same as unhealthy.
 */

import type { Logger } from 'pino';

import { KUBERNETES } from '@/config/constants';
import { Failure, Success, type Result, type RunContext } from '@/types';
import { bastionServerUrl, findKubeconfig, loadBastionHost, rewriteKubeconfigServer } from './kubeconfig';
import { kubectlGetJson, nodeListSchema, podListSchema, type NodeList, type PodList } from './kubectl';

export interface ProbeResult {
  healthy: boolean;
  message: string;
}

export type HealthProbe = (ctx: RunContext) => Promise<Result<ProbeResult>>;

export interface ProbeOptions {
  /** Kubeconfig candidates, first existing file wins */
  kubeconfigPaths: readonly string[];
  /** Inventory used to find the bastion address */
  inventoryFile: string;
  /** Rewrite kubeconfig server URLs to the bastion before querying */
  rewriteServer: boolean;
  kubectlTimeoutMs?: number;
}

// ===== EVALUATION =====

/**
 * Healthy iff there is at least one node and every node reports Ready=True
 */
export function evaluateNodeReadiness(nodes: NodeList): ProbeResult {
  if (nodes.items.length === 0) {
    return { healthy: false, message: 'No nodes registered' };
  }

  const notReady = nodes.items
    .filter(
      (node) =>
        !node.status.conditions.some(
          (condition) => condition.type === 'Ready' && condition.status === 'True',
        ),
    )
    .map((node) => node.metadata.name);

  if (notReady.length > 0) {
    return {
      healthy: false,
      message: `${notReady.length}/${nodes.items.length} nodes not ready: ${notReady.join(', ')}`,
    };
  }
  return { healthy: true, message: `All ${nodes.items.length} nodes ready` };
}

/**
 * Healthy iff at least one pod is Running with every container ready
 */
export function evaluateRancherPods(pods: PodList): ProbeResult {
  const ready = pods.items.filter(
    (pod) =>
      pod.status.phase === 'Running' &&
      pod.status.containerStatuses.length > 0 &&
      pod.status.containerStatuses.every((container) => container.ready),
  );

  if (ready.length === 0) {
    return {
      healthy: false,
      message:
        pods.items.length === 0
          ? `No pods in ${KUBERNETES.RANCHER_NAMESPACE}`
          : `None of ${pods.items.length} pods in ${KUBERNETES.RANCHER_NAMESPACE} are running and ready`,
    };
  }
  return {
    healthy: true,
    message: `${ready.length}/${pods.items.length} pods in ${KUBERNETES.RANCHER_NAMESPACE} running and ready`,
  };
}

// ===== PROBES =====

async function resolveKubeconfig(options: ProbeOptions, logger: Logger): Promise<Result<string>> {
  const kubeconfig = await findKubeconfig(options.kubeconfigPaths, logger);
  if (kubeconfig === undefined) {
    return Failure('Kubeconfig not found', {
      code: 'PROBE_FAILURE',
      message: 'No kubeconfig available for the health probe',
      resolution: `Expected one of: ${options.kubeconfigPaths.join(', ')}`,
    });
  }
  return Success(kubeconfig);
}

async function pointAtBastion(kubeconfig: string, options: ProbeOptions, logger: Logger): Promise<void> {
  const bastion = await loadBastionHost(options.inventoryFile);
  if (!bastion.ok) {
    logger.warn({ error: bastion.error }, 'Keeping kubeconfig server URL');
    return;
  }

  const rewritten = await rewriteKubeconfigServer(kubeconfig, bastionServerUrl(bastion.value), logger);
  if (!rewritten.ok) {
    logger.warn({ error: rewritten.error }, 'Keeping kubeconfig server URL');
  }
}

/**
 * RKE2 cluster readiness: all nodes Ready
 */
export function createRke2Probe(options: ProbeOptions): HealthProbe {
  return async (ctx) => {
    const kubeconfig = await resolveKubeconfig(options, ctx.logger);
    if (!kubeconfig.ok) return kubeconfig;

    if (options.rewriteServer) {
      await pointAtBastion(kubeconfig.value, options, ctx.logger);
    }

    const nodes = await kubectlGetJson(
      ['nodes'],
      nodeListSchema,
      withTimeout({ kubeconfig: kubeconfig.value }, options),
      ctx.logger,
    );
    if (!nodes.ok) return nodes;
    return Success(evaluateNodeReadiness(nodes.value));
  };
}

/**
 * Rancher readiness: a running, ready pod in cattle-system
 */
export function createRancherProbe(options: ProbeOptions): HealthProbe {
  return async (ctx) => {
    const kubeconfig = await resolveKubeconfig(options, ctx.logger);
    if (!kubeconfig.ok) return kubeconfig;

    const pods = await kubectlGetJson(
      ['pods', '-n', KUBERNETES.RANCHER_NAMESPACE],
      podListSchema,
      withTimeout({ kubeconfig: kubeconfig.value }, options),
      ctx.logger,
    );
    if (!pods.ok) return pods;
    return Success(evaluateRancherPods(pods.value));
  };
}

function withTimeout(
  base: { kubeconfig: string },
  options: ProbeOptions,
): { kubeconfig: string; timeoutMs?: number } {
  return options.kubectlTimeoutMs === undefined
    ? base
    : { ...base, timeoutMs: options.kubectlTimeoutMs };
}
