/**
 * Kubeconfig discovery and server rewriting
 *
 * Kubeconfigs fetched from RKE2 servers point at 127.0.0.1 or a private
 * address. Probes run from the deployment container, which reaches the API
 * server through the bastion, so the cluster server URLs are rewritten to
 * `https://<bastion>:6443` first.
 */

import { stat, readFile, writeFile } from 'node:fs/promises';
import yaml from 'js-yaml';
import type { Logger } from 'pino';
import { z } from 'zod';

import { KUBERNETES } from '@/config/constants';
import { extractBastionHost, loadInventory } from '@/infra/ansible/inventory';
import { extractErrorMessage } from '@/lib/errors';
import { Failure, Success, type Result } from '@/types';

/**
 * First path in `candidates` that is an existing regular file
 */
export async function findKubeconfig(
  candidates: readonly string[],
  logger?: Logger,
): Promise<string | undefined> {
  for (const candidate of candidates) {
    const isFile = await stat(candidate).then(
      (stats) => stats.isFile(),
      () => false,
    );
    if (isFile) {
      logger?.debug({ kubeconfig: candidate }, 'Found kubeconfig');
      return candidate;
    }
  }
  logger?.warn({ candidates }, 'Kubeconfig not found in any expected location');
  return undefined;
}

export async function loadBastionHost(inventoryFile: string): Promise<Result<string>> {
  const inventory = await loadInventory(inventoryFile);
  if (!inventory.ok) {
    return Failure(inventory.error, { ...inventory.guidance, code: 'PROBE_FAILURE' });
  }

  const host = extractBastionHost(inventory.value);
  if (host === undefined) {
    return Failure(`No bastion host found in ${inventoryFile}`, {
      code: 'PROBE_FAILURE',
      message: 'Bastion address could not be determined',
      hint: 'The inventory has no bastion-node or bastion host with ansible_host set',
    });
  }
  return Success(host);
}

// ===== KUBECONFIG REWRITE =====

const kubeconfigSchema = z
  .object({
    clusters: z
      .array(
        z
          .object({
            name: z.string().optional(),
            cluster: z.object({ server: z.string() }).passthrough(),
          })
          .passthrough(),
      )
      .min(1),
  })
  .passthrough();

export function bastionServerUrl(host: string): string {
  return `https://${host}:${KUBERNETES.API_PORT}`;
}

/**
 * Point every cluster entry of the kubeconfig at `serverUrl`; returns the
 * number of entries changed
 */
export async function rewriteKubeconfigServer(
  kubeconfig: string,
  serverUrl: string,
  logger?: Logger,
): Promise<Result<number>> {
  let document: unknown;
  try {
    document = yaml.load(await readFile(kubeconfig, 'utf-8'));
  } catch (error) {
    return Failure(`Cannot read kubeconfig ${kubeconfig}: ${extractErrorMessage(error)}`, {
      code: 'PROBE_FAILURE',
      message: 'Kubeconfig could not be read',
    });
  }

  const parsed = kubeconfigSchema.safeParse(document);
  if (!parsed.success) {
    return Failure(`Kubeconfig ${kubeconfig} has no clusters with a server URL`, {
      code: 'PROBE_FAILURE',
      message: 'Kubeconfig is malformed',
      details: { issues: parsed.error.issues.map((issue) => issue.message) },
    });
  }

  let changed = 0;
  for (const entry of parsed.data.clusters) {
    if (entry.cluster.server !== serverUrl) {
      logger?.info(
        { cluster: entry.name, from: entry.cluster.server, to: serverUrl },
        'Rewriting kubeconfig server URL',
      );
      entry.cluster.server = serverUrl;
      changed++;
    }
  }

  if (changed > 0) {
    try {
      await writeFile(kubeconfig, yaml.dump(parsed.data), 'utf-8');
    } catch (error) {
      return Failure(`Cannot write kubeconfig ${kubeconfig}: ${extractErrorMessage(error)}`, {
        code: 'PROBE_FAILURE',
        message: 'Kubeconfig could not be updated',
      });
    }
  }
  return Success(changed);
}
