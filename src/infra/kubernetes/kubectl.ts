/**
 * kubectl queries
 *
 * Read-only `kubectl get ... -o json` calls, validated with zod.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { Logger } from 'pino';
import { z } from 'zod';

import { DEFAULT_TIMEOUTS } from '@/config/constants';
import { extractErrorMessage } from '@/lib/errors';
import { Failure, Success, type Result } from '@/types';

const execFileAsync = promisify(execFile);

const conditionSchema = z.object({ type: z.string(), status: z.string() });

export const nodeListSchema = z.object({
  items: z.array(
    z.object({
      metadata: z.object({ name: z.string() }),
      status: z
        .object({ conditions: z.array(conditionSchema).default([]) })
        .default({ conditions: [] }),
    }),
  ),
});

export const podListSchema = z.object({
  items: z.array(
    z.object({
      metadata: z.object({ name: z.string() }),
      status: z
        .object({
          phase: z.string().optional(),
          containerStatuses: z
            .array(z.object({ name: z.string().optional(), ready: z.boolean() }))
            .default([]),
        })
        .default({ containerStatuses: [] }),
    }),
  ),
});

export type NodeList = z.infer<typeof nodeListSchema>;
export type PodList = z.infer<typeof podListSchema>;

export interface KubectlOptions {
  kubeconfig: string;
  timeoutMs?: number;
}

/**
 * Run `kubectl --kubeconfig <file> get <resource...> -o json` and parse the output
 */
export async function kubectlGetJson<S extends z.ZodTypeAny>(
  resource: readonly string[],
  schema: S,
  options: KubectlOptions,
  logger: Logger,
): Promise<Result<z.infer<S>>> {
  const args = ['--kubeconfig', options.kubeconfig, 'get', ...resource, '-o', 'json'];
  logger.debug({ args }, 'Executing kubectl command');

  let stdout: string;
  try {
    ({ stdout } = await execFileAsync('kubectl', args, {
      encoding: 'utf8',
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUTS.kubectl,
      maxBuffer: 16 * 1024 * 1024,
    }));
  } catch (error) {
    return Failure(`kubectl get ${resource.join(' ')} failed: ${extractErrorMessage(error)}`, {
      code: 'PROBE_FAILURE',
      message: 'kubectl query failed',
      hint: 'The API server may be unreachable or the kubeconfig may be stale',
      resolution: `Try: kubectl --kubeconfig ${options.kubeconfig} get ${resource.join(' ')}`,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (error) {
    return Failure('kubectl returned invalid JSON', {
      code: 'PROBE_FAILURE',
      message: 'kubectl output parsing failed',
      details: { parseError: extractErrorMessage(error), outputPreview: stdout.substring(0, 200) },
    });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return Failure(`Unexpected kubectl output for ${resource.join(' ')}`, {
      code: 'PROBE_FAILURE',
      message: 'kubectl output did not match the expected resource list',
      details: { issues: parsed.error.issues.map((issue) => issue.message) },
    });
  }
  return Success(parsed.data);
}
