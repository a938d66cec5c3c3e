/**
 * Unit tests for the stage runner
 */

import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';

import type { HealthProbe } from '@/infra/kubernetes/probes';
import type { StageDefinition } from '@/runner/stage-definitions';
import { runStages, type RunnerOptions } from '@/runner/stage-runner';
import { StageTracker } from '@/tracker/stage-tracker';
import { Failure, Success, failureCode, type Result } from '@/types';
import {
  createFakeClock,
  createFakeExecutor,
  createMockContext,
} from '../../__support__/utilities/mocks';
import { createTestTempDir, type TestTempDir } from '../../__support__/utilities/tmp-helpers';

const OPTIONS: RunnerOptions = {
  continueOnFailure: false,
  probeSettleMs: 0,
  stageTimeoutMs: 60_000,
};

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new Error(`Expected success, got: ${result.error}`);
  return result.value;
}

describe('runStages', () => {
  let tempDir: TestTempDir;
  let statePath: string;

  const stage = (name: string, extra: Partial<StageDefinition> = {}): StageDefinition => ({
    name,
    description: `Run ${name}`,
    command: { command: name, args: [] },
    logFile: join(tempDir.path, `${name}.log`),
    requiredFiles: [],
    ...extra,
  });

  const createTracker = async (names: readonly string[]): Promise<StageTracker> =>
    unwrap(
      await StageTracker.create(names, {}, statePath, {
        now: createFakeClock(),
        generateId: () => 'test-run',
      }),
    );

  const exitCodes =
    (codes: Record<string, number>) =>
    (spec: { command: string }): number =>
      codes[spec.command] ?? 0;

  beforeEach(() => {
    tempDir = createTestTempDir();
    statePath = join(tempDir.path, 'deployment_state.json');
  });

  afterEach(() => {
    tempDir.cleanup();
  });

  it('should mark every stage successful when all commands exit 0', async () => {
    const tracker = await createTracker(['a', 'b']);
    const { executor, calls } = createFakeExecutor(exitCodes({}));

    const outcome = unwrap(
      await runStages(tracker, [stage('a'), stage('b')], OPTIONS, {
        executor,
        ctx: createMockContext(),
      }),
    );

    expect(outcome.exitCode).toBe(0);
    expect(outcome.failedStages).toEqual([]);
    expect(outcome.run.status).toBe('success');
    expect(outcome.run.exitCode).toBe(0);
    expect(outcome.run.stages.map((record) => record.status)).toEqual(['success', 'success']);
    expect(calls.map((call) => call.spec.command)).toEqual(['a', 'b']);
  });

  it('should stop after a failed stage and leave later stages pending', async () => {
    const tracker = await createTracker(['a', 'b']);
    const { executor, calls } = createFakeExecutor(exitCodes({ a: 1 }));

    const outcome = unwrap(
      await runStages(tracker, [stage('a'), stage('b')], OPTIONS, {
        executor,
        ctx: createMockContext(),
      }),
    );

    expect(outcome.exitCode).toBe(1);
    expect(outcome.failedStages).toEqual(['a']);
    expect(outcome.run.status).toBe('failed');
    expect(outcome.run.stages[0]).toMatchObject({ status: 'failure', exitCode: 1 });
    expect(outcome.run.stages[1]).toEqual({ name: 'b', status: 'pending' });
    expect(calls).toHaveLength(1);
  });

  it('should run remaining stages when continueOnFailure is set', async () => {
    const tracker = await createTracker(['a', 'b', 'c']);
    const { executor, calls } = createFakeExecutor(exitCodes({ b: 4 }));

    const outcome = unwrap(
      await runStages(
        tracker,
        [stage('a'), stage('b'), stage('c')],
        { ...OPTIONS, continueOnFailure: true },
        { executor, ctx: createMockContext() },
      ),
    );

    expect(calls).toHaveLength(3);
    expect(outcome.failedStages).toEqual(['b']);
    expect(outcome.exitCode).toBe(1);
    expect(outcome.run.stages.map((record) => record.status)).toEqual([
      'success',
      'failure',
      'success',
    ]);
  });

  describe('reclassification', () => {
    const healthy: HealthProbe = async () => Success({ healthy: true, message: 'All 3 nodes ready' });
    const unhealthy: HealthProbe = async () =>
      Success({ healthy: false, message: '1/3 nodes not ready: node-2' });

    it('should reclassify a partial failure when the probe reports healthy', async () => {
      const tracker = await createTracker(['deploy']);
      const { executor } = createFakeExecutor(exitCodes({ deploy: 2 }));

      const outcome = unwrap(
        await runStages(tracker, [stage('deploy', { healthProbe: healthy })], OPTIONS, {
          executor,
          ctx: createMockContext(),
        }),
      );

      expect(outcome.run.stages[0]).toMatchObject({ status: 'success', exitCode: 0 });
      expect(outcome.run.status).toBe('success');
      expect(outcome.exitCode).toBe(0);
      expect(outcome.failedStages).toEqual([]);
    });

    it('should keep the failure when the probe reports unhealthy', async () => {
      const tracker = await createTracker(['deploy']);
      const { executor } = createFakeExecutor(exitCodes({ deploy: 2 }));

      const outcome = unwrap(
        await runStages(tracker, [stage('deploy', { healthProbe: unhealthy })], OPTIONS, {
          executor,
          ctx: createMockContext(),
        }),
      );

      expect(outcome.run.stages[0]).toMatchObject({ status: 'failure', exitCode: 2 });
      expect(outcome.run.status).toBe('failed');
      expect(outcome.failedStages).toEqual(['deploy']);
    });

    it('should treat a probe that cannot run as unhealthy', async () => {
      const tracker = await createTracker(['deploy']);
      const { executor } = createFakeExecutor(exitCodes({ deploy: 2 }));
      const broken: HealthProbe = async () =>
        Failure('Kubeconfig not found', { code: 'PROBE_FAILURE' });

      const outcome = unwrap(
        await runStages(tracker, [stage('deploy', { healthProbe: broken })], OPTIONS, {
          executor,
          ctx: createMockContext(),
        }),
      );

      expect(outcome.run.stages[0]?.status).toBe('failure');
    });

    it('should treat a probe that throws as unhealthy', async () => {
      const tracker = await createTracker(['deploy']);
      const { executor } = createFakeExecutor(exitCodes({ deploy: 2 }));
      const throwing: HealthProbe = async () => {
        throw new Error('connection refused');
      };

      const outcome = unwrap(
        await runStages(tracker, [stage('deploy', { healthProbe: throwing })], OPTIONS, {
          executor,
          ctx: createMockContext(),
        }),
      );

      expect(outcome.run.stages[0]?.status).toBe('failure');
      expect(outcome.exitCode).toBe(1);
    });

    it('should skip the health check when the run is aborted while settling', async () => {
      const tracker = await createTracker(['deploy']);
      const controller = new AbortController();
      const { executor } = createFakeExecutor(() => {
        setImmediate(() => controller.abort());
        return 2;
      });
      const probe = jest.fn<HealthProbe>(healthy);

      const outcome = unwrap(
        await runStages(
          tracker,
          [stage('deploy', { healthProbe: probe })],
          { ...OPTIONS, probeSettleMs: 60_000 },
          { executor, ctx: createMockContext({ signal: controller.signal }) },
        ),
      );

      expect(probe).not.toHaveBeenCalled();
      expect(outcome.run.stages[0]).toMatchObject({ status: 'failure', exitCode: 2 });
      expect(outcome.exitCode).toBe(1);
    });

    it('should not probe for exit codes other than 2', async () => {
      const tracker = await createTracker(['deploy']);
      const { executor } = createFakeExecutor(exitCodes({ deploy: 4 }));
      const probe = jest.fn(healthy);

      const outcome = unwrap(
        await runStages(tracker, [stage('deploy', { healthProbe: probe })], OPTIONS, {
          executor,
          ctx: createMockContext(),
        }),
      );

      expect(probe).not.toHaveBeenCalled();
      expect(outcome.run.stages[0]?.status).toBe('failure');
    });

    it('should not reclassify a stage without a probe', async () => {
      const tracker = await createTracker(['ssh']);
      const { executor } = createFakeExecutor(exitCodes({ ssh: 2 }));

      const outcome = unwrap(
        await runStages(tracker, [stage('ssh')], OPTIONS, { executor, ctx: createMockContext() }),
      );

      expect(outcome.run.stages[0]).toMatchObject({ status: 'failure', exitCode: 2 });
    });
  });

  it('should fail a stage with exit code 1 when a required file is missing', async () => {
    const tracker = await createTracker(['a']);
    const { executor, calls } = createFakeExecutor(exitCodes({}));

    const outcome = unwrap(
      await runStages(
        tracker,
        [stage('a', { requiredFiles: [join(tempDir.path, 'missing-playbook.yml')] })],
        OPTIONS,
        { executor, ctx: createMockContext() },
      ),
    );

    expect(calls).toHaveLength(0);
    expect(outcome.run.stages[0]).toMatchObject({ status: 'failure', exitCode: 1 });
  });

  it('should run a stage whose required files exist', async () => {
    const playbook = join(tempDir.path, 'playbook.yml');
    writeFileSync(playbook, '- hosts: all\n');
    const tracker = await createTracker(['a']);
    const { executor, calls } = createFakeExecutor(exitCodes({}));

    await runStages(tracker, [stage('a', { requiredFiles: [playbook] })], OPTIONS, {
      executor,
      ctx: createMockContext(),
    });

    expect(calls).toHaveLength(1);
  });

  it('should record the timeout exit code', async () => {
    const tracker = await createTracker(['a']);
    const { executor, calls } = createFakeExecutor(exitCodes({ a: 124 }));

    const outcome = unwrap(
      await runStages(tracker, [stage('a')], { ...OPTIONS, stageTimeoutMs: 1234 }, {
        executor,
        ctx: createMockContext(),
      }),
    );

    expect(calls[0]?.options.timeoutMs).toBe(1234);
    expect(outcome.run.stages[0]).toMatchObject({ status: 'failure', exitCode: 124 });
  });

  it('should pass the log file and abort signal to the executor', async () => {
    const tracker = await createTracker(['a']);
    const { executor, calls } = createFakeExecutor(exitCodes({}));
    const controller = new AbortController();

    await runStages(tracker, [stage('a')], OPTIONS, {
      executor,
      ctx: createMockContext({ signal: controller.signal }),
    });

    expect(calls[0]?.options.logFile).toBe(join(tempDir.path, 'a.log'));
    expect(calls[0]?.options.signal).toBe(controller.signal);
  });

  it('should report progress once per stage', async () => {
    const tracker = await createTracker(['a', 'b']);
    const { executor } = createFakeExecutor(exitCodes({}));
    const progress = jest.fn(async (_message: string, _progress?: number, _total?: number) => {});

    await runStages(tracker, [stage('a'), stage('b')], OPTIONS, {
      executor,
      ctx: createMockContext({ progress }),
    });

    expect(progress.mock.calls).toEqual([
      ['Running stage 1/2: a', 1, 2],
      ['Running stage 2/2: b', 2, 2],
    ]);
  });

  it('should not start stages once the run is aborted', async () => {
    const tracker = await createTracker(['a', 'b']);
    const { executor, calls } = createFakeExecutor(exitCodes({}));
    const controller = new AbortController();
    controller.abort();

    const outcome = unwrap(
      await runStages(tracker, [stage('a'), stage('b')], OPTIONS, {
        executor,
        ctx: createMockContext({ signal: controller.signal }),
      }),
    );

    expect(calls).toHaveLength(0);
    expect(outcome.exitCode).toBe(1);
    expect(outcome.run.stages.map((record) => record.status)).toEqual(['pending', 'pending']);
  });

  it('should abort with the tracker failure when a stage is not declared', async () => {
    const tracker = await createTracker(['a']);
    const { executor, calls } = createFakeExecutor(exitCodes({}));

    const result = await runStages(tracker, [stage('a'), stage('z')], OPTIONS, {
      executor,
      ctx: createMockContext(),
    });

    expect(failureCode(result)).toBe('NOT_FOUND');
    expect(calls).toHaveLength(1);
    expect(tracker.snapshot().endTime).toBeUndefined();
  });
});
