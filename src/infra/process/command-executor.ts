/**
 * Command Executor
 *
 * Spawns a structured command (never through a shell), tees its combined
 * stdout/stderr into a log file and optionally the console, and enforces a
 * timeout. The returned promise always resolves; failures are expressed as
 * exit codes:
 *
 * - timeout: 124
 * - the command could not be started: 127
 * - killed by a signal: 128 + signal number
 *
 * On timeout or abort the command's process group gets SIGTERM, then SIGKILL
 * after a grace period; the promise resolves once the grace period ends even
 * if the command never closes its pipes.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { createWriteStream, type WriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { constants } from 'node:os';
import { dirname } from 'node:path';
import type { Logger } from 'pino';

import { DEFAULT_TIMEOUTS, EXIT_CODES } from '@/config/constants';
import { formatCommandForLog, type CommandSpec } from '@/lib/command-log';
import { extractErrorMessage } from '@/lib/errors';

export interface CommandRunOptions {
  /** File receiving the combined output; truncated first */
  logFile: string;
  timeoutMs: number;
  /** Also copy output to stdout */
  echo?: boolean;
  /** Aborting kills the running command */
  signal?: AbortSignal;
  /** Wait between SIGTERM and SIGKILL; defaults to `DEFAULT_TIMEOUTS.killGrace` */
  killGraceMs?: number;
}

export interface CommandOutcome {
  exitCode: number;
  timedOut: boolean;
  durationMs: number;
}

export interface CommandExecutor {
  run(spec: CommandSpec, options: CommandRunOptions, logger: Logger): Promise<CommandOutcome>;
}

function signalExitCode(signal: NodeJS.Signals | null): number {
  const number = Object.entries(constants.signals).find(([name]) => name === signal)?.[1];
  return number === undefined ? EXIT_CODES.FAILURE : 128 + number;
}

function closeLog(log: WriteStream | undefined): Promise<void> {
  if (!log || log.destroyed) return Promise.resolve();
  return new Promise((resolve) => {
    log.end(() => resolve());
  });
}

async function openLog(logFile: string, logger: Logger): Promise<WriteStream | undefined> {
  try {
    await mkdir(dirname(logFile), { recursive: true });
  } catch (error) {
    logger.warn({ logFile, error: extractErrorMessage(error) }, 'Cannot create log directory');
    return undefined;
  }

  const log = createWriteStream(logFile, { flags: 'w' });
  log.on('error', (error) => {
    logger.warn({ logFile, error: error.message }, 'Stage log file write failed');
  });
  return log;
}

async function runCommand(
  spec: CommandSpec,
  options: CommandRunOptions,
  logger: Logger,
): Promise<CommandOutcome> {
  const startedAt = Date.now();
  const rendered = formatCommandForLog(spec);
  const log = await openLog(options.logFile, logger);

  log?.write(`$ ${rendered}\n`);
  logger.info({ command: rendered, cwd: spec.cwd, logFile: options.logFile }, 'Running command');

  const graceMs = options.killGraceMs ?? DEFAULT_TIMEOUTS.killGrace;
  const outcome = await new Promise<{ exitCode: number; timedOut: boolean }>((resolve) => {
    let child: ChildProcess | undefined;
    let settled = false;
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    let killTimer: NodeJS.Timeout | undefined;

    const forward = (chunk: Buffer): void => {
      log?.write(chunk);
      if (options.echo) process.stdout.write(chunk);
    };

    // The command runs in its own process group so grandchildren are signalled too.
    const signalCommand = (signal: NodeJS.Signals): void => {
      if (!child) return;
      const pid = child.pid;
      if (pid !== undefined) {
        try {
          process.kill(-pid, signal);
          return;
        } catch (error) {
          logger.debug(
            { command: spec.command, pid, signal, error: extractErrorMessage(error) },
            'Process group signal failed, signalling the command directly',
          );
        }
      }
      child.kill(signal);
    };

    const finish = (code: number): void => {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      if (killTimer !== undefined) clearTimeout(killTimer);
      options.signal?.removeEventListener('abort', onAbort);
      child?.stdout?.off('data', forward);
      child?.stderr?.off('data', forward);
      resolve({ exitCode: code, timedOut });
    };

    // SIGTERM first; SIGKILL and resolve once the grace period runs out.
    const terminate = (): void => {
      if (settled || killTimer !== undefined) return;
      signalCommand('SIGTERM');
      killTimer = setTimeout(() => {
        logger.warn(
          { command: spec.command, graceMs },
          'Command still running after SIGTERM, sending SIGKILL',
        );
        signalCommand('SIGKILL');
        finish(timedOut ? EXIT_CODES.TIMEOUT : signalExitCode('SIGKILL'));
      }, graceMs);
    };

    const onAbort = (): void => {
      logger.warn({ command: spec.command }, 'Run aborted, terminating command');
      terminate();
    };

    let spawned: ChildProcess;
    try {
      spawned = spawn(spec.command, [...spec.args], {
        cwd: spec.cwd,
        env: { ...process.env, ...spec.env },
        shell: false,
        detached: true,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (error) {
      const message = extractErrorMessage(error);
      log?.write(`Failed to start ${spec.command}: ${message}\n`);
      logger.error({ command: spec.command, error: message }, 'Command could not be started');
      finish(EXIT_CODES.NOT_EXECUTABLE);
      return;
    }
    child = spawned;

    spawned.stdout?.on('data', forward);
    spawned.stderr?.on('data', forward);

    spawned.on('error', (error) => {
      log?.write(`Failed to start ${spec.command}: ${error.message}\n`);
      logger.error({ command: spec.command, error: error.message }, 'Command could not be started');
      finish(EXIT_CODES.NOT_EXECUTABLE);
    });

    spawned.on('close', (code, signal) => {
      if (timedOut) {
        finish(EXIT_CODES.TIMEOUT);
      } else {
        finish(code ?? signalExitCode(signal));
      }
    });

    timer = setTimeout(() => {
      timedOut = true;
      logger.error({ command: spec.command, timeoutMs: options.timeoutMs }, 'Command timed out');
      terminate();
    }, options.timeoutMs);

    if (options.signal?.aborted) {
      onAbort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }
  });

  const durationMs = Date.now() - startedAt;
  log?.write(
    outcome.timedOut
      ? `\n[timed out after ${options.timeoutMs}ms]\n`
      : `\n[exit code ${outcome.exitCode} after ${durationMs}ms]\n`,
  );
  await closeLog(log);

  logger.info(
    { command: spec.command, exitCode: outcome.exitCode, timedOut: outcome.timedOut, durationMs },
    'Command finished',
  );
  return { ...outcome, durationMs };
}

/**
 * Create the process-backed executor
 */
export function createCommandExecutor(): CommandExecutor {
  return { run: runCommand };
}
