/**
 * State file persistence
 *
 * Every write goes to a temporary file in the target directory and is then
 * renamed over the state file, so readers only ever see a complete document.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname } from 'node:path';
import tmp from 'tmp';

import { extractErrnoCode, extractErrorMessage } from '@/lib/errors';
import { Failure, Success, type Result } from '@/types';
import { parseRun, serializeRun } from './state-document';
import type { DeploymentRun } from './types';

function ioFailure<T>(action: string, path: string, error: unknown): Result<T> {
  const errno = extractErrnoCode(error);
  return Failure(`Failed to ${action} state file ${path}: ${extractErrorMessage(error)}`, {
    code: 'IO_ERROR',
    message: `State file could not be ${action === 'write' ? 'written' : 'read'}`,
    hint:
      errno === 'EACCES' || errno === 'EPERM'
        ? 'The process lacks permission on the state directory'
        : errno === 'ENOENT'
          ? 'The state file or its directory does not exist'
          : 'The filesystem rejected the operation',
    resolution: `Check that ${dirname(path)} exists and is writable`,
    details: { path, ...(errno !== undefined && { errno }) },
  });
}

/**
 * Atomically write a run to `path`, creating the parent directory if needed
 */
export async function writeStateFile(path: string, run: DeploymentRun): Promise<Result<void>> {
  const directory = dirname(path);
  let tempPath: string | undefined;

  try {
    await mkdir(directory, { recursive: true });
    tempPath = tmp.tmpNameSync({
      tmpdir: directory,
      prefix: `.${basename(path)}-`,
      postfix: '.tmp',
    });
    await writeFile(tempPath, serializeRun(run), { encoding: 'utf-8', mode: 0o644 });
    await rename(tempPath, path);
    return Success(undefined);
  } catch (error) {
    const failure = ioFailure<void>('write', path, error);
    if (tempPath !== undefined && !failure.ok) {
      const cleanupError = await rm(tempPath, { force: true }).then(
        () => undefined,
        (cleanup: unknown) => extractErrorMessage(cleanup),
      );
      if (cleanupError !== undefined && failure.guidance) {
        failure.guidance.details = { ...failure.guidance.details, cleanupError };
      }
    }
    return failure;
  }
}

/**
 * Read and validate the run stored at `path`
 */
export async function readStateFile(path: string): Promise<Result<DeploymentRun>> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    return ioFailure('read', path, error);
  }

  const parsed = parseRun(text);
  if (!parsed.ok) {
    return Failure(`${parsed.error} (${path})`, {
      ...parsed.guidance,
      details: { ...parsed.guidance?.details, path },
    });
  }
  return parsed;
}
