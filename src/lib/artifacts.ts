/**
 * Artifact copying
 *
 * Copies run artifacts (stage logs, state document, summary) into a shared
 * directory that outlives the deployment container.
 */

import { copyFile, mkdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { Logger } from 'pino';

import { Failure, Success, type Result } from '@/types';
import { extractErrnoCode, extractErrorMessage } from './errors';

/**
 * Copy each file into `targetDir`, keeping its base name. Files that do not
 * exist are skipped; returns the paths that were written.
 */
export async function copyArtifacts(
  files: readonly string[],
  targetDir: string,
  logger: Logger,
): Promise<Result<string[]>> {
  try {
    await mkdir(targetDir, { recursive: true });
  } catch (error) {
    return Failure(`Cannot create artifact directory ${targetDir}: ${extractErrorMessage(error)}`, {
      code: 'IO_ERROR',
      message: 'Shared artifact directory is not writable',
      resolution: `Check that ${targetDir} is mounted and writable`,
    });
  }

  const copied: string[] = [];
  for (const file of files) {
    const target = join(targetDir, basename(file));
    try {
      await copyFile(file, target);
      copied.push(target);
    } catch (error) {
      if (extractErrnoCode(error) === 'ENOENT') {
        logger.debug({ file }, 'Artifact not present, skipping');
        continue;
      }
      return Failure(`Cannot copy ${file} to ${targetDir}: ${extractErrorMessage(error)}`, {
        code: 'IO_ERROR',
        message: 'Artifact copy failed',
        details: { file, target },
      });
    }
  }

  logger.info({ targetDir, count: copied.length }, 'Copied artifacts to shared directory');
  return Success(copied);
}
