/**
 * Space Reclaimer
 *
 * Lock, delegate, rename: holds an exclusive lock on the image while the
 * sparsifier writes a reclaimed copy into the scratch directory, then
 * renames that copy over the image.
 */

import { open, rm, stat } from 'node:fs/promises';
import { resolve } from 'node:path';

import { withExclusiveLock, DEFAULT_LOCK_TIMEOUT_MS } from '../lock/flock.js';
import { replaceFile, type ReplaceResult } from '../lib/replace.js';
import { getTempOutputPath } from '../lib/paths.js';
import type { ReclaimOptions, ReclaimResult, ReclaimStage } from './types.js';
import {
  CommitError,
  PreflightError,
  SparsifyFailedError,
  TempOutputExistsError,
  isReclaimError,
} from './errors.js';
import { checkImagePath, checkScratchDir } from './preflight.js';

/**
 * Create the temporary output exclusively so that no other run, and no
 * leftover from an earlier one, can be mistaken for this run's output.
 *
 * @throws TempOutputExistsError if the path already exists
 */
async function claimTempOutput(tempPath: string): Promise<void> {
  try {
    const handle = await open(tempPath, 'wx');
    await handle.close();
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'EEXIST') {
      throw new TempOutputExistsError(tempPath);
    }
    throw new SparsifyFailedError(`Cannot create ${tempPath}: ${err.message}`, null, '');
  }
}

/**
 * Reclaim unused space in a qcow2 image.
 *
 * On failure the image is left as it was, except after a failed final
 * replace, where it is left in whatever state the rename left it.
 * The temporary output this call created never outlives it.
 *
 * @param imagePath - Image to reclaim; must be a regular file
 * @param scratchDir - Directory for the temporary output; must exist
 * @param options - Sparsifier and lock settings
 * @returns Sizes and timing of the completed reclaim
 * @throws PreflightError (INVALID_INPUT) for a bad image path or scratch directory
 * @throws LockTimeoutError if the image stays locked past the timeout
 * @throws TempOutputExistsError if the temporary output path is already taken
 * @throws SparsifyFailedError if the sparsifier fails
 * @throws CommitError if the final replace fails
 */
export async function reclaim(
  imagePath: string,
  scratchDir: string,
  options: ReclaimOptions
): Promise<ReclaimResult> {
  const image = resolve(imagePath);
  const scratch = resolve(scratchDir);

  const scratchCheck = await checkScratchDir(scratch);
  if (!scratchCheck.passed) {
    throw new PreflightError(scratchCheck.message ?? `${scratch} is not a directory`, 'INVALID_INPUT', scratchCheck.suggestion);
  }
  const imageCheck = await checkImagePath(image);
  if (!imageCheck.passed) {
    throw new PreflightError(imageCheck.message ?? `${image} is not a file`, 'INVALID_INPUT', imageCheck.suggestion);
  }

  const tempPath = getTempOutputPath(scratch, image);
  const report = (stage: ReclaimStage): void => {
    options.onProgress?.({ stage, imagePath: image, tempPath });
  };

  const startedAt = Date.now();

  return withExclusiveLock(
    image,
    {
      timeoutMs: options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS,
      pollIntervalMs: options.lockPollIntervalMs,
    },
    async () => {
      report('locked');
      const sizeBefore = (await stat(image)).size;

      // From here on tempPath belongs to this call and is removed on failure
      await claimTempOutput(tempPath);

      try {
        await options.sparsifier.sparsify({
          scratchDir: scratch,
          source: image,
          destination: tempPath,
        });
      } catch (error) {
        await rm(tempPath, { force: true });
        if (isReclaimError(error)) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new SparsifyFailedError(`Sparsify failed: ${message}`, null, '');
      }

      // The claimed file starts empty; a tool that exits 0 without
      // writing to it must not clobber the image
      const output = await stat(tempPath).catch(() => null);
      if (!output?.isFile() || output.size === 0) {
        await rm(tempPath, { force: true });
        throw new SparsifyFailedError(`Sparsify produced no output at ${tempPath}`, 0, '');
      }
      report('sparsified');

      let replaced: ReplaceResult;
      try {
        replaced = await replaceFile(tempPath, image);
      } catch (error) {
        await rm(tempPath, { force: true });
        const err = error as NodeJS.ErrnoException;
        throw new CommitError(
          `Failed to replace ${image} with ${tempPath}: ${err.message}`,
          image,
          tempPath,
          err.code
        );
      }
      report('committed');

      const sizeAfter = (await stat(image)).size;
      const result: ReclaimResult = {
        imagePath: image,
        scratchDir: scratch,
        tempPath,
        sizeBefore,
        sizeAfter,
        reclaimedBytes: Math.max(0, sizeBefore - sizeAfter),
        durationMs: Date.now() - startedAt,
        crossDevice: replaced.crossDevice,
      };
      if (replaced.leftover !== undefined) {
        result.leftoverPath = replaced.leftover;
      }
      return result;
    }
  );
}
