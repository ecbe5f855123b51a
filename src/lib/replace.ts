/**
 * Atomic File Replace
 *
 * Moves a file over another so that readers of the destination path see
 * either the old content or the new content, never a partial write.
 */

import { copyFile, rename, rm } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

/**
 * Result of a replace
 */
export interface ReplaceResult {
  /** Whether src and dst were on different filesystems */
  crossDevice: boolean;
  /** Source left in place because it could not be removed after the commit */
  leftover?: string;
}

/**
 * Filesystem calls used by replaceFile
 */
export interface ReplaceFs {
  rename(from: string, to: string): Promise<void>;
  copyFile(from: string, to: string): Promise<void>;
  remove(path: string): Promise<void>;
}

const nodeFs: ReplaceFs = {
  rename: (from, to) => rename(from, to),
  copyFile: (from, to) => copyFile(from, to),
  remove: (path) => rm(path, { force: true }),
};

/**
 * Path of the staging file used for cross-filesystem replaces.
 *
 * It sits beside the destination so the final rename stays on one filesystem.
 */
export function getStagingPath(dst: string): string {
  return join(dirname(dst), `.reclaim.${basename(dst)}`);
}

/**
 * Replace `dst` with `src`.
 *
 * Same filesystem: a single rename. Across filesystems (EXDEV): copy to a
 * staging file beside `dst`, rename that over `dst`, then remove `src`.
 * The destination is never truncated in place. Once `dst` has been
 * replaced, a failure to remove `src` is reported through `leftover`
 * rather than thrown.
 *
 * @throws the underlying filesystem error if `dst` was not replaced
 */
export async function replaceFile(src: string, dst: string, fs: ReplaceFs = nodeFs): Promise<ReplaceResult> {
  try {
    await fs.rename(src, dst);
    return { crossDevice: false };
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'EXDEV') {
      throw error;
    }
  }

  const staging = getStagingPath(dst);
  try {
    await fs.copyFile(src, staging);
    await fs.rename(staging, dst);
  } catch (error) {
    await fs.remove(staging);
    throw error;
  }

  const removed = await fs.remove(src).then(
    () => true,
    () => false
  );
  return removed ? { crossDevice: true } : { crossDevice: true, leftover: src };
}
