/**
 * Unit tests for atomic file replace
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { copyFile, mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import { getStagingPath, replaceFile, type ReplaceFs } from '../../../src/lib/replace.js';
import { createTempDir, removeTempDir } from '../../helpers/temp.js';

describe('getStagingPath', () => {
  it('should place the staging file beside the destination', () => {
    assert.strictEqual(getStagingPath('/data/disk.qcow2'), '/data/.reclaim.disk.qcow2');
  });
});

describe('replaceFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir('replace');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should move the source over the destination', async () => {
    const src = join(dir, 'temp.disk.qcow2');
    const dst = join(dir, 'disk.qcow2');
    await writeFile(src, 'new');
    await writeFile(dst, 'old content');

    const result = await replaceFile(src, dst);

    assert.deepStrictEqual(result, { crossDevice: false });
    assert.strictEqual(await readFile(dst, 'utf-8'), 'new');
    assert.deepStrictEqual(await readdir(dir), ['disk.qcow2']);
  });

  it('should propagate errors other than EXDEV', async () => {
    const src = join(dir, 'missing');
    const dst = join(dir, 'disk.qcow2');
    await writeFile(dst, 'old');

    await assert.rejects(
      () => replaceFile(src, dst),
      (error: unknown) => {
        assert.strictEqual((error as NodeJS.ErrnoException).code, 'ENOENT');
        return true;
      }
    );
    assert.strictEqual(await readFile(dst, 'utf-8'), 'old');
  });

  describe('across filesystems', () => {
    let src: string;
    let dst: string;

    /**
     * Real filesystem calls, except that renames between directories
     * fail with EXDEV as they would between mounts.
     */
    function crossDeviceFs(overrides: Partial<ReplaceFs> = {}): ReplaceFs {
      return {
        rename: async (from, to) => {
          if (dirname(from) !== dirname(to)) {
            throw Object.assign(new Error('EXDEV: cross-device link not permitted'), { code: 'EXDEV' });
          }
          await rename(from, to);
        },
        copyFile: (from, to) => copyFile(from, to),
        remove: (path) => rm(path, { force: true }),
        ...overrides,
      };
    }

    beforeEach(async () => {
      await mkdir(join(dir, 'scratch'));
      await mkdir(join(dir, 'data'));
      src = join(dir, 'scratch', 'temp.disk.qcow2');
      dst = join(dir, 'data', 'disk.qcow2');
      await writeFile(src, 'new');
      await writeFile(dst, 'old content');
    });

    it('should stage beside the destination and remove the source', async () => {
      const result = await replaceFile(src, dst, crossDeviceFs());

      assert.deepStrictEqual(result, { crossDevice: true });
      assert.strictEqual(await readFile(dst, 'utf-8'), 'new');
      assert.deepStrictEqual(await readdir(join(dir, 'data')), ['disk.qcow2']);
      assert.deepStrictEqual(await readdir(join(dir, 'scratch')), []);
    });

    it('should remove a partial staging copy and keep the destination', async () => {
      const fs = crossDeviceFs({
        copyFile: async (_from, to) => {
          await writeFile(to, 'ne');
          throw Object.assign(new Error('ENOSPC: no space left on device'), { code: 'ENOSPC' });
        },
      });

      await assert.rejects(
        () => replaceFile(src, dst, fs),
        (error: unknown) => {
          assert.strictEqual((error as NodeJS.ErrnoException).code, 'ENOSPC');
          return true;
        }
      );

      assert.strictEqual(await readFile(dst, 'utf-8'), 'old content');
      assert.deepStrictEqual(await readdir(join(dir, 'data')), ['disk.qcow2']);
      assert.strictEqual(await readFile(src, 'utf-8'), 'new');
    });

    it('should report a source it could not remove after the commit', async () => {
      const fs = crossDeviceFs({
        remove: async (path) => {
          if (path === src) {
            throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
          }
          await rm(path, { force: true });
        },
      });

      const result = await replaceFile(src, dst, fs);

      assert.deepStrictEqual(result, { crossDevice: true, leftover: src });
      assert.strictEqual(await readFile(dst, 'utf-8'), 'new');
      assert.deepStrictEqual(await readdir(join(dir, 'data')), ['disk.qcow2']);
    });
  });
});
