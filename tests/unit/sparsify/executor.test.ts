/**
 * Unit tests for the virt-sparsify executor
 *
 * Runs against a stand-in executable so no libguestfs install is needed.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import {
  buildSparsifyArgs,
  formatErrorMessage,
  stripAnsiCodes,
  VirtSparsifyExecutor,
} from '../../../src/sparsify/executor.js';
import { SparsifyFailedError } from '../../../src/core/errors.js';
import { readInvocations, writeFakeTool } from '../../helpers/fake-tool.js';
import { createTempDir, removeTempDir } from '../../helpers/temp.js';

const REQUEST = {
  scratchDir: '/tmp',
  source: '/data/disk.qcow2',
  destination: '/tmp/temp.disk.qcow2',
};

describe('buildSparsifyArgs', () => {
  it('should pass --tmp, source, and destination in order', () => {
    assert.deepStrictEqual(buildSparsifyArgs(REQUEST), [
      '--tmp',
      '/tmp',
      '/data/disk.qcow2',
      '/tmp/temp.disk.qcow2',
    ]);
  });

  it('should add --compress and --convert before the paths', () => {
    assert.deepStrictEqual(buildSparsifyArgs(REQUEST, { compress: true, convert: 'qcow2' }), [
      '--tmp',
      '/tmp',
      '--compress',
      '--convert',
      'qcow2',
      '/data/disk.qcow2',
      '/tmp/temp.disk.qcow2',
    ]);
  });

  it('should omit flags that are false', () => {
    assert.deepStrictEqual(buildSparsifyArgs(REQUEST, { compress: false }), [
      '--tmp',
      '/tmp',
      '/data/disk.qcow2',
      '/tmp/temp.disk.qcow2',
    ]);
  });
});

describe('formatErrorMessage', () => {
  it('should prefer the "<tool>: error:" line', () => {
    const stderr = '[   0.0] Create overlay file\nvirt-sparsify: error: libguestfs error: could not create appliance\n';

    assert.strictEqual(
      formatErrorMessage('virt-sparsify', { code: 1, signal: null, stderr }),
      'virt-sparsify: error: libguestfs error: could not create appliance'
    );
  });

  it('should fall back to a line mentioning a failure', () => {
    const stderr = 'starting\nCannot open disk.qcow2\n';

    assert.strictEqual(
      formatErrorMessage('virt-sparsify', { code: 1, signal: null, stderr }),
      'Cannot open disk.qcow2'
    );
  });

  it('should join up to three lines when nothing looks like an error', () => {
    const stderr = 'one\ntwo\nthree\nfour\n';

    assert.strictEqual(
      formatErrorMessage('virt-sparsify', { code: 3, signal: null, stderr }),
      'one | two | three'
    );
  });

  it('should report the exit code for empty stderr', () => {
    assert.strictEqual(
      formatErrorMessage('virt-sparsify', { code: 4, signal: null, stderr: '' }),
      'virt-sparsify exited with code 4'
    );
  });

  it('should report the signal for a killed process', () => {
    assert.strictEqual(
      formatErrorMessage('virt-sparsify', { code: null, signal: 'SIGKILL', stderr: '\n' }),
      'virt-sparsify was terminated by SIGKILL'
    );
  });
});

describe('stripAnsiCodes', () => {
  it('should remove color codes and carriage returns', () => {
    assert.strictEqual(stripAnsiCodes('\x1b[31mred\x1b[0m\r\n'), 'red\n');
  });
});

describe('VirtSparsifyExecutor', () => {
  let dir: string;
  let tool: string;

  beforeEach(async () => {
    dir = await createTempDir('executor');
    tool = await writeFakeTool(dir);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('sparsify', () => {
    it('should run the tool with the built arguments', async () => {
      const source = join(dir, 'disk.qcow2');
      const destination = join(dir, 'temp.disk.qcow2');
      await writeFile(source, Buffer.concat([Buffer.from('QFI'), Buffer.alloc(64)]));

      const executor = new VirtSparsifyExecutor({ binaryPath: tool, flags: { compress: true } });
      await executor.sparsify({ scratchDir: dir, source, destination });

      assert.deepStrictEqual(await readInvocations(tool), [
        ['--tmp', dir, '--compress', source, destination],
      ]);
      assert.strictEqual(await readFile(destination, 'utf-8'), 'QFI');
    });

    it('should reject with SparsifyFailedError on a non-zero exit', async () => {
      const source = join(dir, 'disk.qcow2');
      await writeFile(source, 'FAIL');

      const executor = new VirtSparsifyExecutor({ binaryPath: tool });

      await assert.rejects(
        () => executor.sparsify({ scratchDir: dir, source, destination: join(dir, 'out') }),
        (error: unknown) => {
          assert.ok(error instanceof SparsifyFailedError);
          assert.strictEqual(error.toolExitCode, 1);
          assert.strictEqual(
            error.message,
            'virt-sparsify: error: libguestfs error: could not create appliance'
          );
          assert.ok(error.stderr.includes(`Create overlay file in ${dir}`));
          return true;
        }
      );
    });

    it('should reject with SparsifyFailedError when the binary is missing', async () => {
      const missing = join(dir, 'no-such-tool');
      const executor = new VirtSparsifyExecutor({ binaryPath: missing });

      await assert.rejects(
        () => executor.sparsify(REQUEST),
        (error: unknown) => {
          assert.ok(error instanceof SparsifyFailedError);
          assert.strictEqual(error.toolExitCode, null);
          assert.ok(error.message.startsWith(`Failed to spawn ${missing}:`));
          return true;
        }
      );
    });
  });

  describe('checkAvailable', () => {
    it('should report the version of an installed tool', async () => {
      const executor = new VirtSparsifyExecutor({ binaryPath: tool });

      assert.deepStrictEqual(await executor.checkAvailable(), {
        available: true,
        version: 'virt-sparsify 1.52.0',
      });
    });

    it('should report a missing tool as not installed', async () => {
      const missing = join(dir, 'no-such-tool');
      const executor = new VirtSparsifyExecutor({ binaryPath: missing });

      assert.deepStrictEqual(await executor.checkAvailable(), {
        available: false,
        message: `${missing} is not installed`,
      });
    });
  });

  describe('verbose output', () => {
    const originalWrite = process.stderr.write;
    let captured: string[] = [];

    afterEach(() => {
      process.stderr.write = originalWrite;
      captured = [];
    });

    function spyStderrWrite(): void {
      captured = [];
      process.stderr.write = function (chunk: unknown): boolean {
        if (typeof chunk === 'string') {
          captured.push(chunk);
        }
        return true;
      } as typeof process.stderr.write;
    }

    it('should NOT write the command when verbose is false', async () => {
      const source = join(dir, 'disk.qcow2');
      await writeFile(source, 'QFI');
      spyStderrWrite();

      const executor = new VirtSparsifyExecutor({ binaryPath: tool });
      await executor.sparsify({ scratchDir: dir, source, destination: join(dir, 'out') });

      assert.strictEqual(captured.filter((s) => s.includes('[$]')).length, 0);
    });

    it('should write the command once when verbose is true', async () => {
      const source = join(dir, 'disk.qcow2');
      const destination = join(dir, 'out');
      await writeFile(source, 'QFI');
      spyStderrWrite();

      const executor = new VirtSparsifyExecutor({ binaryPath: tool, verbose: true });
      await executor.sparsify({ scratchDir: dir, source, destination });

      const verboseOutput = captured.filter((s) => s.includes('[$]'));
      assert.strictEqual(verboseOutput.length, 1);
      assert.ok(verboseOutput[0]?.includes(`[$] ${tool} --tmp ${dir} ${source} ${destination}`));
    });
  });
});
