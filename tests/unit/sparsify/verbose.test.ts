/**
 * Unit tests for verbose output helpers
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  formatCommand,
  quoteArg,
  supportsAnsi,
  toCommandLine,
} from '../../../src/sparsify/verbose.js';

describe('formatCommand', () => {
  it('should produce expected exact format', () => {
    assert.strictEqual(
      formatCommand('virt-sparsify --tmp /tmp a.qcow2 b.qcow2', false),
      '\n[$] virt-sparsify --tmp /tmp a.qcow2 b.qcow2\n\n'
    );
  });

  it('should keep a command with a newline in an argument on one line', () => {
    const command = toCommandLine('virt-sparsify', ['--tmp', '/tmp', '/data/vm\n1.qcow2']);

    assert.strictEqual(formatCommand(command, false), `\n[$] virt-sparsify --tmp /tmp $'/data/vm\\n1.qcow2'\n\n`);
  });

  it('should wrap in gray ANSI codes when ansi is true', () => {
    const result = formatCommand('virt-sparsify', true);

    assert.ok(result.startsWith('\x1b[90m'), 'should start with gray');
    assert.ok(result.endsWith('\x1b[0m'), 'should end with reset');
    assert.strictEqual(result.replace(/\x1b\[[0-9;]*m/g, ''), formatCommand('virt-sparsify', false));
  });
});

describe('quoteArg', () => {
  it('should leave plain paths and flags unquoted', () => {
    assert.strictEqual(quoteArg('/var/lib/libvirt/images/node1.qcow2'), '/var/lib/libvirt/images/node1.qcow2');
    assert.strictEqual(quoteArg('--tmp'), '--tmp');
  });

  it('should single-quote arguments with spaces', () => {
    assert.strictEqual(quoteArg('/mnt/my disks/a.qcow2'), `'/mnt/my disks/a.qcow2'`);
  });

  it('should escape embedded single quotes', () => {
    assert.strictEqual(quoteArg(`it's.qcow2`), `'it'\\''s.qcow2'`);
  });

  it('should use ANSI-C quoting for control characters', () => {
    assert.strictEqual(quoteArg('disk\nname.qcow2'), `$'disk\\nname.qcow2'`);
    assert.strictEqual(quoteArg(`it's\t1`), `$'it\\'s\\t1'`);
    assert.strictEqual(quoteArg('a\\b\x01'), `$'a\\\\b\\x01'`);
  });

  it('should quote the empty string', () => {
    assert.strictEqual(quoteArg(''), `''`);
  });
});

describe('toCommandLine', () => {
  it('should join the binary and quoted arguments with spaces', () => {
    assert.strictEqual(
      toCommandLine('virt-sparsify', ['--tmp', '/tmp', '/data/vm 1.qcow2', '/tmp/temp.vm 1.qcow2']),
      `virt-sparsify --tmp /tmp '/data/vm 1.qcow2' '/tmp/temp.vm 1.qcow2'`
    );
  });
});

describe('supportsAnsi', () => {
  it('should return a boolean', () => {
    assert.strictEqual(typeof supportsAnsi(), 'boolean');
  });
});
