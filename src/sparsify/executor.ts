/**
 * virt-sparsify Executor
 *
 * Spawns virt-sparsify to write a space-reclaimed copy of a disk image.
 */

import { spawn } from 'node:child_process';

import { SparsifyFailedError } from '../core/errors.js';
import type {
  Sparsifier,
  SparsifyAvailability,
  SparsifyFlags,
  SparsifyRequest,
} from './types.js';
import { formatCommand, supportsAnsi, toCommandLine } from './verbose.js';

/**
 * Default binary looked up on PATH
 */
export const DEFAULT_SPARSIFY_BINARY = 'virt-sparsify';

/**
 * Options for constructing a VirtSparsifyExecutor
 */
export interface VirtSparsifyExecutorOptions {
  /** Path to virt-sparsify (default: 'virt-sparsify') */
  binaryPath?: string;
  /** Print the command to stderr before execution (default: false) */
  verbose?: boolean;
  /** Extra tool flags applied to every invocation */
  flags?: SparsifyFlags;
}

/**
 * Captured output of a finished process
 */
interface ProcessOutput {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

/**
 * Build the virt-sparsify argument vector.
 *
 * Source and destination always come last, in that order.
 */
export function buildSparsifyArgs(request: SparsifyRequest, flags: SparsifyFlags = {}): string[] {
  const args = ['--tmp', request.scratchDir];

  if (flags.compress) {
    args.push('--compress');
  }
  if (flags.convert) {
    args.push('--convert', flags.convert);
  }

  args.push(request.source, request.destination);
  return args;
}

/**
 * Runs virt-sparsify as a child process.
 */
export class VirtSparsifyExecutor implements Sparsifier {
  private readonly binaryPath: string;
  private readonly verbose: boolean;
  private readonly flags: SparsifyFlags;

  constructor(options?: VirtSparsifyExecutorOptions) {
    this.binaryPath = options?.binaryPath ?? DEFAULT_SPARSIFY_BINARY;
    this.verbose = options?.verbose ?? false;
    this.flags = options?.flags ?? {};
  }

  /**
   * Write a sparsified copy of `request.source` to `request.destination`.
   *
   * No timeout applies: sparsifying a large image can take arbitrarily long.
   *
   * @throws SparsifyFailedError if the tool cannot be spawned or exits non-zero
   */
  async sparsify(request: SparsifyRequest): Promise<void> {
    const args = buildSparsifyArgs(request, this.flags);

    if (this.verbose) {
      process.stderr.write(formatCommand(toCommandLine(this.binaryPath, args), supportsAnsi()));
    }

    let output: ProcessOutput;
    try {
      output = await this.run(args);
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      throw new SparsifyFailedError(
        `Failed to spawn ${this.binaryPath}: ${err.message}`,
        null,
        ''
      );
    }

    if (output.code !== 0) {
      throw new SparsifyFailedError(
        formatErrorMessage(this.binaryPath, output),
        output.code,
        output.stderr
      );
    }
  }

  /**
   * Probe for the tool by running `--version`.
   *
   * Never rejects; a missing binary is reported as unavailable.
   */
  async checkAvailable(): Promise<SparsifyAvailability> {
    try {
      const output = await this.run(['--version']);
      if (output.code !== 0) {
        return {
          available: false,
          message: formatErrorMessage(this.binaryPath, output),
        };
      }
      const version = output.stdout.trim().split('\n')[0]?.trim();
      return version ? { available: true, version } : { available: true };
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === 'ENOENT') {
        return { available: false, message: `${this.binaryPath} is not installed` };
      }
      return { available: false, message: `Failed to run ${this.binaryPath}: ${err.message}` };
    }
  }

  /**
   * Spawn the binary and collect its output.
   *
   * Rejects only when the process could not be started.
   */
  private run(args: string[]): Promise<ProcessOutput> {
    return new Promise<ProcessOutput>((resolve, reject) => {
      const child = spawn(this.binaryPath, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';

      child.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', reject);

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        resolve({ code, signal, stdout, stderr });
      });
    });
  }
}

/**
 * Strip ANSI escape codes and carriage returns from a string.
 */
export function stripAnsiCodes(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*[a-zA-Z]/g, '').replace(/\r/g, '');
}

/**
 * Format a user-friendly error message from a failed run.
 *
 * libguestfs tools prefix fatal errors with "<tool>: error:", so that
 * line is preferred when present.
 */
export function formatErrorMessage(
  binary: string,
  output: Pick<ProcessOutput, 'code' | 'signal' | 'stderr'>
): string {
  const lines = stripAnsiCodes(output.stderr)
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const errorLine =
    lines.find((line) => line.includes(': error:')) ??
    lines.find((line) => /error|cannot|unable|failed/i.test(line));

  if (errorLine) {
    return errorLine;
  }

  if (lines.length > 0) {
    return lines.slice(0, 3).join(' | ');
  }

  if (output.signal) {
    return `${binary} was terminated by ${output.signal}`;
  }

  return `${binary} exited with code ${output.code}`;
}
