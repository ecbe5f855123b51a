/**
 * CLI Output Layer
 *
 * Provides consistent output formatting for the reclaim command in both
 * human-readable and JSON modes.
 */

import type { ErrorCode, ReclaimError } from '../core/errors.js';
import type { ReclaimProgress, ReclaimResult } from '../core/types.js';

// =============================================================================
// Output Types
// =============================================================================

/**
 * Standard output format for --json mode
 */
export interface CommandResult {
  success: boolean;
  command: string;
  result?: ReclaimResult;
  error?: ErrorOutput;
}

/**
 * Error output format for JSON mode
 */
export interface ErrorOutput {
  code: ErrorCode | string;
  message: string;
  suggestion?: string;
}

// =============================================================================
// Formatting Helpers
// =============================================================================

const UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'] as const;

/**
 * Format a byte count with a binary unit, e.g. 1536 -> "1.5 KiB".
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  const text = unit === 0 ? String(value) : value.toFixed(1);
  return `${text} ${UNITS[unit]}`;
}

/**
 * Format a duration, e.g. 950 -> "950ms", 61000 -> "1m 1s".
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const totalSeconds = Math.round(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}

// =============================================================================
// OutputFormatter Class
// =============================================================================

/**
 * Output mode for the formatter
 */
export type OutputMode = 'human' | 'json';

/**
 * CLI-specific output formatter.
 *
 * In human mode each message is printed as it happens. In JSON mode
 * output is collected and emitted as a single JSON object at flush.
 */
export class OutputFormatter {
  private mode: OutputMode;
  private result: CommandResult;
  private indentLevel: number = 0;

  constructor(command: string, options: { json?: boolean } = {}) {
    this.mode = options.json ? 'json' : 'human';
    this.result = {
      success: true,
      command,
    };
  }

  /**
   * Check if in JSON mode.
   */
  isJson(): boolean {
    return this.mode === 'json';
  }

  // ===========================================================================
  // Indentation
  // ===========================================================================

  indent(): void {
    this.indentLevel++;
  }

  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  // ===========================================================================
  // Basic Output Methods
  // ===========================================================================

  /**
   * Print a success message.
   */
  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}✓ ${message}`);
    }
  }

  /**
   * Print an error message and mark the command failed.
   */
  error(message: string, error?: ReclaimError): void {
    this.result.success = false;

    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ ${message}`);
      if (error?.suggestion) {
        console.error(`${this.getIndent()}  Fix: ${error.suggestion}`);
      }
    }

    this.result.error = {
      code: error?.code ?? 'UNKNOWN',
      message,
    };
    if (error?.suggestion) {
      this.result.error.suggestion = error.suggestion;
    }
  }

  /**
   * Print an info message.
   */
  info(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${message}`);
    }
  }

  /**
   * Print a warning message.
   */
  warning(message: string): void {
    if (this.mode === 'human') {
      console.warn(`${this.getIndent()}⚠ ${message}`);
    }
  }

  // ===========================================================================
  // Reclaim Output
  // ===========================================================================

  /**
   * Print the header for a reclaim run.
   */
  reclaimStart(imagePath: string, scratchDir: string): void {
    if (this.mode === 'human') {
      this.info(`Reclaiming space: ${imagePath}`);
      this.indent();
      this.info(`Scratch directory: ${scratchDir}`);
      this.dedent();
    }
  }

  /**
   * Print a completed reclaim stage.
   */
  progress(event: ReclaimProgress): void {
    switch (event.stage) {
      case 'locked':
        this.success('Lock acquired');
        break;
      case 'sparsified':
        this.success(`Sparsified to ${event.tempPath}`);
        break;
      case 'committed':
        this.success(`Replaced ${event.imagePath}`);
        break;
    }
  }

  /**
   * Print the final summary and record the result for JSON output.
   */
  reclaimDone(result: ReclaimResult): void {
    if (this.mode === 'human') {
      if (result.crossDevice) {
        this.warning('Scratch directory is on another filesystem; the output was copied beside the image before the rename.');
      }
      if (result.leftoverPath) {
        this.warning(`Could not remove ${result.leftoverPath}; delete it by hand.`);
      }
      this.info(
        `Done. Reclaimed ${formatBytes(result.reclaimedBytes)} ` +
          `(${formatBytes(result.sizeBefore)} → ${formatBytes(result.sizeAfter)}) ` +
          `in ${formatDuration(result.durationMs)}.`
      );
    }

    this.result.result = result;
  }

  // ===========================================================================
  // JSON Output
  // ===========================================================================

  /**
   * Get the command result object.
   */
  getResult(): CommandResult {
    return this.result;
  }

  /**
   * Flush output.
   *
   * In JSON mode, prints the collected JSON.
   * In human mode, does nothing (output was printed inline).
   */
  flush(): void {
    if (this.mode === 'json') {
      console.log(JSON.stringify(this.result, null, 2));
    }
  }

  /**
   * Get the exit code based on success status.
   */
  getExitCode(): number {
    return this.result.success ? 0 : 1;
  }
}

/**
 * Create an OutputFormatter from CLI options.
 */
export function createOutput(command: string, options: { json?: boolean }): OutputFormatter {
  return new OutputFormatter(command, options);
}
