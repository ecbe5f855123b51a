/**
 * Error Types for qcow-reclaim
 *
 * Custom error classes with error codes for structured error handling.
 */

/**
 * Error codes for all reclaim errors
 */
export type ErrorCode =
  | 'INVALID_INPUT'
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_YAML'
  | 'CONFIG_VALIDATION_FAILED'
  | 'SPARSIFY_NOT_AVAILABLE'
  | 'LOCK_TIMEOUT'
  | 'TEMP_OUTPUT_EXISTS'
  | 'SPARSIFY_FAILED'
  | 'COMMIT_FAILED';

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  INVALID_INPUT: 1,
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_YAML: 1,
  CONFIG_VALIDATION_FAILED: 1,
  SPARSIFY_NOT_AVAILABLE: 2,
  LOCK_TIMEOUT: 2,
  TEMP_OUTPUT_EXISTS: 2,
  SPARSIFY_FAILED: 2,
  COMMIT_FAILED: 2,
};

/**
 * Base error class for all reclaim errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class ReclaimError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'ReclaimError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, ReclaimError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * Error for settings file issues.
 */
export class ConfigError extends ReclaimError {
  constructor(
    message: string,
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID_YAML' | 'CONFIG_VALIDATION_FAILED',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * Error for preflight check failures.
 */
export class PreflightError extends ReclaimError {
  constructor(
    message: string,
    code: 'INVALID_INPUT' | 'SPARSIFY_NOT_AVAILABLE',
    suggestion?: string
  ) {
    super(message, code, suggestion);
    this.name = 'PreflightError';
    Object.setPrototypeOf(this, PreflightError.prototype);
  }
}

/**
 * The image lock could not be obtained within the wait bound.
 */
export class LockTimeoutError extends ReclaimError {
  constructor(
    public readonly lockPath: string,
    public readonly timeoutMs: number
  ) {
    super(
      `Timed out after ${timeoutMs}ms waiting for exclusive lock on ${lockPath}`,
      'LOCK_TIMEOUT',
      'Another process is using the image. Shut down the VM or wait for the other reclaim to finish, then re-run.'
    );
    this.name = 'LockTimeoutError';
    Object.setPrototypeOf(this, LockTimeoutError.prototype);
  }
}

/**
 * The temporary output path was already taken when the reclaim tried to
 * claim it, by a run still in progress or a leftover from a killed one.
 */
export class TempOutputExistsError extends ReclaimError {
  constructor(public readonly tempPath: string) {
    super(
      `Temporary output ${tempPath} already exists`,
      'TEMP_OUTPUT_EXISTS',
      `Another reclaim may be writing it. If none is running, delete ${tempPath} and re-run.`
    );
    this.name = 'TempOutputExistsError';
    Object.setPrototypeOf(this, TempOutputExistsError.prototype);
  }
}

/**
 * virt-sparsify exited non-zero or could not be spawned.
 *
 * The original image is untouched when this is thrown.
 */
export class SparsifyFailedError extends ReclaimError {
  constructor(
    message: string,
    public readonly toolExitCode: number | null,
    public readonly stderr: string
  ) {
    super(
      message,
      'SPARSIFY_FAILED',
      'Check the virt-sparsify output above. The original image was left unchanged.'
    );
    this.name = 'SparsifyFailedError';
    Object.setPrototypeOf(this, SparsifyFailedError.prototype);
  }
}

/**
 * The final replace of the image failed after a successful sparsify.
 */
export class CommitError extends ReclaimError {
  constructor(
    message: string,
    public readonly imagePath: string,
    public readonly tempPath: string,
    public readonly errno?: string
  ) {
    super(
      message,
      'COMMIT_FAILED',
      `Verify ${imagePath} before using it; it may not have been replaced.`
    );
    this.name = 'CommitError';
    Object.setPrototypeOf(this, CommitError.prototype);
  }
}

/**
 * Check if an error is a ReclaimError.
 */
export function isReclaimError(error: unknown): error is ReclaimError {
  return error instanceof ReclaimError;
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isReclaimError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}
