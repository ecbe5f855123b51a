/**
 * Preflight Checks for qcow-reclaim
 *
 * Validates inputs before anything is locked or written:
 * - Image path is an existing regular file
 * - Scratch directory exists
 * - virt-sparsify can be run
 */

import { stat } from 'node:fs/promises';

import type { SparsifyAvailability } from '../sparsify/types.js';
import type { PreflightCheckResults, PreflightResult } from './types.js';
import { PreflightError } from './errors.js';

/**
 * Anything that can report whether the sparsify tool is installed
 */
export interface AvailabilityProbe {
  checkAvailable(): Promise<SparsifyAvailability>;
}

/**
 * Run all preflight checks before a reclaim.
 *
 * @param imagePath - Image to reclaim
 * @param scratchDir - Scratch directory
 * @param probe - Sparsify tool probe
 * @returns Aggregate preflight check results
 */
export async function runPreflightChecks(
  imagePath: string,
  scratchDir: string,
  probe: AvailabilityProbe
): Promise<PreflightCheckResults> {
  const [imageResult, scratchResult, toolResult] = await Promise.all([
    checkImagePath(imagePath),
    checkScratchDir(scratchDir),
    checkSparsifyAvailability(probe),
  ]);

  return {
    allPassed: imageResult.passed && scratchResult.passed && toolResult.passed,
    imageIsFile: imageResult,
    scratchIsDirectory: scratchResult,
    sparsifyAvailable: toolResult,
  };
}

/**
 * Check that the image path is an existing regular file.
 */
export async function checkImagePath(imagePath: string): Promise<PreflightResult> {
  // A path that cannot be stat'ed counts as missing
  const stats = await stat(imagePath).catch(() => null);
  if (stats?.isFile()) {
    return { passed: true };
  }
  return {
    passed: false,
    message: `${imagePath} is not a file`,
    suggestion: 'Pass the path of an existing qcow2 image.',
  };
}

/**
 * Check that the scratch directory exists.
 */
export async function checkScratchDir(scratchDir: string): Promise<PreflightResult> {
  // A path that cannot be stat'ed counts as missing
  const stats = await stat(scratchDir).catch(() => null);
  if (stats?.isDirectory()) {
    return { passed: true };
  }
  return {
    passed: false,
    message: `${scratchDir} is not a directory`,
    suggestion: 'Create the directory or pass an existing one with -t <dir>.',
  };
}

/**
 * Check that the sparsify tool can be run.
 */
export async function checkSparsifyAvailability(
  probe: AvailabilityProbe
): Promise<PreflightResult & { version?: string }> {
  const result = await probe.checkAvailable();
  if (result.available) {
    return result.version ? { passed: true, version: result.version } : { passed: true };
  }
  return {
    passed: false,
    message: result.message ?? 'virt-sparsify is not installed',
    suggestion: 'Install libguestfs tools (e.g. apt-get install libguestfs-tools) or set virt_sparsify_path in the settings file.',
  };
}

/**
 * Throw a PreflightError if checks failed.
 *
 * Input errors are reported before a missing tool.
 *
 * @param results - Preflight check results
 * @throws PreflightError if any check failed
 */
export function assertPreflightPassed(results: PreflightCheckResults): void {
  if (results.allPassed) {
    return;
  }

  if (!results.scratchIsDirectory.passed) {
    throw new PreflightError(
      results.scratchIsDirectory.message ?? 'Scratch directory not found',
      'INVALID_INPUT',
      results.scratchIsDirectory.suggestion
    );
  }

  if (!results.imageIsFile.passed) {
    throw new PreflightError(
      results.imageIsFile.message ?? 'Image not found',
      'INVALID_INPUT',
      results.imageIsFile.suggestion
    );
  }

  if (!results.sparsifyAvailable.passed) {
    throw new PreflightError(
      results.sparsifyAvailable.message ?? 'virt-sparsify is not installed',
      'SPARSIFY_NOT_AVAILABLE',
      results.sparsifyAvailable.suggestion
    );
  }
}
