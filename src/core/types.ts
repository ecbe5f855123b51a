/**
 * Core Types for qcow-reclaim
 *
 * Types for the reclaim operation and its preflight checks.
 */

import type { Sparsifier } from '../sparsify/types.js';

/**
 * Stages of a reclaim, reported in order as each one finishes
 */
export type ReclaimStage =
  | 'locked'     // Exclusive lock held on the image
  | 'sparsified' // virt-sparsify wrote the temporary output
  | 'committed'; // Temporary output renamed over the image

/**
 * Progress event emitted by the reclaimer
 */
export interface ReclaimProgress {
  stage: ReclaimStage;
  imagePath: string;
  tempPath: string;
}

/**
 * Options for a single reclaim
 */
export interface ReclaimOptions {
  /** Sparsify implementation (virt-sparsify in production) */
  sparsifier: Sparsifier;
  /** Lock wait bound in milliseconds (default: 1000) */
  lockTimeoutMs?: number;
  /** Interval between non-blocking lock attempts (default: 50) */
  lockPollIntervalMs?: number;
  /** Called as each stage completes */
  onProgress?: (progress: ReclaimProgress) => void;
}

/**
 * Outcome of a successful reclaim
 */
export interface ReclaimResult {
  /** Absolute path of the image that was replaced */
  imagePath: string;
  /** Absolute path of the scratch directory */
  scratchDir: string;
  /** Path the sparsified copy was staged at */
  tempPath: string;
  /** Image size in bytes before the reclaim */
  sizeBefore: number;
  /** Image size in bytes after the reclaim */
  sizeAfter: number;
  /** max(0, sizeBefore - sizeAfter) */
  reclaimedBytes: number;
  /** Wall-clock time from lock request to commit */
  durationMs: number;
  /** Whether the commit had to stage a copy across filesystems */
  crossDevice: boolean;
  /** Temporary output that could not be removed after a cross-filesystem commit */
  leftoverPath?: string;
}

/**
 * Result of a preflight check
 */
export interface PreflightResult {
  /** Whether the check passed */
  passed: boolean;
  /** Error message if failed */
  message?: string;
  /** Suggested fix if failed */
  suggestion?: string;
}

/**
 * Aggregate result of all preflight checks
 */
export interface PreflightCheckResults {
  /** Whether all checks passed */
  allPassed: boolean;
  /** Individual check results */
  imageIsFile: PreflightResult;
  scratchIsDirectory: PreflightResult;
  sparsifyAvailable: PreflightResult & { version?: string };
}
