/**
 * Settings Types for qcow-reclaim
 *
 * These types represent the optional YAML settings file and the resolved
 * settings with defaults and CLI overrides applied.
 */

import type { SparsifyFormat } from '../sparsify/types.js';

// =============================================================================
// YAML Input Types
// =============================================================================

/**
 * Root object parsed from a settings file. Every key is optional.
 */
export interface ReclaimSettings {
  /** Default scratch directory */
  temp_dir?: string;
  /** Lock wait bound in milliseconds. Default: 1000 */
  lock_timeout_ms?: number;
  /** virt-sparsify binary name or path. Default: virt-sparsify */
  virt_sparsify_path?: string;
  /** Pass --compress to virt-sparsify. Default: false */
  compress?: boolean;
  /** Pass --convert <format> to virt-sparsify */
  convert?: SparsifyFormat;
}

// =============================================================================
// Resolved Types
// =============================================================================

/**
 * Values given on the command line; these win over the settings file
 */
export interface SettingsOverrides {
  tempDir?: string;
  lockTimeoutMs?: number;
  compress?: boolean;
}

/**
 * Settings with all defaults applied
 */
export interface ResolvedSettings {
  /** Absolute scratch directory */
  tempDir: string;
  /** Lock wait bound in milliseconds */
  lockTimeoutMs: number;
  /** Binary name (looked up on PATH) or absolute path */
  virtSparsifyPath: string;
  /** Pass --compress */
  compress: boolean;
  /** Pass --convert when set */
  convert?: SparsifyFormat;
  /** Absolute path of the settings file, when one was loaded */
  settingsPath?: string;
}
