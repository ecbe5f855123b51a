/**
 * Path Utilities
 *
 * Path expansion for settings values and the temporary output location.
 */

import { homedir, tmpdir } from 'node:os';
import { basename, isAbsolute, join, resolve } from 'node:path';

/**
 * Expand a path, resolving ~ to home directory and making relative paths absolute.
 *
 * @param inputPath - Path that may contain ~, $VAR, or be relative
 * @param basePath - Base directory for resolving relative paths
 * @returns Absolute path with ~ and variables expanded
 */
export function expandPath(inputPath: string, basePath: string): string {
  let expanded = inputPath;

  // Expand ~ to home directory
  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = join(homedir(), expanded.slice(1));
  }

  // Expand $VAR and ${VAR}; unset variables become empty
  expanded = expanded.replace(
    /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_, braced: string | undefined, bare: string | undefined) => {
      return process.env[braced ?? bare ?? ''] ?? '';
    }
  );

  // Make relative paths absolute relative to the base directory
  if (!isAbsolute(expanded)) {
    expanded = resolve(basePath, expanded);
  }

  return expanded;
}

/**
 * Whether a configured binary is a path rather than a bare command name.
 */
export function isPathLike(value: string): boolean {
  return value.includes('/') || value.startsWith('~');
}

/**
 * Path of the temporary output for an image.
 *
 * @param scratchDir - Scratch directory
 * @param imagePath - Image being reclaimed
 * @returns `<scratchDir>/temp.<basename(imagePath)>`
 */
export function getTempOutputPath(scratchDir: string, imagePath: string): string {
  return join(scratchDir, `temp.${basename(imagePath)}`);
}

/**
 * Default scratch directory when neither the CLI nor the settings name one.
 */
export function getDefaultScratchDir(): string {
  return tmpdir();
}
