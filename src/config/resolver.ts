/**
 * Settings Resolver
 *
 * Applies defaults, CLI overrides, and path expansion to produce the
 * settings a reclaim runs with. Precedence: CLI > settings file > defaults.
 */

import { dirname, resolve } from 'node:path';

import { ConfigError } from '../core/errors.js';
import { DEFAULT_LOCK_TIMEOUT_MS } from '../lock/flock.js';
import { expandPath, getDefaultScratchDir, isPathLike } from '../lib/paths.js';
import { DEFAULT_SPARSIFY_BINARY } from '../sparsify/executor.js';
import { ConfigLoadError, loadYamlFile } from './loader.js';
import { formatValidationErrors, validateSettings } from './validator.js';
import type { ReclaimSettings, ResolvedSettings, SettingsOverrides } from './types.js';

/**
 * Resolve validated settings against defaults and overrides.
 *
 * Relative paths in the settings file resolve against the file's directory;
 * relative CLI paths resolve against the working directory.
 *
 * @param settings - Validated settings (empty when no file was given)
 * @param overrides - Values from the command line
 * @param settingsPath - Settings file the values came from, if any
 */
export function resolveSettings(
  settings: ReclaimSettings,
  overrides: SettingsOverrides = {},
  settingsPath?: string
): ResolvedSettings {
  const absoluteSettingsPath = settingsPath ? resolve(settingsPath) : undefined;
  const basePath = absoluteSettingsPath ? dirname(absoluteSettingsPath) : process.cwd();

  let tempDir: string;
  if (overrides.tempDir !== undefined) {
    tempDir = resolve(overrides.tempDir);
  } else if (settings.temp_dir !== undefined) {
    tempDir = expandPath(settings.temp_dir, basePath);
  } else {
    tempDir = getDefaultScratchDir();
  }

  const binary = settings.virt_sparsify_path ?? DEFAULT_SPARSIFY_BINARY;

  const resolved: ResolvedSettings = {
    tempDir,
    lockTimeoutMs: overrides.lockTimeoutMs ?? settings.lock_timeout_ms ?? DEFAULT_LOCK_TIMEOUT_MS,
    // Bare command names stay as-is for PATH lookup
    virtSparsifyPath: isPathLike(binary) ? expandPath(binary, basePath) : binary,
    compress: overrides.compress ?? settings.compress ?? false,
  };

  if (settings.convert !== undefined) {
    resolved.convert = settings.convert;
  }
  if (absoluteSettingsPath !== undefined) {
    resolved.settingsPath = absoluteSettingsPath;
  }

  return resolved;
}

/**
 * Load, validate, and resolve settings.
 *
 * @param settingsPath - Optional YAML settings file
 * @param overrides - Values from the command line
 * @throws ConfigError if the file is missing, malformed, or fails validation
 */
export async function loadSettings(
  settingsPath: string | undefined,
  overrides: SettingsOverrides = {}
): Promise<ResolvedSettings> {
  if (settingsPath === undefined) {
    return resolveSettings({}, overrides);
  }

  const absolutePath = resolve(settingsPath);

  let raw: unknown;
  try {
    raw = await loadYamlFile(absolutePath);
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      throw new ConfigError(
        error.message,
        error.reason === 'invalid-yaml' ? 'CONFIG_INVALID_YAML' : 'CONFIG_NOT_FOUND',
        error.reason === 'invalid-yaml'
          ? 'Fix the YAML syntax in the settings file.'
          : 'Ensure the settings file exists and is readable.',
        absolutePath
      );
    }
    throw error;
  }

  const result = validateSettings(raw);
  if (!result.valid) {
    throw new ConfigError(
      `Invalid settings in ${absolutePath}:\n${formatValidationErrors(result.errors)}`,
      'CONFIG_VALIDATION_FAILED',
      'Fix the listed settings. Allowed keys: temp_dir, lock_timeout_ms, virt_sparsify_path, compress, convert.',
      absolutePath,
      result.errors.map((e) => ({ path: e.path, message: e.message }))
    );
  }

  return resolveSettings(result.settings, overrides, absolutePath);
}
