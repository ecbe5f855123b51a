/**
 * Settings Loader
 *
 * Reads a YAML settings file and parses it. Validation happens later.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';

/**
 * Why a settings file could not be loaded
 */
export type ConfigLoadFailure = 'not-found' | 'unreadable' | 'invalid-yaml';

/**
 * Error thrown when a settings file cannot be read or parsed
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly reason: ConfigLoadFailure,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

const READ_FAILURES: Record<string, { reason: ConfigLoadFailure; describe: (path: string) => string }> = {
  ENOENT: { reason: 'not-found', describe: (path) => `Settings file not found: ${path}` },
  EACCES: { reason: 'unreadable', describe: (path) => `Permission denied reading settings file: ${path}` },
  EISDIR: { reason: 'unreadable', describe: (path) => `Settings path is a directory: ${path}` },
};

/**
 * Map a readFile failure to a ConfigLoadError.
 */
function toReadError(filePath: string, err: NodeJS.ErrnoException): ConfigLoadError {
  const known = err.code !== undefined ? READ_FAILURES[err.code] : undefined;
  if (known) {
    return new ConfigLoadError(known.describe(filePath), filePath, known.reason, err);
  }
  return new ConfigLoadError(`Failed to read settings file: ${filePath}`, filePath, 'unreadable', err);
}

/**
 * Load and parse a YAML settings file.
 *
 * An empty file, or one holding only comments, parses to `undefined`.
 *
 * @returns Parsed YAML content as unknown (requires validation)
 * @throws ConfigLoadError if the file cannot be read or parsed
 */
export async function loadYamlFile(filePath: string): Promise<unknown> {
  const content = await readFile(filePath, 'utf-8').catch((error: NodeJS.ErrnoException) => {
    throw toReadError(filePath, error);
  });

  try {
    return yaml.load(content, { filename: filePath });
  } catch (error) {
    const err = error as yaml.YAMLException;
    throw new ConfigLoadError(`Invalid YAML syntax in ${filePath}: ${err.message}`, filePath, 'invalid-yaml', err);
  }
}
