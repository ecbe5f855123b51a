/**
 * Reclaim Command Handler
 *
 * Resolves settings, runs preflight checks, and reclaims space in a
 * single qcow2 image.
 */

import { resolve } from 'node:path';

import { loadSettings } from '../../config/resolver.js';
import type { SettingsOverrides } from '../../config/types.js';
import { assertPreflightPassed, runPreflightChecks } from '../../core/preflight.js';
import { reclaim } from '../../core/reclaimer.js';
import { getExitCode, isReclaimError } from '../../core/errors.js';
import { VirtSparsifyExecutor } from '../../sparsify/executor.js';
import { createOutput, OutputFormatter } from '../output.js';

/**
 * Options for the reclaim command
 */
export interface ReclaimCommandOptions {
  tmp?: string;
  config?: string;
  lockTimeout?: number;
  compress?: boolean;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Execute the reclaim command.
 *
 * This command:
 * 1. Resolves settings (CLI > settings file > defaults)
 * 2. Checks the image, scratch directory, and virt-sparsify
 * 3. Locks the image, sparsifies it, and renames the result into place
 *
 * @param file - Path to the qcow2 image
 * @param options - Command options
 */
export async function reclaimCommand(file: string, options: ReclaimCommandOptions): Promise<void> {
  const output = createOutput('reclaim', options);

  try {
    const overrides: SettingsOverrides = {};
    if (options.tmp !== undefined) overrides.tempDir = options.tmp;
    if (options.lockTimeout !== undefined) overrides.lockTimeoutMs = options.lockTimeout;
    if (options.compress) overrides.compress = true;

    const settings = await loadSettings(options.config, overrides);
    const imagePath = resolve(file);

    const executor = new VirtSparsifyExecutor({
      binaryPath: settings.virtSparsifyPath,
      verbose: options.verbose === true,
      flags: {
        compress: settings.compress,
        ...(settings.convert ? { convert: settings.convert } : {}),
      },
    });

    const checks = await runPreflightChecks(imagePath, settings.tempDir, executor);
    assertPreflightPassed(checks);

    output.reclaimStart(imagePath, settings.tempDir);
    if (options.verbose && checks.sparsifyAvailable.version) {
      output.info(`Using ${checks.sparsifyAvailable.version}`);
    }

    const result = await reclaim(imagePath, settings.tempDir, {
      sparsifier: executor,
      lockTimeoutMs: settings.lockTimeoutMs,
      onProgress: (event) => output.progress(event),
    });

    output.reclaimDone(result);
    output.flush();
    process.exit(output.getExitCode());
  } catch (error) {
    handleError(output, error);
  }
}

/**
 * Handle errors and exit appropriately.
 */
function handleError(output: OutputFormatter, error: unknown): never {
  if (isReclaimError(error)) {
    output.error(error.message, error);
  } else if (error instanceof Error) {
    output.error(error.message);
  } else {
    output.error(String(error));
  }

  output.flush();
  process.exit(getExitCode(error));
}
