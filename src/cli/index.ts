#!/usr/bin/env node
import { InvalidArgumentError, program } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import { reclaimCommand, type ReclaimCommandOptions } from './commands/reclaim.js';
import { MAX_LOCK_TIMEOUT_MS } from '../config/schema.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packagePath, 'utf-8')) as { version: string };

/**
 * Parse --lock-timeout as a whole number of milliseconds.
 */
function parseLockTimeout(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_LOCK_TIMEOUT_MS) {
    throw new InvalidArgumentError(`Expected whole milliseconds between 1 and ${MAX_LOCK_TIMEOUT_MS}.`);
  }
  return parsed;
}

program
  .name('reclaim')
  .description('Reclaim unused space in a qcow2 image with virt-sparsify')
  .version(packageJson.version)
  .argument('<image>', 'qcow2 image to reclaim')
  .option('-t, --tmp <dir>', 'Scratch directory for the sparsified copy (default: system temp directory)')
  .option('-c, --config <file>', 'YAML settings file')
  .option('--lock-timeout <ms>', 'How long to wait for the image lock', parseLockTimeout)
  .option('--compress', 'Compress the sparsified image')
  .option('--json', 'Output as JSON')
  .option('--verbose', 'Print the virt-sparsify command before execution')
  .action((image: string, opts: ReclaimCommandOptions) => reclaimCommand(image, opts));

await program.parseAsync();
