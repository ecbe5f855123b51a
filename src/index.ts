/**
 * qcow-reclaim library entry point
 */

export { reclaim } from './core/reclaimer.js';
export * from './core/errors.js';
export type * from './core/types.js';
export {
  runPreflightChecks,
  assertPreflightPassed,
  checkImagePath,
  checkScratchDir,
  checkSparsifyAvailability,
  type AvailabilityProbe,
} from './core/preflight.js';
export { FileLock, withExclusiveLock, type LockOptions } from './lock/flock.js';
export { replaceFile, type ReplaceFs, type ReplaceResult } from './lib/replace.js';
export { loadSettings, resolveSettings } from './config/resolver.js';
export type * from './config/types.js';
export * from './sparsify/index.js';
