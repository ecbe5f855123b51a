/**
 * Sparsify Types
 *
 * Contract between the reclaimer and the tool that produces the
 * space-reclaimed copy of an image.
 */

/**
 * Output formats virt-sparsify can convert to
 */
export type SparsifyFormat = 'qcow2' | 'raw' | 'vdi' | 'vmdk';

/**
 * A single sparsify invocation.
 *
 * Paths are passed through to the tool unchanged.
 */
export interface SparsifyRequest {
  /** Scratch directory for the tool's own temporary files (--tmp) */
  scratchDir: string;
  /** Image to read; never modified */
  source: string;
  /** Where to write the sparsified copy */
  destination: string;
}

/**
 * Tool flags that do not vary per invocation
 */
export interface SparsifyFlags {
  /** Compress the output (qcow2 only) */
  compress?: boolean;
  /** Convert the output to another format */
  convert?: SparsifyFormat;
}

/**
 * Anything that can produce a sparsified copy of an image.
 *
 * Implementations must reject when no usable output was produced.
 */
export interface Sparsifier {
  sparsify(request: SparsifyRequest): Promise<void>;
}

/**
 * Result of probing for the sparsify tool
 */
export interface SparsifyAvailability {
  available: boolean;
  /** First line of `--version` output when available */
  version?: string;
  /** Failure description when not available */
  message?: string;
}
