/**
 * JSON Schema for the settings file
 */

/**
 * Upper bound for lock_timeout_ms (ten minutes)
 */
export const MAX_LOCK_TIMEOUT_MS = 600_000;

export const settingsSchema = {
  $id: 'qcow-reclaim/settings',
  type: 'object',
  additionalProperties: false,
  properties: {
    temp_dir: { type: 'string', minLength: 1 },
    lock_timeout_ms: { type: 'integer', minimum: 1, maximum: MAX_LOCK_TIMEOUT_MS },
    virt_sparsify_path: { type: 'string', minLength: 1 },
    compress: { type: 'boolean' },
    convert: { type: 'string', enum: ['qcow2', 'raw', 'vdi', 'vmdk'] },
  },
} as const;
