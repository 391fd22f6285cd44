/**
 * Print buffer factories and config validation.
 */

import type {
  ConfigValidationResult,
  PrintBuffer,
  PrintBufferConfig,
  PrintBufferStorage,
} from '../../types/printbuf.ts';
import { ZERO_BYTE_OFFSET } from '../../types/branded.ts';
import { DEFAULT_MAX_CAPACITY, heapAllocator } from './allocator.ts';

/**
 * Default configuration values.
 */
const DEFAULT_CONFIG: Required<PrintBufferConfig> = {
  units: 'binary',
  humanReadableUnits: false,
  suppressIndentTabstopHandling: false,
  maxCapacity: DEFAULT_MAX_CAPACITY,
  allocator: heapAllocator,
};

/**
 * Validate a config with detailed error messages.
 *
 * @example
 * ```typescript
 * const result = validatePrintBufferConfig({ units: 'octal' });
 * if (!result.valid) {
 *   console.error('Invalid config:', result.errors);
 * }
 * ```
 */
export function validatePrintBufferConfig(value: unknown): ConfigValidationResult {
  const errors: string[] = [];

  if (typeof value !== 'object' || value === null) {
    errors.push('Config must be a non-null object');
    return { valid: false, errors };
  }

  const config = value as Record<string, unknown>;

  if (config.units !== undefined && config.units !== 'binary' && config.units !== 'decimal') {
    errors.push(`"units" must be 'binary' or 'decimal', got ${String(config.units)}`);
  }
  if (config.humanReadableUnits !== undefined && typeof config.humanReadableUnits !== 'boolean') {
    errors.push('"humanReadableUnits" must be a boolean');
  }
  if (
    config.suppressIndentTabstopHandling !== undefined &&
    typeof config.suppressIndentTabstopHandling !== 'boolean'
  ) {
    errors.push('"suppressIndentTabstopHandling" must be a boolean');
  }
  if (config.maxCapacity !== undefined) {
    if (typeof config.maxCapacity !== 'number' || !Number.isInteger(config.maxCapacity)) {
      errors.push('"maxCapacity" must be an integer');
    } else if (config.maxCapacity < 1) {
      errors.push(`"maxCapacity" must be positive: ${config.maxCapacity}`);
    }
  }
  if (config.allocator !== undefined) {
    const allocator = config.allocator;
    if (
      typeof allocator !== 'object' ||
      allocator === null ||
      typeof (allocator as { reallocate?: unknown }).reallocate !== 'function'
    ) {
      errors.push('"allocator" must provide a reallocate() function');
    }
  }

  return { valid: errors.length === 0, errors };
}

function resolveConfig(config: Partial<PrintBufferConfig>): Required<PrintBufferConfig> {
  const result = validatePrintBufferConfig(config);
  if (!result.valid) {
    throw new Error(`Invalid print buffer config: ${result.errors.join('; ')}`);
  }
  return {
    units: config.units ?? DEFAULT_CONFIG.units,
    humanReadableUnits: config.humanReadableUnits ?? DEFAULT_CONFIG.humanReadableUnits,
    suppressIndentTabstopHandling:
      config.suppressIndentTabstopHandling ?? DEFAULT_CONFIG.suppressIndentTabstopHandling,
    maxCapacity: config.maxCapacity ?? DEFAULT_CONFIG.maxCapacity,
    allocator: config.allocator ?? DEFAULT_CONFIG.allocator,
  };
}

function createBuffer(storage: PrintBufferStorage, config: Required<PrintBufferConfig>): PrintBuffer {
  return {
    storage,
    pos: ZERO_BYTE_OFFSET,
    lastNewline: ZERO_BYTE_OFFSET,
    lastField: ZERO_BYTE_OFFSET,
    indent: 0,
    lineIndent: 0,
    atomic: 0,
    allocationFailure: false,
    units: config.units,
    humanReadableUnits: config.humanReadableUnits,
    hasIndentOrTabstops: false,
    suppressIndentTabstopHandling: config.suppressIndentTabstopHandling,
    tabstops: [],
    curTabstop: 0,
    maxCapacity: config.maxCapacity,
    allocator: config.allocator,
  };
}

/**
 * Create an empty buffer that owns its storage.
 * Nothing is allocated until the first write.
 *
 * @throws Error if the config is invalid
 */
export function createPrintBuffer(config: Partial<PrintBufferConfig> = {}): PrintBuffer {
  return createBuffer({ kind: 'owned', bytes: new Uint8Array(0) }, resolveConfig(config));
}

/**
 * Create a buffer that writes into caller-supplied storage.
 * The storage is never reallocated; output past its end is truncated.
 *
 * @throws Error if the config is invalid
 */
export function createExternalPrintBuffer(
  bytes: Uint8Array,
  config: Partial<PrintBufferConfig> = {}
): PrintBuffer {
  const out = createBuffer({ kind: 'borrowed', bytes }, resolveConfig(config));
  if (bytes.length > 0) {
    bytes[0] = 0;
  }
  return out;
}
