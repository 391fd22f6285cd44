/**
 * Print buffer state types.
 *
 * A PrintBuffer is a mutable record owned by a single writer. It is created
 * by the factories in `printbuf/core/state.ts` and changed only through the
 * write API; the fields are public so callers can poll them, not so they can
 * assign them.
 */

import type { ByteOffset, ColumnNumber } from './branded.ts';

// =============================================================================
// Units
// =============================================================================

/**
 * Base used for human-readable numbers.
 * - binary: powers of 1024 (KiB, MiB, ...)
 * - decimal: powers of 1000 (kB, MB, ...)
 */
export type UnitBase = 'binary' | 'decimal';

// =============================================================================
// Allocation
// =============================================================================

/**
 * How urgently growth must obtain memory. `atomic` is requested while the
 * buffer's atomic counter is nonzero.
 */
export type AllocationMode = 'normal' | 'atomic';

/**
 * Memory source for owned storage.
 */
export interface ByteAllocator {
  /**
   * Return a new array of exactly `size` bytes that starts with the contents
   * of `previous`, or `null` if the memory could not be obtained.
   */
  reallocate(previous: Uint8Array, size: number, mode: AllocationMode): Uint8Array | null;
}

// =============================================================================
// Storage
// =============================================================================

/**
 * Storage allocated and grown by the buffer itself.
 */
export interface OwnedStorage {
  readonly kind: 'owned';
  readonly bytes: Uint8Array;
}

/**
 * Caller-supplied storage. Never reallocated.
 */
export interface BorrowedStorage {
  readonly kind: 'borrowed';
  readonly bytes: Uint8Array;
}

/**
 * Storage after teardown or after the caller took the bytes.
 */
export interface ReleasedStorage {
  readonly kind: 'released';
}

export type PrintBufferStorage = OwnedStorage | BorrowedStorage | ReleasedStorage;

// =============================================================================
// Tabstops
// =============================================================================

/**
 * Why a tabstop push was rejected.
 */
export type TabstopRejection = 'limit-exceeded' | 'not-increasing' | 'invalid-column';

/**
 * Outcome of pushing a tabstop.
 */
export type TabstopResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: TabstopRejection; readonly message: string };

// =============================================================================
// Buffer
// =============================================================================

export interface PrintBuffer {
  /** Backing storage; ownership mode is fixed at construction */
  storage: PrintBufferStorage;
  /** Logical write position; may run past capacity when output is truncated */
  pos: ByteOffset;
  /** Position just after the last '\n' written through newline() */
  lastNewline: ByteOffset;
  /** End of the last field boundary (newline, tab or tabRjust) */
  lastField: ByteOffset;
  /** Current indent depth in spaces */
  indent: number;
  /** Indent spaces emitted at the start of the current line */
  lineIndent: number;
  /** Nesting counter of atomic sections */
  atomic: number;
  /** Sticky: set when growth could not obtain memory */
  allocationFailure: boolean;
  /** Base used by human-readable numbers */
  units: UnitBase;
  /** Render unit values scaled with a suffix instead of raw */
  humanReadableUnits: boolean;
  /** Set once an indent or tabstop has been configured */
  hasIndentOrTabstops: boolean;
  /** Treat newlines and indented strings as plain bytes */
  suppressIndentTabstopHandling: boolean;
  /**
   * Tabstop columns relative to the indent, strictly increasing.
   * Do not modify directly: use tabstopPush(), tabstopPop(), tabstopsReset().
   */
  tabstops: ColumnNumber[];
  /** Index of the next tabstop tab()/tabRjust() will satisfy */
  curTabstop: number;
  /** Largest capacity owned storage may grow to */
  readonly maxCapacity: number;
  /** Memory source for owned storage */
  readonly allocator: ByteAllocator;
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Options accepted by createPrintBuffer() and createExternalPrintBuffer().
 */
export interface PrintBufferConfig {
  /** Base for human-readable numbers (default: 'binary') */
  units?: UnitBase;
  /** Scale unit values with a suffix (default: false) */
  humanReadableUnits?: boolean;
  /** Disable indent and tabstop handling (default: false) */
  suppressIndentTabstopHandling?: boolean;
  /** Upper bound for owned storage growth in bytes (default: 4 MiB) */
  maxCapacity?: number;
  /** Memory source for owned storage (default: heapAllocator) */
  allocator?: ByteAllocator;
}

/**
 * Result of validating a config.
 */
export interface ConfigValidationResult {
  /** Whether the config is valid */
  readonly valid: boolean;
  /** Error messages if validation failed */
  readonly errors: readonly string[];
}
