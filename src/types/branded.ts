/**
 * Branded types for type-safe position handling.
 *
 * Branded types (also called "opaque types" or "nominal types") prevent
 * accidentally mixing up different kinds of numeric values. A print buffer
 * juggles three of them at once: where the next byte goes, how many bytes a
 * write covers, and which column on the current line a tabstop targets.
 *
 * Usage:
 * ```typescript
 * const pos = addByteOffset(ZERO_BYTE_OFFSET, 10);
 * const col = columnNumber(4);
 *
 * // Type error: can't assign ByteOffset to ColumnNumber
 * const wrong: ColumnNumber = pos;
 * ```
 */

// =============================================================================
// Brand Symbol
// =============================================================================

/**
 * Unique symbol used for branding types.
 * This symbol is never used at runtime - it only exists for the type system.
 */
declare const brand: unique symbol;

/**
 * Generic brand interface.
 * The brand is a phantom type that only exists in the type system.
 */
interface Brand<B> {
  readonly [brand]: B;
}

/**
 * Create a branded type from a base type.
 * The brand only exists at compile time - no runtime overhead.
 */
type Branded<T, B> = T & Brand<B>;

// =============================================================================
// Position Types
// =============================================================================

/**
 * Byte offset into a print buffer.
 * A logical position: it keeps counting past the end of the backing
 * storage when output is truncated.
 */
export type ByteOffset = Branded<number, 'ByteOffset'>;

/**
 * Byte length (size/count of bytes).
 *
 * Semantically distinct from ByteOffset: an offset is a position,
 * a length is a size/count.
 */
export type ByteLength = Branded<number, 'ByteLength'>;

/**
 * Column number (0-indexed), counted in bytes from the start of the line.
 */
export type ColumnNumber = Branded<number, 'ColumnNumber'>;

// =============================================================================
// Constructor Functions
// =============================================================================

/**
 * Create a ByteLength from a number.
 * Use this for explicit conversions from raw numbers.
 */
export function byteLength(value: number): ByteLength {
  return value as ByteLength;
}

/**
 * Create a ColumnNumber from a number.
 * Use this for explicit conversions from raw numbers.
 */
export function columnNumber(value: number): ColumnNumber {
  return value as ColumnNumber;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Check if a value is a valid column (non-negative integer).
 */
export function isValidColumn(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

// =============================================================================
// Arithmetic Helpers
// =============================================================================

/**
 * Add a delta to a ByteOffset.
 * Preserves the brand type.
 */
export function addByteOffset(offset: ByteOffset, delta: number): ByteOffset {
  return (offset + delta) as ByteOffset;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Zero byte offset - the start of every buffer.
 */
export const ZERO_BYTE_OFFSET: ByteOffset = 0 as ByteOffset;
