/**
 * printbuf - text composition into fixed or growable byte buffers
 *
 * Main entry point exporting types, factories and write operations.
 *
 * Basic example:
 * ```typescript
 * const out = createPrintBuffer();
 * writeString(out, 'size: ');
 * writeUnitsU64(out, 4096);
 * newline(out);
 * if (out.allocationFailure) {
 *   // output is incomplete
 * }
 * console.log(getString(out));
 * releasePrintBuffer(out);
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export type {
  UnitBase,
  AllocationMode,
  ByteAllocator,
  OwnedStorage,
  BorrowedStorage,
  ReleasedStorage,
  PrintBufferStorage,
  TabstopRejection,
  TabstopResult,
  PrintBuffer,
  PrintBufferConfig,
  ConfigValidationResult,
} from './types/index.ts';

// Branded position types
export type { ByteOffset, ByteLength, ColumnNumber } from './types/index.ts';

export {
  byteLength,
  columnNumber,
  isValidColumn,
  addByteOffset,
  ZERO_BYTE_OFFSET,
} from './types/index.ts';

// =============================================================================
// Construction
// =============================================================================

export {
  createPrintBuffer,
  createExternalPrintBuffer,
  validatePrintBufferConfig,
  heapAllocator,
  nextCapacity,
  roundUpPowerOfTwo,
  MIN_CAPACITY,
  DEFAULT_MAX_CAPACITY,
} from './printbuf/index.ts';

// =============================================================================
// Buffer Core
// =============================================================================

export {
  getCapacity,
  remainingCapacity,
  remainingContent,
  isOverflowed,
  writtenLength,
  ensureRoom,
  finalizeTerminator,
  writeBytes,
  writeChar,
  writeRepeatedChar,
  getBytes,
  getString,
  resetPrintBuffer,
  releasePrintBuffer,
  takeBytes,
  enterAtomic,
  leaveAtomic,
} from './printbuf/index.ts';
export type { ByteChar } from './printbuf/index.ts';

// =============================================================================
// Indent and Tabstops
// =============================================================================

export {
  MAX_TABSTOPS,
  lineLength,
  tabstopGet,
  currentTabstop,
  tabstopPush,
  tabstopPop,
  tabstopsReset,
  indentAdd,
  indentSub,
  newline,
  tab,
  tabRjust,
} from './printbuf/index.ts';

// =============================================================================
// Formatting Helpers
// =============================================================================

export {
  writeString,
  writeStringIndented,
  writeBytesIndented,
  writeHexByte,
  writeHexByteUpper,
  writeHumanReadableU64,
  writeHumanReadableS64,
  writeUnitsU64,
  writeUnitsS64,
  formatHumanReadable,
  toU64,
  toS64,
} from './printbuf/index.ts';
