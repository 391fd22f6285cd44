/**
 * Type exports for printbuf.
 */

// Buffer types
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
} from './printbuf.ts';

// Branded position types
export type { ByteOffset, ByteLength, ColumnNumber } from './branded.ts';

export {
  byteLength,
  columnNumber,
  isValidColumn,
  addByteOffset,
  ZERO_BYTE_OFFSET,
} from './branded.ts';
