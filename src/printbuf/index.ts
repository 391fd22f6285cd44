/**
 * Print buffer exports.
 */

// Factories and config
export {
  createPrintBuffer,
  createExternalPrintBuffer,
  validatePrintBufferConfig,
} from './core/state.ts';

// Growth policy
export {
  heapAllocator,
  nextCapacity,
  roundUpPowerOfTwo,
  MIN_CAPACITY,
  DEFAULT_MAX_CAPACITY,
} from './core/allocator.ts';

// Buffer core
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
} from './core/buffer.ts';
export type { ByteChar } from './core/buffer.ts';

// Indent and tabstops
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
} from './features/tabstops.ts';

// Formatting helpers
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
} from './features/format.ts';
export { formatHumanReadable, toU64, toS64 } from './features/units.ts';
