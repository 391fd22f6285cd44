/**
 * Buffer core: capacity, position, truncation, termination and growth.
 *
 * Every writer follows the same discipline:
 * 1. ensureRoom() for the bytes it is about to write (may grow owned storage)
 * 2. store as many bytes as fit before the terminator slot
 * 3. advance `pos` by the full logical length, stored or not
 * 4. finalizeTerminator()
 *
 * So `pos` is always the length the output would have with unlimited space,
 * and a caller detects truncation with isOverflowed().
 */

import type { PrintBuffer } from '../../types/printbuf.ts';
import { addByteOffset, byteLength, ZERO_BYTE_OFFSET } from '../../types/branded.ts';
import type { ByteLength } from '../../types/branded.ts';
import { nextCapacity } from './allocator.ts';
import { textDecoder } from '../encoding.ts';

const EMPTY = new Uint8Array(0);

/**
 * A single byte to write: a byte value, or a one-character string whose
 * UTF-16 code unit is truncated to its low byte. Use writeString() for text
 * outside Latin-1.
 */
export type ByteChar = number | string;

export function toByte(c: ByteChar): number {
  return (typeof c === 'number' ? c : c.charCodeAt(0)) & 0xff;
}

/**
 * Backing bytes, or an empty array once the storage was released.
 */
export function storageBytes(out: PrintBuffer): Uint8Array {
  return out.storage.kind === 'released' ? EMPTY : out.storage.bytes;
}

// =============================================================================
// Capacity Queries
// =============================================================================

/**
 * Total size of the backing storage, terminator slot included.
 */
export function getCapacity(out: PrintBuffer): ByteLength {
  return byteLength(storageBytes(out).length);
}

/**
 * Bytes between the write position and the end of storage.
 * 0 when the position is at or past capacity.
 */
export function remainingCapacity(out: PrintBuffer): ByteLength {
  const capacity = getCapacity(out);
  return byteLength(out.pos < capacity ? capacity - out.pos : 0);
}

/**
 * Bytes that can still be stored, keeping one for the terminator.
 */
export function remainingContent(out: PrintBuffer): ByteLength {
  const capacity = getCapacity(out);
  return byteLength(out.pos < capacity ? capacity - out.pos - 1 : 0);
}

/**
 * Returns true if output was truncated (or there is no storage at all).
 */
export function isOverflowed(out: PrintBuffer): boolean {
  return out.pos >= getCapacity(out);
}

/**
 * Bytes of real content before the terminator.
 */
export function writtenLength(out: PrintBuffer): ByteLength {
  const capacity = getCapacity(out);
  return byteLength(capacity > 0 ? Math.min(out.pos, capacity - 1) : 0);
}

// =============================================================================
// Growth
// =============================================================================

/**
 * Make sure `extra` bytes plus the terminator fit after the current position.
 *
 * Owned storage grows to the next power of two (bounded by maxCapacity).
 * Borrowed or released storage cannot grow. Whenever the room cannot be
 * provided the sticky `allocationFailure` flag is set; the caller's write
 * still goes ahead and is truncated.
 *
 * @returns true if the room is available
 */
export function ensureRoom(out: PrintBuffer, extra: number): boolean {
  const capacity = getCapacity(out);
  const required = out.pos + extra + 1;
  if (required <= capacity) {
    return true;
  }

  const storage = out.storage;
  if (storage.kind !== 'owned') {
    out.allocationFailure = true;
    return false;
  }

  // Bytes were already dropped; growing now would leave a hole behind them.
  if (out.pos > 0 && out.pos >= capacity) {
    return false;
  }

  const size = Math.min(nextCapacity(required), out.maxCapacity);
  if (size <= capacity) {
    out.allocationFailure = true;
    return false;
  }

  const bytes = out.allocator.reallocate(storage.bytes, size, out.atomic > 0 ? 'atomic' : 'normal');
  if (bytes === null) {
    out.allocationFailure = true;
    return false;
  }
  out.storage = { kind: 'owned', bytes };

  if (size < required) {
    out.allocationFailure = true;
    return false;
  }
  return true;
}

/**
 * Place the terminator after the content, growing for it if needed.
 * Idempotent.
 */
export function finalizeTerminator(out: PrintBuffer): void {
  ensureRoom(out, 0);

  const bytes = storageBytes(out);
  if (out.pos < bytes.length) {
    bytes[out.pos] = 0;
  } else if (bytes.length > 0) {
    bytes[bytes.length - 1] = 0;
  }
}

// =============================================================================
// Writers
// =============================================================================

/**
 * Write raw bytes. The position advances by `data.length` even when only a
 * prefix (or nothing) fits.
 */
export function writeBytes(out: PrintBuffer, data: Uint8Array): void {
  ensureRoom(out, data.length);

  const canPrint = Math.min(data.length, remainingContent(out));
  if (canPrint > 0) {
    storageBytes(out).set(data.subarray(0, canPrint), out.pos);
  }
  out.pos = addByteOffset(out.pos, data.length);

  finalizeTerminator(out);
}

export function writeChar(out: PrintBuffer, c: ByteChar): void {
  ensureRoom(out, 1);

  if (remainingContent(out) > 0) {
    storageBytes(out)[out.pos] = toByte(c);
  }
  out.pos = addByteOffset(out.pos, 1);

  finalizeTerminator(out);
}

/**
 * Normalize a caller-supplied count to a non-negative integer.
 * Non-finite counts are reported and treated as 0.
 */
export function toCount(value: number, label: string): number {
  if (!Number.isFinite(value)) {
    console.warn(`Invalid ${label}: ${value}, defaulting to 0`);
    return 0;
  }
  return Math.max(0, Math.trunc(value));
}

/**
 * Write `count` copies of one byte.
 */
export function writeRepeatedChar(out: PrintBuffer, c: ByteChar, count: number): void {
  const n = toCount(count, 'repeat count');
  if (n === 0) return;

  ensureRoom(out, n);

  const canPrint = Math.min(n, remainingContent(out));
  if (canPrint > 0) {
    storageBytes(out).fill(toByte(c), out.pos, out.pos + canPrint);
  }
  out.pos = addByteOffset(out.pos, n);

  finalizeTerminator(out);
}

// =============================================================================
// Reading
// =============================================================================

/**
 * Zero-copy view of the written content (terminator excluded).
 * The view is invalidated by any later write that grows the storage.
 */
export function getBytes(out: PrintBuffer): Uint8Array {
  return storageBytes(out).subarray(0, writtenLength(out));
}

/**
 * Written content decoded as UTF-8. A multi-byte sequence cut by truncation
 * decodes to U+FFFD.
 */
export function getString(out: PrintBuffer): string {
  return textDecoder.decode(getBytes(out));
}

// =============================================================================
// Lifecycle
// =============================================================================

/**
 * Rewind to an empty buffer, keeping the storage for reuse.
 * Clears the allocation failure flag, the indent and the tabstops.
 */
export function resetPrintBuffer(out: PrintBuffer): void {
  out.pos = ZERO_BYTE_OFFSET;
  out.lastNewline = ZERO_BYTE_OFFSET;
  out.lastField = ZERO_BYTE_OFFSET;
  out.allocationFailure = false;
  out.indent = 0;
  out.lineIndent = 0;
  out.tabstops = [];
  out.curTabstop = 0;
  out.hasIndentOrTabstops = false;

  const bytes = storageBytes(out);
  if (bytes.length > 0) {
    bytes[0] = 0;
  }
}

/**
 * Release owned storage. Safe to call more than once, and a no-op for
 * borrowed storage. A released buffer truncates everything written to it.
 */
export function releasePrintBuffer(out: PrintBuffer): void {
  if (out.storage.kind === 'owned') {
    out.storage = { kind: 'released' };
  }
}

/**
 * Hand the written content to the caller.
 *
 * Owned storage is detached, so a later releasePrintBuffer() does not touch
 * it. Borrowed storage already belongs to the caller and stays bound.
 */
export function takeBytes(out: PrintBuffer): Uint8Array {
  const bytes = getBytes(out);
  if (out.storage.kind === 'owned') {
    out.storage = { kind: 'released' };
  }
  return bytes;
}

// =============================================================================
// Atomic Sections
// =============================================================================

/**
 * Mark the start of a section where growth must not block.
 */
export function enterAtomic(out: PrintBuffer): void {
  out.atomic++;
}

/**
 * Mark the end of a section opened by enterAtomic().
 */
export function leaveAtomic(out: PrintBuffer): void {
  if (out.atomic === 0) {
    console.warn('leaveAtomic() called without a matching enterAtomic()');
    return;
  }
  out.atomic--;
}
