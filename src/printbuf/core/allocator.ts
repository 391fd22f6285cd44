/**
 * Growth policy and default memory source for owned print buffer storage.
 *
 * Storage grows geometrically: the new size is the next power of two that
 * holds the required bytes, never below MIN_CAPACITY. Bytes in [0, pos) stay
 * valid across a reallocation; the old array must not be used afterwards.
 */

import type { AllocationMode, ByteAllocator } from '../../types/printbuf.ts';

/** Smallest allocation made for owned storage. */
export const MIN_CAPACITY = 64;

/** Default upper bound for owned storage (4 MiB). */
export const DEFAULT_MAX_CAPACITY = 4 * 1024 * 1024;

/**
 * Round up to the next power of two (values that already are one are kept).
 */
export function roundUpPowerOfTwo(value: number): number {
  if (value <= 1) return 1;
  let size = 1;
  while (size < value) {
    size *= 2;
  }
  return size;
}

/**
 * Capacity to grow to so that `required` bytes fit.
 */
export function nextCapacity(required: number): number {
  return roundUpPowerOfTwo(Math.max(required, MIN_CAPACITY));
}

/**
 * Allocator backed by plain `Uint8Array`s.
 *
 * The mode is ignored: allocation in the JS heap never blocks. An engine
 * refusing the size (RangeError) is reported as `null`.
 */
export const heapAllocator: ByteAllocator = {
  reallocate(previous: Uint8Array, size: number, _mode: AllocationMode): Uint8Array | null {
    let bytes: Uint8Array;
    try {
      bytes = new Uint8Array(size);
    } catch (error) {
      if (error instanceof RangeError) {
        return null;
      }
      throw error;
    }
    bytes.set(previous.subarray(0, Math.min(previous.length, size)));
    return bytes;
  },
};
