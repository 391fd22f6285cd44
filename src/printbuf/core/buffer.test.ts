/**
 * Tests for the buffer core: truncation, growth, termination and lifecycle.
 */

import { describe, it, expect, vi } from 'vitest';
import {
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
  storageBytes,
} from './buffer.ts';
import { createPrintBuffer, createExternalPrintBuffer } from './state.ts';
import { heapAllocator } from './allocator.ts';
import { textEncoder } from '../encoding.ts';
import type { AllocationMode, PrintBuffer } from '../../types/printbuf.ts';

function write(out: PrintBuffer, text: string): void {
  writeBytes(out, textEncoder.encode(text));
}

describe('Buffer Core', () => {
  describe('capacity queries', () => {
    it('should report remaining room before and after the terminator slot', () => {
      const out = createExternalPrintBuffer(new Uint8Array(10));
      write(out, 'abc');

      expect(remainingCapacity(out)).toBe(7);
      expect(remainingContent(out)).toBe(6);
      expect(writtenLength(out)).toBe(3);
      expect(isOverflowed(out)).toBe(false);
    });

    it('should report zero room once overflowed', () => {
      const out = createExternalPrintBuffer(new Uint8Array(4));
      write(out, 'abcdef');

      expect(remainingCapacity(out)).toBe(0);
      expect(remainingContent(out)).toBe(0);
      expect(isOverflowed(out)).toBe(true);
    });

    it('should treat a buffer filled up to the terminator as not overflowed', () => {
      const out = createExternalPrintBuffer(new Uint8Array(4));
      write(out, 'abc');

      expect(isOverflowed(out)).toBe(false);
      expect(writtenLength(out)).toBe(3);
      expect(out.allocationFailure).toBe(false);
    });
  });

  describe('truncation', () => {
    it('should keep counting the logical length past capacity', () => {
      const bytes = new Uint8Array(8);
      const out = createExternalPrintBuffer(bytes);

      write(out, 'hello world');

      expect(out.pos).toBe(11);
      expect(writtenLength(out)).toBe(7);
      expect(getString(out)).toBe('hello w');
      expect(bytes[7]).toBe(0);
      expect(isOverflowed(out)).toBe(true);
    });

    it('should truncate across several writes', () => {
      const bytes = new Uint8Array(6);
      const out = createExternalPrintBuffer(bytes);

      write(out, 'abc');
      write(out, 'def');
      write(out, 'gh');

      expect(out.pos).toBe(8);
      expect(writtenLength(out)).toBe(5);
      expect(getString(out)).toBe('abcde');
      expect(bytes[5]).toBe(0);
    });

    it('should set the failure flag when borrowed storage is too small', () => {
      const out = createExternalPrintBuffer(new Uint8Array(4));
      write(out, 'abcdef');
      expect(out.allocationFailure).toBe(true);
    });

    it('should never crash on zero capacity', () => {
      const out = createExternalPrintBuffer(new Uint8Array(0));

      writeChar(out, 'x');
      write(out, 'yz');

      expect(out.pos).toBe(3);
      expect(writtenLength(out)).toBe(0);
      expect(isOverflowed(out)).toBe(true);
      expect(getString(out)).toBe('');
    });
  });

  describe('growth', () => {
    it('should allocate on the first write', () => {
      const out = createPrintBuffer();
      write(out, 'hello');

      expect(getCapacity(out)).toBe(64);
      expect(getString(out)).toBe('hello');
      expect(storageBytes(out)[5]).toBe(0);
      expect(out.allocationFailure).toBe(false);
    });

    it('should fit a single large write plus terminator', () => {
      const out = createPrintBuffer();
      write(out, 'x'.repeat(100));

      expect(getCapacity(out)).toBe(128);
      expect(writtenLength(out)).toBe(100);
      expect(isOverflowed(out)).toBe(false);
      expect(out.allocationFailure).toBe(false);
    });

    it('should keep existing content when growing', () => {
      const out = createPrintBuffer();
      write(out, 'first ');
      write(out, 'y'.repeat(70));

      expect(getCapacity(out)).toBe(128);
      expect(getString(out)).toBe('first ' + 'y'.repeat(70));
    });

    it('should stop at maxCapacity and truncate', () => {
      const out = createPrintBuffer({ maxCapacity: 16 });
      write(out, 'abcdefghijklmnopqrst');

      expect(getCapacity(out)).toBe(16);
      expect(out.pos).toBe(20);
      expect(getString(out)).toBe('abcdefghijklmno');
      expect(out.allocationFailure).toBe(true);
    });

    it('should degrade to truncation when the allocator fails', () => {
      const reallocate = vi.fn(
        (_previous: Uint8Array, _size: number, _mode: AllocationMode): Uint8Array | null => null
      );
      const out = createPrintBuffer({ allocator: { reallocate } });

      write(out, 'abc');

      expect(reallocate).toHaveBeenCalledTimes(1);
      expect(out.allocationFailure).toBe(true);
      expect(out.pos).toBe(3);
      expect(getCapacity(out)).toBe(0);
      expect(getString(out)).toBe('');
    });

    it('should keep the failure flag sticky and keep accepting writes', () => {
      const out = createExternalPrintBuffer(new Uint8Array(4));
      write(out, 'abcdef');
      write(out, 'gh');

      expect(out.allocationFailure).toBe(true);
      expect(out.pos).toBe(8);
    });

    it('should not grow again after bytes were dropped', () => {
      let calls = 0;
      const reallocate = vi.fn(
        (previous: Uint8Array, size: number, mode: AllocationMode): Uint8Array | null => {
          calls++;
          return calls === 1 ? null : heapAllocator.reallocate(previous, size, mode);
        }
      );
      const out = createPrintBuffer({ allocator: { reallocate } });

      write(out, 'abc');
      write(out, 'd');

      expect(calls).toBe(1);
      expect(out.pos).toBe(4);
      expect(getString(out)).toBe('');
    });

    it('should report whether room is available', () => {
      const owned = createPrintBuffer();
      expect(ensureRoom(owned, 10)).toBe(true);
      expect(getCapacity(owned)).toBe(64);

      const borrowed = createExternalPrintBuffer(new Uint8Array(4));
      expect(ensureRoom(borrowed, 3)).toBe(true);
      expect(ensureRoom(borrowed, 4)).toBe(false);
      expect(borrowed.allocationFailure).toBe(true);
    });
  });

  describe('atomic sections', () => {
    it('should request atomic allocations inside a section', () => {
      const reallocate = vi.fn(
        (previous: Uint8Array, size: number, mode: AllocationMode): Uint8Array | null =>
          heapAllocator.reallocate(previous, size, mode)
      );
      const out = createPrintBuffer({ allocator: { reallocate } });

      enterAtomic(out);
      writeChar(out, 'a');
      leaveAtomic(out);
      write(out, 'b'.repeat(70));

      expect(reallocate).toHaveBeenCalledTimes(2);
      expect(reallocate).toHaveBeenNthCalledWith(1, expect.any(Uint8Array), 64, 'atomic');
      expect(reallocate).toHaveBeenNthCalledWith(2, expect.any(Uint8Array), 128, 'normal');
    });

    it('should nest', () => {
      const out = createPrintBuffer();
      enterAtomic(out);
      enterAtomic(out);
      leaveAtomic(out);
      expect(out.atomic).toBe(1);
    });

    it('should warn on unbalanced leave', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const out = createPrintBuffer();

      leaveAtomic(out);

      expect(out.atomic).toBe(0);
      expect(warn).toHaveBeenCalledWith('leaveAtomic() called without a matching enterAtomic()');
      warn.mockRestore();
    });
  });

  describe('character writers', () => {
    it('should write single and repeated characters', () => {
      const out = createPrintBuffer();
      writeChar(out, 'a');
      writeRepeatedChar(out, '-', 3);
      writeChar(out, 0x41);

      expect(getString(out)).toBe('a---A');
      expect(out.pos).toBe(5);
    });

    it('should ignore zero and negative repeat counts', () => {
      const out = createPrintBuffer();
      writeChar(out, 'a');
      writeRepeatedChar(out, ' ', 0);
      writeRepeatedChar(out, ' ', -3);

      expect(getString(out)).toBe('a');
    });

    it('should advance by the full count when truncated', () => {
      const out = createExternalPrintBuffer(new Uint8Array(4));
      writeRepeatedChar(out, '=', 10);

      expect(out.pos).toBe(10);
      expect(getString(out)).toBe('===');
    });

    it('should warn and write nothing for a non-finite repeat count', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const out = createPrintBuffer();

      writeChar(out, 'a');
      writeChar(out, 'b');
      writeRepeatedChar(out, ' ', NaN);
      writeRepeatedChar(out, ' ', Infinity);
      writeChar(out, 'c');

      expect(out.pos).toBe(3);
      expect(getString(out)).toBe('abc');
      expect(warn).toHaveBeenCalledWith('Invalid repeat count: NaN, defaulting to 0');
      expect(warn).toHaveBeenCalledWith('Invalid repeat count: Infinity, defaulting to 0');
      warn.mockRestore();
    });
  });

  describe('finalizeTerminator', () => {
    it('should be idempotent', () => {
      const out = createPrintBuffer();
      write(out, 'ab');
      finalizeTerminator(out);
      finalizeTerminator(out);

      expect(getString(out)).toBe('ab');
      expect(storageBytes(out)[2]).toBe(0);
    });

    it('should grow an empty owned buffer to hold the terminator', () => {
      const out = createPrintBuffer();
      finalizeTerminator(out);

      expect(getCapacity(out)).toBe(64);
      expect(storageBytes(out)[0]).toBe(0);
      expect(writtenLength(out)).toBe(0);
    });
  });

  describe('resetPrintBuffer', () => {
    it('should reproduce identical bytes after reset', () => {
      const out = createPrintBuffer();
      write(out, 'first line');
      const first = getBytes(out).slice();
      const storage = out.storage;

      resetPrintBuffer(out);
      expect(out.pos).toBe(0);
      expect(getString(out)).toBe('');
      expect(out.storage).toBe(storage);

      write(out, 'first line');
      expect(getBytes(out)).toEqual(first);
    });

    it('should clear the failure flag, indent and tabstops', () => {
      const bytes = new Uint8Array(4);
      const out = createExternalPrintBuffer(bytes);
      out.indent = 2;
      write(out, 'abcdef');

      resetPrintBuffer(out);

      expect(out.allocationFailure).toBe(false);
      expect(out.indent).toBe(0);
      expect(out.tabstops).toEqual([]);
      expect(out.hasIndentOrTabstops).toBe(false);
      expect(bytes[0]).toBe(0);
    });
  });

  describe('releasePrintBuffer', () => {
    it('should release owned storage once', () => {
      const out = createPrintBuffer();
      write(out, 'abc');

      releasePrintBuffer(out);
      releasePrintBuffer(out);

      expect(out.storage.kind).toBe('released');
      expect(getCapacity(out)).toBe(0);
    });

    it('should truncate writes after release', () => {
      const out = createPrintBuffer();
      releasePrintBuffer(out);
      write(out, 'abc');

      expect(out.allocationFailure).toBe(true);
      expect(getString(out)).toBe('');
    });

    it('should leave borrowed storage alone', () => {
      const out = createExternalPrintBuffer(new Uint8Array(8));
      write(out, 'abc');

      releasePrintBuffer(out);

      expect(out.storage.kind).toBe('borrowed');
      expect(getString(out)).toBe('abc');
    });
  });

  describe('takeBytes', () => {
    it('should hand over owned content and detach it', () => {
      const out = createPrintBuffer();
      write(out, 'hello');

      const bytes = takeBytes(out);

      expect(bytes).toEqual(textEncoder.encode('hello'));
      expect(out.storage.kind).toBe('released');
      releasePrintBuffer(out);
      expect(bytes).toEqual(textEncoder.encode('hello'));
    });

    it('should return a view of borrowed storage', () => {
      const storage = new Uint8Array(8);
      const out = createExternalPrintBuffer(storage);
      write(out, 'hi');

      const bytes = takeBytes(out);

      expect(bytes).toEqual(textEncoder.encode('hi'));
      expect(bytes.buffer).toBe(storage.buffer);
      expect(out.storage.kind).toBe('borrowed');
    });
  });

  describe('getString', () => {
    it('should decode UTF-8', () => {
      const out = createPrintBuffer();
      write(out, 'naïve');

      expect(out.pos).toBe(6);
      expect(getString(out)).toBe('naïve');
    });
  });
});
