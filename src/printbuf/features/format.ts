/**
 * Formatting helpers: strings, indented text, hex bytes and unit values.
 */

import type { PrintBuffer } from '../../types/printbuf.ts';
import { ensureRoom, writeBytes, writeChar } from '../core/buffer.ts';
import { currentTabstop, newline, tab, tabRjust } from './tabstops.ts';
import { formatHumanReadable, toS64, toU64 } from './units.ts';
import { textEncoder } from '../encoding.ts';

const NEWLINE = 0x0a;
const TAB = 0x09;
const CARRIAGE_RETURN = 0x0d;

const HEX_LOWER = '0123456789abcdef';
const HEX_UPPER = '0123456789ABCDEF';

// =============================================================================
// Text
// =============================================================================

/**
 * Write a string as UTF-8.
 */
export function writeString(out: PrintBuffer, str: string): void {
  writeBytes(out, textEncoder.encode(str));
}

/**
 * Write bytes, routing embedded control characters through the line engine:
 * - '\n' ends the line with newline(), so the next line is indented
 * - '\t' pads to the next tabstop with tab()
 * - '\r' right-justifies the text before it with tabRjust()
 *
 * '\t' and '\r' are written as-is when no tabstop is pending. With no indent
 * or tabstops configured, or with handling suppressed, this is writeBytes().
 */
export function writeBytesIndented(out: PrintBuffer, data: Uint8Array): void {
  if (!out.hasIndentOrTabstops || out.suppressIndentTabstopHandling) {
    writeBytes(out, data);
    return;
  }

  let unprinted = 0;
  for (let i = 0; i < data.length; i++) {
    switch (data[i]) {
      case NEWLINE:
        writeBytes(out, data.subarray(unprinted, i));
        unprinted = i + 1;
        newline(out);
        break;
      case TAB:
        if (currentTabstop(out) !== undefined) {
          writeBytes(out, data.subarray(unprinted, i));
          unprinted = i + 1;
          tab(out);
        }
        break;
      case CARRIAGE_RETURN:
        if (currentTabstop(out) !== undefined) {
          writeBytes(out, data.subarray(unprinted, i));
          unprinted = i + 1;
          tabRjust(out);
        }
        break;
    }
  }
  writeBytes(out, data.subarray(unprinted));
}

/**
 * UTF-8 counterpart of writeBytesIndented().
 */
export function writeStringIndented(out: PrintBuffer, str: string): void {
  writeBytesIndented(out, textEncoder.encode(str));
}

// =============================================================================
// Hex
// =============================================================================

function writeHexPair(out: PrintBuffer, byte: number, digits: string): void {
  ensureRoom(out, 2);
  writeChar(out, digits.charCodeAt((byte >> 4) & 0xf));
  writeChar(out, digits.charCodeAt(byte & 0xf));
}

/**
 * Two lowercase hex digits for one byte.
 */
export function writeHexByte(out: PrintBuffer, byte: number): void {
  writeHexPair(out, byte, HEX_LOWER);
}

/**
 * Two uppercase hex digits for one byte.
 */
export function writeHexByteUpper(out: PrintBuffer, byte: number): void {
  writeHexPair(out, byte, HEX_UPPER);
}

// =============================================================================
// Units
// =============================================================================

export function writeHumanReadableU64(out: PrintBuffer, value: bigint | number): void {
  writeString(out, formatHumanReadable(toU64(value), out.units));
}

export function writeHumanReadableS64(out: PrintBuffer, value: bigint | number): void {
  const v = toS64(value);
  if (v < 0n) {
    writeChar(out, '-');
  }
  writeString(out, formatHumanReadable(v < 0n ? -v : v, out.units));
}

/**
 * Write an unsigned value, scaled if `humanReadableUnits` is set, raw
 * decimal otherwise.
 */
export function writeUnitsU64(out: PrintBuffer, value: bigint | number): void {
  if (out.humanReadableUnits) {
    writeHumanReadableU64(out, value);
  } else {
    writeString(out, toU64(value).toString());
  }
}

/**
 * Signed counterpart of writeUnitsU64().
 */
export function writeUnitsS64(out: PrintBuffer, value: bigint | number): void {
  if (out.humanReadableUnits) {
    writeHumanReadableS64(out, value);
  } else {
    writeString(out, toS64(value).toString());
  }
}
