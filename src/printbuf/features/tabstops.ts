/**
 * Indent and tabstop engine.
 *
 * Line structure is tracked with three positions:
 * - lastNewline: first byte of the current line
 * - lastField: end of the last field boundary (newline, tab, tabRjust)
 * - pos: the write position
 *
 * Columns are byte counts from lastNewline. A tabstop is stored relative to
 * the indent, so tabstop i targets column `indent + tabstops[i]`.
 */

import type { PrintBuffer, TabstopRejection, TabstopResult } from '../../types/printbuf.ts';
import { addByteOffset, columnNumber, isValidColumn } from '../../types/branded.ts';
import type { ColumnNumber } from '../../types/branded.ts';
import {
  ensureRoom,
  finalizeTerminator,
  storageBytes,
  toCount,
  writeChar,
  writeRepeatedChar,
} from '../core/buffer.ts';

/** Maximum number of tabstops a buffer holds. */
export const MAX_TABSTOPS = 4;

const SPACE = 0x20;

function updateTracking(out: PrintBuffer): void {
  out.hasIndentOrTabstops = out.indent > 0 || out.tabstops.length > 0;
}

// =============================================================================
// Queries
// =============================================================================

/**
 * Bytes written since the start of the current line.
 */
export function lineLength(out: PrintBuffer): ColumnNumber {
  return columnNumber(out.pos - out.lastNewline);
}

/**
 * Column of tabstop `index`, indent included.
 * Returns undefined if no such tabstop is registered.
 */
export function tabstopGet(out: PrintBuffer, index: number): ColumnNumber | undefined {
  if (!Number.isInteger(index) || index < 0 || index >= out.tabstops.length) {
    return undefined;
  }
  return columnNumber(out.indent + out.tabstops[index]);
}

/**
 * Column the next tab()/tabRjust() aligns to, or undefined when every
 * registered tabstop on this line has been used.
 */
export function currentTabstop(out: PrintBuffer): ColumnNumber | undefined {
  return tabstopGet(out, out.curTabstop);
}

// =============================================================================
// Tabstop Table
// =============================================================================

function reject(reason: TabstopRejection, message: string): TabstopResult {
  return { ok: false, reason, message };
}

/**
 * Register a tabstop at `column` (relative to the indent).
 *
 * Rejected, leaving the table unchanged, when MAX_TABSTOPS are already
 * registered or when the column is not greater than the last one.
 */
export function tabstopPush(out: PrintBuffer, column: number): TabstopResult {
  if (!isValidColumn(column)) {
    return reject('invalid-column', `Tabstop column must be a non-negative integer: ${column}`);
  }
  if (out.tabstops.length >= MAX_TABSTOPS) {
    return reject('limit-exceeded', `Cannot register more than ${MAX_TABSTOPS} tabstops`);
  }
  const count = out.tabstops.length;
  if (count > 0 && column <= out.tabstops[count - 1]) {
    return reject(
      'not-increasing',
      `Tabstop column ${column} must be greater than ${out.tabstops[count - 1]}`
    );
  }

  out.tabstops.push(columnNumber(column));
  out.hasIndentOrTabstops = true;
  return { ok: true };
}

/**
 * Remove the last registered tabstop.
 */
export function tabstopPop(out: PrintBuffer): void {
  out.tabstops.pop();
  out.curTabstop = Math.min(out.curTabstop, out.tabstops.length);
  updateTracking(out);
}

/**
 * Remove all tabstops, e.g. when starting a new section of output.
 */
export function tabstopsReset(out: PrintBuffer): void {
  out.tabstops = [];
  out.curTabstop = 0;
  updateTracking(out);
}

// =============================================================================
// Indent
// =============================================================================

/**
 * Increase the indent. Takes effect at the next newline.
 */
export function indentAdd(out: PrintBuffer, spaces: number): void {
  out.indent += toCount(spaces, 'indent');
  updateTracking(out);
}

/**
 * Decrease the indent.
 *
 * If nothing but the indentation has been written on the current line, the
 * removed spaces are taken back so the next write starts at the new depth.
 */
export function indentSub(out: PrintBuffer, spaces: number): void {
  let n = toCount(spaces, 'indent');
  if (n > out.indent) {
    console.warn(`Cannot remove ${n} spaces of indent from ${out.indent}, clamping`);
    n = out.indent;
  }

  if (out.lineIndent > 0 && out.pos === out.lastNewline + out.lineIndent) {
    const back = Math.min(n, out.lineIndent);
    out.pos = addByteOffset(out.pos, -back);
    out.lastField = out.pos;
    out.lineIndent -= back;
    finalizeTerminator(out);
  }

  out.indent -= n;
  updateTracking(out);
}

// =============================================================================
// Line Structure
// =============================================================================

/**
 * End the current line. The next line starts indented (unless indent and
 * tabstop handling is suppressed) and aligns from its first tabstop.
 */
export function newline(out: PrintBuffer): void {
  const indent = out.suppressIndentTabstopHandling ? 0 : out.indent;

  ensureRoom(out, 1 + indent);
  writeChar(out, '\n');
  out.lastNewline = out.pos;

  writeRepeatedChar(out, ' ', indent);
  out.lineIndent = indent;
  out.lastField = out.pos;
  out.curTabstop = 0;
}

/**
 * Pad with spaces up to the next tabstop. Never moves backwards: a line
 * already past the tabstop gets no padding, but the tabstop is still used up.
 */
export function tab(out: PrintBuffer): void {
  const target = currentTabstop(out);
  if (target === undefined) return;

  const spaces = target - lineLength(out);
  if (spaces > 0) {
    writeRepeatedChar(out, ' ', spaces);
  }
  out.lastField = out.pos;
  out.curTabstop++;
}

/**
 * Right-justify the current field against the next tabstop.
 *
 * The bytes written since the last field boundary are shifted forward so the
 * field ends at the tabstop column, and the gap left behind is filled with
 * spaces. A line already past the tabstop is left alone.
 */
export function tabRjust(out: PrintBuffer): void {
  const target = currentTabstop(out);
  if (target === undefined) return;

  const pad = target - lineLength(out);
  if (pad > 0) {
    ensureRoom(out, pad);

    const bytes = storageBytes(out);
    const capacity = bytes.length;
    const start = out.lastField;
    const dest = start + pad;
    const fieldLength = Math.max(0, out.pos - start);

    // copyWithin copies as if through a temporary: source and target overlap here
    if (dest < capacity) {
      bytes.copyWithin(dest, start, start + Math.min(fieldLength, capacity - dest));
    }
    if (start < capacity) {
      bytes.fill(SPACE, start, start + Math.min(pad, capacity - start));
    }

    out.pos = addByteOffset(out.pos, pad);
    finalizeTerminator(out);
  }

  out.lastField = out.pos;
  out.curTabstop++;
}
