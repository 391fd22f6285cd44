/**
 * Human-readable quantities.
 *
 * formatHumanReadable(1536n, 'binary')     // "1.5 KiB"
 * formatHumanReadable(1048576n, 'binary')  // "1.0 MiB"
 * formatHumanReadable(2500n, 'decimal')    // "2.5 kB"
 * formatHumanReadable(512n, 'binary')      // "512"
 */

import type { UnitBase } from '../../types/printbuf.ts';

const BINARY_SUFFIXES = ['KiB', 'MiB', 'GiB', 'TiB', 'PiB', 'EiB'] as const;
const DECIMAL_SUFFIXES = ['kB', 'MB', 'GB', 'TB', 'PB', 'EB'] as const;

/**
 * Scale a non-negative value to the largest unit it reaches at least 1 of,
 * with one fractional digit truncated toward zero. Values below the
 * smallest unit are rendered raw.
 */
export function formatHumanReadable(value: bigint, base: UnitBase): string {
  const step = base === 'binary' ? 1024n : 1000n;
  const suffixes = base === 'binary' ? BINARY_SUFFIXES : DECIMAL_SUFFIXES;

  let scale = 1n;
  let index = -1;
  while (index + 1 < suffixes.length && value >= scale * step) {
    scale *= step;
    index++;
  }
  if (index < 0) {
    return value.toString();
  }

  const whole = value / scale;
  const tenths = ((value % scale) * 10n) / scale;
  return `${whole}.${tenths} ${suffixes[index]}`;
}

function toBigInt(value: bigint | number): bigint {
  if (typeof value === 'bigint') return value;
  if (!Number.isFinite(value)) {
    console.warn(`Invalid unit value: ${value}, defaulting to 0`);
    return 0n;
  }
  return BigInt(Math.trunc(value));
}

/**
 * Coerce to an unsigned 64-bit integer (wrapping like a u64 would).
 */
export function toU64(value: bigint | number): bigint {
  return BigInt.asUintN(64, toBigInt(value));
}

/**
 * Coerce to a signed 64-bit integer (wrapping like an s64 would).
 */
export function toS64(value: bigint | number): bigint {
  return BigInt.asIntN(64, toBigInt(value));
}
