import { ArithmeticError } from '../../errors/index.js';

/**
 * Signed 64.64 fixed-point arithmetic over bigint
 *
 * A Fixed64x64 value is a 128-bit signed integer whose low 64 bits are the
 * fractional part: the real number it represents is `value / 2^64`.
 * Every operation range-checks its result and throws instead of wrapping.
 *
 * All numeraire amounts in the engine use this representation.
 */

/** Raw 64.64 representation */
export type Fixed64x64 = bigint;

/** 1.0 in 64.64 */
export const ONE_64X64: Fixed64x64 = 1n << 64n;

export const MIN_64X64: Fixed64x64 = -(1n << 127n);
export const MAX_64X64: Fixed64x64 = (1n << 127n) - 1n;

/** Integer part bounds (signed 64-bit) */
const MIN_INT64 = -(1n << 63n);
const MAX_INT64 = (1n << 63n) - 1n;

/** Bounds for integer results of mixed operations (signed 256-bit) */
const MIN_INT256 = -(1n << 255n);
const MAX_INT256 = (1n << 255n) - 1n;

function overflow(operation: string, value: bigint): never {
  throw new ArithmeticError(
    'ArithmeticOverflow',
    `${operation}: result ${value} is outside the 64.64 range`
  );
}

function checked(operation: string, value: bigint): Fixed64x64 {
  if (value < MIN_64X64 || value > MAX_64X64) {
    overflow(operation, value);
  }
  return value;
}

function requireNonZero(operation: string, divisor: bigint): void {
  if (divisor === 0n) {
    throw new ArithmeticError('DivisionByZero', `${operation}: division by zero`);
  }
}

/**
 * Convert a signed integer into 64.64
 */
export function fromInt(x: bigint): Fixed64x64 {
  if (x < MIN_INT64 || x > MAX_INT64) {
    overflow('fromInt', x);
  }
  return x << 64n;
}

/**
 * Convert a non-negative integer into 64.64
 */
export function fromUInt(x: bigint): Fixed64x64 {
  if (x < 0n || x > MAX_INT64) {
    overflow('fromUInt', x);
  }
  return x << 64n;
}

/**
 * Integer part of a 64.64 value, truncated toward zero
 */
export function toInt(x: Fixed64x64): bigint {
  return x / ONE_64X64;
}

/**
 * Integer part of a non-negative 64.64 value
 */
export function toUInt(x: Fixed64x64): bigint {
  if (x < 0n) {
    overflow('toUInt', x);
  }
  return x >> 64n;
}

export function add(x: Fixed64x64, y: Fixed64x64): Fixed64x64 {
  return checked('add', x + y);
}

export function sub(x: Fixed64x64, y: Fixed64x64): Fixed64x64 {
  return checked('sub', x - y);
}

/**
 * Product of two 64.64 values (rounded toward negative infinity)
 */
export function mul(x: Fixed64x64, y: Fixed64x64): Fixed64x64 {
  return checked('mul', (x * y) >> 64n);
}

/**
 * Quotient of two 64.64 values (truncated toward zero)
 */
export function div(x: Fixed64x64, y: Fixed64x64): Fixed64x64 {
  requireNonZero('div', y);
  return checked('div', (x << 64n) / y);
}

/**
 * Multiply a 64.64 value by an integer, returning an integer truncated toward zero
 *
 * @example
 * mulByInteger(fromInt(100n), 1_000_000n) // 100_000_000n
 */
export function mulByInteger(x: Fixed64x64, y: bigint): bigint {
  const result = (x * y) / ONE_64X64;
  if (result < MIN_INT256 || result > MAX_INT256) {
    throw new ArithmeticError(
      'ArithmeticOverflow',
      `mulByInteger: result ${result} is outside the int256 range`
    );
  }
  return result;
}

/**
 * Divide an integer by an integer, returning a 64.64 value truncated toward zero
 *
 * @example
 * divideIntegerBy(1n, 4n) // 0.25 in 64.64
 */
export function divideIntegerBy(numerator: bigint, denominator: bigint): Fixed64x64 {
  requireNonZero('divideIntegerBy', denominator);
  return checked('divideIntegerBy', (numerator << 64n) / denominator);
}

/**
 * x * numerator / denominator, multiplying first (truncated toward zero)
 */
export function mulDiv(x: Fixed64x64, numerator: bigint, denominator: bigint): Fixed64x64 {
  requireNonZero('mulDiv', denominator);
  return checked('mulDiv', (x * numerator) / denominator);
}

export function neg(x: Fixed64x64): Fixed64x64 {
  return checked('neg', -x);
}

export function abs(x: Fixed64x64): Fixed64x64 {
  return x < 0n ? neg(x) : x;
}

/**
 * 1 / x
 */
export function reciprocal(x: Fixed64x64): Fixed64x64 {
  requireNonZero('reciprocal', x);
  return checked('reciprocal', (ONE_64X64 << 64n) / x);
}

/**
 * Fraction in basis points (1 bp = 0.01%) as 64.64
 */
export function fromBps(bps: number | bigint): Fixed64x64 {
  return divideIntegerBy(BigInt(bps), 10_000n);
}

export function min(x: Fixed64x64, y: Fixed64x64): Fixed64x64 {
  return x < y ? x : y;
}

export function max(x: Fixed64x64, y: Fixed64x64): Fixed64x64 {
  return x > y ? x : y;
}

/**
 * Render a 64.64 value as a decimal string, for logs and error details
 *
 * @example
 * toDecimalString(divideIntegerBy(1n, 4n), 4) // "0.2500"
 */
export function toDecimalString(x: Fixed64x64, precision: number = 6): string {
  const negative = x < 0n;
  const magnitude = negative ? -x : x;
  const integerPart = magnitude >> 64n;
  const fraction = ((magnitude & (ONE_64X64 - 1n)) * 10n ** BigInt(precision)) >> 64n;

  const fractionStr = precision > 0 ? `.${fraction.toString().padStart(precision, '0')}` : '';
  return `${negative ? '-' : ''}${integerPart}${fractionStr}`;
}
