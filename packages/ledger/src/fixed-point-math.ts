/**
 * @rebasekit/ledger — Deterministic fixed-point arithmetic.
 *
 * Every credit/balance conversion in the ledger goes through
 * mulTruncate or divPrecisely. Both round toward zero, which is the
 * single source of all drift between balances and total supply.
 *
 * Rules:
 * - bigint only, no floating-point operations
 * - Values model unsigned 256-bit integers; anything past
 *   MAX_UINT256 is an overflow, anything below zero an underflow
 */

import { LedgerError } from "./types.js";

/** Fixed-point scale for every ratio and multiplier. */
export const PRECISION = 10n ** 18n;

export const MAX_UINT256 = 2n ** 256n - 1n;

const UINT_PATTERN = /^\d+$/;

/**
 * floor(x * multiplier / PRECISION)
 *
 * mulTruncate(3n, 5n * 10n ** 17n) → 1n
 */
export function mulTruncate(x: bigint, multiplier: bigint): bigint {
  const product = x * multiplier;
  if (product > MAX_UINT256) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `mulTruncate overflow: ${x.toString()} * ${multiplier.toString()}`,
    );
  }
  return product / PRECISION;
}

/**
 * floor(x * PRECISION / divisor)
 *
 * divPrecisely(1n, 666666666666666666n) → 1n
 */
export function divPrecisely(x: bigint, divisor: bigint): bigint {
  if (divisor === 0n) {
    throw new LedgerError("DIVISION_BY_ZERO", "divPrecisely divisor is zero");
  }
  const scaled = x * PRECISION;
  if (scaled > MAX_UINT256) {
    throw new LedgerError("ARITHMETIC_OVERFLOW", `divPrecisely overflow: ${x.toString()} * PRECISION`);
  }
  return scaled / divisor;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  const sum = a + b;
  if (sum > MAX_UINT256) {
    throw new LedgerError("ARITHMETIC_OVERFLOW", `Addition overflow: ${a.toString()} + ${b.toString()}`);
  }
  return sum;
}

export function checkedSub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new LedgerError("ARITHMETIC_OVERFLOW", `Subtraction underflow: ${a.toString()} - ${b.toString()}`);
  }
  return a - b;
}

/** Apply a signed delta to an unsigned value. */
export function applyDelta(value: bigint, delta: bigint): bigint {
  return delta >= 0n ? checkedAdd(value, delta) : checkedSub(value, -delta);
}

/**
 * Assert a caller-supplied amount is a valid uint256.
 */
export function assertUint256(value: bigint, label: string): void {
  if (value < 0n || value > MAX_UINT256) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be an unsigned 256-bit integer, got ${value.toString()}`);
  }
}

/**
 * Parse a base-10 unsigned integer string.
 *
 * "42" → 42n; "", "-1", "1.5" and values past MAX_UINT256 are rejected.
 */
export function parseUint(text: string, label = "amount"): bigint {
  if (!UINT_PATTERN.test(text)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid ${label}: "${text}"`);
  }
  const value = BigInt(text);
  assertUint256(value, label);
  return value;
}
