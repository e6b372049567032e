/**
 * Shared test helpers for @rebasekit/ledger.
 */

import { LedgerError } from "../src/types.js";
import type { LedgerErrorCode, LedgerResult } from "../src/types.js";

export const P = 10n ** 18n;

/** 2e18 / 3, the multiplier after two 1-unit mints rebase to 3. */
export const TWO_THIRDS = 666_666_666_666_666_666n;

/** Value of a successful result; fails the test otherwise. */
export function unwrap<T>(result: LedgerResult<T>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

/** Error code of a failed result; fails the test otherwise. */
export function errorCode<T>(result: LedgerResult<T>): LedgerErrorCode {
  if (result.ok) {
    throw new Error("Expected failure, got success");
  }
  return result.error.code;
}

/** Code of the LedgerError thrown by fn, or undefined if nothing was thrown. */
export function thrownCode(fn: () => unknown): LedgerErrorCode | undefined {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof LedgerError) {
      return err.code;
    }
    throw err;
  }
  return undefined;
}
