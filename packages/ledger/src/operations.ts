/**
 * @rebasekit/ledger — Wire operation dispatch.
 *
 * Applies a LedgerOperation (string amounts, as submitted over HTTP or
 * read back from a journal) to any TokenLedger. Unparseable amounts
 * come back as INVALID_AMOUNT results like every other failure.
 */

import type { LedgerOperation } from "@rebasekit/types";
import { parseUint } from "./fixed-point-math.js";
import type { LedgerResult, OperationValue, TokenLedger } from "./types.js";
import { fail, LedgerError } from "./types.js";

export function applyOperation(ledger: TokenLedger, operation: LedgerOperation): LedgerResult<OperationValue> {
  try {
    switch (operation.kind) {
      case "mint":
        return ledger.mint(operation.account, parseUint(operation.amount));
      case "burn":
        return ledger.burn(operation.account, parseUint(operation.amount));
      case "transfer":
        return ledger.transfer(operation.from, operation.to, parseUint(operation.amount));
      case "optIn":
        return ledger.optIn(operation.account);
      case "optOut":
        return ledger.optOut(operation.account);
      case "changeSupply":
        return ledger.changeSupply(parseUint(operation.newTotalSupply, "newTotalSupply"));
    }
  } catch (err: unknown) {
    if (err instanceof LedgerError) {
      return fail(err);
    }
    throw err;
  }
}

/**
 * Short human-readable form for logs.
 */
export function describeOperation(operation: LedgerOperation): string {
  switch (operation.kind) {
    case "mint":
    case "burn":
      return `${operation.kind} ${operation.amount} → ${operation.account}`;
    case "transfer":
      return `transfer ${operation.amount} ${operation.from} → ${operation.to}`;
    case "optIn":
    case "optOut":
      return `${operation.kind} ${operation.account}`;
    case "changeSupply":
      return `changeSupply ${operation.newTotalSupply}`;
  }
}
