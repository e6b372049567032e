/**
 * @rebasekit/ledger — Invariant audit.
 *
 * Walks every account once and compares the recomputed figures with
 * the cached aggregates. This is the O(n) pass the multiplier scheme
 * exists to avoid, so no ledger operation calls it; property tests,
 * harnesses and operators do.
 */

import { balanceOfAccount } from "./account-ledger.js";
import type { AuditReport } from "./types.js";
import type { LedgerState } from "./state.js";

export function auditState(state: LedgerState, reportedTotalSupply: bigint): AuditReport {
  const global = state.getGlobal();
  let sumOfBalances = 0n;
  let rebasingCredits = 0n;
  let nonRebasingSupply = 0n;

  for (const [, account] of state.entries()) {
    const balance = balanceOfAccount(account, global);
    sumOfBalances += balance;
    if (account.isNonRebasing) {
      nonRebasingSupply += balance;
    } else {
      rebasingCredits += account.credits;
    }
  }

  const supplyGap = reportedTotalSupply - sumOfBalances;

  return {
    accountCount: state.accountCount,
    sumOfBalances,
    totalSupply: global.totalSupply,
    reportedTotalSupply,
    supplyGap,
    rebasingCredits: { recorded: global.rebasingCredits, computed: rebasingCredits },
    nonRebasingSupply: { recorded: global.nonRebasingSupply, computed: nonRebasingSupply },
    balanced: supplyGap === 0n,
  };
}

/**
 * Re-express a report against a different reported supply.
 */
export function withReportedTotalSupply(report: AuditReport, reportedTotalSupply: bigint): AuditReport {
  const supplyGap = reportedTotalSupply - report.sumOfBalances;
  return { ...report, reportedTotalSupply, supplyGap, balanced: supplyGap === 0n };
}
