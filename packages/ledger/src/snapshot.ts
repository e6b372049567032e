/**
 * @rebasekit/ledger — Snapshot conversion.
 *
 * Converts between in-memory bigint state and the string-typed records
 * of @rebasekit/types. Loading is fail-closed: any record that breaks
 * a ledger invariant throws INVALID_SNAPSHOT.
 */

import type { AccountId, AccountRecord, GlobalStateRecord } from "@rebasekit/types";
import { isUintString } from "@rebasekit/types";
import { MAX_UINT256 } from "./fixed-point-math.js";
import type { AccountState, GlobalState } from "./types.js";
import { LedgerError } from "./types.js";

function loadUint(text: string, label: string): bigint {
  if (!isUintString(text)) {
    throw new LedgerError("INVALID_SNAPSHOT", `Snapshot field ${label} is not an unsigned integer: "${text}"`);
  }
  const value = BigInt(text);
  if (value > MAX_UINT256) {
    throw new LedgerError("INVALID_SNAPSHOT", `Snapshot field ${label} exceeds uint256`);
  }
  return value;
}

export function toAccountRecord(id: AccountId, account: AccountState): AccountRecord {
  if (account.isNonRebasing) {
    return {
      id,
      credits: account.credits.toString(),
      isNonRebasing: true,
      lockedCreditsPerToken: account.lockedCreditsPerToken.toString(),
    };
  }
  return { id, credits: account.credits.toString(), isNonRebasing: false };
}

export function fromAccountRecord(record: AccountRecord): AccountState {
  const credits = loadUint(record.credits, `accounts["${record.id}"].credits`);

  if (!record.isNonRebasing) {
    if (record.lockedCreditsPerToken !== undefined) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Rebasing account "${record.id}" must not carry a locked multiplier`,
      );
    }
    return { credits, isNonRebasing: false };
  }

  if (record.lockedCreditsPerToken === undefined) {
    throw new LedgerError("INVALID_SNAPSHOT", `Non-rebasing account "${record.id}" has no locked multiplier`);
  }
  const lockedCreditsPerToken = loadUint(
    record.lockedCreditsPerToken,
    `accounts["${record.id}"].lockedCreditsPerToken`,
  );
  if (lockedCreditsPerToken === 0n) {
    throw new LedgerError("INVALID_SNAPSHOT", `Non-rebasing account "${record.id}" has a zero multiplier`);
  }
  return { credits, isNonRebasing: true, lockedCreditsPerToken };
}

export function toGlobalRecord(global: GlobalState): GlobalStateRecord {
  return {
    rebasingCredits: global.rebasingCredits.toString(),
    rebasingCreditsPerToken: global.rebasingCreditsPerToken.toString(),
    nonRebasingSupply: global.nonRebasingSupply.toString(),
    totalSupply: global.totalSupply.toString(),
  };
}

export function fromGlobalRecord(record: GlobalStateRecord): GlobalState {
  const rebasingCreditsPerToken = loadUint(record.rebasingCreditsPerToken, "global.rebasingCreditsPerToken");
  if (rebasingCreditsPerToken === 0n) {
    throw new LedgerError("INVALID_SNAPSHOT", "Snapshot rebasingCreditsPerToken is zero");
  }
  return {
    rebasingCredits: loadUint(record.rebasingCredits, "global.rebasingCredits"),
    rebasingCreditsPerToken,
    nonRebasingSupply: loadUint(record.nonRebasingSupply, "global.nonRebasingSupply"),
    totalSupply: loadUint(record.totalSupply, "global.totalSupply"),
  };
}
