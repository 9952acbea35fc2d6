/**
 * Revocable badges. Revocation flips `valid` and keeps the record, so the
 * holder's history stays visible. Each holder's count of valid badges is
 * kept in step with claims, transfers and revocations.
 */

import { getAddress, type Address } from "viem";

import { AlreadyRevokedError, TokenNotFoundError } from "../errors/catalog.js";
import { intColumn, nullableTextColumn, type LedgerDatabase } from "../ledger/sqlite.js";
import { normalizeAddress } from "../schemas/primitives.js";

import type { VariantHooks } from "./types.js";

export interface BadgeState {
  tokenId: number;
  valid: boolean;
  revokedAt: number;
  revokedBy: Address | null;
}

export interface BadgeRegistry {
  readonly hooks: VariantHooks;
  badge(tokenId: number): BadgeState;
  isValid(tokenId: number): boolean;
  hasValid(holder: Address): boolean;
  validCount(holder: Address): number;
  /** Distinct holders with at least one valid badge. */
  holdersCount(): number;
}

export function createBadgeRegistry(db: LedgerDatabase): BadgeRegistry {
  function validCount(holder: Address): number {
    const row = db.get("SELECT count FROM valid_counts WHERE holder = ?", [holder]);
    return row ? intColumn(row, "count") : 0;
  }

  function adjustCount(holder: Address, delta: number): void {
    const next = validCount(holder) + delta;
    if (next <= 0) {
      db.run("DELETE FROM valid_counts WHERE holder = ?", [holder]);
    } else {
      db.run(
        `INSERT INTO valid_counts (holder, count) VALUES (?, ?)
         ON CONFLICT (holder) DO UPDATE SET count = excluded.count`,
        [holder, next],
      );
    }
  }

  function readBadge(tokenId: number): BadgeState | undefined {
    const row = db.get("SELECT * FROM badges WHERE token_id = ?", [tokenId]);
    if (!row) return undefined;
    const revokedBy = nullableTextColumn(row, "revoked_by");
    return {
      tokenId: intColumn(row, "token_id"),
      valid: intColumn(row, "valid") === 1,
      revokedAt: intColumn(row, "revoked_at"),
      revokedBy: revokedBy === null ? null : getAddress(revokedBy),
    };
  }

  return {
    hooks: {
      kind: "badge",
      multiSlot: false,
      onClaimed(_tx, record) {
        db.run("INSERT INTO badges (token_id, valid, revoked_at) VALUES (?, 1, 0)", [record.tokenId]);
        if (record.owner !== null) adjustCount(record.owner, 1);
      },
      onTransfer(_tx, record, from, to) {
        if (!readBadge(record.tokenId)?.valid) return;
        adjustCount(from, -1);
        adjustCount(to, 1);
      },
      onRevoke(tx, record, caller) {
        const state = readBadge(record.tokenId);
        if (!state) throw new TokenNotFoundError({ tokenId: record.tokenId });
        if (!state.valid) {
          throw new AlreadyRevokedError({ tokenId: record.tokenId, revokedAt: state.revokedAt });
        }

        db.run(
          "UPDATE badges SET valid = 0, revoked_at = ?, revoked_by = ? WHERE token_id = ?",
          [tx.now, caller, record.tokenId],
        );
        if (record.owner !== null) adjustCount(record.owner, -1);

        tx.emit({
          name: "Revoked",
          tokenId: record.tokenId,
          documentId: record.documentId,
          data: { owner: record.owner, by: caller },
        });
      },
    },

    badge(tokenId) {
      const state = readBadge(tokenId);
      if (!state) throw new TokenNotFoundError({ tokenId });
      return state;
    },

    isValid(tokenId) {
      return readBadge(tokenId)?.valid ?? false;
    },

    hasValid(holder) {
      return validCount(normalizeAddress(holder, "holder")) > 0;
    },

    validCount(holder) {
      return validCount(normalizeAddress(holder, "holder"));
    },

    holdersCount() {
      const row = db.get("SELECT COUNT(*) AS cnt FROM valid_counts WHERE count > 0");
      return row ? intColumn(row, "cnt") : 0;
    },
  };
}
