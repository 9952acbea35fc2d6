/**
 * Permanent lock: a record becomes non-transferable the moment it is
 * claimed. There is no unlock path.
 */

import { TokenLockedError } from "../errors/catalog.js";
import { intColumn, type LedgerDatabase } from "../ledger/sqlite.js";

import type { VariantHooks } from "./types.js";

export interface LockRegistry {
  readonly hooks: VariantHooks;
  isLocked(tokenId: number): boolean;
  lockedAt(tokenId: number): number | null;
}

export function createLockRegistry(db: LedgerDatabase): LockRegistry {
  function lockedAt(tokenId: number): number | null {
    const row = db.get("SELECT locked_at FROM locks WHERE token_id = ?", [tokenId]);
    return row ? intColumn(row, "locked_at") : null;
  }

  return {
    hooks: {
      kind: "locked",
      multiSlot: false,
      onClaimed(tx, record) {
        db.run("INSERT OR IGNORE INTO locks (token_id, locked_at) VALUES (?, ?)", [
          record.tokenId,
          tx.now,
        ]);
        tx.emit({
          name: "Locked",
          tokenId: record.tokenId,
          documentId: record.documentId,
          data: { owner: record.owner },
        });
      },
      onTransfer(_tx, record) {
        throw new TokenLockedError({ tokenId: record.tokenId });
      },
    },

    isLocked(tokenId) {
      return lockedAt(tokenId) !== null;
    },

    lockedAt,
  };
}
