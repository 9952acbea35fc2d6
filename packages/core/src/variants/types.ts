import type { Address } from "viem";

import type { LedgerTx } from "../ledger/transactions.js";
import type { TokenRecord } from "../ledger/types.js";

export const RESOLVER_KINDS = ["standard", "value", "locked", "badge", "rental"] as const;

export type ResolverKind = (typeof RESOLVER_KINDS)[number];

/**
 * Behaviour a resolver variant adds to the shared reservation/claim
 * lifecycle. Hooks run inside the operation's transaction; throwing from a
 * hook rolls the whole operation back.
 */
export interface VariantHooks {
  readonly kind: ResolverKind;
  /** Whether reservations may name a slot and a value other than 1. */
  readonly multiSlot: boolean;
  onClaimed?(tx: LedgerTx, record: TokenRecord): void;
  /** Runs before the ownership and authorization checks; may refuse the transfer by throwing. */
  onTransfer?(tx: LedgerTx, record: TokenRecord, from: Address, to: Address): void;
  /** Absent when the variant has no revocation. */
  onRevoke?(tx: LedgerTx, record: TokenRecord, caller: Address): void;
}
