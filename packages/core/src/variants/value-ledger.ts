/**
 * Semi-fungible value ledger. Records carry a value within a slot; value can
 * be split off and merged between records of the same slot, never across
 * slots, and the slot's total is unchanged by any such move.
 */

import type { Address } from "viem";

import {
  InsufficientAllowanceError,
  InsufficientValueError,
  InvalidValueError,
  NotAuthorizedError,
  SlotMismatchError,
  TokenNotFoundError,
} from "../errors/catalog.js";
import { requireClaimed, type ClaimEngine } from "../ledger/engine.js";
import type { LedgerStore } from "../ledger/store.js";
import type { LedgerTx } from "../ledger/transactions.js";
import type { SlotSummary, TokenRecord } from "../ledger/types.js";
import { normalizeAddress, requireNonZeroAddress, sameAddress } from "../schemas/primitives.js";

import type { VariantHooks } from "./types.js";

/**
 * Keep `holder` in the slot's holder set exactly while their balance in the
 * slot is positive. `pending` is value about to move that the store does not
 * show yet.
 */
function syncSlotHolder(store: LedgerStore, slot: bigint, holder: Address, pending = 0n): void {
  const balance = store
    .listOwned(holder, slot)
    .reduce((sum, record) => sum + record.value, pending);
  if (balance > 0n) store.addSlotHolder(slot, holder);
  else store.removeSlotHolder(slot, holder);
}

export const valueLedgerHooks: VariantHooks = {
  kind: "value",
  multiSlot: true,
  onClaimed(tx, record) {
    if (record.owner !== null) syncSlotHolder(tx.store, record.slot, record.owner);
  },
  // Runs before the owner changes, so the record's value is still counted for `from`.
  onTransfer(tx, record, from, to) {
    if (sameAddress(from, to)) return;
    syncSlotHolder(tx.store, record.slot, from, -record.value);
    syncSlotHolder(tx.store, record.slot, to, record.value);
  },
};

export interface ValueTransferResult {
  from: TokenRecord;
  to: TokenRecord;
}

type OwnedRecord = TokenRecord & { owner: Address };

/**
 * Check that `caller` may move `amount` out of `record`, in priority order:
 * owner, operator-for-all, record approval, slot approval, then value
 * allowance. A used allowance is reduced by `amount`.
 */
function authorizeValueSpend(
  store: LedgerStore,
  record: OwnedRecord,
  caller: Address,
  amount: bigint,
): void {
  if (sameAddress(record.owner, caller)) return;
  if (store.isOperator(record.owner, caller)) return;
  if (sameAddress(record.approved, caller)) return;
  if (store.isSlotOperator(record.owner, record.slot, caller)) return;

  const allowance = store.getAllowance(record.tokenId, caller);
  if (allowance === 0n) {
    throw new NotAuthorizedError({ tokenId: record.tokenId, caller });
  }
  if (allowance < amount) {
    throw new InsufficientAllowanceError({
      tokenId: record.tokenId,
      allowance: allowance.toString(),
      amount: amount.toString(),
    });
  }
  store.setAllowance(record.tokenId, caller, allowance - amount);
}

function assertPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new InvalidValueError({ field: "amount", reason: "must be positive" });
  }
}

export class ValueLedger {
  constructor(private readonly engine: ClaimEngine) {}

  /** Move `amount` from one claimed record to another in the same slot. */
  async transferValue(
    rawCaller: Address,
    params: { fromTokenId: number; toTokenId: number; amount: bigint },
  ): Promise<ValueTransferResult> {
    const caller = normalizeAddress(rawCaller, "caller");
    const { fromTokenId, toTokenId, amount } = params;
    assertPositive(amount);
    if (fromTokenId === toTokenId) {
      throw new InvalidValueError({ field: "toTokenId", reason: "source and destination are the same record" });
    }

    return this.engine.execute("transferValue", (tx) => {
      const from = requireClaimed(tx.store, fromTokenId);
      const to = requireClaimed(tx.store, toTokenId);
      if (from.slot !== to.slot) {
        throw new SlotMismatchError({
          fromSlot: from.slot.toString(),
          toSlot: to.slot.toString(),
        });
      }

      this.debit(tx, from, caller, amount);
      tx.store.setValue(toTokenId, to.value + amount);
      syncSlotHolder(tx.store, from.slot, from.owner);
      syncSlotHolder(tx.store, to.slot, to.owner);

      this.emitTransferValue(tx, from, toTokenId, amount, caller);
      return {
        from: { ...from, value: from.value - amount },
        to: { ...to, value: to.value + amount },
      };
    });
  }

  /** Split `amount` off into a new claimed record owned by `to`. */
  async transferValueToAddress(
    rawCaller: Address,
    params: { fromTokenId: number; to: Address; amount: bigint },
  ): Promise<TokenRecord> {
    const caller = normalizeAddress(rawCaller, "caller");
    const to = requireNonZeroAddress(params.to, "to");
    const { fromTokenId, amount } = params;
    assertPositive(amount);

    return this.engine.execute("transferValueToAddress", (tx) => {
      const from = requireClaimed(tx.store, fromTokenId);
      this.debit(tx, from, caller, amount);

      const record: TokenRecord = {
        tokenId: tx.store.allocateTokenId(),
        documentId: from.documentId,
        slot: from.slot,
        value: amount,
        owner: to,
        reservedFor: null,
        claimed: true,
        label: null,
        approved: null,
        createdAt: tx.now,
        claimedAt: tx.now,
        labelUpdatedAt: null,
      };
      tx.store.insertRecord(record);
      syncSlotHolder(tx.store, from.slot, from.owner);
      syncSlotHolder(tx.store, record.slot, to);

      tx.emit({
        name: "Transfer",
        tokenId: record.tokenId,
        documentId: record.documentId,
        data: { from: null, to, by: caller },
      });
      this.emitTransferValue(tx, from, record.tokenId, amount, caller);
      return record;
    });
  }

  private debit(tx: LedgerTx, from: OwnedRecord, caller: Address, amount: bigint): void {
    authorizeValueSpend(tx.store, from, caller, amount);
    if (amount > from.value) {
      throw new InsufficientValueError({
        tokenId: from.tokenId,
        value: from.value.toString(),
        amount: amount.toString(),
      });
    }
    tx.store.setValue(from.tokenId, from.value - amount);
  }

  private emitTransferValue(
    tx: LedgerTx,
    from: TokenRecord,
    toTokenId: number,
    amount: bigint,
    caller: Address,
  ): void {
    tx.emit({
      name: "TransferValue",
      tokenId: from.tokenId,
      documentId: from.documentId,
      data: {
        fromTokenId: from.tokenId,
        toTokenId,
        slot: from.slot.toString(),
        amount: amount.toString(),
        by: caller,
      },
    });
  }

  /** Owner (or operator-for-all) sets how much `operator` may move out of a record. */
  async approveValue(
    rawCaller: Address,
    params: { tokenId: number; operator: Address; amount: bigint },
  ): Promise<void> {
    const caller = normalizeAddress(rawCaller, "caller");
    const operator = requireNonZeroAddress(params.operator, "operator");
    const { tokenId, amount } = params;
    if (amount < 0n) {
      throw new InvalidValueError({ field: "amount", reason: "must be non-negative" });
    }

    return this.engine.execute("approveValue", (tx) => {
      const record = requireClaimed(tx.store, tokenId);
      if (!sameAddress(record.owner, caller) && !tx.store.isOperator(record.owner, caller)) {
        throw new NotAuthorizedError({ tokenId, caller });
      }
      tx.store.setAllowance(tokenId, operator, amount);
      tx.emit({
        name: "ValueApproval",
        tokenId,
        documentId: record.documentId,
        data: { owner: record.owner, operator, amount: amount.toString() },
      });
    });
  }

  allowance(tokenId: number, operator: Address): bigint {
    return this.engine.store.getAllowance(tokenId, normalizeAddress(operator, "operator"));
  }

  /** Approve `operator` for every record the caller holds in `slot`. */
  async setApprovalForSlot(
    rawCaller: Address,
    params: { slot: bigint; operator: Address; approved: boolean },
  ): Promise<void> {
    const caller = normalizeAddress(rawCaller, "caller");
    const operator = requireNonZeroAddress(params.operator, "operator");
    const { slot, approved } = params;

    return this.engine.execute("setApprovalForSlot", (tx) => {
      tx.store.setSlotOperator(caller, slot, operator, approved);
      tx.emit({
        name: "SlotApproval",
        data: { owner: caller, slot: slot.toString(), operator, approved },
      });
    });
  }

  isApprovedForSlot(owner: Address, slot: bigint, operator: Address): boolean {
    return this.engine.store.isSlotOperator(
      normalizeAddress(owner, "owner"),
      slot,
      normalizeAddress(operator, "operator"),
    );
  }

  valueOf(tokenId: number): bigint {
    return this.record(tokenId).value;
  }

  slotOf(tokenId: number): bigint {
    return this.record(tokenId).slot;
  }

  /** Sum of the values of the claimed records `holder` owns, optionally within one slot. */
  balanceOf(holder: Address, slot?: bigint): bigint {
    return this.engine.store
      .listOwned(normalizeAddress(holder, "holder"), slot)
      .reduce((sum, record) => sum + record.value, 0n);
  }

  slotSummary(slot: bigint): SlotSummary {
    const totals = this.engine.store.getSlot(slot);
    return {
      slot,
      totalReserved: totals?.totalReserved ?? 0n,
      totalMinted: totals?.totalMinted ?? 0n,
      holders: this.engine.store.listSlotHolders(slot),
    };
  }

  private record(tokenId: number): TokenRecord {
    const record = this.engine.store.getRecord(tokenId);
    if (!record) throw new TokenNotFoundError({ tokenId });
    return record;
  }
}
