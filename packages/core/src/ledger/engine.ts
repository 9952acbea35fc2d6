/**
 * Reservation/claim lifecycle shared by every resolver variant.
 *
 * Each public mutating method is one entry point: it is queued behind the
 * ledger's earlier operations, refuses while paused, and commits all of its
 * writes (and events) in a single transaction or none of them.
 */

import type { Logger } from "pino";
import type { Address, Hex } from "viem";

import type { AttestationGateway } from "../attestations/gateway.js";
import { Capability } from "../capabilities/bitmask.js";
import {
  AlreadyClaimedError,
  InvalidAddressError,
  InvalidValueError,
  IssuerAlreadySetError,
  LabelTooLargeError,
  MissingRoleError,
  NotAuthorizedError,
  NotReservedForCallerError,
  OnlyIssuerMayCancelError,
  TokenNotFoundError,
  UnsupportedOperationError,
} from "../errors/catalog.js";
import { reservationState, transition } from "../lifecycle/state-machine.js";
import {
  byteLength,
  normalizeAddress,
  normalizeBytes32,
  requireNonZeroAddress,
  sameAddress,
} from "../schemas/primitives.js";
import type { VariantHooks } from "../variants/types.js";
import {
  assertCapability,
  checkCapability,
  fetchAttestation,
  type CapabilityCheck,
  type CapabilityGrant,
  type CapabilityRequest,
} from "../verifier/verify.js";

import {
  META_PAUSED,
  META_SCHEMA_ID,
  assertNotPaused,
  capabilitySchemaId,
  isPaused,
  requireRole,
} from "./access.js";
import type { LedgerStore } from "./store.js";
import {
  LedgerRunner,
  type Clock,
  type LedgerEventListener,
  type LedgerTx,
} from "./transactions.js";
import type { LedgerEvent, LedgerEventName, TokenRecord } from "./types.js";

export const DEFAULT_MAX_LABEL_BYTES = 1024;

export interface CommittedClaim {
  record: TokenRecord;
  grant: CapabilityGrant;
}

export interface ClaimEngineOptions {
  store: LedgerStore;
  gateway: AttestationGateway;
  variant: VariantHooks;
  logger: Logger;
  maxLabelBytes?: number;
  clock?: Clock;
  /**
   * Runs after a claim commits, outside the queue and without delaying the
   * claim's result. Failures are logged, never surfaced.
   */
  onClaimCommitted?: (claim: CommittedClaim) => Promise<void>;
}

export interface ReserveParams {
  documentId: Hex;
  recipient: Address;
  value?: bigint;
  slot?: bigint;
  label?: Hex | null;
}

export interface ReserveAnonymousParams {
  documentId: Hex;
  label: Hex;
  value?: bigint;
  slot?: bigint;
}

export interface ClaimParams {
  documentId: Hex;
  tokenId: number;
  attestationId: Hex;
}

export interface TransferParams {
  from: Address;
  to: Address;
  tokenId: number;
}

export interface UpdateLabelParams {
  documentId: Hex;
  tokenId: number;
  label: Hex;
  attestationId: Hex;
}

export interface ExecuteOptions {
  /** Administration entry points stay available while the ledger is paused. */
  allowWhilePaused?: boolean;
}

/** Move value between a slot's reserved and minted totals. */
export function adjustSlotTotals(
  store: LedgerStore,
  slot: bigint,
  reservedDelta: bigint,
  mintedDelta: bigint,
): void {
  const current = store.getSlot(slot) ?? { slot, totalReserved: 0n, totalMinted: 0n };
  const next = {
    slot,
    totalReserved: current.totalReserved + reservedDelta,
    totalMinted: current.totalMinted + mintedDelta,
  };
  if (next.totalReserved === 0n && next.totalMinted === 0n) {
    store.deleteSlot(slot);
    return;
  }
  store.putSlot(next);
}

/** A claimed record, or TokenNotFound. */
export function requireClaimed(store: LedgerStore, tokenId: number): TokenRecord & { owner: Address } {
  const record = store.getRecord(tokenId);
  if (!record || !record.claimed || record.owner === null) {
    throw new TokenNotFoundError({ tokenId });
  }
  return { ...record, owner: record.owner };
}

export class ClaimEngine {
  readonly store: LedgerStore;
  readonly variant: VariantHooks;
  readonly logger: Logger;
  readonly maxLabelBytes: number;
  private readonly runner: LedgerRunner;
  private readonly gateway: AttestationGateway;
  private readonly onClaimCommitted?: (claim: CommittedClaim) => Promise<void>;

  constructor(options: ClaimEngineOptions) {
    this.store = options.store;
    this.variant = options.variant;
    this.logger = options.logger;
    this.gateway = options.gateway;
    this.maxLabelBytes = options.maxLabelBytes ?? DEFAULT_MAX_LABEL_BYTES;
    this.onClaimCommitted = options.onClaimCommitted;
    this.runner = new LedgerRunner(options.store, options.logger, options.clock);
  }

  /** Current ledger time in unix seconds. */
  now(): number {
    return this.runner.clock();
  }

  onEvent(listener: LedgerEventListener): () => void {
    return this.runner.onEvent(listener);
  }

  /** Queue an entry point and run it in one transaction. */
  execute<T>(
    operation: string,
    fn: (tx: LedgerTx) => T,
    options: ExecuteOptions = {},
  ): Promise<T> {
    return this.runner.serialize(operation, () =>
      this.runner.atomic((tx) => {
        if (!options.allowWhilePaused) assertNotPaused(tx.store);
        return fn(tx);
      }),
    );
  }

  /**
   * Queue an entry point with an asynchronous preparation step (a fetch or a
   * signature check) that runs inside the queued slot, before the transaction.
   */
  executePrepared<P, T>(
    operation: string,
    prepare: (store: LedgerStore) => Promise<P>,
    fn: (tx: LedgerTx, prepared: P) => T,
  ): Promise<T> {
    return this.runner.serialize(operation, async () => {
      assertNotPaused(this.store);
      const prepared = await prepare(this.store);

      return this.runner.atomic((tx) => {
        assertNotPaused(tx.store);
        return fn(tx, prepared);
      });
    });
  }

  /**
   * Queue an entry point that needs a verified capability. `precheck` runs
   * before the attestation fetch and again inside the transaction, so state
   * errors win over attestation errors.
   */
  executeVerified<T>(
    operation: string,
    request: CapabilityRequest,
    precheck: (store: LedgerStore) => void,
    fn: (tx: LedgerTx, grant: CapabilityGrant) => T,
  ): Promise<T> {
    return this.executePrepared(
      operation,
      (store) => {
        precheck(store);
        return fetchAttestation(this.gateway, request.attestationId);
      },
      (tx, attestation) => {
        precheck(tx.store);
        const grant = assertCapability(tx, request, attestation);
        return fn(tx, grant);
      },
    );
  }

  // Issuers

  async setIssuer(caller: Address, documentId: Hex, issuer: Address): Promise<Address> {
    const doc = normalizeBytes32(documentId, "documentId");
    const issuerAddress = requireNonZeroAddress(issuer, "issuer");

    return this.execute("setIssuer", (tx) => {
      requireRole(tx.store, "executor", normalizeAddress(caller, "caller"));

      const existing = tx.store.getIssuer(doc);
      if (existing !== null) {
        throw new IssuerAlreadySetError({ documentId: doc, issuer: existing });
      }

      tx.store.insertIssuer(doc, issuerAddress, tx.now);
      tx.emit({ name: "IssuerRegistered", documentId: doc, data: { issuer: issuerAddress } });
      return issuerAddress;
    });
  }

  issuerOf(documentId: Hex): Address | null {
    return this.store.getIssuer(normalizeBytes32(documentId, "documentId"));
  }

  // Reservations

  async reserve(caller: Address, params: ReserveParams): Promise<TokenRecord> {
    const recipient = requireNonZeroAddress(params.recipient, "recipient");
    return this.createReservation("reserve", caller, {
      documentId: params.documentId,
      reservedFor: recipient,
      value: params.value,
      slot: params.slot,
      label: params.label ?? null,
    });
  }

  /** Reserve for whoever first presents a valid claim attestation. */
  async reserveAnonymous(caller: Address, params: ReserveAnonymousParams): Promise<TokenRecord> {
    return this.createReservation("reserveAnonymous", caller, {
      documentId: params.documentId,
      reservedFor: null,
      value: params.value,
      slot: params.slot,
      label: params.label,
    });
  }

  reservationFor(documentId: Hex, slot = 0n): TokenRecord | null {
    const tokenId = this.store.getReservation(normalizeBytes32(documentId, "documentId"), slot);
    if (tokenId === undefined) return null;
    return this.store.getRecord(tokenId) ?? null;
  }

  private createReservation(
    operation: string,
    rawCaller: Address,
    params: {
      documentId: Hex;
      reservedFor: Address | null;
      value?: bigint;
      slot?: bigint;
      label: Hex | null;
    },
  ): Promise<TokenRecord> {
    const caller = normalizeAddress(rawCaller, "caller");
    const documentId = normalizeBytes32(params.documentId, "documentId");
    const { slot, value } = this.reservationShape(params.slot, params.value);
    const label = params.label;
    if (label !== null) this.assertLabelSize(label);

    return this.execute(operation, (tx) => {
      this.requireReserver(tx.store, caller, documentId);

      const existingId = tx.store.getReservation(documentId, slot);
      const existing = existingId === undefined ? undefined : tx.store.getRecord(existingId);
      if (existing) {
        if (existing.claimed) {
          throw new AlreadyClaimedError({ documentId, slot: slot.toString(), tokenId: existing.tokenId });
        }
        if (
          sameReservedFor(existing.reservedFor, params.reservedFor) &&
          existing.value === value &&
          existing.label === label
        ) {
          return existing;
        }
      }
      transition(reservationState(existing), "reserve", {
        documentId,
        slot: slot.toString(),
        tokenId: existing?.tokenId,
      });

      const record: TokenRecord = {
        tokenId: tx.store.allocateTokenId(),
        documentId,
        slot,
        value,
        owner: null,
        reservedFor: params.reservedFor,
        claimed: false,
        label,
        approved: null,
        createdAt: tx.now,
        claimedAt: null,
        labelUpdatedAt: label === null ? null : tx.now,
      };
      tx.store.insertRecord(record);
      tx.store.insertReservation(documentId, slot, record.tokenId);
      adjustSlotTotals(tx.store, slot, value, 0n);

      tx.emit({
        name: "Reserved",
        tokenId: record.tokenId,
        documentId,
        data: {
          reservedFor: params.reservedFor,
          slot: slot.toString(),
          value: value.toString(),
          by: caller,
        },
      });
      return record;
    });
  }

  private reservationShape(slot?: bigint, value?: bigint): { slot: bigint; value: bigint } {
    const resolved = { slot: slot ?? 0n, value: value ?? 1n };
    if (resolved.slot < 0n) {
      throw new InvalidValueError({ field: "slot", reason: "must be non-negative" });
    }
    if (resolved.value < 0n) {
      throw new InvalidValueError({ field: "value", reason: "must be non-negative" });
    }
    if (!this.variant.multiSlot && (resolved.slot !== 0n || resolved.value !== 1n)) {
      throw new InvalidValueError({
        reason: `${this.variant.kind} resolvers hold one unit per document in slot 0`,
      });
    }
    return resolved;
  }

  private requireReserver(store: LedgerStore, caller: Address, documentId: Hex): void {
    if (store.hasRole("reserver", caller)) return;
    if (sameAddress(store.getIssuer(documentId), caller)) return;
    throw new MissingRoleError({ role: "reserver", caller, documentId });
  }

  private assertLabelSize(label: Hex): void {
    const size = byteLength(label);
    if (size > this.maxLabelBytes) {
      throw new LabelTooLargeError({ maxBytes: this.maxLabelBytes, actual: size });
    }
  }

  // Claims

  async claim(rawCaller: Address, params: ClaimParams): Promise<TokenRecord> {
    const caller = normalizeAddress(rawCaller, "caller");
    const documentId = normalizeBytes32(params.documentId, "documentId");
    const attestationId = normalizeBytes32(params.attestationId, "attestationId");
    const { tokenId } = params;

    const precheck = (store: LedgerStore): void => {
      const record = store.getRecord(tokenId);
      if (!record || record.documentId !== documentId) {
        throw new TokenNotFoundError({ documentId, tokenId });
      }
      transition(reservationState(record), "claim", { documentId, tokenId });
      if (record.reservedFor !== null && !sameAddress(record.reservedFor, caller)) {
        throw new NotReservedForCallerError({ tokenId, caller });
      }
    };

    const committed = await this.executeVerified(
      "claim",
      { caller, documentId, required: Capability.CLAIM, attestationId },
      precheck,
      (tx, grant) => {
        const reserved = tx.store.getRecord(tokenId);
        if (!reserved) throw new TokenNotFoundError({ documentId, tokenId });

        tx.store.markClaimed(tokenId, caller, tx.now);
        adjustSlotTotals(tx.store, reserved.slot, -reserved.value, reserved.value);

        const record = tx.store.getRecord(tokenId) ?? reserved;
        this.variant.onClaimed?.(tx, record);

        tx.emit({
          name: "Claimed",
          tokenId,
          documentId,
          data: {
            owner: caller,
            attestationId,
            slot: record.slot.toString(),
            value: record.value.toString(),
          },
        });
        return { record, grant };
      },
    );

    const hook = this.onClaimCommitted;
    if (hook) {
      // Not awaited: the claim response never waits on the hook.
      Promise.resolve()
        .then(() => hook(committed))
        .catch((err: unknown) => {
          this.logger.warn({ err, tokenId }, "Post-claim hook failed");
        });
    }
    return committed.record;
  }

  async cancel(rawCaller: Address, params: { documentId: Hex; tokenId: number }): Promise<TokenRecord> {
    const caller = normalizeAddress(rawCaller, "caller");
    const documentId = normalizeBytes32(params.documentId, "documentId");
    const { tokenId } = params;

    return this.execute("cancel", (tx) => {
      const record = tx.store.getRecord(tokenId);
      if (!record || record.documentId !== documentId) {
        throw new TokenNotFoundError({ documentId, tokenId });
      }
      if (!sameAddress(tx.store.getIssuer(documentId), caller)) {
        throw new OnlyIssuerMayCancelError({ documentId, caller });
      }
      transition(reservationState(record), "cancel", { documentId, tokenId });

      tx.store.deleteRecord(tokenId);
      if (tx.store.getReservation(documentId, record.slot) === tokenId) {
        tx.store.deleteReservation(documentId, record.slot);
      }
      adjustSlotTotals(tx.store, record.slot, -record.value, 0n);

      tx.emit({
        name: "Cancelled",
        tokenId,
        documentId,
        data: { by: caller, slot: record.slot.toString(), value: record.value.toString() },
      });
      return record;
    });
  }

  // Ownership

  async transfer(rawCaller: Address, params: TransferParams): Promise<TokenRecord> {
    const caller = normalizeAddress(rawCaller, "caller");
    const from = normalizeAddress(params.from, "from");
    const to = requireNonZeroAddress(params.to, "to");
    const { tokenId } = params;

    return this.execute("transfer", (tx) => {
      const record = requireClaimed(tx.store, tokenId);
      this.variant.onTransfer?.(tx, record, from, to);

      if (!sameAddress(record.owner, from)) {
        throw new NotAuthorizedError({ tokenId, reason: "from is not the owner" });
      }
      if (!this.isAuthorizedForToken(tx.store, record, caller)) {
        throw new NotAuthorizedError({ tokenId, caller });
      }

      tx.store.setOwner(tokenId, to);
      tx.store.setApproved(tokenId, null);
      tx.store.clearAllowances(tokenId);

      tx.emit({
        name: "Transfer",
        tokenId,
        documentId: record.documentId,
        data: { from, to, by: caller },
      });
      return tx.store.getRecord(tokenId) ?? record;
    });
  }

  /** Owner, operator-for-all, or the record's approved address. */
  isAuthorizedForToken(store: LedgerStore, record: TokenRecord & { owner: Address }, caller: Address): boolean {
    return (
      sameAddress(record.owner, caller) ||
      store.isOperator(record.owner, caller) ||
      sameAddress(record.approved, caller)
    );
  }

  async approve(rawCaller: Address, tokenId: number, approved: Address | null): Promise<void> {
    const caller = normalizeAddress(rawCaller, "caller");
    const target = approved === null ? null : normalizeAddress(approved, "approved");

    return this.execute("approve", (tx) => {
      const record = requireClaimed(tx.store, tokenId);
      if (!sameAddress(record.owner, caller) && !tx.store.isOperator(record.owner, caller)) {
        throw new NotAuthorizedError({ tokenId, caller });
      }
      tx.store.setApproved(tokenId, target);
      tx.emit({
        name: "Approval",
        tokenId,
        documentId: record.documentId,
        data: { owner: record.owner, approved: target },
      });
    });
  }

  async setApprovalForAll(rawCaller: Address, operator: Address, approved: boolean): Promise<void> {
    const caller = normalizeAddress(rawCaller, "caller");
    const target = requireNonZeroAddress(operator, "operator");
    if (sameAddress(caller, target)) {
      throw new InvalidAddressError({ field: "operator", reason: "cannot approve self" });
    }

    return this.execute("setApprovalForAll", (tx) => {
      tx.store.setOperator(caller, target, approved);
      tx.emit({
        name: "ApprovalForAll",
        data: { owner: caller, operator: target, approved },
      });
    });
  }

  getApproved(tokenId: number): Address | null {
    return requireClaimed(this.store, tokenId).approved;
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    return this.store.isOperator(
      normalizeAddress(owner, "owner"),
      normalizeAddress(operator, "operator"),
    );
  }

  // Metadata

  async updateLabel(rawCaller: Address, params: UpdateLabelParams): Promise<TokenRecord> {
    const caller = normalizeAddress(rawCaller, "caller");
    const documentId = normalizeBytes32(params.documentId, "documentId");
    const attestationId = normalizeBytes32(params.attestationId, "attestationId");
    const { tokenId, label } = params;
    this.assertLabelSize(label);

    const precheck = (store: LedgerStore): void => {
      const record = requireClaimed(store, tokenId);
      if (record.documentId !== documentId) {
        throw new TokenNotFoundError({ documentId, tokenId });
      }
      if (!sameAddress(record.owner, caller)) {
        throw new NotAuthorizedError({ tokenId, caller, reason: "only the owner may relabel" });
      }
    };

    return this.executeVerified(
      "updateLabel",
      { caller, documentId, required: Capability.UPDATE_METADATA, attestationId },
      precheck,
      (tx) => {
        tx.store.setLabel(tokenId, label, tx.now);
        tx.emit({ name: "LabelUpdated", tokenId, documentId, data: { label, by: caller } });
        const updated = tx.store.getRecord(tokenId);
        if (!updated) throw new TokenNotFoundError({ tokenId });
        return updated;
      },
    );
  }

  // Revocation

  async revoke(rawCaller: Address, tokenId: number): Promise<TokenRecord> {
    const caller = normalizeAddress(rawCaller, "caller");
    const onRevoke = this.variant.onRevoke;
    if (!onRevoke) {
      throw new UnsupportedOperationError({ operation: "revoke", kind: this.variant.kind });
    }

    return this.execute("revoke", (tx) => {
      const record = requireClaimed(tx.store, tokenId);
      const isIssuer = sameAddress(tx.store.getIssuer(record.documentId), caller);
      if (!isIssuer && !tx.store.hasRole("administrator", caller)) {
        throw new NotAuthorizedError({
          tokenId,
          caller,
          reason: "only the document issuer or an administrator may revoke",
        });
      }
      onRevoke.call(this.variant, tx, record, caller);
      return record;
    });
  }

  // Verification

  /** Verify a capability as its own entry point; records the audit event. */
  async verify(rawCaller: Address, request: Omit<CapabilityRequest, "caller">): Promise<number> {
    const caller = normalizeAddress(rawCaller, "caller");
    const documentId = normalizeBytes32(request.documentId, "documentId");
    const attestationId = normalizeBytes32(request.attestationId, "attestationId");

    return this.executeVerified(
      "verify",
      { caller, documentId, required: request.required, attestationId },
      () => undefined,
      (_tx, grant) => grant.granted,
    );
  }

  /** Same checks as verify without events or writes. */
  async check(rawCaller: Address, request: Omit<CapabilityRequest, "caller">): Promise<CapabilityCheck> {
    return checkCapability(
      this.gateway,
      this.store,
      {
        caller: normalizeAddress(rawCaller, "caller"),
        documentId: normalizeBytes32(request.documentId, "documentId"),
        required: request.required,
        attestationId: normalizeBytes32(request.attestationId, "attestationId"),
      },
      this.now(),
    );
  }

  // Administration

  async pause(rawCaller: Address): Promise<void> {
    return this.setPaused(rawCaller, true);
  }

  async unpause(rawCaller: Address): Promise<void> {
    return this.setPaused(rawCaller, false);
  }

  private async setPaused(rawCaller: Address, paused: boolean): Promise<void> {
    const caller = normalizeAddress(rawCaller, "caller");
    return this.execute(
      paused ? "pause" : "unpause",
      (tx) => {
        requireRole(tx.store, "administrator", caller);
        if (isPaused(tx.store) === paused) return;
        tx.store.setMeta(META_PAUSED, paused ? "1" : "0");
        tx.emit({ name: paused ? "Paused" : "Unpaused", data: { by: caller } });
      },
      { allowWhilePaused: true },
    );
  }

  isPaused(): boolean {
    return isPaused(this.store);
  }

  capabilitySchema(): Hex | null {
    return capabilitySchemaId(this.store);
  }

  async setCapabilitySchema(rawCaller: Address, schemaId: Hex): Promise<Hex> {
    const caller = normalizeAddress(rawCaller, "caller");
    const next = normalizeBytes32(schemaId, "schemaId");

    return this.execute(
      "setCapabilitySchema",
      (tx) => {
        requireRole(tx.store, "governor", caller);
        const previous = capabilitySchemaId(tx.store);
        tx.store.setMeta(META_SCHEMA_ID, next);
        tx.emit({ name: "SchemaUpdated", data: { previous, schemaId: next, by: caller } });
        return next;
      },
      { allowWhilePaused: true },
    );
  }

  async authorizeUpgrade(rawCaller: Address, implementation: Address): Promise<number> {
    const caller = normalizeAddress(rawCaller, "caller");
    const target = requireNonZeroAddress(implementation, "implementation");

    return this.execute(
      "authorizeUpgrade",
      (tx) => {
        requireRole(tx.store, "governor", caller);
        const id = tx.store.insertUpgrade(target, caller, tx.now);
        tx.emit({
          name: "UpgradeAuthorized",
          data: { upgradeId: id, implementation: target, by: caller },
        });
        return id;
      },
      { allowWhilePaused: true },
    );
  }

  // Queries

  getRecord(tokenId: number): TokenRecord {
    const record = this.store.getRecord(tokenId);
    if (!record) throw new TokenNotFoundError({ tokenId });
    return record;
  }

  ownerOf(tokenId: number): Address {
    return requireClaimed(this.store, tokenId).owner;
  }

  /** Number of claimed records held. */
  balanceOf(owner: Address): number {
    return this.store.countOwned(normalizeAddress(owner, "owner"));
  }

  listEvents(options?: {
    name?: LedgerEventName;
    tokenId?: number;
    documentId?: Hex;
    limit?: number;
    afterId?: number;
  }): LedgerEvent[] {
    return this.store.listEvents(options);
  }
}

function sameReservedFor(a: Address | null, b: Address | null): boolean {
  if (a === null || b === null) return a === b;
  return sameAddress(a, b);
}
