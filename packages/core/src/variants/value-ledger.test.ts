import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  AlreadyClaimedError,
  InsufficientAllowanceError,
  InsufficientValueError,
  InvalidValueError,
  NotAuthorizedError,
  SlotMismatchError,
} from "../errors/catalog.js";
import { createTestLedger, testDocumentId, type TestLedger } from "../test-utils/ledger.js";

import type { ValueLedger } from "./value-ledger.js";

const SLOT = 5n;
const OTHER_SLOT = 6n;

function valueLedgerOf(t: TestLedger): ValueLedger {
  if (t.resolver.kind !== "value") throw new Error("expected a value resolver");
  return t.resolver.value;
}

describe("ValueLedger", () => {
  let t: TestLedger;
  let ledger: ValueLedger;

  beforeEach(() => {
    t = createTestLedger("value");
    ledger = valueLedgerOf(t);
  });

  afterEach(() => {
    t.close();
  });

  describe("anonymous claims", () => {
    beforeEach(async () => {
      await t.registerDocument(testDocumentId(1));
      await t.engine.reserveAnonymous(t.wallets.reserver.address, {
        documentId: testDocumentId(1),
        label: "0x01",
        value: 100n,
        slot: SLOT,
      });
    });

    it("credits the full value to the first claimant", async () => {
      const attestation = t.attest(t.wallets.alice, testDocumentId(1));

      await t.engine.claim(t.wallets.alice.address, {
        documentId: testDocumentId(1),
        tokenId: 0,
        attestationId: attestation.id,
      });

      expect(ledger.balanceOf(t.wallets.alice.address)).toBe(100n);
      expect(ledger.balanceOf(t.wallets.alice.address, SLOT)).toBe(100n);
      expect(ledger.slotOf(0)).toBe(SLOT);
    });

    it("refuses a second claimant with a valid attestation", async () => {
      const first = t.attest(t.wallets.alice, testDocumentId(1));
      const second = t.attest(t.wallets.bob, testDocumentId(1));
      await t.engine.claim(t.wallets.alice.address, {
        documentId: testDocumentId(1),
        tokenId: 0,
        attestationId: first.id,
      });

      await expect(
        t.engine.claim(t.wallets.bob.address, {
          documentId: testDocumentId(1),
          tokenId: 0,
          attestationId: second.id,
        }),
      ).rejects.toBeInstanceOf(AlreadyClaimedError);
      expect(ledger.balanceOf(t.wallets.bob.address)).toBe(0n);
    });

    it("moves reserved value to minted on claim", async () => {
      expect(ledger.slotSummary(SLOT)).toEqual({
        slot: SLOT,
        totalReserved: 100n,
        totalMinted: 0n,
        holders: [],
      });

      const attestation = t.attest(t.wallets.alice, testDocumentId(1));
      await t.engine.claim(t.wallets.alice.address, {
        documentId: testDocumentId(1),
        tokenId: 0,
        attestationId: attestation.id,
      });

      expect(ledger.slotSummary(SLOT)).toEqual({
        slot: SLOT,
        totalReserved: 0n,
        totalMinted: 100n,
        holders: [t.wallets.alice.address],
      });
    });
  });

  describe("value transfers", () => {
    beforeEach(async () => {
      await t.reserveAndClaim(t.wallets.alice, testDocumentId(1), { value: 100n, slot: SLOT });
      await t.reserveAndClaim(t.wallets.bob, testDocumentId(2), { value: 0n, slot: SLOT });
    });

    it("moves value between records of one slot", async () => {
      const result = await ledger.transferValue(t.wallets.alice.address, {
        fromTokenId: 0,
        toTokenId: 1,
        amount: 30n,
      });

      expect(result.from.value).toBe(70n);
      expect(result.to.value).toBe(30n);
      expect(ledger.valueOf(0)).toBe(70n);
      expect(ledger.valueOf(1)).toBe(30n);
      expect(ledger.slotSummary(SLOT)).toEqual({
        slot: SLOT,
        totalReserved: 0n,
        totalMinted: 100n,
        holders: [t.wallets.alice.address, t.wallets.bob.address],
      });

      const [event] = t.engine.listEvents({ name: "TransferValue" });
      expect(event.data).toEqual({
        fromTokenId: 0,
        toTokenId: 1,
        slot: "5",
        amount: "30",
        by: t.wallets.alice.address,
      });
    });

    it("refuses to move value across slots", async () => {
      await ledger.transferValue(t.wallets.alice.address, { fromTokenId: 0, toTokenId: 1, amount: 30n });
      await t.reserveAndClaim(t.wallets.carol, testDocumentId(3), { value: 10n, slot: OTHER_SLOT });

      await expect(
        ledger.transferValue(t.wallets.alice.address, { fromTokenId: 0, toTokenId: 2, amount: 30n }),
      ).rejects.toBeInstanceOf(SlotMismatchError);
      expect(ledger.valueOf(0)).toBe(70n);
      expect(ledger.valueOf(2)).toBe(10n);
    });

    it("refuses more than the record holds", async () => {
      await expect(
        ledger.transferValue(t.wallets.alice.address, { fromTokenId: 0, toTokenId: 1, amount: 101n }),
      ).rejects.toBeInstanceOf(InsufficientValueError);
    });

    it("refuses zero amounts and self transfers", async () => {
      await expect(
        ledger.transferValue(t.wallets.alice.address, { fromTokenId: 0, toTokenId: 1, amount: 0n }),
      ).rejects.toBeInstanceOf(InvalidValueError);
      await expect(
        ledger.transferValue(t.wallets.alice.address, { fromTokenId: 0, toTokenId: 0, amount: 1n }),
      ).rejects.toBeInstanceOf(InvalidValueError);
    });

    it("spends an allowance down and then refuses", async () => {
      await ledger.approveValue(t.wallets.alice.address, { tokenId: 0, operator: t.wallets.bob.address, amount: 20n });

      await ledger.transferValue(t.wallets.bob.address, { fromTokenId: 0, toTokenId: 1, amount: 15n });
      expect(ledger.allowance(0, t.wallets.bob.address)).toBe(5n);

      await expect(
        ledger.transferValue(t.wallets.bob.address, { fromTokenId: 0, toTokenId: 1, amount: 10n }),
      ).rejects.toBeInstanceOf(InsufficientAllowanceError);
      expect(ledger.allowance(0, t.wallets.bob.address)).toBe(5n);
    });

    it("refuses callers with no approval of any kind", async () => {
      await expect(
        ledger.transferValue(t.wallets.carol.address, { fromTokenId: 0, toTokenId: 1, amount: 1n }),
      ).rejects.toBeInstanceOf(NotAuthorizedError);
    });

    it("lets a slot operator move value without an allowance", async () => {
      await ledger.setApprovalForSlot(t.wallets.alice.address, {
        slot: SLOT,
        operator: t.wallets.carol.address,
        approved: true,
      });
      expect(ledger.isApprovedForSlot(t.wallets.alice.address, SLOT, t.wallets.carol.address)).toBe(true);

      await ledger.transferValue(t.wallets.carol.address, { fromTokenId: 0, toTokenId: 1, amount: 10n });
      expect(ledger.valueOf(0)).toBe(90n);
    });

    it("splits value into a new record for an address", async () => {
      const created = await ledger.transferValueToAddress(t.wallets.alice.address, {
        fromTokenId: 0,
        to: t.wallets.carol.address,
        amount: 25n,
      });

      expect(created).toMatchObject({
        tokenId: 2,
        slot: SLOT,
        value: 25n,
        owner: t.wallets.carol.address,
        claimed: true,
      });
      expect(ledger.valueOf(0)).toBe(75n);
      expect(ledger.balanceOf(t.wallets.carol.address)).toBe(25n);
      expect(t.engine.ownerOf(2)).toBe(t.wallets.carol.address);
      expect(ledger.slotSummary(SLOT)).toEqual({
        slot: SLOT,
        totalReserved: 0n,
        totalMinted: 100n,
        holders: [t.wallets.alice.address, t.wallets.carol.address],
      });
    });

    it("drops a holder whose slot balance reaches zero", async () => {
      await ledger.transferValue(t.wallets.alice.address, { fromTokenId: 0, toTokenId: 1, amount: 100n });

      expect(ledger.balanceOf(t.wallets.alice.address, SLOT)).toBe(0n);
      expect(ledger.slotSummary(SLOT).holders).toEqual([t.wallets.bob.address]);
    });

    it("moves holdership with a whole-record transfer", async () => {
      await t.engine.transfer(t.wallets.alice.address, {
        from: t.wallets.alice.address,
        to: t.wallets.carol.address,
        tokenId: 0,
      });

      expect(ledger.slotSummary(SLOT).holders).toEqual([t.wallets.carol.address]);
    });

    it("keeps holders unchanged when a transfer is refused", async () => {
      await expect(
        t.engine.transfer(t.wallets.carol.address, {
          from: t.wallets.alice.address,
          to: t.wallets.carol.address,
          tokenId: 0,
        }),
      ).rejects.toBeInstanceOf(NotAuthorizedError);

      expect(ledger.slotSummary(SLOT).holders).toEqual([t.wallets.alice.address]);
    });

    it("drops value allowances when the record changes hands", async () => {
      await ledger.approveValue(t.wallets.alice.address, { tokenId: 0, operator: t.wallets.bob.address, amount: 20n });

      await t.engine.transfer(t.wallets.alice.address, {
        from: t.wallets.alice.address,
        to: t.wallets.carol.address,
        tokenId: 0,
      });

      expect(ledger.allowance(0, t.wallets.bob.address)).toBe(0n);
      expect(ledger.balanceOf(t.wallets.carol.address, SLOT)).toBe(100n);
    });

    it("only lets the owner set allowances", async () => {
      await expect(
        ledger.approveValue(t.wallets.bob.address, { tokenId: 0, operator: t.wallets.bob.address, amount: 5n }),
      ).rejects.toBeInstanceOf(NotAuthorizedError);
    });
  });

  describe("slot totals on cancel", () => {
    beforeEach(async () => {
      await t.registerDocument(testDocumentId(1));
      await t.registerDocument(testDocumentId(2));
    });

    function reserve(documentId: number, value: bigint) {
      return t.engine.reserve(t.wallets.reserver.address, {
        documentId: testDocumentId(documentId),
        recipient: t.wallets.alice.address,
        value,
        slot: SLOT,
      });
    }

    it("returns reserved value to zero and removes the emptied aggregate", async () => {
      const reserved = await reserve(1, 100n);
      expect(ledger.slotSummary(SLOT).totalReserved).toBe(100n);

      await t.engine.cancel(t.wallets.issuer.address, {
        documentId: testDocumentId(1),
        tokenId: reserved.tokenId,
      });

      expect(ledger.slotSummary(SLOT)).toEqual({
        slot: SLOT,
        totalReserved: 0n,
        totalMinted: 0n,
        holders: [],
      });
      expect(t.engine.store.getSlot(SLOT)).toBeUndefined();
    });

    it("subtracts only the cancelled reservation's value", async () => {
      const first = await reserve(1, 100n);
      await reserve(2, 40n);
      expect(ledger.slotSummary(SLOT).totalReserved).toBe(140n);

      await t.engine.cancel(t.wallets.issuer.address, {
        documentId: testDocumentId(1),
        tokenId: first.tokenId,
      });

      expect(t.engine.store.getSlot(SLOT)).toEqual({
        slot: SLOT,
        totalReserved: 40n,
        totalMinted: 0n,
      });
    });

    it("leaves minted value in place when a sibling reservation is cancelled", async () => {
      await t.reserveAndClaim(t.wallets.alice, testDocumentId(1), { value: 60n, slot: SLOT });
      const pending = await reserve(2, 40n);

      await t.engine.cancel(t.wallets.issuer.address, {
        documentId: testDocumentId(2),
        tokenId: pending.tokenId,
      });

      expect(ledger.slotSummary(SLOT)).toEqual({
        slot: SLOT,
        totalReserved: 0n,
        totalMinted: 60n,
        holders: [t.wallets.alice.address],
      });
    });
  });
});
