import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { TokenLockedError } from "../errors/catalog.js";
import { createTestLedger, testDocumentId, type TestLedger } from "../test-utils/ledger.js";

import type { LockRegistry } from "./locked.js";

function locksOf(t: TestLedger): LockRegistry {
  if (t.resolver.kind !== "locked") throw new Error("expected a locked resolver");
  return t.resolver.locks;
}

describe("locked resolver", () => {
  let t: TestLedger;

  beforeEach(() => {
    t = createTestLedger("locked");
  });

  afterEach(() => {
    t.close();
  });

  it("leaves reservations unlocked", async () => {
    await t.engine.reserve(t.wallets.reserver.address, {
      documentId: testDocumentId(1),
      recipient: t.wallets.alice.address,
    });

    expect(locksOf(t).isLocked(0)).toBe(false);
    expect(locksOf(t).lockedAt(0)).toBeNull();
  });

  it("locks a record when it is claimed", async () => {
    await t.reserveAndClaim(t.wallets.alice, testDocumentId(1));

    expect(locksOf(t).isLocked(0)).toBe(true);
    expect(locksOf(t).lockedAt(0)).toBe(t.clock.now());
    const [event] = t.engine.listEvents({ name: "Locked" });
    expect(event.tokenId).toBe(0);
    expect(event.data).toEqual({ owner: t.wallets.alice.address });
  });

  it("refuses every transfer of a locked record", async () => {
    await t.reserveAndClaim(t.wallets.alice, testDocumentId(1));

    await expect(
      t.engine.transfer(t.wallets.alice.address, {
        from: t.wallets.alice.address,
        to: t.wallets.bob.address,
        tokenId: 0,
      }),
    ).rejects.toBeInstanceOf(TokenLockedError);
    await expect(
      t.engine.transfer(t.wallets.bob.address, {
        from: t.wallets.alice.address,
        to: t.wallets.bob.address,
        tokenId: 0,
      }),
    ).rejects.toBeInstanceOf(TokenLockedError);
    expect(t.engine.ownerOf(0)).toBe(t.wallets.alice.address);
  });
});
