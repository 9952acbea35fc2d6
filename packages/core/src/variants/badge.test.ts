import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { AlreadyRevokedError, NotAuthorizedError, TokenNotFoundError } from "../errors/catalog.js";
import { createTestLedger, testDocumentId, type TestLedger } from "../test-utils/ledger.js";

import type { BadgeRegistry } from "./badge.js";

function badgesOf(t: TestLedger): BadgeRegistry {
  if (t.resolver.kind !== "badge") throw new Error("expected a badge resolver");
  return t.resolver.badges;
}

describe("badge resolver", () => {
  let t: TestLedger;
  let badges: BadgeRegistry;

  beforeEach(() => {
    t = createTestLedger("badge");
    badges = badgesOf(t);
  });

  afterEach(() => {
    t.close();
  });

  it("issues a valid badge on claim", async () => {
    await t.reserveAndClaim(t.wallets.alice, testDocumentId(1));

    expect(badges.isValid(0)).toBe(true);
    expect(badges.hasValid(t.wallets.alice.address)).toBe(true);
    expect(badges.badge(0)).toEqual({ tokenId: 0, valid: true, revokedAt: 0, revokedBy: null });
  });

  it("keeps ownership but drops validity on revoke", async () => {
    await t.reserveAndClaim(t.wallets.alice, testDocumentId(1));
    t.clock.advance(30);

    await t.engine.revoke(t.wallets.issuer.address, 0);

    expect(badges.isValid(0)).toBe(false);
    expect(t.engine.ownerOf(0)).toBe(t.wallets.alice.address);
    expect(badges.hasValid(t.wallets.alice.address)).toBe(false);
    expect(badges.badge(0)).toEqual({
      tokenId: 0,
      valid: false,
      revokedAt: t.clock.now(),
      revokedBy: t.wallets.issuer.address,
    });
    const [event] = t.engine.listEvents({ name: "Revoked" });
    expect(event.data).toEqual({ owner: t.wallets.alice.address, by: t.wallets.issuer.address });
  });

  it("refuses to revoke twice", async () => {
    await t.reserveAndClaim(t.wallets.alice, testDocumentId(1));
    await t.engine.revoke(t.wallets.issuer.address, 0);

    await expect(t.engine.revoke(t.wallets.issuer.address, 0)).rejects.toBeInstanceOf(
      AlreadyRevokedError,
    );
  });

  it("lets administrators revoke and nobody else", async () => {
    await t.reserveAndClaim(t.wallets.alice, testDocumentId(1));

    await expect(t.engine.revoke(t.wallets.bob.address, 0)).rejects.toBeInstanceOf(
      NotAuthorizedError,
    );
    await t.engine.revoke(t.wallets.administrator.address, 0);
    expect(badges.badge(0).revokedBy).toBe(t.wallets.administrator.address);
  });

  it("cannot revoke an unclaimed reservation", async () => {
    await t.registerDocument(testDocumentId(1));
    await t.engine.reserve(t.wallets.reserver.address, {
      documentId: testDocumentId(1),
      recipient: t.wallets.alice.address,
    });

    await expect(t.engine.revoke(t.wallets.issuer.address, 0)).rejects.toBeInstanceOf(
      TokenNotFoundError,
    );
  });

  it("counts each holder once however many badges they hold", async () => {
    await t.reserveAndClaim(t.wallets.alice, testDocumentId(1));
    await t.reserveAndClaim(t.wallets.alice, testDocumentId(2));
    await t.reserveAndClaim(t.wallets.bob, testDocumentId(3));

    expect(badges.validCount(t.wallets.alice.address)).toBe(2);
    expect(badges.holdersCount()).toBe(2);

    await t.engine.revoke(t.wallets.issuer.address, 0);
    expect(badges.validCount(t.wallets.alice.address)).toBe(1);
    expect(badges.holdersCount()).toBe(2);

    await t.engine.revoke(t.wallets.issuer.address, 1);
    expect(badges.holdersCount()).toBe(1);
  });

  it("moves valid badges with their records", async () => {
    await t.reserveAndClaim(t.wallets.alice, testDocumentId(1));

    await t.engine.transfer(t.wallets.alice.address, {
      from: t.wallets.alice.address,
      to: t.wallets.bob.address,
      tokenId: 0,
    });

    expect(badges.hasValid(t.wallets.alice.address)).toBe(false);
    expect(badges.validCount(t.wallets.bob.address)).toBe(1);
  });

  it("does not count a revoked badge for its new owner", async () => {
    await t.reserveAndClaim(t.wallets.alice, testDocumentId(1));
    await t.engine.revoke(t.wallets.issuer.address, 0);

    await t.engine.transfer(t.wallets.alice.address, {
      from: t.wallets.alice.address,
      to: t.wallets.bob.address,
      tokenId: 0,
    });

    expect(badges.hasValid(t.wallets.bob.address)).toBe(false);
    expect(badges.holdersCount()).toBe(0);
  });

  it("leaves counts untouched when a transfer is refused", async () => {
    await t.reserveAndClaim(t.wallets.alice, testDocumentId(1));

    await expect(
      t.engine.transfer(t.wallets.carol.address, {
        from: t.wallets.alice.address,
        to: t.wallets.carol.address,
        tokenId: 0,
      }),
    ).rejects.toBeInstanceOf(NotAuthorizedError);

    expect(badges.validCount(t.wallets.alice.address)).toBe(1);
    expect(badges.validCount(t.wallets.carol.address)).toBe(0);
  });
});
