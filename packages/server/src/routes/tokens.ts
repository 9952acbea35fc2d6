/**
 * Token routes: records, ownership transfers and approvals, holder balances,
 * badge revocation and rental delegation.
 */

import { Hono } from "hono";
import { z } from "zod";
import type { Resolver } from "@docclaims/core/variants";
import type { TokenRecord } from "@docclaims/core/ledger";
import { addressSchema, hexBytesSchema } from "@docclaims/core/schemas";

import {
  authenticateRequest,
  createWeb3AuthMiddleware,
  type AuthEnv,
} from "../middleware/web3-auth.js";
import { addressParam, readBody, recordJson, tokenIdParam, unsupported } from "../http.js";

import type { ResolverRouteDeps } from "./resolver.js";

const TransferBodySchema = z.object({ from: addressSchema, to: addressSchema });

const ApprovalBodySchema = z.object({ approved: addressSchema.nullable() });

const OperatorBodySchema = z.object({ approved: z.boolean() });

const unixSeconds = z.number().int().nonnegative();

const SetUserBodySchema = z.union([
  z.object({
    user: addressSchema,
    expires: unixSeconds,
    nonce: unixSeconds,
    deadline: unixSeconds,
    signature: hexBytesSchema,
  }),
  z.object({
    user: addressSchema.nullable(),
    expires: unixSeconds,
  }),
]);

/** Variant state shown alongside a record. */
function variantView(resolver: Resolver, record: TokenRecord): Record<string, unknown> {
  switch (resolver.kind) {
    case "locked":
      return {
        locked: resolver.locks.isLocked(record.tokenId),
        lockedAt: resolver.locks.lockedAt(record.tokenId),
      };
    case "badge": {
      if (!record.claimed) return { valid: false };
      const badge = resolver.badges.badge(record.tokenId);
      return { valid: badge.valid, revokedAt: badge.revokedAt, revokedBy: badge.revokedBy };
    }
    case "rental":
      if (!record.claimed) return { user: null, userExpires: 0 };
      return {
        user: resolver.rentals.userOf(record.tokenId),
        userExpires: resolver.rentals.userExpires(record.tokenId),
      };
    case "standard":
    case "value":
      return {};
  }
}

export function tokenRoutes(deps: ResolverRouteDeps): Hono<AuthEnv> {
  const app = new Hono<AuthEnv>();
  const { resolver } = deps;
  const { engine } = resolver;
  const web3Auth = createWeb3AuthMiddleware({ serverOrigin: deps.serverOrigin });

  app.get("/tokens/:tokenId", (c) => {
    const record = engine.getRecord(tokenIdParam(c.req.param("tokenId")));
    return c.json({ record: recordJson(record), ...variantView(resolver, record) });
  });

  app.post("/tokens/:tokenId/transfer", web3Auth, async (c) => {
    const body = await readBody(c, TransferBodySchema);
    const record = await engine.transfer(c.get("auth").signer, {
      tokenId: tokenIdParam(c.req.param("tokenId")),
      ...body,
    });
    return c.json({ record: recordJson(record) });
  });

  app.get("/tokens/:tokenId/approval", (c) => {
    return c.json({ approved: engine.getApproved(tokenIdParam(c.req.param("tokenId"))) });
  });

  app.post("/tokens/:tokenId/approval", web3Auth, async (c) => {
    const tokenId = tokenIdParam(c.req.param("tokenId"));
    const body = await readBody(c, ApprovalBodySchema);
    await engine.approve(c.get("auth").signer, tokenId, body.approved);
    return c.json({ tokenId, approved: body.approved });
  });

  app.put("/operators/:operator", web3Auth, async (c) => {
    const operator = addressParam(c.req.param("operator"), "operator");
    const body = await readBody(c, OperatorBodySchema);
    await engine.setApprovalForAll(c.get("auth").signer, operator, body.approved);
    return c.json({ operator, approved: body.approved });
  });

  app.get("/holders/:address", (c) => {
    const address = addressParam(c.req.param("address"), "address");
    const summary: Record<string, unknown> = {
      address,
      tokenCount: engine.balanceOf(address),
    };
    if (resolver.kind === "value") {
      summary.value = resolver.value.balanceOf(address).toString();
    }
    if (resolver.kind === "badge") {
      summary.validBadges = resolver.badges.validCount(address);
    }
    return c.json(summary);
  });

  app.post("/tokens/:tokenId/revocation", web3Auth, async (c) => {
    const record = await engine.revoke(
      c.get("auth").signer,
      tokenIdParam(c.req.param("tokenId")),
    );
    return c.json({ record: recordJson(record), ...variantView(resolver, record) });
  });

  app.get("/tokens/:tokenId/user", (c) => {
    if (resolver.kind !== "rental") throw unsupported(resolver, "userOf");
    const tokenId = tokenIdParam(c.req.param("tokenId"));
    return c.json({
      tokenId,
      user: resolver.rentals.userOf(tokenId),
      expires: resolver.rentals.userExpires(tokenId),
      nonce: resolver.rentals.nonceOf(tokenId),
    });
  });

  // PUT — a signed SetUser message needs no auth header; a direct update does
  app.put("/tokens/:tokenId/user", async (c) => {
    if (resolver.kind !== "rental") throw unsupported(resolver, "setUser");
    const tokenId = tokenIdParam(c.req.param("tokenId"));
    const body = await readBody(c, SetUserBodySchema);

    if ("signature" in body) {
      await resolver.rentals.setUserWithSignature({ tokenId, ...body });
    } else {
      const auth = await authenticateRequest(c, deps);
      await resolver.rentals.setUser(auth.signer, { tokenId, ...body });
    }
    return c.json({
      tokenId,
      user: resolver.rentals.userOf(tokenId),
      expires: resolver.rentals.userExpires(tokenId),
    });
  });

  return app;
}
