import { Hono } from "hono";
import { z } from "zod";
import { InvalidBodyError } from "@docclaims/core/errors";
import { addressSchema, uintSchema } from "@docclaims/core/schemas";
import type { ValueLedger } from "@docclaims/core/variants";

import { createWeb3AuthMiddleware, type AuthEnv } from "../middleware/web3-auth.js";
import {
  addressParam,
  readBody,
  recordJson,
  slotJson,
  slotParam,
  tokenIdParam,
  unsupported,
} from "../http.js";

import type { ResolverRouteDeps } from "./resolver.js";

const ValueTransferBodySchema = z.object({
  toTokenId: z.number().int().nonnegative().optional(),
  to: addressSchema.optional(),
  amount: uintSchema,
});

const AllowanceBodySchema = z.object({ amount: uintSchema });

const SlotOperatorBodySchema = z.object({ approved: z.boolean() });

export function valueRoutes(deps: ResolverRouteDeps): Hono<AuthEnv> {
  const app = new Hono<AuthEnv>();
  const { resolver } = deps;
  const web3Auth = createWeb3AuthMiddleware({ serverOrigin: deps.serverOrigin });

  function ledger(operation: string): ValueLedger {
    if (resolver.kind !== "value") throw unsupported(resolver, operation);
    return resolver.value;
  }

  app.post("/tokens/:tokenId/value-transfers", web3Auth, async (c) => {
    const value = ledger("transferValue");
    const fromTokenId = tokenIdParam(c.req.param("tokenId"));
    const body = await readBody(c, ValueTransferBodySchema);
    const caller = c.get("auth").signer;

    if (body.toTokenId !== undefined && body.to === undefined) {
      const result = await value.transferValue(caller, {
        fromTokenId,
        toTokenId: body.toTokenId,
        amount: body.amount,
      });
      return c.json({ from: recordJson(result.from), to: recordJson(result.to) });
    }
    if (body.to !== undefined && body.toTokenId === undefined) {
      const created = await value.transferValueToAddress(caller, {
        fromTokenId,
        to: body.to,
        amount: body.amount,
      });
      return c.json({ record: recordJson(created) }, 201);
    }
    throw new InvalidBodyError({ reason: "Give exactly one of toTokenId and to" });
  });

  app.get("/tokens/:tokenId/allowances/:operator", (c) => {
    const tokenId = tokenIdParam(c.req.param("tokenId"));
    const operator = addressParam(c.req.param("operator"), "operator");
    return c.json({
      tokenId,
      operator,
      allowance: ledger("allowance").allowance(tokenId, operator).toString(),
    });
  });

  app.put("/tokens/:tokenId/allowances/:operator", web3Auth, async (c) => {
    const value = ledger("approveValue");
    const tokenId = tokenIdParam(c.req.param("tokenId"));
    const operator = addressParam(c.req.param("operator"), "operator");
    const body = await readBody(c, AllowanceBodySchema);
    await value.approveValue(c.get("auth").signer, { tokenId, operator, amount: body.amount });
    return c.json({ tokenId, operator, allowance: body.amount.toString() });
  });

  app.put("/slots/:slot/operators/:operator", web3Auth, async (c) => {
    const value = ledger("setApprovalForSlot");
    const slot = slotParam(c.req.param("slot"));
    const operator = addressParam(c.req.param("operator"), "operator");
    const body = await readBody(c, SlotOperatorBodySchema);
    await value.setApprovalForSlot(c.get("auth").signer, { slot, operator, approved: body.approved });
    return c.json({ slot: slot.toString(), operator, approved: body.approved });
  });

  app.get("/slots/:slot", (c) => {
    const slot = slotParam(c.req.param("slot"));
    return c.json(slotJson(ledger("slotSummary").slotSummary(slot)));
  });

  return app;
}
