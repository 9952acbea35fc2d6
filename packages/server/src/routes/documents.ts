/**
 * Document routes: issuer registry, reservations, claims, capability checks
 * and label updates. Mounted under /v1/resolvers/:resolverId.
 */

import { Hono } from "hono";
import { z } from "zod";
import { capabilityNames, parseCapabilities } from "@docclaims/core/capabilities";
import { InvalidBodyError, InvalidValueError } from "@docclaims/core/errors";
import {
  addressSchema,
  bytes32Schema,
  hexBytesSchema,
  uintSchema,
} from "@docclaims/core/schemas";

import { createWeb3AuthMiddleware, type AuthEnv } from "../middleware/web3-auth.js";
import {
  documentIdParam,
  readBody,
  readQuery,
  recordJson,
  slotParam,
  tokenIdParam,
} from "../http.js";

import type { ResolverRouteDeps } from "./resolver.js";

const tokenIdSchema = z.number().int().nonnegative();

const IssuerBodySchema = z.object({ issuer: addressSchema });

const ReservationBodySchema = z.object({
  recipient: addressSchema.optional(),
  label: hexBytesSchema.optional(),
  value: uintSchema.optional(),
  slot: uintSchema.optional(),
});

const ClaimBodySchema = z.object({
  tokenId: tokenIdSchema,
  attestationId: bytes32Schema,
});

const LabelBodySchema = z.object({
  label: hexBytesSchema,
  attestationId: bytes32Schema,
});

/** Bitmask as an integer, or a comma-separated list of capability names. */
const requiredSchema = z.union([z.number().int().min(1).max(0xff), z.string().min(1)]);

const VerifyBodySchema = z.object({
  required: requiredSchema,
  attestationId: bytes32Schema,
});

const CheckQuerySchema = z.object({
  required: z.string().min(1),
  attestationId: bytes32Schema,
});

function requiredBits(value: number | string): number {
  if (typeof value === "number") return value;
  if (/^[0-9]+$/.test(value)) {
    const bits = Number(value);
    if (bits >= 1 && bits <= 0xff) return bits;
    throw new InvalidValueError({ field: "required", value });
  }
  try {
    return parseCapabilities(value.split(","));
  } catch (err) {
    throw new InvalidValueError({
      field: "required",
      reason: err instanceof Error ? err.message : String(err),
    });
  }
}

export function documentRoutes(deps: ResolverRouteDeps): Hono<AuthEnv> {
  const app = new Hono<AuthEnv>();
  const { engine } = deps.resolver;
  const web3Auth = createWeb3AuthMiddleware({ serverOrigin: deps.serverOrigin });

  app.get("/documents/:documentId/issuer", (c) => {
    const documentId = documentIdParam(c.req.param("documentId"));
    return c.json({ documentId, issuer: engine.issuerOf(documentId) });
  });

  app.put("/documents/:documentId/issuer", web3Auth, async (c) => {
    const documentId = documentIdParam(c.req.param("documentId"));
    const body = await readBody(c, IssuerBodySchema);
    const issuer = await engine.setIssuer(c.get("auth").signer, documentId, body.issuer);
    return c.json({ documentId, issuer });
  });

  // POST — targeted when a recipient is given, anonymous (label required) otherwise
  app.post("/documents/:documentId/reservations", web3Auth, async (c) => {
    const documentId = documentIdParam(c.req.param("documentId"));
    const body = await readBody(c, ReservationBodySchema);
    const caller = c.get("auth").signer;

    if (body.recipient !== undefined) {
      const record = await engine.reserve(caller, {
        documentId,
        recipient: body.recipient,
        value: body.value,
        slot: body.slot,
        label: body.label ?? null,
      });
      return c.json({ record: recordJson(record) }, 201);
    }

    if (body.label === undefined) {
      throw new InvalidBodyError({ reason: "Anonymous reservations need a label" });
    }
    const record = await engine.reserveAnonymous(caller, {
      documentId,
      label: body.label,
      value: body.value,
      slot: body.slot,
    });
    return c.json({ record: recordJson(record) }, 201);
  });

  app.get("/documents/:documentId/reservations", (c) => {
    const documentId = documentIdParam(c.req.param("documentId"));
    const slot = c.req.query("slot");
    const record = engine.reservationFor(documentId, slot === undefined ? 0n : slotParam(slot));
    return c.json({ record: record ? recordJson(record) : null });
  });

  app.delete("/documents/:documentId/reservations/:tokenId", web3Auth, async (c) => {
    const record = await engine.cancel(c.get("auth").signer, {
      documentId: documentIdParam(c.req.param("documentId")),
      tokenId: tokenIdParam(c.req.param("tokenId")),
    });
    return c.json({ record: recordJson(record) });
  });

  app.post("/documents/:documentId/claims", web3Auth, async (c) => {
    const documentId = documentIdParam(c.req.param("documentId"));
    const body = await readBody(c, ClaimBodySchema);
    const record = await engine.claim(c.get("auth").signer, { documentId, ...body });
    return c.json({ record: recordJson(record) });
  });

  // GET — pure check for the signed caller; records nothing
  app.get("/documents/:documentId/capabilities", web3Auth, async (c) => {
    const documentId = documentIdParam(c.req.param("documentId"));
    const query = readQuery(c, CheckQuerySchema);
    const result = await engine.check(c.get("auth").signer, {
      documentId,
      required: requiredBits(query.required),
      attestationId: query.attestationId,
    });

    if (!result.valid) return c.json(result);
    return c.json({
      valid: true,
      granted: result.granted,
      capabilities: capabilityNames(result.granted),
    });
  });

  // POST — verification as its own entry point; records CapabilityVerified
  app.post("/documents/:documentId/verifications", web3Auth, async (c) => {
    const documentId = documentIdParam(c.req.param("documentId"));
    const body = await readBody(c, VerifyBodySchema);
    const granted = await engine.verify(c.get("auth").signer, {
      documentId,
      required: requiredBits(body.required),
      attestationId: body.attestationId,
    });
    return c.json({ granted, capabilities: capabilityNames(granted) });
  });

  app.put("/documents/:documentId/tokens/:tokenId/label", web3Auth, async (c) => {
    const documentId = documentIdParam(c.req.param("documentId"));
    const body = await readBody(c, LabelBodySchema);
    const record = await engine.updateLabel(c.get("auth").signer, {
      documentId,
      tokenId: tokenIdParam(c.req.param("tokenId")),
      label: body.label,
      attestationId: body.attestationId,
    });
    return c.json({ record: recordJson(record) });
  });

  return app;
}
