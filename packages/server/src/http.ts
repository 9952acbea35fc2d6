/**
 * Request parsing and response shaping shared by the resolver routes.
 * Path parameters and bodies are validated here so handlers only see
 * normalized values; bigints leave as decimal strings.
 */

import type { Context } from "hono";
import type { Address, Hex } from "viem";
import { z } from "zod";
import {
  InvalidBodyError,
  InvalidValueError,
  UnsupportedOperationError,
  type ProtocolError,
} from "@docclaims/core/errors";
import type { SlotSummary, TokenRecord } from "@docclaims/core/ledger";
import {
  normalizeAddress,
  normalizeBytes32,
} from "@docclaims/core/schemas";
import type { Resolver } from "@docclaims/core/variants";

const UINT_PATTERN = /^(?:0|[1-9][0-9]*)$/;

export function tokenIdParam(value: string): number {
  const tokenId = UINT_PATTERN.test(value) ? Number(value) : Number.NaN;
  if (!Number.isSafeInteger(tokenId)) {
    throw new InvalidValueError({ field: "tokenId", value });
  }
  return tokenId;
}

export function slotParam(value: string): bigint {
  if (!UINT_PATTERN.test(value)) {
    throw new InvalidValueError({ field: "slot", value });
  }
  return BigInt(value);
}

export function documentIdParam(value: string): Hex {
  return normalizeBytes32(value, "documentId");
}

export function addressParam(value: string, field: string): Address {
  return normalizeAddress(value, field);
}

/** Parse the JSON body against `schema`, or throw InvalidBodyError. */
export async function readBody<T>(c: Context, schema: z.ZodType<T>): Promise<T> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    throw new InvalidBodyError({ reason: "Body must be JSON" });
  }
  return parseInput(schema, raw, (details) => new InvalidBodyError(details));
}

/** Parse query parameters against `schema`, or throw InvalidValueError. */
export function readQuery<T>(c: Context, schema: z.ZodType<T>): T {
  return parseInput(schema, c.req.query(), (details) => new InvalidValueError(details));
}

function parseInput<T>(
  schema: z.ZodType<T>,
  raw: unknown,
  toError: (details: Record<string, unknown>) => ProtocolError,
): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw toError({
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.map(String).join("."),
        message: issue.message,
      })),
    });
  }
  return parsed.data;
}

export function unsupported(resolver: Resolver, operation: string): UnsupportedOperationError {
  return new UnsupportedOperationError({ operation, kind: resolver.kind });
}

export interface TokenRecordJson {
  tokenId: number;
  documentId: Hex;
  slot: string;
  value: string;
  owner: Address | null;
  reservedFor: Address | null;
  claimed: boolean;
  label: Hex | null;
  approved: Address | null;
  createdAt: number;
  claimedAt: number | null;
  labelUpdatedAt: number | null;
}

export function recordJson(record: TokenRecord): TokenRecordJson {
  return {
    ...record,
    slot: record.slot.toString(),
    value: record.value.toString(),
  };
}

export function slotJson(summary: SlotSummary) {
  return {
    slot: summary.slot.toString(),
    totalReserved: summary.totalReserved.toString(),
    totalMinted: summary.totalMinted.toString(),
    holders: summary.holders,
  };
}
