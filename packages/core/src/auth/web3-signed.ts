/**
 * Web3Signed Authorization header: how HTTP callers prove the address they
 * act as. The recovered signer becomes the caller of every ledger operation.
 *
 * Header format: "Web3Signed {base64url(payload)}.{signature}"
 * The payload binds audience, method and path; the signature is EIP-191 over
 * the base64url string.
 */

import { z } from "zod";
import { recoverMessageAddress, type Address, type Hex } from "viem";

import {
  MissingAuthError,
  InvalidSignatureError,
  ExpiredTokenError,
} from "../errors/catalog.js";

const Web3SignedPayloadSchema = z.object({
  aud: z.string(),
  method: z.string(),
  uri: z.string(),
  bodyHash: z.string(),
  iat: z.number().int(),
  exp: z.number().int(),
  attestationId: z.string().optional(),
});

export type Web3SignedPayload = z.infer<typeof Web3SignedPayloadSchema>;

export interface VerifiedAuth {
  signer: Address;
  payload: Web3SignedPayload;
}

const WEB3_SIGNED_PREFIX = "Web3Signed ";
const CLOCK_SKEW_SECONDS = 60;

function base64urlDecode(input: string): string {
  let base64 = input.replace(/-/g, "+").replace(/_/g, "/");
  base64 += "=".repeat((4 - (base64.length % 4)) % 4);
  return Buffer.from(base64, "base64").toString("utf-8");
}

function isHexSignature(value: string): value is Hex {
  return /^0x[0-9a-fA-F]+$/.test(value);
}

/**
 * Split and decode the header.
 * Throws MissingAuthError when absent, InvalidSignatureError when malformed.
 */
export function parseWeb3SignedHeader(headerValue: string | undefined): {
  payloadBase64: string;
  payload: Web3SignedPayload;
  signature: Hex;
} {
  if (!headerValue) {
    throw new MissingAuthError();
  }

  if (!headerValue.startsWith(WEB3_SIGNED_PREFIX)) {
    throw new InvalidSignatureError({ reason: "Missing Web3Signed prefix" });
  }

  const value = headerValue.slice(WEB3_SIGNED_PREFIX.length);
  const dotIndex = value.indexOf(".");
  if (dotIndex <= 0 || dotIndex === value.length - 1) {
    throw new InvalidSignatureError({ reason: "Invalid header format" });
  }

  const payloadBase64 = value.slice(0, dotIndex);
  const signature = value.slice(dotIndex + 1);
  if (!isHexSignature(signature)) {
    throw new InvalidSignatureError({ reason: "Invalid signature format" });
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(base64urlDecode(payloadBase64));
  } catch {
    throw new InvalidSignatureError({ reason: "Invalid payload encoding" });
  }

  const parsed = Web3SignedPayloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new InvalidSignatureError({ reason: "Invalid payload fields" });
  }

  return { payloadBase64, payload: parsed.data, signature };
}

/**
 * Parse the header, recover the EIP-191 signer and check the bound claims
 * (audience, method, path, iat/exp within 60s of skew).
 */
export async function verifyWeb3Signed(params: {
  headerValue: string | undefined;
  expectedOrigin: string;
  expectedMethod: string;
  expectedPath: string;
  now?: number;
}): Promise<VerifiedAuth> {
  const { payloadBase64, payload, signature } = parseWeb3SignedHeader(
    params.headerValue,
  );

  let signer: Address;
  try {
    signer = await recoverMessageAddress({ message: payloadBase64, signature });
  } catch {
    throw new InvalidSignatureError({ reason: "Signature recovery failed" });
  }

  const bindings: Array<[string, string, string]> = [
    ["Audience mismatch", params.expectedOrigin, payload.aud],
    ["Method mismatch", params.expectedMethod, payload.method],
    ["URI mismatch", params.expectedPath, payload.uri],
  ];
  for (const [reason, expected, actual] of bindings) {
    if (expected !== actual) {
      throw new InvalidSignatureError({ reason, expected, actual });
    }
  }

  const now = params.now ?? Math.floor(Date.now() / 1000);

  if (payload.exp < now - CLOCK_SKEW_SECONDS) {
    throw new ExpiredTokenError({ reason: "Token expired" });
  }

  if (payload.iat > now + CLOCK_SKEW_SECONDS) {
    throw new ExpiredTokenError({ reason: "Token issued in the future" });
  }

  return { signer, payload };
}
