/**
 * Client for the external trust-credential service. Issuing a credential is
 * a side effect of a claim and never part of it, so the client reports
 * failure as a value instead of throwing.
 */

import type { Address, Hex } from "viem";
import { z } from "zod";

import { isTimeoutError } from "../attestations/gateway.js";

import { err, ok, type Result } from "./result.js";

export interface CredentialRequest {
  recipient: Address;
  documentId: Hex;
  tokenId: number;
  verifiedIdentity: string;
  contractRole: string;
}

export interface CredentialReceipt {
  credentialId: string;
}

const ReceiptEnvelopeSchema = z.object({
  data: z.object({ credentialId: z.string().min(1) }),
});

export interface CredentialClient {
  issue(request: CredentialRequest): Promise<Result<CredentialReceipt>>;
}

export const DEFAULT_CREDENTIAL_TIMEOUT_MS = 5000;

export function createCredentialClient(
  baseUrl: string,
  options?: { timeoutMs?: number },
): CredentialClient {
  const base = baseUrl.replace(/\/+$/, "");
  const timeoutMs = options?.timeoutMs ?? DEFAULT_CREDENTIAL_TIMEOUT_MS;

  return {
    async issue(request: CredentialRequest): Promise<Result<CredentialReceipt>> {
      let res: Response;
      try {
        res = await fetch(`${base}/v1/credentials`, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(request),
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (cause) {
        if (isTimeoutError(cause)) {
          return err(new Error(`Credential service timed out after ${timeoutMs}ms`, { cause }));
        }
        return err(new Error("Credential service unreachable", { cause }));
      }

      if (!res.ok) {
        return err(new Error(`Credential service error: ${res.status}`));
      }

      const parsed = ReceiptEnvelopeSchema.safeParse(await res.json().catch(() => null));
      if (!parsed.success) {
        return err(new Error("Credential service returned an unexpected body"));
      }
      return ok(parsed.data.data);
    },
  };
}
