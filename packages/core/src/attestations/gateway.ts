/**
 * Read-only client for the external attestation service.
 *
 * GET endpoints return responses wrapped in { data: T, proof: GatewayProof };
 * the client unwraps the envelope, validates the record shape and returns
 * just the attestation.
 */

import { z } from "zod";

import {
  AttestationUnavailableError,
  MalformedAttestationError,
} from "../errors/catalog.js";
import {
  addressSchema,
  bytes32Schema,
  hexBytesSchema,
} from "../schemas/primitives.js";

import type { Attestation } from "./types.js";

export interface GatewayProof {
  signature: string;
  timestamp: string;
  gatewayAddress: string;
  chainBlockHeight: number;
}

const timestampSchema = z.coerce.number().int().nonnegative();

export const GatewayAttestationSchema = z.object({
  id: bytes32Schema,
  schemaId: bytes32Schema,
  issuedAt: timestampSchema,
  expiresAt: timestampSchema.default(0),
  revokedAt: timestampSchema.default(0),
  recipient: addressSchema,
  issuer: addressSchema,
  payload: hexBytesSchema,
});

const EnvelopeSchema = z.object({ data: z.unknown() });

export interface AttestationGateway {
  /** Resolves null when the attestation does not exist. */
  getAttestation(id: string): Promise<Attestation | null>;
}

export const DEFAULT_GATEWAY_TIMEOUT_MS = 5000;

export interface AttestationGatewayClientOptions {
  /** Abort a lookup that has not completed after this long. */
  timeoutMs?: number;
}

export function isTimeoutError(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "name" in err &&
    (err.name === "TimeoutError" || err.name === "AbortError")
  );
}

export function createAttestationGatewayClient(
  baseUrl: string,
  options?: AttestationGatewayClientOptions,
): AttestationGateway {
  const base = baseUrl.replace(/\/+$/, "");
  const timeoutMs = options?.timeoutMs ?? DEFAULT_GATEWAY_TIMEOUT_MS;

  return {
    async getAttestation(id: string): Promise<Attestation | null> {
      try {
        return await lookup(id);
      } catch (err) {
        if (isTimeoutError(err)) {
          throw new AttestationUnavailableError({
            attestationId: id,
            reason: `timed out after ${timeoutMs}ms`,
          });
        }
        throw err;
      }
    },
  };

  async function lookup(id: string): Promise<Attestation | null> {
    const res = await fetch(`${base}/v1/attestations/${id}`, {
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (res.status === 404) return null;
    if (!res.ok) {
      throw new Error(`Attestation service error: ${res.status} ${res.statusText}`);
    }
    const envelope = EnvelopeSchema.safeParse(await res.json());
    const parsed = GatewayAttestationSchema.safeParse(
      envelope.success ? envelope.data.data : undefined,
    );
    if (!parsed.success) {
      throw new MalformedAttestationError({
        attestationId: id,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    return parsed.data;
  }
}
