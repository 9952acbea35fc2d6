/**
 * In-memory attestation service and attestation builders for tests and
 * local development.
 */

import type { Address, Hex } from "viem";

import type { AttestationGateway } from "../attestations/gateway.js";
import { encodeAttestationPayload } from "../attestations/payload.js";
import type { Attestation, AttestationPayload } from "../attestations/types.js";

export const TEST_SCHEMA_ID: Hex = `0x${"5c".repeat(32)}`;

/** Deterministic bytes32 id from a small integer. */
export function testBytes32(n: number): Hex {
  return `0x${n.toString(16).padStart(64, "0")}`;
}

export interface InMemoryAttestationGateway extends AttestationGateway {
  put(attestation: Attestation): void;
  revoke(id: Hex, at: number): void;
  /** Make every following lookup reject with `error` until cleared with null. */
  failWith(error: Error | null): void;
  readonly lookups: number;
}

export function createInMemoryAttestationGateway(
  initial: Attestation[] = [],
): InMemoryAttestationGateway {
  const records = new Map<string, Attestation>();
  let failure: Error | null = null;
  let lookups = 0;

  for (const attestation of initial) {
    records.set(attestation.id.toLowerCase(), attestation);
  }

  return {
    async getAttestation(id: string): Promise<Attestation | null> {
      lookups += 1;
      if (failure) throw failure;
      return records.get(id.toLowerCase()) ?? null;
    },
    put(attestation) {
      records.set(attestation.id.toLowerCase(), attestation);
    },
    revoke(id, at) {
      const existing = records.get(id.toLowerCase());
      if (existing) {
        records.set(id.toLowerCase(), { ...existing, revokedAt: at });
      }
    },
    failWith(error) {
      failure = error;
    },
    get lookups() {
      return lookups;
    },
  };
}

let nextAttestation = 1;

export interface BuildAttestationParams {
  recipient: Address;
  issuer: Address;
  documentId: Hex;
  capabilityBits: number;
  id?: Hex;
  schemaId?: Hex;
  issuedAt?: number;
  expiresAt?: number;
  revokedAt?: number;
  payload?: Partial<AttestationPayload>;
}

export function buildAttestation(params: BuildAttestationParams): Attestation {
  const payload: AttestationPayload = {
    documentId: params.documentId,
    tokenId: 0n,
    capabilityBits: params.capabilityBits,
    verifiedIdentity: "Test Holder",
    verificationMethod: "document-check",
    verificationDate: 1_700_000_000n,
    contractRole: "holder",
    legalEntityType: "individual",
    notes: "",
    ...params.payload,
  };

  return {
    id: params.id ?? testBytes32(0xa7000000 + nextAttestation++),
    schemaId: params.schemaId ?? TEST_SCHEMA_ID,
    issuedAt: params.issuedAt ?? 1_700_000_000,
    expiresAt: params.expiresAt ?? 0,
    revokedAt: params.revokedAt ?? 0,
    recipient: params.recipient,
    issuer: params.issuer,
    payload: encodeAttestationPayload(payload),
  };
}
