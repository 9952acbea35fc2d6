/**
 * Capability attestation records as served by the external attestation
 * service. Times are unix seconds; 0 means "never" for expiresAt and
 * "active" for revokedAt.
 */

import type { Address, Hex } from "viem";

export interface Attestation {
  id: Hex;
  schemaId: Hex;
  issuedAt: number;
  expiresAt: number;
  revokedAt: number;
  recipient: Address;
  issuer: Address;
  /** ABI-encoded AttestationPayload */
  payload: Hex;
}

/** The fixed nine-field record carried in Attestation.payload. */
export interface AttestationPayload {
  documentId: Hex;
  tokenId: bigint;
  capabilityBits: number;
  verifiedIdentity: string;
  verificationMethod: string;
  verificationDate: bigint;
  contractRole: string;
  legalEntityType: string;
  notes: string;
}
