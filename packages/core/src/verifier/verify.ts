/**
 * Capability verification: turns an externally issued attestation into an
 * access decision for one caller, one document and one capability.
 *
 * Checks, in order, each with its own failure:
 * 1. Attestation exists
 * 2. Not revoked
 * 3. Not expired (expiresAt 0 = never)
 * 4. Schema matches the ledger's capability schema
 * 5. Recipient is the caller
 * 6. Document has a registered issuer, and it issued the attestation
 * 7. Payload is for this document
 * 8. Payload grants the required capability
 */

import type { Address, Hex } from "viem";

import type { AttestationGateway } from "../attestations/gateway.js";
import { decodeAttestationPayload } from "../attestations/payload.js";
import type { Attestation, AttestationPayload } from "../attestations/types.js";
import { capabilityNames, hasCapability } from "../capabilities/bitmask.js";
import {
  AttestationExpiredError,
  AttestationNotFoundError,
  AttestationRevokedError,
  AttestationUnavailableError,
  DocumentMismatchError,
  InsufficientCapabilityError,
  IssuerMismatchError,
  IssuerNotRegisteredError,
  ProtocolError,
  RecipientMismatchError,
  SchemaMismatchError,
} from "../errors/catalog.js";
import { capabilitySchemaId } from "../ledger/access.js";
import type { LedgerStore } from "../ledger/store.js";
import type { LedgerTx } from "../ledger/transactions.js";
import { sameAddress } from "../schemas/primitives.js";

export interface CapabilityRequest {
  caller: Address;
  documentId: Hex;
  required: number;
  attestationId: Hex;
}

export interface CapabilityGrant {
  attestation: Attestation;
  payload: AttestationPayload;
  /** Full bitmask carried by the attestation, not just the required bits. */
  granted: number;
}

export type CapabilityCheck =
  | { valid: true; granted: number; payload: AttestationPayload }
  | { valid: false; errorCode: string; reason: string };

/**
 * Fetch an attestation. Transport failures surface as
 * AttestationUnavailableError; a missing record resolves null.
 */
export async function fetchAttestation(
  gateway: AttestationGateway,
  attestationId: Hex,
): Promise<Attestation | null> {
  try {
    return await gateway.getAttestation(attestationId);
  } catch (err) {
    if (err instanceof ProtocolError) throw err;
    throw new AttestationUnavailableError({
      attestationId,
      reason: err instanceof Error ? err.message : String(err),
    });
  }
}

/** Run every check against a fetched attestation. Throws the first failure. */
export function evaluateCapability(
  store: LedgerStore,
  request: CapabilityRequest,
  attestation: Attestation | null,
  now: number,
): CapabilityGrant {
  const { caller, documentId, required, attestationId } = request;

  if (!attestation) {
    throw new AttestationNotFoundError({ attestationId });
  }

  if (attestation.revokedAt !== 0) {
    throw new AttestationRevokedError({ attestationId, revokedAt: attestation.revokedAt });
  }

  if (attestation.expiresAt !== 0 && attestation.expiresAt < now) {
    throw new AttestationExpiredError({ attestationId, expiresAt: attestation.expiresAt });
  }

  const schemaId = capabilitySchemaId(store);
  if (schemaId === null || attestation.schemaId.toLowerCase() !== schemaId.toLowerCase()) {
    throw new SchemaMismatchError({
      attestationId,
      expected: schemaId,
      actual: attestation.schemaId,
    });
  }

  if (!sameAddress(attestation.recipient, caller)) {
    throw new RecipientMismatchError({ attestationId, recipient: attestation.recipient, caller });
  }

  const issuer = store.getIssuer(documentId);
  if (issuer === null) {
    throw new IssuerNotRegisteredError({ documentId });
  }
  if (!sameAddress(issuer, attestation.issuer)) {
    throw new IssuerMismatchError({ attestationId, expected: issuer, actual: attestation.issuer });
  }

  const payload = decodeAttestationPayload(attestation.payload);

  if (payload.documentId.toLowerCase() !== documentId.toLowerCase()) {
    throw new DocumentMismatchError({
      attestationId,
      expected: documentId,
      actual: payload.documentId,
    });
  }

  if (!hasCapability(payload.capabilityBits, required)) {
    throw new InsufficientCapabilityError({
      attestationId,
      required: capabilityNames(required),
      granted: capabilityNames(payload.capabilityBits),
    });
  }

  return { attestation, payload, granted: payload.capabilityBits };
}

/**
 * Verify inside a ledger transaction and record the CapabilityVerified audit
 * event with the full granted bitmask.
 */
export function assertCapability(
  tx: LedgerTx,
  request: CapabilityRequest,
  attestation: Attestation | null,
): CapabilityGrant {
  const grant = evaluateCapability(tx.store, request, attestation, tx.now);

  tx.emit({
    name: "CapabilityVerified",
    documentId: request.documentId,
    data: {
      caller: request.caller,
      attestationId: request.attestationId,
      required: request.required,
      granted: grant.granted,
    },
  });

  return grant;
}

/**
 * Pure check: same steps, no events, no writes. Never rejects with a
 * protocol error: a failed check, an undecodable payload and an unreachable
 * attestation service all resolve `{valid: false}`.
 */
export async function checkCapability(
  gateway: AttestationGateway,
  store: LedgerStore,
  request: CapabilityRequest,
  now: number,
): Promise<CapabilityCheck> {
  try {
    const attestation = await fetchAttestation(gateway, request.attestationId);
    const grant = evaluateCapability(store, request, attestation, now);
    return { valid: true, granted: grant.granted, payload: grant.payload };
  } catch (err) {
    if (err instanceof ProtocolError) {
      return { valid: false, errorCode: err.errorCode, reason: err.message };
    }
    throw err;
  }
}
