import {
  decodeAbiParameters,
  encodeAbiParameters,
  parseAbiParameters,
  type Hex,
} from "viem";

import { MalformedAttestationError } from "../errors/catalog.js";

import type { AttestationPayload } from "./types.js";

export const ATTESTATION_PAYLOAD_PARAMETERS = parseAbiParameters(
  "bytes32 documentId, uint256 tokenId, uint8 capabilityBits, string verifiedIdentity, string verificationMethod, uint64 verificationDate, string contractRole, string legalEntityType, string notes",
);

export function encodeAttestationPayload(payload: AttestationPayload): Hex {
  return encodeAbiParameters(ATTESTATION_PAYLOAD_PARAMETERS, [
    payload.documentId,
    payload.tokenId,
    payload.capabilityBits,
    payload.verifiedIdentity,
    payload.verificationMethod,
    payload.verificationDate,
    payload.contractRole,
    payload.legalEntityType,
    payload.notes,
  ]);
}

function decodeTuple(data: Hex) {
  try {
    return decodeAbiParameters(ATTESTATION_PAYLOAD_PARAMETERS, data);
  } catch (err) {
    throw new MalformedAttestationError({
      reason: err instanceof Error ? err.message.split("\n")[0] : String(err),
    });
  }
}

/** Decode an attestation payload. Throws MalformedAttestationError. */
export function decodeAttestationPayload(data: Hex): AttestationPayload {
  const [
    documentId,
    tokenId,
    capabilityBits,
    verifiedIdentity,
    verificationMethod,
    verificationDate,
    contractRole,
    legalEntityType,
    notes,
  ] = decodeTuple(data);

  return {
    documentId,
    tokenId,
    capabilityBits,
    verifiedIdentity,
    verificationMethod,
    verificationDate,
    contractRole,
    legalEntityType,
    notes,
  };
}
