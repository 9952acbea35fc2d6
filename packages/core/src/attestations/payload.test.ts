import { describe, it, expect } from "vitest";
import type { Hex } from "viem";

import { MalformedAttestationError } from "../errors/catalog.js";

import { decodeAttestationPayload, encodeAttestationPayload } from "./payload.js";
import type { AttestationPayload } from "./types.js";

const PAYLOAD: AttestationPayload = {
  documentId: `0x${"d1".repeat(32)}`,
  tokenId: 7n,
  capabilityBits: 0x11,
  verifiedIdentity: "Jordan Example",
  verificationMethod: "notarized-copy",
  verificationDate: 1_750_000_000n,
  contractRole: "tenant",
  legalEntityType: "individual",
  notes: "second floor unit",
};

describe("attestation payload codec", () => {
  it("decodes every field it encoded", () => {
    expect(decodeAttestationPayload(encodeAttestationPayload(PAYLOAD))).toEqual(PAYLOAD);
  });

  it("encodes as a dynamic tuple starting with the document id", () => {
    const encoded = encodeAttestationPayload(PAYLOAD);
    // First head word is the bytes32 document id itself
    expect(encoded.slice(0, 66)).toBe(`0x${"d1".repeat(32)}`);
  });

  it("rejects truncated data as malformed", () => {
    const truncated: Hex = `0x${encodeAttestationPayload(PAYLOAD).slice(2, 130)}`;
    expect(() => decodeAttestationPayload(truncated)).toThrow(MalformedAttestationError);
  });

  it("rejects empty data as malformed", () => {
    try {
      decodeAttestationPayload("0x");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedAttestationError);
      if (err instanceof MalformedAttestationError) {
        expect(err.code).toBe(422);
        expect(typeof err.details?.reason).toBe("string");
      }
    }
  });
});
