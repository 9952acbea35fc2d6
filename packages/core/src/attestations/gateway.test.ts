import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { getAddress } from "viem";

import {
  AttestationUnavailableError,
  MalformedAttestationError,
} from "../errors/catalog.js";

import { createAttestationGatewayClient } from "./gateway.js";

const BASE_URL = "https://attest.example.com/";
const ATTESTATION_ID = `0x${"a1".repeat(32)}`;
const RECIPIENT = "0x00000000000000000000000000000000000000b2";
const ISSUER = "0x00000000000000000000000000000000000000c3";

/** Wrap data in the service's envelope format */
function envelope<T>(data: T) {
  return {
    data,
    proof: {
      signature: "0xproof",
      timestamp: "2026-01-21T10:00:00.000Z",
      gatewayAddress: "0x00000000000000000000000000000000000000f0",
      chainBlockHeight: 1000,
    },
  };
}

function wireAttestation(overrides: Record<string, unknown> = {}) {
  return {
    id: ATTESTATION_ID.toUpperCase().replace("0X", "0x"),
    schemaId: `0x${"5c".repeat(32)}`,
    issuedAt: "1700000000",
    expiresAt: 0,
    recipient: RECIPIENT,
    issuer: ISSUER,
    payload: "0x1234",
    ...overrides,
  };
}

describe("AttestationGatewayClient", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function mockFetch(status: number, body?: unknown) {
    fetchMock.mockResolvedValueOnce(
      new Response(body === undefined ? null : JSON.stringify(body), { status }),
    );
  }

  it("requests the attestation by id without a doubled slash", async () => {
    mockFetch(200, envelope(wireAttestation()));
    const client = createAttestationGatewayClient(BASE_URL);

    await client.getAttestation(ATTESTATION_ID);

    expect(fetchMock).toHaveBeenCalledWith(
      `https://attest.example.com/v1/attestations/${ATTESTATION_ID}`,
      { signal: expect.any(AbortSignal) },
    );
  });

  it("unwraps the envelope and normalizes the record", async () => {
    mockFetch(200, envelope(wireAttestation()));
    const client = createAttestationGatewayClient(BASE_URL);

    const attestation = await client.getAttestation(ATTESTATION_ID);

    expect(attestation).toEqual({
      id: ATTESTATION_ID,
      schemaId: `0x${"5c".repeat(32)}`,
      issuedAt: 1_700_000_000,
      expiresAt: 0,
      revokedAt: 0,
      recipient: getAddress(RECIPIENT),
      issuer: getAddress(ISSUER),
      payload: "0x1234",
    });
  });

  it("returns null on 404", async () => {
    mockFetch(404, { error: "not found" });
    const client = createAttestationGatewayClient(BASE_URL);

    await expect(client.getAttestation(ATTESTATION_ID)).resolves.toBeNull();
  });

  it("throws on other error statuses", async () => {
    mockFetch(500, { error: "boom" });
    const client = createAttestationGatewayClient(BASE_URL);

    await expect(client.getAttestation(ATTESTATION_ID)).rejects.toThrow(
      "Attestation service error: 500",
    );
  });

  it("propagates network errors", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
    const client = createAttestationGatewayClient(BASE_URL);

    await expect(client.getAttestation(ATTESTATION_ID)).rejects.toThrow("fetch failed");
  });

  it("rejects records that do not match the attestation shape", async () => {
    mockFetch(200, envelope(wireAttestation({ recipient: "not-an-address" })));
    const client = createAttestationGatewayClient(BASE_URL);

    await expect(client.getAttestation(ATTESTATION_ID)).rejects.toBeInstanceOf(
      MalformedAttestationError,
    );
  });

  it("rejects a body without an envelope", async () => {
    mockFetch(200, wireAttestation());
    const client = createAttestationGatewayClient(BASE_URL);

    await expect(client.getAttestation(ATTESTATION_ID)).rejects.toBeInstanceOf(
      MalformedAttestationError,
    );
  });

  describe("timeouts", () => {
    function hangUntilAborted(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
      return new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        if (!signal) return;
        signal.addEventListener("abort", () => reject(signal.reason));
      });
    }

    it("gives up on a lookup that outlives the timeout", async () => {
      fetchMock.mockImplementationOnce(hangUntilAborted);
      const client = createAttestationGatewayClient(BASE_URL, { timeoutMs: 20 });

      const lookup = client.getAttestation(ATTESTATION_ID);

      await expect(lookup).rejects.toBeInstanceOf(AttestationUnavailableError);
      await expect(lookup).rejects.toMatchObject({
        details: { attestationId: ATTESTATION_ID, reason: "timed out after 20ms" },
      });
    });

    it("reports an aborted request as unavailable", async () => {
      fetchMock.mockRejectedValueOnce(new DOMException("signal timed out", "TimeoutError"));
      const client = createAttestationGatewayClient(BASE_URL);

      await expect(client.getAttestation(ATTESTATION_ID)).rejects.toMatchObject({
        errorCode: "ATTESTATION_UNAVAILABLE",
        details: { attestationId: ATTESTATION_ID, reason: "timed out after 5000ms" },
      });
    });
  });
});
