/**
 * Deterministic wallets and Web3Signed header builders for tests.
 */

import { privateKeyToAccount } from "viem/accounts";
import type { Address, Hex, PrivateKeyAccount } from "viem";

export interface TestWallet {
  address: Address;
  privateKey: Hex;
  /** Underlying viem account, for typed-data signing in tests. */
  account: PrivateKeyAccount;
  signMessage(message: string): Promise<Hex>;
}

/**
 * Create a deterministic test wallet from a seed index.
 * Seed N produces the private key padded hex(N + 1).
 */
export function createTestWallet(seed: number = 0): TestWallet {
  const privateKey: Hex = `0x${(seed + 1).toString(16).padStart(64, "0")}`;
  const account = privateKeyToAccount(privateKey);

  return {
    address: account.address,
    privateKey,
    account,
    async signMessage(message: string): Promise<Hex> {
      return account.signMessage({ message });
    },
  };
}

/** Base64url encode a string (no padding). */
function base64urlEncode(input: string): string {
  return Buffer.from(input, "utf-8")
    .toString("base64")
    .replace(/\+/g, "-")
    .replace(/\//g, "_")
    .replace(/=+$/, "");
}

/**
 * Build a valid Web3Signed Authorization header value.
 * Format: "Web3Signed {base64url(payload)}.{signature}"
 *
 * The payload is JSON with sorted keys, signed via EIP-191.
 */
export async function buildWeb3SignedHeader(params: {
  wallet: TestWallet;
  aud: string;
  method: string;
  uri: string;
  bodyHash?: string;
  iat?: number;
  exp?: number;
  attestationId?: string;
}): Promise<string> {
  const now = Math.floor(Date.now() / 1000);
  const payload: Record<string, unknown> = {
    aud: params.aud,
    // sha256("")
    bodyHash:
      params.bodyHash ??
      "sha256:e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    exp: params.exp ?? now + 300,
    iat: params.iat ?? now,
    method: params.method,
    uri: params.uri,
  };

  if (params.attestationId !== undefined) {
    payload["attestationId"] = params.attestationId;
  }

  const sortedPayload = Object.keys(payload)
    .sort()
    .reduce<Record<string, unknown>>((acc, key) => {
      acc[key] = payload[key];
      return acc;
    }, {});

  const payloadBase64 = base64urlEncode(JSON.stringify(sortedPayload));
  const signature = await params.wallet.signMessage(payloadBase64);

  return `Web3Signed ${payloadBase64}.${signature}`;
}
