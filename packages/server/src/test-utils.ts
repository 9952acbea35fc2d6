/**
 * HTTP harness over an in-memory resolver: the real app, a test ledger
 * behind it, and requests signed as any of the ledger's test wallets.
 */

import type { Hono } from "hono";
import pino from "pino";
import {
  buildWeb3SignedHeader,
  createTestLedger,
  type CreateTestLedgerOptions,
  type TestLedger,
  type TestWallet,
} from "@docclaims/core/test-utils";
import type { ResolverKind } from "@docclaims/core/variants";

import { createApp } from "./app.js";

export const SERVER_ORIGIN = "http://localhost:8080";
export const RESOLVER_BASE = "/v1/resolvers/test";

export interface TestServer {
  app: Hono;
  ledger: TestLedger;
  /**
   * Send a request to `path` under the resolver base, signed by `wallet`
   * (unsigned when null). Objects are sent as JSON.
   */
  call(wallet: TestWallet | null, method: string, path: string, body?: unknown): Promise<Response>;
  close(): void;
}

export function createTestServer(
  kind: ResolverKind,
  options: Omit<CreateTestLedgerOptions, "id"> = {},
): TestServer {
  const ledger = createTestLedger(kind, { ...options, id: "test" });
  const app = createApp({
    logger: pino({ level: "silent" }),
    version: "0.0.0-test",
    startedAt: new Date(),
    serverOrigin: SERVER_ORIGIN,
    resolvers: [ledger.resolver],
  });

  return {
    app,
    ledger,
    async call(wallet, method, path, body) {
      const url = `${RESOLVER_BASE}${path}`;
      const headers: Record<string, string> = {};
      if (wallet) {
        headers["Authorization"] = await buildWeb3SignedHeader({
          wallet,
          aud: SERVER_ORIGIN,
          method,
          uri: new URL(url, SERVER_ORIGIN).pathname,
        });
      }
      if (body !== undefined) {
        headers["Content-Type"] = "application/json";
      }
      return app.request(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    },
    close() {
      ledger.close();
    },
  };
}
