import type { Context, MiddlewareHandler } from "hono";
import {
  verifyWeb3Signed,
  type VerifiedAuth,
} from "@docclaims/core/auth";
import { ProtocolError } from "@docclaims/core/errors";

import { errorResponse } from "../errors.js";

export type AuthEnv = { Variables: { auth: VerifiedAuth } };

export interface Web3AuthMiddlewareDeps {
  serverOrigin: string | (() => string);
}

function originOf(deps: Web3AuthMiddlewareDeps): string {
  return typeof deps.serverOrigin === "function"
    ? deps.serverOrigin()
    : deps.serverOrigin;
}

/** Verify the request's Web3Signed header against this server's origin. */
export function authenticateRequest(
  c: Context,
  deps: Web3AuthMiddlewareDeps,
): Promise<VerifiedAuth> {
  return verifyWeb3Signed({
    headerValue: c.req.header("authorization"),
    expectedOrigin: originOf(deps),
    expectedMethod: c.req.method,
    expectedPath: new URL(c.req.url).pathname,
  });
}

/**
 * Parses + verifies Web3Signed Authorization header.
 * Sets c.set('auth', VerifiedAuth) for downstream handlers; the signer is
 * the caller of every ledger operation the request performs.
 */
export function createWeb3AuthMiddleware(
  depsOrOrigin: Web3AuthMiddlewareDeps | string,
): MiddlewareHandler<AuthEnv> {
  const deps: Web3AuthMiddlewareDeps =
    typeof depsOrOrigin === "string"
      ? { serverOrigin: depsOrOrigin }
      : depsOrOrigin;

  return async (c, next) => {
    try {
      c.set("auth", await authenticateRequest(c, deps));
    } catch (err) {
      if (err instanceof ProtocolError) {
        return errorResponse(err);
      }
      throw err;
    }
    await next();
  };
}
