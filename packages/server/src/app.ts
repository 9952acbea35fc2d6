import { Hono } from "hono";
import { cors } from "hono/cors";
import { ProtocolError } from "@docclaims/core/errors";
import type { Resolver } from "@docclaims/core/variants";
import type { Logger } from "pino";

import { errorResponse, internalErrorResponse } from "./errors.js";
import { createBodyLimit } from "./middleware/body-limit.js";
import { capabilitiesRoute } from "./routes/capabilities.js";
import { healthRoute } from "./routes/health.js";
import { resolverRoutes } from "./routes/resolver.js";

export interface AppDeps {
  logger: Logger;
  version: string;
  startedAt: Date;
  serverOrigin: string | (() => string);
  resolvers: readonly Resolver[];
  maxBodySize?: number;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  // CORS — allow all origins for browser-based clients
  app.use(
    "*",
    cors({
      origin: "*",
      allowHeaders: ["Content-Type", "Authorization"],
      allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      maxAge: 86400,
    }),
  );

  app.use("/v1/*", createBodyLimit(deps.maxBodySize));

  app.route(
    "/",
    healthRoute({
      version: deps.version,
      startedAt: deps.startedAt,
      resolvers: deps.resolvers,
    }),
  );
  app.route("/", capabilitiesRoute());

  app.get("/v1/resolvers", (c) =>
    c.json({
      resolvers: deps.resolvers.map((resolver) => ({ id: resolver.id, kind: resolver.kind })),
    }),
  );

  // One sub-app per configured resolver; unknown ids fall through to 404
  for (const resolver of deps.resolvers) {
    app.route(
      `/v1/resolvers/${resolver.id}`,
      resolverRoutes({ resolver, serverOrigin: deps.serverOrigin }),
    );
  }

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof ProtocolError) {
      deps.logger.warn(
        { err, method: c.req.method, path: c.req.path },
        err.message,
      );
      return errorResponse(err);
    }

    deps.logger.error({ err }, "Unhandled error");
    return internalErrorResponse();
  });

  // 404 fallback
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 404,
          errorCode: "NOT_FOUND",
          message: "Not found",
        },
      },
      404,
    );
  });

  return app;
}
