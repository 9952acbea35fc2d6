import { Hono } from "hono";
import type { Resolver } from "@docclaims/core/variants";

import type { AuthEnv } from "../middleware/web3-auth.js";

import { adminRoutes } from "./admin.js";
import { documentRoutes } from "./documents.js";
import { eventRoutes } from "./events.js";
import { tokenRoutes } from "./tokens.js";
import { valueRoutes } from "./value.js";

export interface ResolverRouteDeps {
  resolver: Resolver;
  serverOrigin: string | (() => string);
}

/** Every route of one resolver, relative to /v1/resolvers/:resolverId. */
export function resolverRoutes(deps: ResolverRouteDeps): Hono<AuthEnv> {
  const app = new Hono<AuthEnv>();

  app.get("/", (c) =>
    c.json({
      id: deps.resolver.id,
      kind: deps.resolver.kind,
      paused: deps.resolver.engine.isPaused(),
      schemaId: deps.resolver.engine.capabilitySchema(),
    }),
  );

  app.route("/", documentRoutes(deps));
  app.route("/", tokenRoutes(deps));
  app.route("/", valueRoutes(deps));
  app.route("/", adminRoutes(deps));
  app.route("/", eventRoutes(deps));

  return app;
}
