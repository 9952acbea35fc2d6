import { Hono } from "hono";
import type { Resolver } from "@docclaims/core/variants";

export interface HealthDeps {
  version: string;
  startedAt: Date;
  resolvers: readonly Resolver[];
}

export function healthRoute(deps: HealthDeps): Hono {
  const app = new Hono();

  app.get("/health", (c) => {
    const uptimeMs = Date.now() - deps.startedAt.getTime();

    return c.json({
      status: "healthy",
      version: deps.version,
      uptime: Math.floor(uptimeMs / 1000),
      resolvers: deps.resolvers.map((resolver) => ({
        id: resolver.id,
        kind: resolver.kind,
        paused: resolver.engine.isPaused(),
      })),
    });
  });

  return app;
}
