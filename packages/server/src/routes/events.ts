import { Hono } from "hono";
import { z } from "zod";
import { LEDGER_EVENT_NAMES } from "@docclaims/core/ledger";
import { bytes32Schema } from "@docclaims/core/schemas";

import type { AuthEnv } from "../middleware/web3-auth.js";
import { readQuery } from "../http.js";

import type { ResolverRouteDeps } from "./resolver.js";

const EventsQuerySchema = z.object({
  name: z.enum(LEDGER_EVENT_NAMES).optional(),
  tokenId: z.coerce.number().int().nonnegative().optional(),
  documentId: bytes32Schema.optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  afterId: z.coerce.number().int().nonnegative().default(0),
});

/** Committed ledger events in id order; page with `afterId`. */
export function eventRoutes(deps: ResolverRouteDeps): Hono<AuthEnv> {
  const app = new Hono<AuthEnv>();

  app.get("/events", (c) => {
    const query = readQuery(c, EventsQuerySchema);
    const events = deps.resolver.engine.listEvents(query);
    const last = events.at(-1);
    return c.json({ events, nextAfterId: last ? last.id : query.afterId });
  });

  return app;
}
