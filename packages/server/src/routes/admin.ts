import { Hono } from "hono";
import { z } from "zod";
import { addressSchema, bytes32Schema } from "@docclaims/core/schemas";

import { createWeb3AuthMiddleware, type AuthEnv } from "../middleware/web3-auth.js";
import { readBody } from "../http.js";

import type { ResolverRouteDeps } from "./resolver.js";

const SchemaBodySchema = z.object({ schemaId: bytes32Schema });

const UpgradeBodySchema = z.object({ implementation: addressSchema });

/** Pause switch, capability schema and upgrade authorizations. Role checks live in the engine. */
export function adminRoutes(deps: ResolverRouteDeps): Hono<AuthEnv> {
  const app = new Hono<AuthEnv>();
  const { engine } = deps.resolver;
  const web3Auth = createWeb3AuthMiddleware({ serverOrigin: deps.serverOrigin });

  app.get("/admin/status", (c) => {
    return c.json({
      paused: engine.isPaused(),
      schemaId: engine.capabilitySchema(),
      upgrades: engine.store.listUpgrades(),
    });
  });

  app.post("/admin/pause", web3Auth, async (c) => {
    await engine.pause(c.get("auth").signer);
    return c.json({ paused: engine.isPaused() });
  });

  app.post("/admin/unpause", web3Auth, async (c) => {
    await engine.unpause(c.get("auth").signer);
    return c.json({ paused: engine.isPaused() });
  });

  app.put("/admin/schema", web3Auth, async (c) => {
    const body = await readBody(c, SchemaBodySchema);
    const schemaId = await engine.setCapabilitySchema(c.get("auth").signer, body.schemaId);
    return c.json({ schemaId });
  });

  app.post("/admin/upgrades", web3Auth, async (c) => {
    const body = await readBody(c, UpgradeBodySchema);
    const id = await engine.authorizeUpgrade(c.get("auth").signer, body.implementation);
    return c.json({ id, implementation: body.implementation }, 201);
  });

  return app;
}
