import { Hono } from "hono";
import { ALL_CAPABILITIES, Capability } from "@docclaims/core/capabilities";

/** The capability bit table, for clients building attestations. */
export function capabilitiesRoute(): Hono {
  const app = new Hono();

  app.get("/v1/capabilities", (c) =>
    c.json({
      capabilities: Object.entries(Capability).map(([name, bit]) => ({ name, bit })),
      all: ALL_CAPABILITIES,
    }),
  );

  return app;
}
