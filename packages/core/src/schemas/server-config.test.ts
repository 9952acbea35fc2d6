import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { getAddress, keccak256, toHex } from "viem";
import { DEFAULT_SCHEMA_ID, ServerConfigSchema } from "./server-config.js";
import { loadConfig, saveConfig } from "../config/loader.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "server-config-test-"));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true });
  }
}

const GOVERNOR = "0x00000000000000000000000000000000000000a1";

describe("ServerConfigSchema — attestation and ledger fields", () => {
  it("defaults the capability schema id to the v1 schema hash", () => {
    const config = ServerConfigSchema.parse({});

    expect(DEFAULT_SCHEMA_ID).toBe(keccak256(toHex("docclaims.capability.v1")));
    expect(config.attestations.schemaId).toBe(DEFAULT_SCHEMA_ID);
  });

  it("lowercases a configured schema id", () => {
    const config = ServerConfigSchema.parse({
      attestations: { schemaId: `0x${"AB".repeat(32)}` },
    });

    expect(config.attestations.schemaId).toBe(`0x${"ab".repeat(32)}`);
  });

  it("bounds attestation and credential requests with a timeout", () => {
    const defaults = ServerConfigSchema.parse({});
    const configured = ServerConfigSchema.parse({
      attestations: { timeoutMs: 250 },
      credentials: { timeoutMs: 750 },
    });

    expect(defaults.attestations.timeoutMs).toBe(5000);
    expect(defaults.credentials.timeoutMs).toBe(5000);
    expect(configured.attestations.timeoutMs).toBe(250);
    expect(configured.credentials.timeoutMs).toBe(750);
    expect(() => ServerConfigSchema.parse({ attestations: { timeoutMs: 0 } })).toThrow();
  });

  it("rejects a schema id that is not 32 bytes", () => {
    expect(() =>
      ServerConfigSchema.parse({ attestations: { schemaId: "0x1234" } }),
    ).toThrow();
  });

  it("checksums role addresses", () => {
    const config = ServerConfigSchema.parse({
      roles: { governors: [GOVERNOR] },
    });

    expect(config.roles.governors).toEqual([getAddress(GOVERNOR)]);
    expect(config.roles.executors).toEqual([]);
  });

  it("rejects malformed role addresses", () => {
    expect(() =>
      ServerConfigSchema.parse({ roles: { reservers: ["0x1234"] } }),
    ).toThrow();
  });

  it("rejects unknown resolver kinds", () => {
    expect(() =>
      ServerConfigSchema.parse({ resolvers: [{ id: "x", kind: "fungible" }] }),
    ).toThrow();
  });

  it("rejects duplicate resolver ids", () => {
    expect(() =>
      ServerConfigSchema.parse({
        resolvers: [
          { id: "same", kind: "standard" },
          { id: "same", kind: "badge" },
        ],
      }),
    ).toThrow();
  });

  it("rejects resolver ids that cannot name a file", () => {
    expect(() =>
      ServerConfigSchema.parse({ resolvers: [{ id: "../escape", kind: "standard" }] }),
    ).toThrow();
  });
});

describe("saveConfig", () => {
  it("writes JSON file that loadConfig reads back identically", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "config.json");

      const original = await loadConfig({ configPath });
      original.credentials.enabled = true;
      original.resolvers = [
        { id: "default", kind: "standard" },
        { id: "badges", kind: "badge" },
      ];

      await saveConfig(original, { configPath });
      const reloaded = await loadConfig({ configPath });

      expect(reloaded.credentials.enabled).toBe(true);
      expect(reloaded.resolvers).toEqual(original.resolvers);
      expect(reloaded.server.port).toBe(original.server.port);
    });
  });

  it("creates parent directory if missing", async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, "nested", "deep", "config.json");

      const config = ServerConfigSchema.parse({});
      await saveConfig(config, { configPath });

      const parsed = JSON.parse(await readFile(configPath, "utf-8"));
      expect(parsed.server.port).toBe(8080);
      expect(parsed.resolvers).toEqual([{ id: "default", kind: "standard" }]);
    });
  });
});
