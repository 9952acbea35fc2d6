import { mkdtemp, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import pino from "pino";
import { createServer, type ServerContext } from "./bootstrap.js";
import { ServerConfigSchema } from "@docclaims/core/schemas";
import {
  TEST_SCHEMA_ID,
  buildAttestation,
  createInMemoryAttestationGateway,
  createTestWallets,
  testDocumentId,
  type InMemoryAttestationGateway,
} from "@docclaims/core/test-utils";

const wallets = createTestWallets();

function makeConfig(overrides: { credentials?: boolean; attestationTimeoutMs?: number } = {}) {
  return ServerConfigSchema.parse({
    attestations: {
      schemaId: TEST_SCHEMA_ID,
      url: "http://attestations.test",
      timeoutMs: overrides.attestationTimeoutMs,
    },
    credentials: { enabled: overrides.credentials ?? false, url: "http://credentials.test" },
    roles: {
      governors: [wallets.governor.address],
      executors: [wallets.executor.address],
      reservers: [wallets.reserver.address],
      administrators: [wallets.administrator.address],
    },
    resolvers: [
      { id: "deeds", kind: "standard" },
      { id: "badges", kind: "badge" },
    ],
  });
}

describe("createServer", () => {
  let tempDir: string;
  let gateway: InMemoryAttestationGateway;
  let ctx: ServerContext | undefined;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "bootstrap-test-"));
    gateway = createInMemoryAttestationGateway();
    ctx = undefined;
  });

  afterEach(async () => {
    await ctx?.cleanup();
    vi.unstubAllGlobals();
    await rm(tempDir, { recursive: true, force: true });
  });

  async function start(config = makeConfig()): Promise<ServerContext> {
    ctx = await createServer(config, {
      rootPath: tempDir,
      gateway,
      logger: pino({ level: "silent" }),
    });
    return ctx;
  }

  it("returns object with app, logger, config, startedAt and resolvers", async () => {
    const server = await start();

    expect(server.rootPath).toBe(tempDir);
    expect(server.config.server.origin).toBe("http://localhost:8080");
    expect(server.resolvers.map((r) => [r.id, r.kind])).toEqual([
      ["deeds", "standard"],
      ["badges", "badge"],
    ]);
  });

  it("opens one ledger file per resolver", async () => {
    await start();

    const deeds = await stat(join(tempDir, "ledgers", "deeds.db"));
    const badges = await stat(join(tempDir, "ledgers", "badges.db"));
    expect(deeds.isFile()).toBe(true);
    expect(badges.isFile()).toBe(true);
  });

  it("seeds roles and the capability schema from config", async () => {
    const server = await start();
    const engine = server.resolvers[0].engine;

    expect(engine.capabilitySchema()).toBe(TEST_SCHEMA_ID);
    await expect(
      engine.setIssuer(wallets.executor.address, testDocumentId(1), wallets.issuer.address),
    ).resolves.toBe(wallets.issuer.address);
  });

  it("app responds to GET /health", async () => {
    const server = await start();

    const res = await server.app.request("/health");
    expect(res.status).toBe(200);

    const body = await res.json();
    expect(body.status).toBe("healthy");
    expect(body.resolvers).toHaveLength(2);
  });

  it("auth middleware is wired on resolver writes", async () => {
    const server = await start();

    const res = await server.app.request(`/v1/resolvers/deeds/documents/${testDocumentId(1)}/issuer`, {
      method: "PUT",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ issuer: wallets.issuer.address }),
    });

    expect(res.status).toBe(401);
    const body = await res.json();
    expect(body.error.errorCode).toBe("MISSING_AUTH");
  });

  it("keeps ledger state across restarts", async () => {
    const first = await start();
    await first.resolvers[0].engine.setIssuer(
      wallets.executor.address,
      testDocumentId(1),
      wallets.issuer.address,
    );
    await first.cleanup();
    ctx = undefined;

    const second = await start();
    expect(second.resolvers[0].engine.issuerOf(testDocumentId(1))).toBe(wallets.issuer.address);
  });

  it("requests a trust credential after a claim when enabled", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(JSON.stringify({ data: { credentialId: "cred-1" } }), { status: 201 }),
    );
    vi.stubGlobal("fetch", fetchMock);
    const server = await start(makeConfig({ credentials: true }));
    const engine = server.resolvers[0].engine;
    const documentId = testDocumentId(1);

    await engine.setIssuer(wallets.executor.address, documentId, wallets.issuer.address);
    await engine.reserve(wallets.reserver.address, { documentId, recipient: wallets.alice.address });
    const attestation = buildAttestation({
      recipient: wallets.alice.address,
      issuer: wallets.issuer.address,
      documentId,
      capabilityBits: 1,
    });
    gateway.put(attestation);
    await engine.claim(wallets.alice.address, {
      documentId,
      tokenId: 0,
      attestationId: attestation.id,
    });

    await vi.waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(1));
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://credentials.test/v1/credentials");
    expect(JSON.parse(init.body)).toEqual({
      recipient: wallets.alice.address,
      documentId,
      tokenId: 0,
      verifiedIdentity: "Test Holder",
      contractRole: "holder",
    });
  });

  it("does not call the credential service when disabled", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    const server = await start();
    const engine = server.resolvers[0].engine;
    const documentId = testDocumentId(1);

    await engine.setIssuer(wallets.executor.address, documentId, wallets.issuer.address);
    await engine.reserve(wallets.reserver.address, { documentId, recipient: wallets.alice.address });
    const attestation = buildAttestation({
      recipient: wallets.alice.address,
      issuer: wallets.issuer.address,
      documentId,
      capabilityBits: 1,
    });
    gateway.put(attestation);
    await engine.claim(wallets.alice.address, {
      documentId,
      tokenId: 0,
      attestationId: attestation.id,
    });

    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("cleanup() closes every ledger", async () => {
    const server = await start();

    await server.cleanup();
    ctx = undefined;

    expect(() => server.resolvers[0].engine.isPaused()).toThrow();
  });

  it("releases the ledger queue when the attestation service hangs", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        (_input: string | URL | Request, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            const signal = init?.signal;
            if (!signal) return;
            signal.addEventListener("abort", () => reject(signal.reason));
          }),
      ),
    );
    ctx = await createServer(makeConfig({ attestationTimeoutMs: 20 }), {
      rootPath: tempDir,
      logger: pino({ level: "silent" }),
    });
    const engine = ctx.resolvers[0].engine;
    const documentId = testDocumentId(1);
    await engine.setIssuer(wallets.executor.address, documentId, wallets.issuer.address);
    await engine.reserve(wallets.reserver.address, { documentId, recipient: wallets.alice.address });

    const claim = engine.claim(wallets.alice.address, {
      documentId,
      tokenId: 0,
      attestationId: testDocumentId(99),
    });
    const pause = engine.pause(wallets.administrator.address);

    await expect(claim).rejects.toMatchObject({ errorCode: "ATTESTATION_UNAVAILABLE" });
    await expect(pause).resolves.toBeUndefined();
    expect(engine.isPaused()).toBe(true);
  });

  it("answers a claim without waiting for the credential service", async () => {
    vi.stubGlobal("fetch", vi.fn(() => new Promise<Response>(() => {})));
    const server = await start(makeConfig({ credentials: true }));
    const engine = server.resolvers[0].engine;
    const documentId = testDocumentId(1);
    await engine.setIssuer(wallets.executor.address, documentId, wallets.issuer.address);
    await engine.reserve(wallets.reserver.address, { documentId, recipient: wallets.alice.address });
    const attestation = buildAttestation({
      recipient: wallets.alice.address,
      issuer: wallets.issuer.address,
      documentId,
      capabilityBits: 1,
    });
    gateway.put(attestation);

    const record = await engine.claim(wallets.alice.address, {
      documentId,
      tokenId: 0,
      attestationId: attestation.id,
    });

    expect(record.owner).toBe(wallets.alice.address);
  });
});
