import { mkdir } from "node:fs/promises";
import { createRequire } from "node:module";
import { dirname } from "node:path";

const require = createRequire(import.meta.url);
const pkg: { version: string } = require("../package.json");
import type { ServerConfig } from "@docclaims/core/schemas";
import {
  ledgerDatabasePath,
  resolveRootPath,
} from "@docclaims/core/config";
import {
  createLogger,
  type Logger,
} from "@docclaims/core/logger";
import {
  createAttestationGatewayClient,
  type AttestationGateway,
} from "@docclaims/core/attestations";
import {
  createCredentialClient,
  issueCredentialBestEffort,
} from "@docclaims/core/credentials";
import {
  createLedgerStore,
  initializeLedgerDatabase,
  seedLedger,
  type CommittedClaim,
  type Clock,
  type LedgerDatabase,
} from "@docclaims/core/ledger";
import { createResolver, type Resolver } from "@docclaims/core/variants";
import type { Hono } from "hono";
import { createApp } from "./app.js";

export interface ServerContext {
  app: Hono;
  logger: Logger;
  config: ServerConfig;
  startedAt: Date;
  rootPath: string;
  resolvers: Resolver[];
  cleanup: () => Promise<void>;
}

export interface CreateServerOptions {
  rootPath?: string;
  /** Attestation service override; defaults to an HTTP client for `config.attestations.url`. */
  gateway?: AttestationGateway;
  logger?: Logger;
  clock?: Clock;
}

export async function createServer(
  config: ServerConfig,
  options?: CreateServerOptions,
): Promise<ServerContext> {
  const logger =
    options?.logger ?? createLogger(config.logging, { service: "docclaims" });
  const startedAt = new Date();
  const rootPath = resolveRootPath(options?.rootPath);

  const gateway =
    options?.gateway ??
    createAttestationGatewayClient(config.attestations.url, {
      timeoutMs: config.attestations.timeoutMs,
    });

  let onClaimCommitted: ((claim: CommittedClaim) => Promise<void>) | undefined;
  if (config.credentials.enabled) {
    const credentials = createCredentialClient(config.credentials.url, {
      timeoutMs: config.credentials.timeoutMs,
    });
    const credentialLogger = logger.child({ component: "credentials" });
    onClaimCommitted = (claim) =>
      issueCredentialBestEffort(credentials, claim, credentialLogger);
    logger.info({ url: config.credentials.url }, "Trust credentials enabled");
  }

  const databases: LedgerDatabase[] = [];
  const resolvers: Resolver[] = [];

  for (const resolverConfig of config.resolvers) {
    const dbPath = ledgerDatabasePath(rootPath, resolverConfig.id);
    await mkdir(dirname(dbPath), { recursive: true });
    const db = await initializeLedgerDatabase(dbPath);
    databases.push(db);

    seedLedger(createLedgerStore(db), {
      schemaId: config.attestations.schemaId,
      roles: {
        governor: config.roles.governors,
        executor: config.roles.executors,
        reserver: config.roles.reservers,
        administrator: config.roles.administrators,
      },
    });

    resolvers.push(
      createResolver({
        id: resolverConfig.id,
        kind: resolverConfig.kind,
        db,
        gateway,
        logger,
        maxLabelBytes: config.ledger.maxLabelBytes,
        chainId: config.ledger.chainId,
        clock: options?.clock,
        onClaimCommitted,
      }),
    );
    logger.info(
      { resolver: resolverConfig.id, kind: resolverConfig.kind, dbPath },
      "Resolver ledger opened",
    );
  }

  const app = createApp({
    logger,
    version: pkg.version,
    startedAt,
    serverOrigin: config.server.origin,
    resolvers,
  });

  const cleanup = async (): Promise<void> => {
    for (const db of databases) {
      db.close();
    }
  };

  return {
    app,
    logger,
    config,
    startedAt,
    rootPath,
    resolvers,
    cleanup,
  };
}
