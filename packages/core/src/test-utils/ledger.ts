/**
 * In-memory resolver harness: a migrated, never-persisted ledger, a controllable
 * clock, an in-memory attestation service and a cast of role holders.
 */

import pino from "pino";
import type { Hex } from "viem";

import type { Attestation } from "../attestations/types.js";
import { Capability } from "../capabilities/bitmask.js";
import { seedLedger } from "../ledger/access.js";
import type { ClaimEngine, CommittedClaim } from "../ledger/engine.js";
import { migrateLedger } from "../ledger/schema.js";
import { LedgerDatabase, loadSqlJs } from "../ledger/sqlite.js";
import { createLedgerStore } from "../ledger/store.js";
import type { Clock } from "../ledger/transactions.js";
import type { TokenRecord } from "../ledger/types.js";
import { createResolver, type Resolver } from "../variants/resolver.js";
import type { ResolverKind } from "../variants/types.js";

import {
  TEST_SCHEMA_ID,
  buildAttestation,
  createInMemoryAttestationGateway,
  testBytes32,
  type BuildAttestationParams,
  type InMemoryAttestationGateway,
} from "./attestations.js";
import { createTestWallet, type TestWallet } from "./wallet.js";

export const TEST_NOW = 1_800_000_000;

const sqlJs = await loadSqlJs();

export interface TestClock {
  readonly clock: Clock;
  now(): number;
  set(seconds: number): void;
  advance(seconds: number): void;
}

export function createTestClock(start: number = TEST_NOW): TestClock {
  let current = start;
  return {
    clock: () => current,
    now: () => current,
    set(seconds) {
      current = seconds;
    },
    advance(seconds) {
      current += seconds;
    },
  };
}

export interface TestWallets {
  governor: TestWallet;
  executor: TestWallet;
  reserver: TestWallet;
  administrator: TestWallet;
  issuer: TestWallet;
  alice: TestWallet;
  bob: TestWallet;
  carol: TestWallet;
}

export function createTestWallets(): TestWallets {
  return {
    governor: createTestWallet(10),
    executor: createTestWallet(11),
    reserver: createTestWallet(12),
    administrator: createTestWallet(13),
    issuer: createTestWallet(20),
    alice: createTestWallet(30),
    bob: createTestWallet(31),
    carol: createTestWallet(32),
  };
}

export interface TestLedger {
  resolver: Resolver;
  engine: ClaimEngine;
  db: LedgerDatabase;
  gateway: InMemoryAttestationGateway;
  clock: TestClock;
  wallets: TestWallets;
  /** Register `wallets.issuer` as the document's issuer. */
  registerDocument(documentId: Hex): Promise<void>;
  /** Store an attestation from `wallets.issuer` in the gateway and return it. */
  attest(
    recipient: TestWallet,
    documentId: Hex,
    capabilityBits?: number,
    overrides?: Partial<BuildAttestationParams>,
  ): Attestation;
  /**
   * Register the document (if needed), reserve it for `recipient` and claim it
   * with a fresh CLAIM attestation.
   */
  reserveAndClaim(
    recipient: TestWallet,
    documentId: Hex,
    shape?: { value?: bigint; slot?: bigint },
  ): Promise<TokenRecord>;
  close(): void;
}

export interface CreateTestLedgerOptions {
  id?: string;
  maxLabelBytes?: number;
  chainId?: number;
  onClaimCommitted?: (claim: CommittedClaim) => Promise<void>;
}

export function createTestLedger(
  kind: ResolverKind,
  options: CreateTestLedgerOptions = {},
): TestLedger {
  const db = LedgerDatabase.open(sqlJs, null);
  migrateLedger(db);

  const wallets = createTestWallets();
  seedLedger(createLedgerStore(db), {
    schemaId: TEST_SCHEMA_ID,
    roles: {
      governor: [wallets.governor.address],
      executor: [wallets.executor.address],
      reserver: [wallets.reserver.address],
      administrator: [wallets.administrator.address],
    },
  });

  const gateway = createInMemoryAttestationGateway();
  const clock = createTestClock();
  const resolver = createResolver({
    id: options.id ?? "test",
    kind,
    db,
    gateway,
    logger: pino({ level: "silent" }),
    maxLabelBytes: options.maxLabelBytes,
    chainId: options.chainId,
    clock: clock.clock,
    onClaimCommitted: options.onClaimCommitted,
  });
  const engine = resolver.engine;

  return {
    resolver,
    engine,
    db,
    gateway,
    clock,
    wallets,
    async registerDocument(documentId) {
      await engine.setIssuer(wallets.executor.address, documentId, wallets.issuer.address);
    },
    attest(recipient, documentId, capabilityBits = Capability.CLAIM, overrides = {}) {
      const attestation = buildAttestation({
        recipient: recipient.address,
        issuer: wallets.issuer.address,
        documentId,
        capabilityBits,
        ...overrides,
      });
      gateway.put(attestation);
      return attestation;
    },
    async reserveAndClaim(recipient, documentId, shape = {}) {
      if (engine.issuerOf(documentId) === null) {
        await engine.setIssuer(wallets.executor.address, documentId, wallets.issuer.address);
      }
      const reserved = await engine.reserve(wallets.reserver.address, {
        documentId,
        recipient: recipient.address,
        ...shape,
      });
      const attestation = buildAttestation({
        recipient: recipient.address,
        issuer: wallets.issuer.address,
        documentId,
        capabilityBits: Capability.CLAIM,
      });
      gateway.put(attestation);
      return engine.claim(recipient.address, {
        documentId,
        tokenId: reserved.tokenId,
        attestationId: attestation.id,
      });
    },
    close() {
      db.close();
    },
  };
}

/** Deterministic document ids for tests. */
export function testDocumentId(n: number): Hex {
  return testBytes32(0xd0c00000 + n);
}
