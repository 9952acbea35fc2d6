/**
 * Resolver assembly: one ledger database, one claim engine, and the variant
 * registry that matches the resolver's kind.
 */

import type { Logger } from "pino";

import type { AttestationGateway } from "../attestations/gateway.js";
import { ClaimEngine, type CommittedClaim } from "../ledger/engine.js";
import type { LedgerDatabase } from "../ledger/sqlite.js";
import { createLedgerStore } from "../ledger/store.js";
import type { Clock } from "../ledger/transactions.js";

import { createBadgeRegistry, type BadgeRegistry } from "./badge.js";
import { createLockRegistry, type LockRegistry } from "./locked.js";
import { RentalLedger, createRentalRegistry, rentalDomain } from "./rental.js";
import { standardHooks } from "./standard.js";
import type { ResolverKind } from "./types.js";
import { ValueLedger, valueLedgerHooks } from "./value-ledger.js";

interface ResolverBase {
  id: string;
  engine: ClaimEngine;
}

export type Resolver =
  | (ResolverBase & { kind: "standard" })
  | (ResolverBase & { kind: "value"; value: ValueLedger })
  | (ResolverBase & { kind: "locked"; locks: LockRegistry })
  | (ResolverBase & { kind: "badge"; badges: BadgeRegistry })
  | (ResolverBase & { kind: "rental"; rentals: RentalLedger });

export interface CreateResolverOptions {
  id: string;
  kind: ResolverKind;
  /** An open, migrated ledger database. */
  db: LedgerDatabase;
  gateway: AttestationGateway;
  logger: Logger;
  maxLabelBytes?: number;
  /** Chain id bound into rental delegation signatures. */
  chainId?: number;
  clock?: Clock;
  onClaimCommitted?: (claim: CommittedClaim) => Promise<void>;
}

export function createResolver(options: CreateResolverOptions): Resolver {
  const { id, kind, db } = options;
  const logger = options.logger.child({ resolver: id, kind });
  const store = createLedgerStore(db);

  const engineFor = (variant: ClaimEngine["variant"]): ClaimEngine =>
    new ClaimEngine({
      store,
      gateway: options.gateway,
      variant,
      logger,
      maxLabelBytes: options.maxLabelBytes,
      clock: options.clock,
      onClaimCommitted: options.onClaimCommitted,
    });

  switch (kind) {
    case "standard":
      return { id, kind, engine: engineFor(standardHooks) };
    case "value": {
      const engine = engineFor(valueLedgerHooks);
      return { id, kind, engine, value: new ValueLedger(engine) };
    }
    case "locked": {
      const locks = createLockRegistry(db);
      return { id, kind, engine: engineFor(locks.hooks), locks };
    }
    case "badge": {
      const badges = createBadgeRegistry(db);
      return { id, kind, engine: engineFor(badges.hooks), badges };
    }
    case "rental": {
      const registry = createRentalRegistry(db);
      const engine = engineFor(registry.hooks);
      const rentals = new RentalLedger(engine, registry, rentalDomain(id, options.chainId ?? 1));
      return { id, kind, engine, rentals };
    }
  }
}
