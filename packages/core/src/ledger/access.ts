import type { Address, Hex } from "viem";

import { ContractPausedError, MissingRoleError } from "../errors/catalog.js";
import { isBytes32 } from "../schemas/primitives.js";

import type { LedgerStore } from "./store.js";
import { ROLES, type Role } from "./types.js";

export const META_PAUSED = "paused";
export const META_SCHEMA_ID = "capability_schema_id";

export function requireRole(store: LedgerStore, role: Role, caller: Address): void {
  if (!store.hasRole(role, caller)) {
    throw new MissingRoleError({ role, caller });
  }
}

export function isPaused(store: LedgerStore): boolean {
  return store.getMeta(META_PAUSED) === "1";
}

export function assertNotPaused(store: LedgerStore): void {
  if (isPaused(store)) throw new ContractPausedError();
}

export function capabilitySchemaId(store: LedgerStore): Hex | null {
  const value = store.getMeta(META_SCHEMA_ID);
  return isBytes32(value) ? value : null;
}

export interface LedgerSeed {
  /** Only applied when the ledger has no schema yet; later changes go through setCapabilitySchema. */
  schemaId: Hex;
  roles: Partial<Record<Role, readonly Address[]>>;
}

/** Idempotent bootstrap: initial schema id and configured role members. */
export function seedLedger(store: LedgerStore, seed: LedgerSeed): void {
  store.db.transaction(() => {
    if (store.getMeta(META_SCHEMA_ID) === undefined) {
      store.setMeta(META_SCHEMA_ID, seed.schemaId.toLowerCase());
    }
    for (const role of ROLES) {
      for (const account of seed.roles[role] ?? []) {
        store.grantRole(role, account);
      }
    }
  });
}
