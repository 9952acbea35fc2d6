export { RESOLVER_KINDS, type ResolverKind, type VariantHooks } from "./types.js";
export { standardHooks } from "./standard.js";
export { createLockRegistry, type LockRegistry } from "./locked.js";
export { createBadgeRegistry, type BadgeRegistry, type BadgeState } from "./badge.js";
export {
  RentalLedger,
  SET_USER_TYPES,
  createRentalRegistry,
  rentalDomain,
  type Delegation,
  type RentalRegistry,
  type SignedDelegation,
} from "./rental.js";
export { ValueLedger, valueLedgerHooks, type ValueTransferResult } from "./value-ledger.js";
export { createResolver, type CreateResolverOptions, type Resolver } from "./resolver.js";
