export {
  LEDGER_EVENT_NAMES,
  ROLES,
  isLedgerEventName,
  type EventData,
  type LedgerEvent,
  type LedgerEventName,
  type NewLedgerEvent,
  type Role,
  type SlotSummary,
  type SlotTotals,
  type TokenRecord,
  type UpgradeAuthorization,
} from "./types.js";
export {
  LEDGER_SCHEMA_VERSION,
  getSchemaVersion,
  initializeLedgerDatabase,
  migrateLedger,
} from "./schema.js";
export {
  LedgerDatabase,
  loadSqlJs,
  type SqlParams,
  type SqlRow,
} from "./sqlite.js";
export { createLedgerStore, type LedgerStore } from "./store.js";
export {
  LedgerRunner,
  systemClock,
  type Clock,
  type LedgerEventListener,
  type LedgerTx,
} from "./transactions.js";
export {
  assertNotPaused,
  capabilitySchemaId,
  isPaused,
  requireRole,
  seedLedger,
  type LedgerSeed,
} from "./access.js";
export {
  ClaimEngine,
  DEFAULT_MAX_LABEL_BYTES,
  adjustSlotTotals,
  requireClaimed,
  type ClaimEngineOptions,
  type ClaimParams,
  type CommittedClaim,
  type ReserveAnonymousParams,
  type ReserveParams,
  type TransferParams,
  type UpdateLabelParams,
} from "./engine.js";
