/**
 * Ledger database layout. Versions are tracked in PRAGMA user_version and
 * migrations are additive only: new tables or appended columns, never a
 * reorder, rename or drop.
 */

import { LedgerDatabase, loadSqlJs } from "./sqlite.js";

interface Migration {
  version: number;
  statements: readonly string[];
}

const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    statements: [
      `CREATE TABLE meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      )`,
      `CREATE TABLE roles (
        role TEXT NOT NULL,
        account TEXT NOT NULL,
        PRIMARY KEY (role, account)
      )`,
      `CREATE TABLE issuers (
        document_id TEXT PRIMARY KEY,
        issuer TEXT NOT NULL,
        registered_at INTEGER NOT NULL
      )`,
      `CREATE TABLE records (
        token_id INTEGER PRIMARY KEY,
        document_id TEXT NOT NULL,
        slot TEXT NOT NULL,
        value TEXT NOT NULL,
        owner TEXT,
        reserved_for TEXT,
        claimed INTEGER NOT NULL DEFAULT 0,
        label TEXT,
        approved TEXT,
        created_at INTEGER NOT NULL,
        claimed_at INTEGER
      )`,
      "CREATE INDEX idx_records_owner ON records (owner)",
      "CREATE INDEX idx_records_document ON records (document_id)",
      `CREATE TABLE reservations (
        document_id TEXT NOT NULL,
        slot TEXT NOT NULL,
        token_id INTEGER NOT NULL,
        PRIMARY KEY (document_id, slot)
      )`,
      `CREATE TABLE slots (
        slot TEXT PRIMARY KEY,
        total_reserved TEXT NOT NULL,
        total_minted TEXT NOT NULL
      )`,
      `CREATE TABLE slot_holders (
        slot TEXT NOT NULL,
        holder TEXT NOT NULL,
        PRIMARY KEY (slot, holder)
      )`,
      `CREATE TABLE operator_approvals (
        owner TEXT NOT NULL,
        operator TEXT NOT NULL,
        PRIMARY KEY (owner, operator)
      )`,
      `CREATE TABLE slot_approvals (
        owner TEXT NOT NULL,
        slot TEXT NOT NULL,
        operator TEXT NOT NULL,
        PRIMARY KEY (owner, slot, operator)
      )`,
      `CREATE TABLE value_allowances (
        token_id INTEGER NOT NULL,
        operator TEXT NOT NULL,
        amount TEXT NOT NULL,
        PRIMARY KEY (token_id, operator)
      )`,
      `CREATE TABLE events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        token_id INTEGER,
        document_id TEXT,
        data TEXT NOT NULL,
        at INTEGER NOT NULL
      )`,
    ],
  },
  {
    version: 2,
    statements: [
      `CREATE TABLE locks (
        token_id INTEGER PRIMARY KEY,
        locked_at INTEGER NOT NULL
      )`,
      `CREATE TABLE badges (
        token_id INTEGER PRIMARY KEY,
        valid INTEGER NOT NULL,
        revoked_at INTEGER NOT NULL DEFAULT 0,
        revoked_by TEXT
      )`,
      `CREATE TABLE valid_counts (
        holder TEXT PRIMARY KEY,
        count INTEGER NOT NULL
      )`,
      `CREATE TABLE delegations (
        token_id INTEGER PRIMARY KEY,
        user TEXT NOT NULL,
        expires INTEGER NOT NULL
      )`,
      `CREATE TABLE delegation_nonces (
        token_id INTEGER PRIMARY KEY,
        nonce INTEGER NOT NULL
      )`,
      `CREATE TABLE upgrades (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        implementation TEXT NOT NULL,
        authorized_by TEXT NOT NULL,
        authorized_at INTEGER NOT NULL
      )`,
    ],
  },
  {
    version: 3,
    statements: ["ALTER TABLE records ADD COLUMN label_updated_at INTEGER"],
  },
];

export const LEDGER_SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1].version;

export function getSchemaVersion(db: LedgerDatabase): number {
  const version = db.get("PRAGMA user_version")?.user_version;
  return typeof version === "number" ? version : 0;
}

/** Apply every migration newer than the database's user_version. */
export function migrateLedger(
  db: LedgerDatabase,
  targetVersion: number = LEDGER_SCHEMA_VERSION,
): number {
  for (const migration of MIGRATIONS) {
    if (migration.version > targetVersion) break;
    if (migration.version <= getSchemaVersion(db)) continue;
    db.transaction(() => {
      for (const sql of migration.statements) {
        db.exec(sql);
      }
      db.exec(`PRAGMA user_version = ${migration.version}`);
    });
  }

  return getSchemaVersion(db);
}

/**
 * Open a ledger file and bring the schema current; migrating a new file
 * writes it. A null path keeps the ledger in memory.
 */
export async function initializeLedgerDatabase(dbPath: string | null): Promise<LedgerDatabase> {
  const db = LedgerDatabase.open(await loadSqlJs(), dbPath);
  migrateLedger(db);
  return db;
}
