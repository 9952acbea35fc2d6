import { getAddress, type Address, type Hex } from "viem";

import { isBytes32, isHexBytes } from "../schemas/primitives.js";

import {
  intColumn,
  nullableIntColumn,
  nullableTextColumn,
  textColumn,
  type LedgerDatabase,
  type SqlRow,
} from "./sqlite.js";
import {
  isLedgerEventName,
  type EventData,
  type LedgerEvent,
  type LedgerEventName,
  type NewLedgerEvent,
  type Role,
  type SlotTotals,
  type TokenRecord,
  type UpgradeAuthorization,
} from "./types.js";

/**
 * Typed access to the ledger tables. Every method is synchronous so callers
 * can compose them inside a single sql.js transaction.
 */
export interface LedgerStore {
  readonly db: LedgerDatabase;

  getMeta(key: string): string | undefined;
  setMeta(key: string, value: string): void;
  /** Next arena index for a token record, starting at 0. */
  allocateTokenId(): number;

  hasRole(role: Role, account: Address): boolean;
  grantRole(role: Role, account: Address): void;

  getIssuer(documentId: Hex): Address | null;
  insertIssuer(documentId: Hex, issuer: Address, at: number): void;

  getRecord(tokenId: number): TokenRecord | undefined;
  insertRecord(record: TokenRecord): void;
  markClaimed(tokenId: number, owner: Address, at: number): void;
  setOwner(tokenId: number, owner: Address): void;
  setValue(tokenId: number, value: bigint): void;
  setApproved(tokenId: number, approved: Address | null): void;
  setLabel(tokenId: number, label: Hex | null, at: number): void;
  deleteRecord(tokenId: number): void;
  countOwned(owner: Address): number;
  listOwned(owner: Address, slot?: bigint): TokenRecord[];

  getReservation(documentId: Hex, slot: bigint): number | undefined;
  insertReservation(documentId: Hex, slot: bigint, tokenId: number): void;
  deleteReservation(documentId: Hex, slot: bigint): void;

  getSlot(slot: bigint): SlotTotals | undefined;
  putSlot(totals: SlotTotals): void;
  deleteSlot(slot: bigint): void;
  addSlotHolder(slot: bigint, holder: Address): boolean;
  removeSlotHolder(slot: bigint, holder: Address): void;
  listSlotHolders(slot: bigint): Address[];

  isOperator(owner: Address, operator: Address): boolean;
  setOperator(owner: Address, operator: Address, approved: boolean): void;
  isSlotOperator(owner: Address, slot: bigint, operator: Address): boolean;
  setSlotOperator(owner: Address, slot: bigint, operator: Address, approved: boolean): void;
  getAllowance(tokenId: number, operator: Address): bigint;
  setAllowance(tokenId: number, operator: Address, amount: bigint): void;
  clearAllowances(tokenId: number): void;

  insertUpgrade(implementation: Address, authorizedBy: Address, at: number): number;
  listUpgrades(): UpgradeAuthorization[];

  appendEvent(event: NewLedgerEvent, at: number): LedgerEvent;
  listEvents(options?: {
    name?: LedgerEventName;
    tokenId?: number;
    documentId?: Hex;
    limit?: number;
    afterId?: number;
  }): LedgerEvent[];
}

function corrupt(table: string, column: string, value: unknown): Error {
  return new Error(`Corrupt ledger row in ${table}.${column}: ${String(value)}`);
}

function readHex32(table: string, column: string, value: string): Hex {
  if (!isBytes32(value)) throw corrupt(table, column, value);
  return value;
}

function readAddress(value: string): Address;
function readAddress(value: string | null): Address | null;
function readAddress(value: string | null): Address | null {
  return value === null ? null : getAddress(value);
}

function rowToRecord(row: SqlRow): TokenRecord {
  const label = nullableTextColumn(row, "label");
  if (label !== null && !isHexBytes(label)) {
    throw corrupt("records", "label", label);
  }
  return {
    tokenId: intColumn(row, "token_id"),
    documentId: readHex32("records", "document_id", textColumn(row, "document_id")),
    slot: BigInt(textColumn(row, "slot")),
    value: BigInt(textColumn(row, "value")),
    owner: readAddress(nullableTextColumn(row, "owner")),
    reservedFor: readAddress(nullableTextColumn(row, "reserved_for")),
    claimed: intColumn(row, "claimed") === 1,
    label,
    approved: readAddress(nullableTextColumn(row, "approved")),
    createdAt: intColumn(row, "created_at"),
    claimedAt: nullableIntColumn(row, "claimed_at"),
    labelUpdatedAt: nullableIntColumn(row, "label_updated_at"),
  };
}

function parseEventData(raw: string): EventData {
  const parsed: unknown = JSON.parse(raw);
  const data: EventData = {};
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    return data;
  }
  for (const [key, value] of Object.entries(parsed)) {
    if (
      value === null ||
      typeof value === "string" ||
      typeof value === "number" ||
      typeof value === "boolean"
    ) {
      data[key] = value;
    }
  }
  return data;
}

function rowToEvent(row: SqlRow): LedgerEvent {
  const name = textColumn(row, "name");
  if (!isLedgerEventName(name)) throw corrupt("events", "name", name);
  const documentId = nullableTextColumn(row, "document_id");
  return {
    id: intColumn(row, "id"),
    name,
    tokenId: nullableIntColumn(row, "token_id"),
    documentId: documentId === null ? null : readHex32("events", "document_id", documentId),
    data: parseEventData(textColumn(row, "data")),
    at: intColumn(row, "at"),
  };
}

export function createLedgerStore(db: LedgerDatabase): LedgerStore {
  function getMeta(key: string): string | undefined {
    const row = db.get("SELECT value FROM meta WHERE key = ?", [key]);
    return row ? textColumn(row, "value") : undefined;
  }

  function setMeta(key: string, value: string): void {
    db.run(
      `INSERT INTO meta (key, value) VALUES (?, ?)
       ON CONFLICT (key) DO UPDATE SET value = excluded.value`,
      [key, value],
    );
  }

  return {
    db,
    getMeta,
    setMeta,

    allocateTokenId() {
      const next = Number(getMeta("next_token_id") ?? "0");
      setMeta("next_token_id", String(next + 1));
      return next;
    },

    hasRole(role, account) {
      return db.get("SELECT role FROM roles WHERE role = ? AND account = ?", [role, account]) !== undefined;
    },

    grantRole(role, account) {
      db.run("INSERT OR IGNORE INTO roles (role, account) VALUES (?, ?)", [role, account]);
    },

    getIssuer(documentId) {
      const row = db.get("SELECT issuer FROM issuers WHERE document_id = ?", [documentId]);
      return row ? readAddress(textColumn(row, "issuer")) : null;
    },

    insertIssuer(documentId, issuer, at) {
      db.run(
        "INSERT INTO issuers (document_id, issuer, registered_at) VALUES (?, ?, ?)",
        [documentId, issuer, at],
      );
    },

    getRecord(tokenId) {
      const row = db.get("SELECT * FROM records WHERE token_id = ?", [tokenId]);
      return row ? rowToRecord(row) : undefined;
    },

    insertRecord(record) {
      db.run(
        `INSERT INTO records (token_id, document_id, slot, value, owner, reserved_for,
           claimed, label, approved, created_at, claimed_at, label_updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          record.tokenId,
          record.documentId,
          record.slot.toString(),
          record.value.toString(),
          record.owner,
          record.reservedFor,
          record.claimed ? 1 : 0,
          record.label,
          record.approved,
          record.createdAt,
          record.claimedAt,
          record.labelUpdatedAt,
        ],
      );
    },

    markClaimed(tokenId, owner, at) {
      db.run(
        `UPDATE records SET owner = ?, claimed = 1, reserved_for = NULL, claimed_at = ?
         WHERE token_id = ?`,
        [owner, at, tokenId],
      );
    },

    setOwner(tokenId, owner) {
      db.run("UPDATE records SET owner = ? WHERE token_id = ?", [owner, tokenId]);
    },

    setValue(tokenId, value) {
      db.run("UPDATE records SET value = ? WHERE token_id = ?", [value.toString(), tokenId]);
    },

    setApproved(tokenId, approved) {
      db.run("UPDATE records SET approved = ? WHERE token_id = ?", [approved, tokenId]);
    },

    setLabel(tokenId, label, at) {
      db.run(
        "UPDATE records SET label = ?, label_updated_at = ? WHERE token_id = ?",
        [label, at, tokenId],
      );
    },

    deleteRecord(tokenId) {
      db.run("DELETE FROM records WHERE token_id = ?", [tokenId]);
    },

    countOwned(owner) {
      const row = db.get(
        "SELECT COUNT(*) AS cnt FROM records WHERE owner = ? AND claimed = 1",
        [owner],
      );
      return row ? intColumn(row, "cnt") : 0;
    },

    listOwned(owner, slot) {
      const rows =
        slot === undefined
          ? db.all(
              "SELECT * FROM records WHERE owner = ? AND claimed = 1 ORDER BY token_id",
              [owner],
            )
          : db.all(
              "SELECT * FROM records WHERE owner = ? AND slot = ? AND claimed = 1 ORDER BY token_id",
              [owner, slot.toString()],
            );
      return rows.map(rowToRecord);
    },

    getReservation(documentId, slot) {
      const row = db.get(
        "SELECT token_id FROM reservations WHERE document_id = ? AND slot = ?",
        [documentId, slot.toString()],
      );
      return row ? intColumn(row, "token_id") : undefined;
    },

    insertReservation(documentId, slot, tokenId) {
      db.run(
        "INSERT INTO reservations (document_id, slot, token_id) VALUES (?, ?, ?)",
        [documentId, slot.toString(), tokenId],
      );
    },

    deleteReservation(documentId, slot) {
      db.run(
        "DELETE FROM reservations WHERE document_id = ? AND slot = ?",
        [documentId, slot.toString()],
      );
    },

    getSlot(slot) {
      const row = db.get("SELECT * FROM slots WHERE slot = ?", [slot.toString()]);
      if (!row) return undefined;
      return {
        slot,
        totalReserved: BigInt(textColumn(row, "total_reserved")),
        totalMinted: BigInt(textColumn(row, "total_minted")),
      };
    },

    putSlot(totals) {
      db.run(
        `INSERT INTO slots (slot, total_reserved, total_minted) VALUES (?, ?, ?)
         ON CONFLICT (slot) DO UPDATE SET
           total_reserved = excluded.total_reserved,
           total_minted = excluded.total_minted`,
        [totals.slot.toString(), totals.totalReserved.toString(), totals.totalMinted.toString()],
      );
    },

    deleteSlot(slot) {
      db.run("DELETE FROM slots WHERE slot = ?", [slot.toString()]);
    },

    addSlotHolder(slot, holder) {
      return (
        db.run("INSERT OR IGNORE INTO slot_holders (slot, holder) VALUES (?, ?)", [
          slot.toString(),
          holder,
        ]) > 0
      );
    },

    removeSlotHolder(slot, holder) {
      db.run("DELETE FROM slot_holders WHERE slot = ? AND holder = ?", [slot.toString(), holder]);
    },

    listSlotHolders(slot) {
      return db
        .all("SELECT holder FROM slot_holders WHERE slot = ? ORDER BY rowid", [slot.toString()])
        .map((row) => readAddress(textColumn(row, "holder")));
    },

    isOperator(owner, operator) {
      return (
        db.get("SELECT owner FROM operator_approvals WHERE owner = ? AND operator = ?", [
          owner,
          operator,
        ]) !== undefined
      );
    },

    setOperator(owner, operator, approved) {
      if (approved) {
        db.run("INSERT OR IGNORE INTO operator_approvals (owner, operator) VALUES (?, ?)", [
          owner,
          operator,
        ]);
      } else {
        db.run("DELETE FROM operator_approvals WHERE owner = ? AND operator = ?", [owner, operator]);
      }
    },

    isSlotOperator(owner, slot, operator) {
      return (
        db.get(
          "SELECT owner FROM slot_approvals WHERE owner = ? AND slot = ? AND operator = ?",
          [owner, slot.toString(), operator],
        ) !== undefined
      );
    },

    setSlotOperator(owner, slot, operator, approved) {
      const params = [owner, slot.toString(), operator];
      if (approved) {
        db.run("INSERT OR IGNORE INTO slot_approvals (owner, slot, operator) VALUES (?, ?, ?)", params);
      } else {
        db.run("DELETE FROM slot_approvals WHERE owner = ? AND slot = ? AND operator = ?", params);
      }
    },

    getAllowance(tokenId, operator) {
      const row = db.get(
        "SELECT amount FROM value_allowances WHERE token_id = ? AND operator = ?",
        [tokenId, operator],
      );
      return row ? BigInt(textColumn(row, "amount")) : 0n;
    },

    setAllowance(tokenId, operator, amount) {
      if (amount === 0n) {
        db.run("DELETE FROM value_allowances WHERE token_id = ? AND operator = ?", [tokenId, operator]);
      } else {
        db.run(
          `INSERT INTO value_allowances (token_id, operator, amount) VALUES (?, ?, ?)
           ON CONFLICT (token_id, operator) DO UPDATE SET amount = excluded.amount`,
          [tokenId, operator, amount.toString()],
        );
      }
    },

    clearAllowances(tokenId) {
      db.run("DELETE FROM value_allowances WHERE token_id = ?", [tokenId]);
    },

    insertUpgrade(implementation, authorizedBy, at) {
      db.run(
        "INSERT INTO upgrades (implementation, authorized_by, authorized_at) VALUES (?, ?, ?)",
        [implementation, authorizedBy, at],
      );
      return db.lastInsertRowid();
    },

    listUpgrades() {
      return db.all("SELECT * FROM upgrades ORDER BY id").map((row) => ({
        id: intColumn(row, "id"),
        implementation: readAddress(textColumn(row, "implementation")),
        authorizedBy: readAddress(textColumn(row, "authorized_by")),
        authorizedAt: intColumn(row, "authorized_at"),
      }));
    },

    appendEvent(event, at) {
      const data = event.data ?? {};
      db.run(
        "INSERT INTO events (name, token_id, document_id, data, at) VALUES (?, ?, ?, ?, ?)",
        [event.name, event.tokenId ?? null, event.documentId ?? null, JSON.stringify(data), at],
      );
      return {
        id: db.lastInsertRowid(),
        name: event.name,
        tokenId: event.tokenId ?? null,
        documentId: event.documentId ?? null,
        data,
        at,
      };
    },

    listEvents(options) {
      let sql = "SELECT * FROM events WHERE id > ?";
      const params: Array<string | number> = [options?.afterId ?? 0];

      if (options?.name !== undefined) {
        sql += " AND name = ?";
        params.push(options.name);
      }
      if (options?.tokenId !== undefined) {
        sql += " AND token_id = ?";
        params.push(options.tokenId);
      }
      if (options?.documentId !== undefined) {
        sql += " AND document_id = ?";
        params.push(options.documentId);
      }

      sql += " ORDER BY id ASC LIMIT ?";
      params.push(options?.limit ?? 100);

      return db.all(sql, params).map(rowToEvent);
    },
  };
}
