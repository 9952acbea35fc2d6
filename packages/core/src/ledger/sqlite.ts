/**
 * sql.js access for ledger files. The database lives in memory and the
 * whole image is written back to its file after every committed
 * transaction.
 *
 * `Database.export()` frees every prepared statement, so statements are
 * prepared per call and never cached across a commit.
 */

import { existsSync, readFileSync, renameSync, writeFileSync } from "node:fs";

import initSqlJs from "sql.js";
import type { Database, SqlJsStatic, SqlValue } from "sql.js";

export type SqlRow = Record<string, SqlValue>;
export type SqlParams = SqlValue[];

let sqlJsModule: Promise<SqlJsStatic> | undefined;

/** Load the sql.js WebAssembly module once per process. */
export function loadSqlJs(): Promise<SqlJsStatic> {
  // sql.js is CommonJS and also exposes itself as `default`.
  if (!sqlJsModule) sqlJsModule = initSqlJs.default();
  return sqlJsModule;
}

export class LedgerDatabase {
  private depth = 0;
  private closed = false;

  private constructor(
    private readonly db: Database,
    /** Backing file, or null for a database that is never persisted. */
    readonly path: string | null,
  ) {}

  /** Open `path` if it exists, otherwise start empty. Pass null for memory only. */
  static open(sql: SqlJsStatic, path: string | null): LedgerDatabase {
    const image = path !== null && existsSync(path) ? readFileSync(path) : undefined;
    return new LedgerDatabase(new sql.Database(image), path);
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  /** Run one or more statements without parameters (DDL, pragmas). */
  exec(sql: string): void {
    this.handle().exec(sql);
  }

  all(sql: string, params: SqlParams = []): SqlRow[] {
    const stmt = this.handle().prepare(sql);
    try {
      stmt.bind(params);
      const rows: SqlRow[] = [];
      while (stmt.step()) rows.push(stmt.getAsObject());
      return rows;
    } finally {
      stmt.free();
    }
  }

  get(sql: string, params: SqlParams = []): SqlRow | undefined {
    return this.all(sql, params)[0];
  }

  /** Execute a write. Returns the number of rows it changed. */
  run(sql: string, params: SqlParams = []): number {
    const db = this.handle();
    db.run(sql, params);
    return db.getRowsModified();
  }

  lastInsertRowid(): number {
    const id = this.get("SELECT last_insert_rowid() AS id")?.id;
    if (typeof id !== "number") throw new Error("last_insert_rowid() returned no row");
    return id;
  }

  /**
   * Run `fn` between BEGIN and COMMIT and persist the result. A nested call
   * joins the enclosing transaction.
   */
  transaction<T>(fn: () => T): T {
    if (this.depth > 0) return fn();

    const db = this.handle();
    db.run("BEGIN");
    this.depth = 1;
    let result: T;
    try {
      result = fn();
      db.run("COMMIT");
    } catch (err) {
      db.run("ROLLBACK");
      throw err;
    } finally {
      this.depth = 0;
    }

    this.persist();
    return result;
  }

  /** Write the current image to the backing file through a rename. */
  persist(): void {
    if (this.path === null) return;
    const staging = `${this.path}.tmp`;
    writeFileSync(staging, this.handle().export());
    renameSync(staging, this.path);
  }

  close(): void {
    if (this.closed) return;
    this.db.close();
    this.closed = true;
  }

  private handle(): Database {
    if (this.closed) throw new Error("Ledger database is closed");
    return this.db;
  }
}

/** Column readers for rows coming back from sql.js. */
export function textColumn(row: SqlRow, column: string): string {
  const value = row[column];
  if (typeof value !== "string") throw corruptColumn(column, value);
  return value;
}

export function nullableTextColumn(row: SqlRow, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (typeof value !== "string") throw corruptColumn(column, value);
  return value;
}

export function intColumn(row: SqlRow, column: string): number {
  const value = row[column];
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw corruptColumn(column, value);
  }
  return value;
}

export function nullableIntColumn(row: SqlRow, column: string): number | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  return intColumn(row, column);
}

function corruptColumn(column: string, value: unknown): Error {
  return new Error(`Corrupt ledger column ${column}: ${String(value)}`);
}
