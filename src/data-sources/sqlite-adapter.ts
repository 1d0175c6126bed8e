/**
 * SQLite adapter over sql.js (WASM).
 *
 * The database lives in memory and is written to disk explicitly with
 * persist(); there is no native addon to build.
 */
import initSqlJs, {
  type Database as SqlJsDatabase,
  type SqlJsStatic,
  type SqlValue,
} from "sql.js";
import fs from "fs";
import path from "path";

export type { SqlValue };
export type Row = Record<string, SqlValue>;

// ---------------------------------------------------------------------------
// Singleton WASM initialization
// ---------------------------------------------------------------------------

let SQL: SqlJsStatic | null = null;

/** Load the sql.js WASM binary. Idempotent. */
export async function ensureSqlJs(): Promise<SqlJsStatic> {
  if (!SQL) {
    SQL = await initSqlJs();
  }
  return SQL;
}

function requireSqlJs(): SqlJsStatic {
  if (!SQL) throw new Error("Call ensureSqlJs() before opening a database");
  return SQL;
}

// ---------------------------------------------------------------------------
// Row readers
// ---------------------------------------------------------------------------

export function rowText(row: Row, column: string): string {
  const value = row[column];
  if (value === null || value === undefined) {
    throw new Error(`Column ${column} is unexpectedly NULL`);
  }
  return typeof value === "string" ? value : String(value);
}

export function rowTextOrNull(row: Row, column: string): string | null {
  const value = row[column];
  return value === null || value === undefined ? null : rowText(row, column);
}

export function rowNumber(row: Row, column: string): number {
  const value = row[column];
  const n = typeof value === "number" ? value : Number(value);
  if (!Number.isFinite(n)) {
    throw new Error(`Column ${column} is not numeric`);
  }
  return n;
}

// ---------------------------------------------------------------------------
// PreparedStatement
// ---------------------------------------------------------------------------

export class PreparedStatement {
  private db: SqlJsDatabase;
  private sql: string;
  private parent: SqliteDatabase;

  constructor(db: SqlJsDatabase, sql: string, parent: SqliteDatabase) {
    this.db = db;
    this.sql = sql;
    this.parent = parent;
  }

  /** Execute INSERT/UPDATE/DELETE. */
  run(...params: SqlValue[]): { lastInsertRowid: number } {
    const stmt = this.db.prepare(this.sql);
    try {
      if (params.length > 0) stmt.bind(params);
      stmt.step();
    } finally {
      stmt.free();
    }
    this.parent.markDirty();
    const result = this.db.exec("SELECT last_insert_rowid() as id");
    const rowid =
      result.length > 0 && result[0].values.length > 0
        ? Number(result[0].values[0][0])
        : 0;
    return { lastInsertRowid: rowid };
  }

  /** First row, or undefined. */
  get(...params: SqlValue[]): Row | undefined {
    const stmt = this.db.prepare(this.sql);
    try {
      if (params.length > 0) stmt.bind(params);
      return stmt.step() ? stmt.getAsObject() : undefined;
    } finally {
      stmt.free();
    }
  }

  all(...params: SqlValue[]): Row[] {
    const stmt = this.db.prepare(this.sql);
    const rows: Row[] = [];
    try {
      if (params.length > 0) stmt.bind(params);
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
    } finally {
      stmt.free();
    }
    return rows;
  }
}

// ---------------------------------------------------------------------------
// SqliteDatabase
// ---------------------------------------------------------------------------

export class SqliteDatabase {
  private db: SqlJsDatabase;
  private filePath: string | null;
  private dirty = false;

  private constructor(db: SqlJsDatabase, filePath: string | null) {
    this.db = db;
    this.filePath = filePath;
  }

  /** Open a file-backed database, loading the file when it exists.
   *  Rejects files without a SQLite header instead of overwriting them. */
  static open(filePath: string): SqliteDatabase {
    const sql = requireSqlJs();
    let db: SqlJsDatabase;
    if (fs.existsSync(filePath)) {
      const buffer = fs.readFileSync(filePath);
      if (buffer.length < 100) {
        throw new Error(
          `Database file too small to be valid SQLite: ${filePath} (${buffer.length} bytes)`,
        );
      }
      if (buffer.subarray(0, 15).toString("utf8") !== "SQLite format 3") {
        throw new Error(`Not a valid SQLite database (bad header): ${filePath}`);
      }
      db = new sql.Database(new Uint8Array(buffer));
    } else {
      db = new sql.Database();
    }
    return new SqliteDatabase(db, filePath);
  }

  static inMemory(): SqliteDatabase {
    return new SqliteDatabase(new (requireSqlJs().Database)(), null);
  }

  /** Run one or more SQL statements (DDL, multi-statement strings). */
  sqlExec(sql: string): void {
    this.db.run(sql);
    this.dirty = true;
  }

  prepare(sql: string): PreparedStatement {
    return new PreparedStatement(this.db, sql, this);
  }

  /** Wrap fn in BEGIN/COMMIT, rolling back if it throws. */
  transaction<T>(fn: (args: T) => void): (args: T) => void {
    return (args: T) => {
      this.db.run("BEGIN");
      try {
        fn(args);
        this.db.run("COMMIT");
        this.dirty = true;
      } catch (err) {
        this.db.run("ROLLBACK");
        throw err;
      }
    };
  }

  /** Write to disk via write-then-rename. No-op for in-memory databases. */
  persist(): void {
    if (this.filePath && this.dirty) {
      const data = this.db.export();
      const dir = path.dirname(this.filePath);
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
      const tmpPath = `${this.filePath}.tmp`;
      fs.writeFileSync(tmpPath, Buffer.from(data));
      fs.renameSync(tmpPath, this.filePath);
      this.dirty = false;
    }
  }

  markDirty(): void {
    this.dirty = true;
  }

  close(): void {
    this.persist();
    this.db.close();
  }
}
