import fs from "node:fs";
import path from "node:path";
import BetterSqlite3, { type Database as BetterSqliteDatabase } from "better-sqlite3";

export type SQLiteParam = string | number | bigint | Buffer | null;

export interface SQLiteRunResult {
  readonly changes: number;
}

export interface Storage {
  connect(): void;
  close(): void;
  exec(sql: string, params?: readonly SQLiteParam[]): SQLiteRunResult;
  query<T extends Record<string, unknown>>(
    sql: string,
    params?: readonly SQLiteParam[]
  ): readonly T[];
  transaction<T>(work: () => T): T;
}

export interface SQLiteStorageOptions {
  readonly dbPath?: string;
  readonly expectedSchemaVersion?: string;
}

export const DEFAULT_SQLITE_DB_REL_PATH = path.join("ops", "runtime", "sessions.db");
export const SQLITE_STORAGE_SCHEMA_VERSION = "1";

const CREATE_SCHEMA_VERSION_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS schema_version (
  version TEXT PRIMARY KEY,
  applied_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);
`;

const CREATE_SESSIONS_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS sessions (
  app_id TEXT NOT NULL,
  user_id TEXT NOT NULL,
  session_id TEXT NOT NULL,
  state_json TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  last_updated_at INTEGER NOT NULL,
  PRIMARY KEY (app_id, user_id, session_id)
);
`;

function resolveDbPath(explicitPath?: string): string {
  if (explicitPath && explicitPath.trim() !== "") {
    return path.resolve(explicitPath);
  }
  return path.resolve(process.cwd(), DEFAULT_SQLITE_DB_REL_PATH);
}

export class SQLiteStorage implements Storage {
  private readonly dbPath: string;
  private readonly expectedSchemaVersion: string;
  private db: BetterSqliteDatabase | null = null;
  private closed = false;

  constructor(options: SQLiteStorageOptions = {}) {
    this.dbPath = resolveDbPath(options.dbPath);
    this.expectedSchemaVersion = options.expectedSchemaVersion ?? SQLITE_STORAGE_SCHEMA_VERSION;
  }

  connect(): void {
    if (this.closed) {
      throw new Error("SQLITE_STORAGE_ERROR storage has been closed");
    }
    if (this.db !== null) {
      throw new Error("SQLITE_STORAGE_ERROR single connection already opened");
    }

    fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    const db = new BetterSqlite3(this.dbPath);

    try {
      db.pragma("journal_mode = WAL");
      db.pragma("synchronous = FULL");
      this.db = db;
      this.initializeSchema();
    } catch (error) {
      db.close();
      this.db = null;
      throw error;
    }
  }

  close(): void {
    if (this.db !== null) {
      this.db.close();
      this.db = null;
    }
    this.closed = true;
  }

  exec(sql: string, params: readonly SQLiteParam[] = []): SQLiteRunResult {
    const result = this.requireDb().prepare(sql).run(...params);
    return { changes: result.changes };
  }

  query<T extends Record<string, unknown>>(
    sql: string,
    params: readonly SQLiteParam[] = []
  ): readonly T[] {
    return this.requireDb().prepare<unknown[], T>(sql).all(...params);
  }

  transaction<T>(work: () => T): T {
    return this.requireDb().transaction(work)();
  }

  getResolvedDbPath(): string {
    return this.dbPath;
  }

  private initializeSchema(): void {
    const db = this.requireDb();
    db.exec(CREATE_SCHEMA_VERSION_TABLE_SQL);

    const versions = this.query<{ version: unknown }>(
      "SELECT version FROM schema_version ORDER BY version ASC"
    );

    if (versions.length === 0) {
      this.transaction(() => {
        db.exec(CREATE_SESSIONS_SCHEMA_SQL);
        this.exec("INSERT INTO schema_version(version) VALUES (?)", [
          this.expectedSchemaVersion,
        ]);
      });
      return;
    }

    const storedVersions = versions
      .map((row) => row.version)
      .filter((value): value is string => typeof value === "string");
    const schemaMatches =
      storedVersions.length === 1 && storedVersions[0] === this.expectedSchemaVersion;
    if (!schemaMatches) {
      throw new Error(
        `SQLITE_STORAGE_VERSION_MISMATCH expected=${this.expectedSchemaVersion} actual=${storedVersions.join(",")}`
      );
    }
    db.exec(CREATE_SESSIONS_SCHEMA_SQL);
  }

  private requireDb(): BetterSqliteDatabase {
    if (this.db === null) {
      if (this.closed) {
        throw new Error("SQLITE_STORAGE_ERROR connection is closed");
      }
      throw new Error("SQLITE_STORAGE_ERROR connection is not open");
    }
    return this.db;
  }
}
