import { createSnapshot } from "../../../core/_shared/utils/snapshot";
import { SessionAlreadyExistsError, SessionNotFoundError } from "../../../session/session.errors";
import { toSessionKey } from "../../../session/session_key";
import type {
  Session,
  SessionKey,
  SessionStateMap,
  SessionStore,
  StateValue,
  StateWrite,
} from "../../../session/session.types";
import { SQLiteStorage, type SQLiteStorageOptions } from "./sqlite.storage";

interface SessionRow extends Record<string, unknown> {
  readonly state_json: unknown;
  readonly created_at: unknown;
  readonly last_updated_at: unknown;
}

export interface SQLiteSessionStoreOptions {
  readonly nowMs?: () => number;
}

function isStateValue(value: unknown): value is StateValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

function parseState(raw: unknown, key: SessionKey): Record<string, StateValue> {
  if (typeof raw !== "string") {
    throw new Error(`SESSION_STATE_PARSE_ERROR session=${key.sessionId}: state_json must be text`);
  }
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`SESSION_STATE_PARSE_ERROR session=${key.sessionId}: state must be an object`);
  }

  const state: Record<string, StateValue> = {};
  for (const [name, value] of Object.entries(parsed)) {
    if (!isStateValue(value)) {
      throw new Error(
        `SESSION_STATE_PARSE_ERROR session=${key.sessionId}: '${name}' is not a scalar value`
      );
    }
    state[name] = value;
  }
  return state;
}

function fromSessionRow(key: SessionKey, row: SessionRow): Session {
  return createSnapshot({
    ...key,
    state: parseState(row.state_json, key),
    createdAt: Number(row.created_at),
    lastUpdatedAt: Number(row.last_updated_at),
  });
}

/**
 * Durable session store with the same contract as the in-memory one. Every
 * operation is a synchronous better-sqlite3 call; state writes read, merge and
 * update inside one transaction.
 */
export class SQLiteSessionStore implements SessionStore {
  private readonly nowMs: () => number;

  constructor(
    private readonly storage: SQLiteStorage,
    options: SQLiteSessionStoreOptions = {}
  ) {
    this.nowMs = options.nowMs ?? Date.now;
  }

  create(
    appId: string,
    userId: string,
    sessionId: string,
    initialState: SessionStateMap = {}
  ): Session {
    const key = toSessionKey(appId, userId, sessionId);
    const now = this.nowMs();

    const result = this.storage.exec(
      `
      INSERT INTO sessions (app_id, user_id, session_id, state_json, created_at, last_updated_at)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(app_id, user_id, session_id) DO NOTHING
      `,
      [key.appId, key.userId, key.sessionId, JSON.stringify(initialState), now, now]
    );
    if (result.changes !== 1) {
      throw new SessionAlreadyExistsError(key);
    }

    return this.get(key.appId, key.userId, key.sessionId);
  }

  get(appId: string, userId: string, sessionId: string): Session {
    const key = toSessionKey(appId, userId, sessionId);
    return fromSessionRow(key, this.requireRow(key));
  }

  applyStateWrite(session: SessionKey, write: StateWrite): Session {
    const key = toSessionKey(session.appId, session.userId, session.sessionId);

    this.storage.transaction(() => {
      const current = parseState(this.requireRow(key).state_json, key);
      this.storage.exec(
        `
        UPDATE sessions
        SET state_json = ?, last_updated_at = ?
        WHERE app_id = ? AND user_id = ? AND session_id = ?
        `,
        [
          JSON.stringify({ ...current, ...write }),
          this.nowMs(),
          key.appId,
          key.userId,
          key.sessionId,
        ]
      );
    });

    return this.get(key.appId, key.userId, key.sessionId);
  }

  private requireRow(key: SessionKey): SessionRow {
    const rows = this.storage.query<SessionRow>(
      `
      SELECT state_json, created_at, last_updated_at
      FROM sessions
      WHERE app_id = ? AND user_id = ? AND session_id = ?
      `,
      [key.appId, key.userId, key.sessionId]
    );
    const row = rows[0];
    if (!row) {
      throw new SessionNotFoundError(key);
    }
    return row;
  }
}

export function createSQLiteSessionStore(
  options: SQLiteStorageOptions & SQLiteSessionStoreOptions = {}
): { readonly storage: SQLiteStorage; readonly sessionStore: SQLiteSessionStore } {
  const storage = new SQLiteStorage(options);
  return {
    storage,
    sessionStore: new SQLiteSessionStore(storage, { nowMs: options.nowMs }),
  };
}
