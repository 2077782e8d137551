import { createSnapshot } from "../core/_shared/utils/snapshot";
import { SessionAlreadyExistsError, SessionNotFoundError } from "./session.errors";
import { encodeSessionKey, toSessionKey } from "./session_key";
import type {
  Session,
  SessionKey,
  SessionStateMap,
  SessionStore,
  StateValue,
  StateWrite,
} from "./session.types";

interface StoredSession {
  readonly key: SessionKey;
  state: Record<string, StateValue>;
  readonly createdAt: number;
  lastUpdatedAt: number;
}

export interface InMemorySessionStoreOptions {
  readonly nowMs?: () => number;
}

function toSession(stored: StoredSession): Session {
  return createSnapshot({
    ...stored.key,
    state: stored.state,
    createdAt: stored.createdAt,
    lastUpdatedAt: stored.lastUpdatedAt,
  });
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, StoredSession>();
  private readonly nowMs: () => number;

  constructor(options: InMemorySessionStoreOptions = {}) {
    this.nowMs = options.nowMs ?? Date.now;
  }

  create(
    appId: string,
    userId: string,
    sessionId: string,
    initialState: SessionStateMap = {}
  ): Session {
    const key = toSessionKey(appId, userId, sessionId);
    const encoded = encodeSessionKey(key);
    if (this.sessions.has(encoded)) {
      throw new SessionAlreadyExistsError(key);
    }

    const now = this.nowMs();
    const stored: StoredSession = {
      key,
      state: { ...initialState },
      createdAt: now,
      lastUpdatedAt: now,
    };
    this.sessions.set(encoded, stored);
    return toSession(stored);
  }

  get(appId: string, userId: string, sessionId: string): Session {
    return toSession(this.require(toSessionKey(appId, userId, sessionId)));
  }

  applyStateWrite(session: SessionKey, write: StateWrite): Session {
    const stored = this.require(toSessionKey(session.appId, session.userId, session.sessionId));
    stored.state = { ...stored.state, ...write };
    stored.lastUpdatedAt = this.nowMs();
    return toSession(stored);
  }

  private require(key: SessionKey): StoredSession {
    const stored = this.sessions.get(encodeSessionKey(key));
    if (!stored) {
      throw new SessionNotFoundError(key);
    }
    return stored;
  }
}
