import { SessionKeyError } from "./session.errors";
import type { SessionKey } from "./session.types";

const KEY_FIELDS = ["appId", "userId", "sessionId"] as const;

export function toSessionKey(appId: string, userId: string, sessionId: string): SessionKey {
  const key: SessionKey = { appId, userId, sessionId };
  for (const field of KEY_FIELDS) {
    const value: unknown = key[field];
    if (typeof value !== "string" || value.trim() === "") {
      throw new SessionKeyError(field);
    }
  }
  return Object.freeze(key);
}

// ["appId","userId","sessionId"]
export function encodeSessionKey(key: SessionKey): string {
  return JSON.stringify([key.appId, key.userId, key.sessionId]);
}
