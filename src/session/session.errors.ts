import { ERROR_CODES } from "../core/errors/canonical_error_codes";
import type { SessionKey } from "./session.types";

function describeKey(key: SessionKey): string {
  return `app=${key.appId} user=${key.userId} session=${key.sessionId}`;
}

export class SessionKeyError extends Error {
  readonly kind = "SessionKeyError";
  readonly code = ERROR_CODES.SESSION_KEY_INVALID;

  constructor(field: keyof SessionKey) {
    super(`SESSION_KEY_INVALID ${field} must be a non-empty string`);
    this.name = "SessionKeyError";
  }
}

export class SessionAlreadyExistsError extends Error {
  readonly kind = "SessionAlreadyExistsError";
  readonly code = ERROR_CODES.SESSION_ALREADY_EXISTS;
  readonly key: SessionKey;

  constructor(key: SessionKey) {
    super(`SESSION_ALREADY_EXISTS ${describeKey(key)}`);
    this.name = "SessionAlreadyExistsError";
    this.key = key;
  }
}

export class SessionNotFoundError extends Error {
  readonly kind = "SessionNotFoundError";
  readonly code = ERROR_CODES.SESSION_NOT_FOUND;
  readonly key: SessionKey;

  constructor(key: SessionKey) {
    super(`SESSION_NOT_FOUND ${describeKey(key)}`);
    this.name = "SessionNotFoundError";
    this.key = key;
  }
}
