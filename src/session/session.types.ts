export type StateValue = string | number | boolean | null;

export type SessionStateMap = Readonly<Record<string, StateValue>>;

/** Partial mapping merged into session state by key overwrite. */
export type StateWrite = Readonly<Record<string, StateValue>>;

export interface SessionKey {
  readonly appId: string;
  readonly userId: string;
  readonly sessionId: string;
}

export interface Session extends SessionKey {
  readonly state: SessionStateMap;
  readonly createdAt: number;
  readonly lastUpdatedAt: number;
}

/**
 * Keyed session container. Implementations hand out frozen snapshots; the only
 * way to change stored state is `applyStateWrite`.
 */
export interface SessionStore {
  create(
    appId: string,
    userId: string,
    sessionId: string,
    initialState?: SessionStateMap
  ): Session;
  get(appId: string, userId: string, sessionId: string): Session;
  applyStateWrite(session: SessionKey, write: StateWrite): Session;
}

export const STATE_KEYS = Object.freeze({
  TEMPERATURE_UNIT: "user_preference_temperature_unit",
  LAST_CITY_CHECKED: "last_city_checked_stateful",
  LAST_WEATHER_REPORT: "last_weather_report",
} as const);
