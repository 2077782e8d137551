import { ERROR_CODES } from "../../src/core/errors/canonical_error_codes";
import { createSnapshot } from "../../src/core/_shared/utils/snapshot";
import type { CoordinatorRouter } from "../../src/core/routing/coordinator.router";
import type { ToolRegistry } from "../../src/core/tools/tool.registry";
import { encodeSessionKey, toSessionKey } from "../../src/session/session_key";
import type {
  Session,
  SessionKey,
  SessionStateMap,
  SessionStore,
  StateWrite,
} from "../../src/session/session.types";
import { buildTurnGraph, runTurnGraph, type TurnGraph, type TurnState } from "../graph/turn.graph";
import { KeyedTaskQueue } from "./session_queue";

export class TurnAbortedError extends Error {
  readonly kind = "TurnAbortedError";
  readonly code = ERROR_CODES.TURN_ABORTED;
  readonly key: SessionKey;

  constructor(key: SessionKey) {
    super(`TURN_ABORTED app=${key.appId} user=${key.userId} session=${key.sessionId}`);
    this.name = "TurnAbortedError";
    this.key = key;
  }
}

export interface RunTurnOptions {
  /** Aborting before the state write is committed rejects the turn and commits nothing. */
  readonly signal?: AbortSignal;
}

export interface ConversationDriverOptions {
  readonly store: SessionStore;
  readonly router: CoordinatorRouter;
  readonly tools: ToolRegistry;
  readonly log?: (line: string) => void;
}

function describeRoute(state: TurnState): string {
  if (state.failure?.kind === "inference") {
    return "route=inference_failed";
  }
  if (!state.routeResult || !("call" in state.routeResult)) {
    return "route=declined";
  }
  const { call } = state.routeResult;
  const outcome = state.failure ? "failure" : "success";
  return `route=${state.routeResult.decision.kind} handler=${call.handler.id} tool=${call.toolName} outcome=${outcome}`;
}

/**
 * Drives turns against stored sessions. Each turn reads a frozen snapshot,
 * runs the turn graph and then commits the graph's pending write, so the next
 * turn on the same session observes it.
 */
export class ConversationDriver {
  private readonly store: SessionStore;
  private readonly graph: TurnGraph;
  private readonly queue = new KeyedTaskQueue();
  private readonly log: (line: string) => void;

  constructor(options: ConversationDriverOptions) {
    this.store = options.store;
    this.graph = buildTurnGraph({ router: options.router, tools: options.tools });
    this.log = options.log ?? ((line) => console.log(line));
  }

  createSession(
    appId: string,
    userId: string,
    sessionId: string,
    initialState?: SessionStateMap
  ): Session {
    return this.store.create(appId, userId, sessionId, initialState);
  }

  getSession(appId: string, userId: string, sessionId: string): Session {
    return this.store.get(appId, userId, sessionId);
  }

  /** Queued behind any turn already running on the same session. */
  applyStateWrite(
    appId: string,
    userId: string,
    sessionId: string,
    write: StateWrite
  ): Promise<Session> {
    let key: SessionKey;
    try {
      key = toSessionKey(appId, userId, sessionId);
    } catch (error) {
      return Promise.reject(error);
    }
    return this.queue.run(encodeSessionKey(key), async () => this.store.applyStateWrite(key, write));
  }

  runTurn(
    utterance: string,
    appId: string,
    userId: string,
    sessionId: string,
    options: RunTurnOptions = {}
  ): Promise<string> {
    let key: SessionKey;
    try {
      key = toSessionKey(appId, userId, sessionId);
    } catch (error) {
      return Promise.reject(error);
    }
    return this.queue.run(encodeSessionKey(key), () => this.executeTurn(utterance, key, options));
  }

  private async executeTurn(
    utterance: string,
    key: SessionKey,
    options: RunTurnOptions
  ): Promise<string> {
    if (options.signal?.aborted) {
      throw new TurnAbortedError(key);
    }

    const session = this.store.get(key.appId, key.userId, key.sessionId);
    const snapshot = createSnapshot(session.state);
    const result = await runTurnGraph(this.graph, { utterance, snapshot });

    if (options.signal?.aborted) {
      throw new TurnAbortedError(key);
    }
    if (result.pendingWrite) {
      this.store.applyStateWrite(key, result.pendingWrite);
    }

    const writtenKeys = Object.keys(result.pendingWrite ?? {});
    this.log(
      `[turn] app=${key.appId} user=${key.userId} session=${key.sessionId} ${describeRoute(result)} writes=[${writtenKeys.join(",")}]`
    );

    return result.finalText ?? "";
  }
}
