import { createSQLiteSessionStore, type SQLiteStorage } from "../../src/adapter/storage/sqlite";
import { mapErrorToCliOutcome } from "../../src/adapter/_shared/response_policy";
import { CoordinatorRouter } from "../../src/core/routing/coordinator.router";
import { createBuiltinToolRegistry } from "../../src/core/tools";
import { TeamProfileInterpreter } from "../../src/policy/interpreter/team_profile.interpreter";
import type { DemoStep } from "../../src/policy/schema/team.types";
import { InMemorySessionStore } from "../../src/session/in_memory_session.store";
import { SessionNotFoundError } from "../../src/session/session.errors";
import type { Session, SessionStore } from "../../src/session/session.types";
import { createInferenceEngine } from "../inference/inference.factory";
import { resolveProviderConfig } from "../llm/provider.router";
import { ConversationDriver } from "../orchestrator/conversation.driver";
import { runDemo } from "../orchestrator/demo.runner";
import { parseRunLocalArgs } from "./run_local.args";

let storage: SQLiteStorage | undefined;

try {
  const args = parseRunLocalArgs(process.argv.slice(2));
  const providerConfig = resolveProviderConfig(args, process.env);
  const profile = new TeamProfileInterpreter({
    repoRoot: args.repoPath,
    profile: args.profile,
  }).toProfile();

  const tools = createBuiltinToolRegistry();
  const router = new CoordinatorRouter({
    team: profile.team,
    tools,
    engine: createInferenceEngine({ provider: providerConfig, triggers: profile.triggers }),
  });

  let store: SessionStore;
  if (args.dbPath) {
    const sqlite = createSQLiteSessionStore({ dbPath: args.dbPath });
    storage = sqlite.storage;
    storage.connect();
    store = sqlite.sessionStore;
  } else {
    store = new InMemorySessionStore();
  }
  console.log(
    `mode=local profile=${profile.name} app=${profile.team.appName} provider=${providerConfig.provider} model=${providerConfig.model ?? "DEFAULT"} store=${storage ? storage.getResolvedDbPath() : "memory"}`
  );

  const driver = new ConversationDriver({ store, router, tools });
  const { appName } = profile.team;
  let session: Session;
  try {
    session = driver.getSession(appName, args.userId, args.sessionId);
    console.log(`[session] resumed user=${session.userId} session=${session.sessionId}`);
  } catch (error) {
    if (!(error instanceof SessionNotFoundError)) {
      throw error;
    }
    session = driver.createSession(appName, args.userId, args.sessionId, profile.team.initialState);
    console.log(`[session] created user=${session.userId} session=${session.sessionId}`);
  }

  const steps: readonly DemoStep[] = [
    ...(args.demo ? profile.demo : []),
    ...args.utterances.map((utterance): DemoStep => ({ kind: "say", utterance })),
  ];

  await runDemo({
    driver,
    session,
    agentName: profile.team.coordinator.id,
    steps,
  });

  const finalSession = driver.getSession(appName, args.userId, args.sessionId);
  console.log("----- session state -----");
  console.log(JSON.stringify(finalSession.state, null, 2));
} catch (error) {
  const outcome = mapErrorToCliOutcome(error);
  console.error(`run:local ${outcome.fatal ? "fatal" : "failed"}: ${outcome.message}`);
  process.exitCode = outcome.exitCode;
} finally {
  storage?.close();
}
