/**
 * Intent: shipped profiles play their scripted demos end to end with rule-based inference.
 * Scope: TeamProfileInterpreter + CoordinatorRouter + ConversationDriver + runDemo on the in-memory and sqlite stores.
 * Non-Goals: LLM providers.
 */
import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createSQLiteSessionStore } from "../../src/adapter/storage/sqlite";
import { CoordinatorRouter } from "../../src/core/routing/coordinator.router";
import { createBuiltinToolRegistry } from "../../src/core/tools";
import { TeamProfileInterpreter } from "../../src/policy/interpreter/team_profile.interpreter";
import type { TeamProfile } from "../../src/policy/schema/team.types";
import { InMemorySessionStore } from "../../src/session/in_memory_session.store";
import type { SessionStore } from "../../src/session/session.types";
import { RuleInferenceEngine } from "../../runtime/inference/rule.inference";
import { ConversationDriver } from "../../runtime/orchestrator/conversation.driver";
import { runDemo, type DemoExchange } from "../../runtime/orchestrator/demo.runner";

function loadProfile(name: string): TeamProfile {
  return new TeamProfileInterpreter({ repoRoot: process.cwd(), profile: name }).toProfile();
}

async function playDemo(
  profile: TeamProfile,
  store: SessionStore,
  printed: string[] = []
): Promise<DemoExchange[]> {
  const tools = createBuiltinToolRegistry();
  const router = new CoordinatorRouter({
    team: profile.team,
    tools,
    engine: new RuleInferenceEngine(profile.triggers),
  });
  const driver = new ConversationDriver({ store, router, tools, log: () => undefined });
  const session = driver.createSession(profile.team.appName, "user_1", "session_001", profile.team.initialState);
  return runDemo({
    driver,
    session,
    agentName: profile.team.coordinator.id,
    steps: profile.demo,
    print: (line) => printed.push(line),
  });
}

test("basic profile demo: known cities report, unknown cities apologise", async () => {
  const exchanges = await playDemo(loadProfile("basic"), new InMemorySessionStore());

  assert.deepEqual(
    exchanges.map((exchange) => exchange.reply),
    [
      "The weather in London is cloudy with a temperature of 15 degrees Celsius.",
      "Sorry, I couldn't complete that request: no weather data for Paris",
      "The weather in New York is sunny with a temperature of 25 degrees Celsius.",
    ]
  );
});

test("team profile demo: greetings and farewells are delegated", async () => {
  const printed: string[] = [];
  await playDemo(loadProfile("team"), new InMemorySessionStore(), printed);

  assert.deepEqual(printed, [
    ">>> User: Hello there!",
    "<<< weather_agent_v2: Hello there!",
    ">>> User: What is the weather in New York?",
    "<<< weather_agent_v2: The weather in New York is sunny with a temperature of 25 degrees Celsius.",
    ">>> User: Tell me the weather in London",
    "<<< weather_agent_v2: The weather in London is cloudy with a temperature of 15 degrees Celsius.",
    ">>> User: Thanks, bye!",
    "<<< weather_agent_v2: Goodbye! Have a great day.",
  ]);
});

test("stateful profile demo: unit preference change shows up in the next report", async () => {
  const profile = loadProfile("stateful");
  const store = new InMemorySessionStore();
  const printed: string[] = [];

  const exchanges = await playDemo(profile, store, printed);

  const nyReport = "The weather in New York is sunny with a temperature of 77 degrees Fahrenheit.";
  assert.deepEqual(
    exchanges.map((exchange) => exchange.reply),
    [
      "The weather in London is cloudy with a temperature of 15 degrees Celsius.",
      nyReport,
      "Hello there!",
    ]
  );
  assert.equal(printed[2], "[session] state updated user_preference_temperature_unit=Fahrenheit");
  assert.deepEqual(store.get(profile.team.appName, "user_1", "session_001").state, {
    user_preference_temperature_unit: "Fahrenheit",
    last_city_checked_stateful: "new york",
    last_weather_report: nyReport,
  });
});

test("stateful profile demo: same transcript on the sqlite store", async (t) => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "profile-demo-"));
  t.after(() => fs.rmSync(dir, { recursive: true, force: true }));
  const layer = createSQLiteSessionStore({ dbPath: path.join(dir, "sessions.db") });
  layer.storage.connect();
  t.after(() => layer.storage.close());

  const exchanges = await playDemo(loadProfile("stateful"), layer.sessionStore);

  assert.equal(
    exchanges[1]?.reply,
    "The weather in New York is sunny with a temperature of 77 degrees Fahrenheit."
  );
  assert.equal(
    layer.sessionStore.get("weather_tutorial_session_state", "user_1", "session_001").state
      .last_city_checked_stateful,
    "new york"
  );
});
