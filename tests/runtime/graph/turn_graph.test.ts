import test from "node:test";
import assert from "node:assert/strict";
import { CoordinatorRouter } from "../../../src/core/routing/coordinator.router";
import { createBuiltinToolRegistry } from "../../../src/core/tools";
import {
  TURN_REPLIES,
  TurnStateAnnotation,
  buildTurnGraph,
  runTurnGraph,
} from "../../../runtime/graph/turn.graph";
import { ScriptedInferenceEngine, WEATHER_TEAM, greet, weather } from "../../support/team.fixture";

function graphFor(engine: ScriptedInferenceEngine) {
  const tools = createBuiltinToolRegistry();
  return buildTurnGraph({ router: new CoordinatorRouter({ team: WEATHER_TEAM, tools, engine }), tools });
}

test("turn graph: node names and state channels are disjoint, so the graph builds", () => {
  const channels = Object.keys(TurnStateAnnotation.spec);
  const nodes = ["route", "self_tool", "delegated_tool", "declined", "finalize"];
  assert.deepEqual(
    nodes.filter((node) => channels.includes(node)),
    []
  );
  assert.doesNotThrow(() => graphFor(new ScriptedInferenceEngine([])));
});

test("turn graph: self tool success finalizes with the pending write but commits nothing", async () => {
  const snapshot = Object.freeze({ user_preference_temperature_unit: "Fahrenheit" });
  const result = await runTurnGraph(graphFor(new ScriptedInferenceEngine([weather("Tokyo")])), {
    utterance: "weather in Tokyo",
    snapshot,
  });

  const report = "The weather in Tokyo is light rain with a temperature of 64.4 degrees Fahrenheit.";
  assert.equal(result.stage, "FINALIZED");
  assert.equal(result.finalText, report);
  assert.deepEqual(result.pendingWrite, {
    last_city_checked_stateful: "tokyo",
    last_weather_report: report,
  });
  assert.equal(result.failure, undefined);
  assert.deepEqual(snapshot, { user_preference_temperature_unit: "Fahrenheit" });
});

test("turn graph: delegated greeting uses the tool's response field and has no write", async () => {
  const result = await runTurnGraph(graphFor(new ScriptedInferenceEngine([greet("Ada")])), {
    utterance: "hello, my name is Ada",
    snapshot: {},
  });
  assert.equal(result.finalText, "Hello, Ada!");
  assert.equal(result.pendingWrite, undefined);
  assert.deepEqual(result.routeResult?.decision, { kind: "delegate", handlerId: "greeting_agent" });
});

test("turn graph: tool failure and inference failure map to fixed replies", async () => {
  const failed = await runTurnGraph(graphFor(new ScriptedInferenceEngine([weather("Atlantis")])), {
    utterance: "weather in Atlantis",
    snapshot: {},
  });
  assert.equal(failed.finalText, TURN_REPLIES.toolFailure("no weather data for Atlantis"));
  assert.deepEqual(failed.failure, { kind: "tool", message: "no weather data for Atlantis" });
  assert.equal(failed.pendingWrite, undefined);

  const confused = await runTurnGraph(
    graphFor(new ScriptedInferenceEngine([{ kind: "malformed", reason: "?" }])),
    { utterance: "hmm", snapshot: {} }
  );
  assert.equal(confused.finalText, "Sorry, I couldn't work out how to handle that request.");
  assert.equal(confused.toolResult, undefined);
});

test("turn graph: decline skips the tool entirely", async () => {
  const result = await runTurnGraph(graphFor(new ScriptedInferenceEngine([{ kind: "decline" }])), {
    utterance: "sing",
    snapshot: {},
  });
  assert.equal(result.finalText, "Sorry, I can't help with that request.");
  assert.equal(result.toolResult, undefined);
  assert.equal(result.stage, "FINALIZED");
});
