/**
 * Intent: run_local flag parsing is syntax-only; profile and provider validity are checked later.
 * Scope: parseRunLocalArgs defaults, flags, positional utterances and flag errors.
 * Non-Goals: profile loading or turn execution.
 */
import test from "node:test";
import assert from "node:assert/strict";
import { ConfigurationError } from "../../../src/core/errors/configuration.error";
import { parseRunLocalArgs } from "../../../runtime/cli/run_local.args";

test("run_local args: no arguments runs the team demo in memory", () => {
  const args = parseRunLocalArgs([]);
  assert.deepEqual(args, {
    utterances: [],
    repoPath: process.cwd(),
    profile: "team",
    userId: "user_1",
    sessionId: "session_001",
    demo: true,
    dbPath: undefined,
    provider: undefined,
    model: undefined,
    timeoutMs: undefined,
    maxAttempts: undefined,
  });
});

test("run_local args: positional utterances switch the demo off", () => {
  const args = parseRunLocalArgs(["--profile", "stateful", "Hi!", "weather in Tokyo"]);
  assert.equal(args.profile, "stateful");
  assert.equal(args.demo, false);
  assert.deepEqual(args.utterances, ["Hi!", "weather in Tokyo"]);
});

test("run_local args: everything after -- is an utterance", () => {
  const args = parseRunLocalArgs(["--repo", ".", "--", "--demo", "ping"]);
  assert.equal(args.repoPath, ".");
  assert.equal(args.demo, false);
  assert.deepEqual(args.utterances, ["--demo", "ping"]);
});

test("run_local args: value and numeric flags", () => {
  const args = parseRunLocalArgs([
    "--user",
    "user_state_demo",
    "--session",
    "session_state_demo_001",
    "--db",
    "/tmp/sessions.db",
    "--provider",
    "ollama",
    "--model",
    "llama3",
    "--timeoutMs",
    "2500",
    "--maxAttempts",
    "2",
    "--demo",
  ]);
  assert.equal(args.userId, "user_state_demo");
  assert.equal(args.sessionId, "session_state_demo_001");
  assert.equal(args.dbPath, "/tmp/sessions.db");
  assert.equal(args.provider, "ollama");
  assert.equal(args.model, "llama3");
  assert.equal(args.timeoutMs, 2500);
  assert.equal(args.maxAttempts, 2);
  assert.equal(args.demo, true);
});

test("run_local args: missing values, bad numbers and unknown flags are configuration errors", () => {
  const cases: Array<[string[], RegExp]> = [
    [["--profile"], /--profile requires a value/],
    [["--session", "--demo"], /--session requires a value/],
    [["--timeoutMs", "soon"], /--timeoutMs must be a number, got 'soon'/],
    [["--phase", "diagnose"], /unknown flag '--phase'/],
  ];
  for (const [argv, pattern] of cases) {
    assert.throws(
      () => parseRunLocalArgs(argv),
      (error: unknown) => error instanceof ConfigurationError && pattern.test(error.message)
    );
  }
});
