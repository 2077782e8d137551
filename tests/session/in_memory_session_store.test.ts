import test from "node:test";
import assert from "node:assert/strict";
import { InMemorySessionStore } from "../../src/session/in_memory_session.store";
import { describeSessionStoreContract } from "./session_store.contract";

describeSessionStoreContract("in-memory session store", () => {
  let now = 0;
  return {
    store: new InMemorySessionStore({ nowMs: () => now }),
    setNow: (ms) => {
      now = ms;
    },
  };
});

test("in-memory session store: caller's initial state object is copied, not aliased", () => {
  const store = new InMemorySessionStore();
  const initial: Record<string, string> = { unit: "Celsius" };
  store.create("app", "u1", "s1", initial);

  initial.unit = "Fahrenheit";

  assert.equal(store.get("app", "u1", "s1").state.unit, "Celsius");
});
