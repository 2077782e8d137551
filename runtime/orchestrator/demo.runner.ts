import type { DemoStep } from "../../src/policy/schema/team.types";
import type { SessionKey } from "../../src/session/session.types";
import type { ConversationDriver } from "./conversation.driver";

export interface DemoRunInput {
  readonly driver: ConversationDriver;
  readonly session: SessionKey;
  readonly agentName: string;
  readonly steps: readonly DemoStep[];
  readonly print?: (line: string) => void;
}

export interface DemoExchange {
  readonly utterance: string;
  readonly reply: string;
}

/**
 * Plays `say` steps as turns and `set` steps as state writes, both through
 * the driver's per-session queue, in order, and returns the exchanges.
 */
export async function runDemo(input: DemoRunInput): Promise<DemoExchange[]> {
  const print = input.print ?? ((line: string) => console.log(line));
  const { appId, userId, sessionId } = input.session;
  const exchanges: DemoExchange[] = [];

  for (const step of input.steps) {
    if (step.kind === "set") {
      await input.driver.applyStateWrite(appId, userId, sessionId, step.write);
      const entries = Object.entries(step.write).map(([key, value]) => `${key}=${String(value)}`);
      print(`[session] state updated ${entries.join(" ")}`);
      continue;
    }

    print(`>>> User: ${step.utterance}`);
    const reply = await input.driver.runTurn(step.utterance, appId, userId, sessionId);
    print(`<<< ${input.agentName}: ${reply}`);
    exchanges.push({ utterance: step.utterance, reply });
  }

  return exchanges;
}
