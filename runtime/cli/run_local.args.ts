import { ConfigurationError } from "../../src/core/errors/configuration.error";

export const DEFAULT_PROFILE = "team";
export const DEFAULT_USER_ID = "user_1";
export const DEFAULT_SESSION_ID = "session_001";

export interface RunLocalArgs {
  utterances: string[];
  repoPath: string;
  profile: string;
  userId: string;
  sessionId: string;
  /** Plays the profile's scripted demo before any utterances; implied when none is given. */
  demo: boolean;
  /** SQLite file for sessions that outlive the process; in-memory when absent. */
  dbPath?: string;
  provider?: string;
  model?: string;
  timeoutMs?: number;
  maxAttempts?: number;
}

const STRING_FLAGS = [
  "--repo",
  "--profile",
  "--user",
  "--session",
  "--db",
  "--provider",
  "--model",
] as const;
const NUMBER_FLAGS = ["--timeoutMs", "--maxAttempts"] as const;

type StringFlag = (typeof STRING_FLAGS)[number];
type NumberFlag = (typeof NUMBER_FLAGS)[number];

function isStringFlag(token: string): token is StringFlag {
  return STRING_FLAGS.some((flag) => flag === token);
}

function isNumberFlag(token: string): token is NumberFlag {
  return NUMBER_FLAGS.some((flag) => flag === token);
}

function readFlagValue(argv: readonly string[], idx: number, flag: string): string {
  const next = argv[idx + 1];
  if (typeof next !== "string" || next.trim() === "" || next.startsWith("--")) {
    throw new ConfigurationError(`CONFIGURATION_ERROR ${flag} requires a value`);
  }
  return next.trim();
}

export function parseRunLocalArgs(argv: readonly string[]): RunLocalArgs {
  const utterances: string[] = [];
  const strings: Partial<Record<StringFlag, string>> = {};
  const numbers: Partial<Record<NumberFlag, number>> = {};
  let demo = false;
  let flagsDone = false;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (typeof token !== "string") {
      continue;
    }
    if (flagsDone || !token.startsWith("--")) {
      if (token.trim() !== "") {
        utterances.push(token.trim());
      }
      continue;
    }
    if (token === "--") {
      flagsDone = true;
      continue;
    }
    if (token === "--demo") {
      demo = true;
      continue;
    }
    if (isStringFlag(token)) {
      strings[token] = readFlagValue(argv, i, token);
      i += 1;
      continue;
    }
    if (isNumberFlag(token)) {
      const raw = readFlagValue(argv, i, token);
      const parsed = Number(raw);
      if (!Number.isFinite(parsed)) {
        throw new ConfigurationError(`CONFIGURATION_ERROR ${token} must be a number, got '${raw}'`);
      }
      numbers[token] = parsed;
      i += 1;
      continue;
    }
    throw new ConfigurationError(`CONFIGURATION_ERROR unknown flag '${token}'`);
  }

  return {
    utterances,
    repoPath: strings["--repo"] ?? process.cwd(),
    profile: strings["--profile"] ?? DEFAULT_PROFILE,
    userId: strings["--user"] ?? DEFAULT_USER_ID,
    sessionId: strings["--session"] ?? DEFAULT_SESSION_ID,
    demo: demo || utterances.length === 0,
    dbPath: strings["--db"],
    provider: strings["--provider"],
    model: strings["--model"],
    timeoutMs: numbers["--timeoutMs"],
    maxAttempts: numbers["--maxAttempts"],
  };
}
