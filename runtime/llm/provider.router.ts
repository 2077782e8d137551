import type { ProviderConfig, ProviderId } from "./provider.config";
import { ConfigurationError } from "../../src/core/errors/configuration.error";

export interface ProviderResolutionArgs {
  readonly provider?: string;
  readonly model?: string;
  readonly timeoutMs?: number;
  readonly maxAttempts?: number;
}

export interface ProviderResolutionEnv {
  readonly LLM_PROVIDER?: string;
  readonly LLM_MODEL?: string;
  readonly LLM_TIMEOUT_MS?: string;
  readonly LLM_MAX_ATTEMPTS?: string;
  readonly GEMINI_API_KEY?: string;
}

const DEFAULT_PROVIDER: ProviderId = "rules";
const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BACKOFF_MS = [500, 1000] as const;
export const DEFAULT_GEMINI_MODEL = "gemini-2.0-flash";

function parseProvider(value: string): ProviderId {
  const normalized = value.trim().toLowerCase();
  if (normalized === "rules" || normalized === "ollama" || normalized === "gemini") {
    return normalized;
  }
  throw new ConfigurationError(
    `CONFIGURATION_ERROR unsupported provider='${value}'. expected one of: rules|ollama|gemini`
  );
}

function resolveIntegerOption(
  field: "timeoutMs" | "maxAttempts",
  flagValue: number | undefined,
  envValue: string | undefined,
  fallback: number
): number {
  const raw = typeof flagValue === "number" ? flagValue : envValue?.trim();
  if (typeof raw === "undefined" || raw === "") {
    return fallback;
  }
  const num = typeof raw === "number" ? raw : Number(raw);
  if (!Number.isInteger(num)) {
    throw new ConfigurationError(`CONFIGURATION_ERROR ${field} must be an integer`);
  }
  return num;
}

function toTrimmedString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** One wait between each pair of attempts, capped at the default schedule. */
function buildBackoffSchedule(maxAttempts: number): readonly number[] {
  return DEFAULT_BACKOFF_MS.slice(0, maxAttempts - 1);
}

/**
 * Flags win over environment variables. Without either, turns are routed by
 * the profile's triggers and no model is contacted.
 */
export function resolveProviderConfig(
  args: ProviderResolutionArgs,
  env: ProviderResolutionEnv
): ProviderConfig {
  const providerRaw = toTrimmedString(args.provider) ?? toTrimmedString(env.LLM_PROVIDER);
  const provider = providerRaw ? parseProvider(providerRaw) : DEFAULT_PROVIDER;

  const timeoutMs = resolveIntegerOption(
    "timeoutMs",
    args.timeoutMs,
    env.LLM_TIMEOUT_MS,
    DEFAULT_TIMEOUT_MS
  );
  if (timeoutMs <= 0) {
    throw new ConfigurationError("CONFIGURATION_ERROR timeoutMs must be > 0");
  }

  const maxAttempts = resolveIntegerOption(
    "maxAttempts",
    args.maxAttempts,
    env.LLM_MAX_ATTEMPTS,
    DEFAULT_MAX_ATTEMPTS
  );
  if (maxAttempts < 1) {
    throw new ConfigurationError("CONFIGURATION_ERROR maxAttempts must be >= 1");
  }

  const explicitModel = toTrimmedString(args.model) ?? toTrimmedString(env.LLM_MODEL);
  const model = provider === "gemini" ? explicitModel ?? DEFAULT_GEMINI_MODEL : explicitModel;

  if (provider === "gemini" && !toTrimmedString(env.GEMINI_API_KEY)) {
    throw new ConfigurationError(
      "CONFIGURATION_ERROR GEMINI_API_KEY is required when provider=gemini"
    );
  }

  return {
    provider,
    model,
    timeoutMs,
    maxAttempts,
    backoffMs: buildBackoffSchedule(maxAttempts),
  };
}
