import type { LLMClient } from "./llm.types";
import type { ProviderConfig } from "./provider.config";
import { DEFAULT_GEMINI_MODEL } from "./provider.router";
import { ConfigurationError } from "../../src/core/errors/configuration.error";

const GEMINI_API_BASE = "https://generativelanguage.googleapis.com/v1beta";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function classifyHttpStatus(status: number): {
  readonly code: string;
  readonly isTransient: boolean;
} {
  if (status === 401 || status === 403) {
    return { code: `GEMINI_PERMANENT_HTTP_${status}`, isTransient: false };
  }
  if (status === 429 || status === 503) {
    return { code: `GEMINI_TRANSIENT_HTTP_${status}`, isTransient: true };
  }
  return { code: `GEMINI_HTTP_${status}`, isTransient: false };
}

function asObject(value: unknown): Record<string, unknown> | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return null;
  }
  return Object.fromEntries(Object.entries(value));
}

export function extractResponseText(payload: unknown): string | null {
  const candidates = asObject(payload)?.candidates;
  if (!Array.isArray(candidates) || candidates.length === 0) {
    return null;
  }

  const content = asObject(asObject(candidates[0])?.content);
  const parts = content?.parts;
  if (!Array.isArray(parts)) {
    return null;
  }

  const text = parts
    .map((part: unknown) => {
      const partText = asObject(part)?.text;
      return typeof partText === "string" ? partText : "";
    })
    .join("")
    .trim();

  return text === "" ? null : text;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && /abort/i.test(error.name);
}

/** Asks Gemini for JSON output; routing decisions are parsed from the text. */
export class GeminiAdapter implements LLMClient {
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly backoffMs: readonly number[];
  private readonly apiKey: string;

  constructor(config: ProviderConfig, env: NodeJS.ProcessEnv = process.env) {
    this.model = config.model ?? DEFAULT_GEMINI_MODEL;
    this.timeoutMs = config.timeoutMs;
    this.maxAttempts = config.maxAttempts;
    this.backoffMs = config.backoffMs;

    const apiKey = env.GEMINI_API_KEY;
    if (typeof apiKey !== "string" || apiKey.trim() === "") {
      throw new ConfigurationError(
        "CONFIGURATION_ERROR GEMINI_API_KEY is required when provider=gemini"
      );
    }
    this.apiKey = apiKey;
  }

  async generate(prompt: string): Promise<string> {
    const endpoint = `${GEMINI_API_BASE}/models/${encodeURIComponent(this.model)}:generateContent`;
    let lastFailure = "GEMINI_REQUEST_FAILED: retries exhausted";

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      if (attempt > 1) {
        const delayMs = this.backoffMs[Math.min(attempt - 2, this.backoffMs.length - 1)] ?? 0;
        if (delayMs > 0) {
          await sleep(delayMs);
        }
      }

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), this.timeoutMs);

      try {
        const response = await fetch(endpoint, {
          method: "POST",
          headers: {
            "content-type": "application/json",
            "x-goog-api-key": this.apiKey,
          },
          body: JSON.stringify({
            contents: [{ parts: [{ text: prompt }] }],
            generationConfig: { responseMimeType: "application/json" },
          }),
          signal: controller.signal,
        });

        if (!response.ok) {
          const { code, isTransient } = classifyHttpStatus(response.status);
          lastFailure = `${code}: request failed`;
          if (isTransient) {
            continue;
          }
          throw new Error(lastFailure);
        }

        const text = extractResponseText(await response.json());
        if (!text) {
          throw new Error("GEMINI_BAD_RESPONSE: missing text response");
        }
        return text;
      } catch (error) {
        if (isAbortError(error)) {
          lastFailure = "GEMINI_TIMEOUT";
          continue;
        }

        const message = error instanceof Error ? error.message : String(error);
        if (/fetch failed/i.test(message)) {
          lastFailure = `GEMINI_REQUEST_FAILED: ${message}`;
          continue;
        }
        if (/^GEMINI_/.test(message)) {
          throw error;
        }
        throw new Error(`GEMINI_REQUEST_FAILED: ${message}`, { cause: error });
      } finally {
        clearTimeout(timer);
      }
    }

    throw new Error(lastFailure);
  }
}
