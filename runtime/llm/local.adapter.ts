import type { LLMClient } from "./llm.types";
import type { ProviderConfig } from "./provider.config";

const DEFAULT_OLLAMA_BASE_URL = "http://localhost:11434";
export const DEFAULT_OLLAMA_MODEL = "qwen2.5:7b-instruct";

function env(source: NodeJS.ProcessEnv, name: string, fallback: string): string {
  const v = source[name];
  return typeof v === "string" && v.trim() !== "" ? v : fallback;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && /abort/i.test(error.name);
}

function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/** Ollama `/api/generate` in JSON mode, retrying transient failures with the configured backoff. */
export class LocalLLMClient implements LLMClient {
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly backoffMs: readonly number[];

  constructor(config: ProviderConfig, source: NodeJS.ProcessEnv = process.env) {
    this.baseUrl = env(source, "OLLAMA_BASE_URL", DEFAULT_OLLAMA_BASE_URL);
    this.model = config.model ?? env(source, "OLLAMA_MODEL", DEFAULT_OLLAMA_MODEL);
    this.timeoutMs = config.timeoutMs;
    this.maxAttempts = config.maxAttempts;
    this.backoffMs = config.backoffMs;
  }

  async generate(prompt: string): Promise<string> {
    let lastFailure = "OLLAMA_REQUEST_FAILED: retries exhausted";

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      if (attempt > 1) {
        const delayMs = this.backoffMs[Math.min(attempt - 2, this.backoffMs.length - 1)] ?? 0;
        if (delayMs > 0) {
          await sleep(delayMs);
        }
      }

      const controller = new AbortController();
      const t = setTimeout(() => controller.abort(), this.timeoutMs);

      try {
        const res = await fetch(`${this.baseUrl}/api/generate`, {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify({ model: this.model, prompt, stream: false, format: "json" }),
          signal: controller.signal,
        });

        if (!res.ok) {
          const text = await res.text().catch(() => "");
          lastFailure = `OLLAMA_HTTP_${res.status}: ${text.slice(0, 300)}`;
          if (isTransientStatus(res.status)) {
            continue;
          }
          throw new Error(lastFailure);
        }

        const data: unknown = await res.json();
        const maybeResponse =
          typeof data === "object" && data !== null && "response" in data
            ? data.response
            : undefined;

        if (typeof maybeResponse !== "string") {
          throw new Error("OLLAMA_BAD_RESPONSE: missing string 'response'");
        }

        return maybeResponse;
      } catch (error) {
        if (isAbortError(error)) {
          lastFailure = "OLLAMA_TIMEOUT";
          continue;
        }
        const message = error instanceof Error ? error.message : String(error);
        if (/fetch failed/i.test(message)) {
          lastFailure = `OLLAMA_REQUEST_FAILED: ${message}`;
          continue;
        }
        if (/^OLLAMA_/.test(message)) {
          throw error;
        }
        throw new Error(`OLLAMA_REQUEST_FAILED: ${message}`, { cause: error });
      } finally {
        clearTimeout(t);
      }
    }

    throw new Error(lastFailure);
  }
}
