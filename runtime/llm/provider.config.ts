export type ProviderId = "rules" | "ollama" | "gemini";

export interface ProviderConfig {
  readonly provider: ProviderId;
  readonly model?: string;
  readonly timeoutMs: number;
  readonly maxAttempts: number;
  readonly backoffMs: readonly number[];
}
