export const ERROR_CODES = {
  CAPABILITY_ERROR: "CAPABILITY_ERROR",
  INFERENCE_ERROR: "INFERENCE_ERROR",
  SESSION_KEY_INVALID: "SESSION_KEY_INVALID",
  SESSION_ALREADY_EXISTS: "SESSION_ALREADY_EXISTS",
  SESSION_NOT_FOUND: "SESSION_NOT_FOUND",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
  TURN_ABORTED: "TURN_ABORTED",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export function hasErrorCode(error: unknown): error is Error & { readonly code: ErrorCode } {
  if (!(error instanceof Error)) {
    return false;
  }
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" && Object.values<string>(ERROR_CODES).includes(code);
}
