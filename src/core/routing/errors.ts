import { ERROR_CODES } from "../errors/canonical_error_codes";

/**
 * A handler tried to use a tool outside its allow-list. This is a broken team
 * configuration, so it aborts the turn instead of becoming user-facing text.
 */
export class CapabilityError extends Error {
  readonly kind = "CapabilityError";
  readonly code = ERROR_CODES.CAPABILITY_ERROR;
  readonly handlerId: string;
  readonly toolName: string;

  constructor(handlerId: string, toolName: string, allowed: readonly string[]) {
    super(
      `CAPABILITY_ERROR handler='${handlerId}' tool='${toolName}' allowed=[${allowed.join(",")}]`
    );
    this.name = "CapabilityError";
    this.handlerId = handlerId;
    this.toolName = toolName;
  }
}

export class InferenceError extends Error {
  readonly kind = "InferenceError";
  readonly code = ERROR_CODES.INFERENCE_ERROR;
  readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(`INFERENCE_ERROR ${message}`);
    this.name = "InferenceError";
    this.cause = options?.cause;
  }
}
