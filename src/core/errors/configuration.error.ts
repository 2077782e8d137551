import { ERROR_CODES } from "./canonical_error_codes";

export class ConfigurationError extends Error {
  readonly kind = "ConfigurationError";
  readonly code = ERROR_CODES.CONFIGURATION_ERROR;
  readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "ConfigurationError";
    this.cause = options?.cause;
  }
}
