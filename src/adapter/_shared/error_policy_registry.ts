import { ERROR_CODES, type ErrorCode } from "../../core/errors/canonical_error_codes";

export interface ErrorMetadata {
  /** "Y" when the error message may be shown to the user as-is. */
  publicMessage: "Y" | "N";
  /** Fatal errors point at a broken team configuration or program state. */
  fatal: boolean;
  cliExitCode: number;
}

export const ERROR_POLICY_REGISTRY = {
  [ERROR_CODES.CAPABILITY_ERROR]: {
    publicMessage: "N",
    fatal: true,
    cliExitCode: 2,
  },
  [ERROR_CODES.INFERENCE_ERROR]: {
    publicMessage: "N",
    fatal: false,
    cliExitCode: 1,
  },
  [ERROR_CODES.SESSION_KEY_INVALID]: {
    publicMessage: "Y",
    fatal: false,
    cliExitCode: 1,
  },
  [ERROR_CODES.SESSION_ALREADY_EXISTS]: {
    publicMessage: "Y",
    fatal: false,
    cliExitCode: 1,
  },
  [ERROR_CODES.SESSION_NOT_FOUND]: {
    publicMessage: "Y",
    fatal: false,
    cliExitCode: 1,
  },
  [ERROR_CODES.CONFIGURATION_ERROR]: {
    publicMessage: "Y",
    fatal: true,
    cliExitCode: 2,
  },
  [ERROR_CODES.TURN_ABORTED]: {
    publicMessage: "Y",
    fatal: false,
    cliExitCode: 130,
  },
} satisfies Record<ErrorCode, ErrorMetadata>;
