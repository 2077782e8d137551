import { hasErrorCode } from "../../core/errors/canonical_error_codes";
import { ERROR_POLICY_REGISTRY } from "./error_policy_registry";

export interface CliErrorOutcome {
  readonly code: string;
  readonly message: string;
  readonly exitCode: number;
  readonly fatal: boolean;
}

const INTERNAL_ERROR_EXIT_CODE = 2;

export function mapErrorToCliOutcome(error: unknown): CliErrorOutcome {
  if (!hasErrorCode(error)) {
    return {
      code: "INTERNAL_ERROR",
      message: error instanceof Error ? error.message : String(error),
      exitCode: INTERNAL_ERROR_EXIT_CODE,
      fatal: true,
    };
  }

  const policy = ERROR_POLICY_REGISTRY[error.code];
  return {
    code: error.code,
    message: policy.publicMessage === "Y" ? error.message : `${error.code} (details withheld)`,
    exitCode: policy.cliExitCode,
    fatal: policy.fatal,
  };
}
