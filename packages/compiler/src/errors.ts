/* =============================================================================
 * INFRASTRUCTURE ERRORS
 * -----------------------------------------------------------------------------
 * Broken preconditions of the environment. Problems with the user's files are
 * never thrown; they come back as diagnostics.
 * ============================================================================= */

export const InfrastructureErrorCode = {
  ENV_NOT_INITIALIZED: "PLAYBENCH_ENV_NOT_INITIALIZED",
  LIB_NOT_FOUND: "PLAYBENCH_LIB_NOT_FOUND",
  EMIT_FAILED: "PLAYBENCH_EMIT_FAILED",
} as const;

export type InfrastructureErrorCodeType = (typeof InfrastructureErrorCode)[keyof typeof InfrastructureErrorCode];

export class CompilationInfrastructureError extends Error {
  constructor(
    message: string,
    public readonly code: InfrastructureErrorCodeType,
  ) {
    super(message);
    this.name = "CompilationInfrastructureError";
  }
}
