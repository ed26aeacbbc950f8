/**
 * packages/core/src/errors.ts — Error type for deterministic engine violations.
 *
 * Why: Misconfiguration (illegal size policies, z-index, app config) fails fast at
 * the call that introduced it; callers branch on `code`, not on message text.
 */

export type LatticeErrorCode =
  | "LUI_INVALID_SIZE_POLICY"
  | "LUI_INVALID_Z_INDEX"
  | "LUI_INVALID_CONFIG"
  | "LUI_DETACHED_WIDGET"
  | "LUI_INVALID_STATE";

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class LatticeError extends Error {
  override readonly name = "LatticeError";
  readonly code: LatticeErrorCode;

  constructor(code: LatticeErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LatticeError);
    }
  }
}

export function isLatticeError(value: unknown, code?: LatticeErrorCode): value is LatticeError {
  if (!(value instanceof LatticeError)) return false;
  return code === undefined || value.code === code;
}

/** Render an unknown thrown value for log lines. */
export function describeThrown(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
