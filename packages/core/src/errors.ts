export type StackgateErrorCode =
  | "CYCLE_DETECTED"
  | "UNKNOWN_DEPENDENCY"
  | "DUPLICATE_UNIT"
  | "INVALID_TOPOLOGY"
  | "INVALID_CONFIG";

/**
 * Configuration fault. Raised at load time, before any unit starts;
 * runtime unit failures are reported through unit state instead.
 */
export class StackgateError extends Error {
  readonly code: StackgateErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    code: StackgateErrorCode,
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "StackgateError";
    this.code = code;
    this.details = details;
  }
}

export function isStackgateError(
  err: unknown,
  code?: StackgateErrorCode,
): err is StackgateError {
  return (
    err instanceof StackgateError && (code === undefined || err.code === code)
  );
}

/** Render an unknown thrown value as a single-line message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
