export type PlannerErrorCode =
  | "INVALID_QUANTITY"
  | "INVALID_PRICE"
  | "NO_CATALOGS"
  | "NO_COMPLETE_CATALOG";

/**
 * Thrown by the core when a single call is rejected.
 * `input` echoes the offending arguments so a presentation layer can show them.
 */
export class PlannerError extends Error {
  readonly code: PlannerErrorCode;
  readonly input: Record<string, unknown>;

  constructor(code: PlannerErrorCode, message: string, input: Record<string, unknown> = {}) {
    super(`${code}: ${message}`);
    this.name = "PlannerError";
    this.code = code;
    this.input = input;
  }
}

export function isPlannerError(e: unknown, code?: PlannerErrorCode): e is PlannerError {
  return e instanceof PlannerError && (code == null || e.code === code);
}
