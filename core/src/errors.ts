/**
 * Hook error class (shared).
 *
 * Every failure that reaches the process boundary is a HookError, so the
 * launcher can report one terminal error with a stable code.
 */

/**
 * Error codes raised by the hook framework.
 */
export type HookErrorCode =
  | "PRECONDITION_FAILED"
  | "USAGE"
  | "UNIMPLEMENTED"
  | "TOOL_FAILED"
  | "STATE_LOAD_FAILED"
  | "STATE_SAVE_FAILED"
  | "HANDLER_FAILED"
  | "CONTEXT_SETTER_FAILED"
  | "DUPLICATE_COMMAND"
  | "REGISTRATION_CONFLICT"
  | "INVALID_NAME"
  | "INVALID_CONFIG";

/**
 * Structured error for hook invocations.
 */
export class HookError extends Error {
  public readonly code: HookErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly cause?: unknown;
  /** Set when saving state also failed after this error was raised. */
  public saveError?: unknown;

  constructor(args: {
    code: HookErrorCode;
    message: string;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "HookError";
    this.code = args.code;
    this.details = args.details;
    this.cause = args.cause;
  }
}

/**
 * Reports whether err is a HookError with the given code.
 */
export function isHookError(err: unknown, code?: HookErrorCode): err is HookError {
  return err instanceof HookError && (code === undefined || err.code === code);
}

/**
 * Reports whether err means a hook tool is not implemented by the agent.
 * Callers use this to treat a missing tool as "feature not available".
 */
export function isUnimplemented(err: unknown): err is HookError {
  return isHookError(err, "UNIMPLEMENTED");
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
