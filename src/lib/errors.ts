export enum NodefredErrorCode {
  NOT_A_PROJECT = "NOT_A_PROJECT",
  INVALID_ARGUMENTS = "INVALID_ARGUMENTS",
  INVALID_OUTPUT = "INVALID_OUTPUT",
  HOST_NOT_FOUND = "HOST_NOT_FOUND",
  PREFERENCES_UNAVAILABLE = "PREFERENCES_UNAVAILABLE",
  TEMPLATE_FAILED = "TEMPLATE_FAILED",
  LINK_FAILED = "LINK_FAILED",
  VENDOR_FAILED = "VENDOR_FAILED",
  COMMAND_FAILED = "COMMAND_FAILED",
}

export class NodefredError extends Error {
  readonly code: NodefredErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: NodefredErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "NodefredError";
    this.code = code;
    this.context = context;
  }
}

export function isNodefredError(err: unknown, code?: NodefredErrorCode): err is NodefredError {
  return err instanceof NodefredError && (code === undefined || err.code === code);
}

/**
 * Message of an unknown thrown value, for log lines.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
