export type TroupeErrorCode =
  | "CONFIGURATION_ERROR"
  | "BAD_REQUEST"
  | "NOT_FOUND"
  | "CONFLICT"
  | "IO_ERROR"
  | "INTERNAL";

export class TroupeError extends Error {
  readonly code: TroupeErrorCode;
  readonly details?: unknown;

  constructor(code: TroupeErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "TroupeError";
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
  }

  toJSON(): { code: TroupeErrorCode; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details })
    };
  }
}

/**
 * Shorthand for the error raised while resolving a pipeline or building its roster.
 * Always thrown before any agent is invoked.
 */
export function configurationError(message: string, details?: unknown): TroupeError {
  return new TroupeError("CONFIGURATION_ERROR", message, details);
}

export function isConfigurationError(err: unknown): err is TroupeError {
  return err instanceof TroupeError && err.code === "CONFIGURATION_ERROR";
}

export function toTroupeError(err: unknown): TroupeError {
  if (err instanceof TroupeError) return err;
  if (err instanceof Error) {
    if (err.name === "ZodError" && "issues" in err) {
      return new TroupeError("BAD_REQUEST", "Validation error", { issues: err.issues });
    }
    return new TroupeError("INTERNAL", err.message, { name: err.name, stack: err.stack });
  }
  return new TroupeError("INTERNAL", "Unknown error", { err });
}
