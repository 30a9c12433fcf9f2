export type ErrorCode =
  | "ValidationError"
  | "PayloadTooLarge"
  | "UnsupportedFormat"
  | "UnsupportedPair"
  | "NotFound"
  | "MethodNotAllowed"
  | "ExternalToolError"
  | "Timeout"
  | "InternalError";

export const ERROR_CODES: readonly ErrorCode[] = [
  "ValidationError",
  "PayloadTooLarge",
  "UnsupportedFormat",
  "UnsupportedPair",
  "NotFound",
  "MethodNotAllowed",
  "ExternalToolError",
  "Timeout",
  "InternalError",
];

/**
 * Base class for every failure the service reports to clients. `message` is
 * safe to return over HTTP; anything diagnostic goes in `detail`, which is
 * only ever logged.
 */
export class ServiceError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
    readonly status: number,
    readonly detail?: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends ServiceError {
  constructor(message: string) {
    super(message, "ValidationError", 400);
  }
}

export class PayloadTooLargeError extends ServiceError {
  constructor(limitBytes: number) {
    super(`Upload exceeds the ${limitBytes} byte limit`, "PayloadTooLarge", 413);
  }
}

export class UnsupportedFormatError extends ServiceError {
  constructor(readonly format: string) {
    super(`Unsupported format: ${format}`, "UnsupportedFormat", 422);
  }
}

export class UnsupportedPairError extends ServiceError {
  constructor(
    readonly from: string,
    readonly to: string,
  ) {
    super(`Conversion from ${from} to ${to} is not supported`, "UnsupportedPair", 422);
  }
}

export class NotFoundError extends ServiceError {
  constructor(message = "File not found or expired") {
    super(message, "NotFound", 404);
  }
}

export class MethodNotAllowedError extends ServiceError {
  constructor(readonly allowed: readonly string[]) {
    super("Method not allowed", "MethodNotAllowed", 405);
  }
}

export class ExternalToolError extends ServiceError {
  constructor(
    readonly tool: string,
    detail: string,
  ) {
    super("File conversion failed", "ExternalToolError", 500, `${tool}: ${detail}`);
  }
}

export class ToolTimeoutError extends ServiceError {
  constructor(
    readonly tool: string,
    readonly timeoutMs: number,
  ) {
    super(
      `Conversion timed out after ${Math.round(timeoutMs / 1000)}s`,
      "Timeout",
      504,
      `${tool} exceeded ${timeoutMs}ms`,
    );
  }
}

/**
 * Normalise anything thrown into a ServiceError so the HTTP layer has one
 * shape to serialise. Unknown errors keep their message as log detail only.
 */
export function toServiceError(err: unknown): ServiceError {
  if (err instanceof ServiceError) return err;
  const detail = err instanceof Error ? err.stack ?? err.message : String(err);
  return new ServiceError("Internal server error", "InternalError", 500, detail);
}
