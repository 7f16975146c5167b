// --- Error Taxonomy ---
// Every failure a tool call can end in has a `kind`. The dispatcher turns any
// thrown value into a Failure carrying one of these.

export type ErrorKind =
  | "ConfigurationError"
  | "UnknownToolError"
  | "DuplicateToolError"
  | "ValidationError"
  | "AuthError"
  | "NotFoundError"
  | "RateLimitedError"
  | "UpstreamError"
  | "UpstreamShapeError"
  | "TransportError"
  | "InternalError";

export class MealieMcpError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

/** Base URL or API token missing or unusable. Repeats on every call until fixed. */
export class ConfigurationError extends MealieMcpError {
  constructor(message: string, options?: ErrorOptions) {
    super("ConfigurationError", message, options);
  }
}

export class UnknownToolError extends MealieMcpError {
  constructor(readonly toolName: string) {
    super("UnknownToolError", toolName);
  }
}

export class DuplicateToolError extends MealieMcpError {
  constructor(readonly toolName: string) {
    super("DuplicateToolError", `Tool "${toolName}" is already registered.`);
  }
}

export class ValidationError extends MealieMcpError {
  constructor(readonly field: string, readonly reason: string) {
    super("ValidationError", `${field}: ${reason}`);
  }
}

export class AuthError extends MealieMcpError {
  constructor(message: string, options?: ErrorOptions) {
    super("AuthError", message, options);
  }
}

export class NotFoundError extends MealieMcpError {
  constructor(message: string, options?: ErrorOptions) {
    super("NotFoundError", message, options);
  }
}

export class RateLimitedError extends MealieMcpError {
  /** Seconds the backend asked us to wait, when it said so. */
  readonly retryAfter?: number;

  constructor(message: string, retryAfter?: number, options?: ErrorOptions) {
    super("RateLimitedError", message, options);
    this.retryAfter = retryAfter;
  }
}

export class UpstreamError extends MealieMcpError {
  constructor(message: string, readonly status?: number, options?: ErrorOptions) {
    super("UpstreamError", message, options);
  }
}

export class UpstreamShapeError extends MealieMcpError {
  constructor(message: string, options?: ErrorOptions) {
    super("UpstreamShapeError", message, options);
  }
}

/** Network failure, timeout or cancellation. */
export class TransportError extends MealieMcpError {
  constructor(message: string, options?: ErrorOptions) {
    super("TransportError", message, options);
  }
}

export interface Failure {
  status: "failure";
  kind: ErrorKind;
  message: string;
  field?: string;
  retryAfter?: number;
}

export function toFailure(error: unknown): Failure {
  if (error instanceof ValidationError) {
    return { status: "failure", kind: error.kind, message: error.message, field: error.field };
  }
  if (error instanceof RateLimitedError) {
    const failure: Failure = { status: "failure", kind: error.kind, message: error.message };
    if (error.retryAfter !== undefined) failure.retryAfter = error.retryAfter;
    return failure;
  }
  if (error instanceof MealieMcpError) {
    return { status: "failure", kind: error.kind, message: error.message };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { status: "failure", kind: "InternalError", message: `Tool execution failed: ${message}` };
}
