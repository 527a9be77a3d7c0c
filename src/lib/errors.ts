export type FleetErrorCode = "auth" | "network" | "region_unavailable" | "action";

export class FleetError extends Error {
  readonly code: FleetErrorCode;

  constructor(code: FleetErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FleetError";
    this.code = code;
  }
}

/** Credentials are missing or rejected. Fatal for the whole session. */
export class AuthError extends FleetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("auth", message, options);
    this.name = "AuthError";
  }
}

export class NetworkError extends FleetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("network", message, options);
    this.name = "NetworkError";
  }
}

export class TimeoutError extends NetworkError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class RegionUnavailableError extends FleetError {
  readonly region: string;

  constructor(region: string, cause: unknown) {
    super("region_unavailable", `Region ${region} is unavailable: ${describeError(cause)}`, { cause });
    this.name = "RegionUnavailableError";
    this.region = region;
  }
}

export class ActionError extends FleetError {
  readonly reason: string;

  constructor(reason: string, options?: { cause?: unknown }) {
    super("action", reason, options);
    this.name = "ActionError";
    this.reason = reason;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type CliErrorKind = "validation" | "not_found" | "dependency" | "auth" | "network" | "runtime";

interface CliErrorOptions {
  kind: CliErrorKind;
  message: string;
  hint?: string;
  detail?: string;
  exitCode?: number;
}

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly hint?: string;
  readonly detail?: string;
  readonly exitCode: number;

  constructor(options: CliErrorOptions) {
    super(options.message);
    this.name = "CliError";
    this.kind = options.kind;
    this.hint = options.hint;
    this.detail = options.detail;
    this.exitCode = options.exitCode ?? 1;
  }
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }

  if (error instanceof AuthError) {
    return new CliError({
      kind: "auth",
      message: error.message,
      hint: "Configure AWS credentials (environment, shared config or SSO) and retry.",
      exitCode: 2
    });
  }

  if (error instanceof RegionUnavailableError) {
    return new CliError({
      kind: "network",
      message: error.message,
      hint: "Cached data for other regions is unaffected; retry later."
    });
  }

  if (error instanceof NetworkError) {
    return new CliError({
      kind: "network",
      message: error.message,
      detail: error.cause === undefined ? undefined : describeError(error.cause)
    });
  }

  if (error instanceof ActionError) {
    return new CliError({
      kind: "runtime",
      message: `Action failed: ${error.reason}`
    });
  }

  if (error instanceof Error) {
    return new CliError({
      kind: "runtime",
      message: error.message
    });
  }

  return new CliError({
    kind: "runtime",
    message: String(error)
  });
}

export function renderCliError(error: CliError): string {
  const lines = [error.message];
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  if (error.detail) {
    lines.push(error.detail);
  }
  return lines.join("\n");
}
