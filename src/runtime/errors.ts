export type RelayErrorKind =
  | "credential_invalid"
  | "transient_network"
  | "rate_limited"
  | "routing_error"
  | "adapter_crash"
  | "misconfigured";

export abstract class RelayError extends Error {
  abstract readonly kind: RelayErrorKind;
  /** Permanent failures are never retried by the supervisor. */
  abstract readonly permanent: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CredentialInvalidError extends RelayError {
  readonly kind = "credential_invalid";
  readonly permanent = true;
}

export class MisconfiguredError extends RelayError {
  readonly kind = "misconfigured";
  readonly permanent = true;
}

export class TransientNetworkError extends RelayError {
  readonly kind = "transient_network";
  readonly permanent = false;
  readonly status: number | undefined;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

export class RateLimitedError extends RelayError {
  readonly kind = "rate_limited";
  readonly permanent = false;
  readonly retryAfterMs: number | undefined;

  constructor(message: string, options?: { cause?: unknown; retryAfterMs?: number }) {
    super(message, options);
    this.retryAfterMs = options?.retryAfterMs;
  }
}

export class AdapterCrashError extends RelayError {
  readonly kind = "adapter_crash";
  readonly permanent = false;
}

export type RoutingFailureReason =
  | "unknown_binding"
  | "binding_disabled"
  | "not_running"
  | "not_passive";

export class RoutingError extends RelayError {
  readonly kind = "routing_error";
  readonly permanent = false;

  constructor(
    readonly reason: RoutingFailureReason,
    message: string,
  ) {
    super(message);
  }
}

export function isRelayError(err: unknown): err is RelayError {
  return err instanceof RelayError;
}
