/**
 * Error taxonomy for the extractor.
 *
 * Per-call (RPC) and per-event (bus) errors are counted and logged where they
 * occur and never leave the extraction loop. Only FatalConfigError is allowed
 * to reach the process boundary.
 */

export type RpcFailureKind = "network" | "auth" | "decode" | "timeout" | "rpc";

export abstract class RpcCallError extends Error {
  abstract readonly kind: RpcFailureKind;

  constructor(
    message: string,
    public readonly method: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * Connection refused, reset, DNS failure or any other transport-level problem
 */
export class RpcNetworkError extends RpcCallError {
  readonly kind = "network";

  constructor(method: string, message: string, options?: { cause?: unknown }) {
    super(message, method, options);
    this.name = "RpcNetworkError";
  }
}

/**
 * Node rejected the credentials, or the cookie file could not be read
 */
export class RpcAuthError extends RpcCallError {
  readonly kind = "auth";

  constructor(
    method: string,
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, method, options);
    this.name = "RpcAuthError";
  }
}

export class RpcDecodeError extends RpcCallError {
  readonly kind = "decode";

  constructor(method: string, message: string, options?: { cause?: unknown }) {
    super(message, method, options);
    this.name = "RpcDecodeError";
  }
}

export class RpcTimeoutError extends RpcCallError {
  readonly kind = "timeout";

  constructor(
    method: string,
    public readonly timeoutMs: number,
  ) {
    super(`RPC call ${method} timed out after ${timeoutMs}ms`, method);
    this.name = "RpcTimeoutError";
  }
}

/**
 * The node answered with a JSON-RPC error object (unknown method, warm-up, ...)
 */
export class RpcResponseError extends RpcCallError {
  readonly kind = "rpc";

  constructor(
    method: string,
    public readonly code: number,
    message: string,
  ) {
    super(`RPC error ${code} for ${method}: ${message}`, method);
    this.name = "RpcResponseError";
  }
}

export class PublishError extends Error {
  constructor(
    public readonly subject: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PublishError";
  }
}

export class FatalConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FatalConfigError";
  }
}

/**
 * Format any thrown value into a single readable line
 */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
