// ---------------------------------------------------------------------------
// MMPay SDK – Error Classes
// ---------------------------------------------------------------------------
// Thrown errors are reserved for programmer mistakes (bad config, missing
// callback inputs) and for `unwrap()`. Remote and transport failures are
// returned as `ApiFailure` values and share the same error codes.
// ---------------------------------------------------------------------------

/** Machine-readable error codes emitted by the SDK. */
export type MMPayErrorCode =
  | "configuration_error" // missing / empty credential at construction
  | "invalid_argument_error" // caller passed an empty required argument
  | "signature_verification_error" // callback signature did not match
  | "authentication_error" // 401
  | "forbidden_error" // 403
  | "invalid_request_error" // 400/422
  | "not_found_error" // 404
  | "rate_limit_error" // 429
  | "api_error" // 5xx
  | "network_error" // fetch rejected (DNS, reset, ...)
  | "timeout_error" // request aborted after the configured timeout
  | "invalid_response_error" // 2xx with an empty or non-JSON body
  | "missing_token_error" // handshake succeeded but carried no token
  | "unknown_error";

/**
 * Base error class for all MMPay SDK errors.
 *
 * @example
 * ```ts
 * try {
 *   new MMPay({ appId: "", publishableKey: "pk", secretKey: "sk", apiBaseUrl: "https://..." });
 * } catch (err) {
 *   if (err instanceof MMPayError && err.code === "configuration_error") {
 *     // fix deployment config
 *   }
 * }
 * ```
 */
export class MMPayError extends Error {
  /** HTTP status code (0 when no response was involved). */
  public readonly statusCode: number;
  public readonly code: MMPayErrorCode;
  /** Raw response text, when available. */
  public readonly details?: string;

  constructor(
    message: string,
    statusCode: number,
    code: MMPayErrorCode,
    details?: string,
  ) {
    super(message);
    this.name = "MMPayError";
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  override toString(): string {
    return `[${this.name}: ${this.code}] ${this.message} (HTTP ${this.statusCode})`;
  }

  /** Serialise to a plain object for structured logging. */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

/** A required credential or option is missing or malformed. */
export class MMPayConfigurationError extends MMPayError {
  constructor(message: string) {
    super(message, 0, "configuration_error");
    this.name = "MMPayConfigurationError";
  }
}

/** A required argument was empty or absent. */
export class MMPayInvalidArgumentError extends MMPayError {
  constructor(message: string) {
    super(message, 0, "invalid_argument_error");
    this.name = "MMPayInvalidArgumentError";
  }
}

/** Thrown by `callbacks.constructEvent` when the signature does not match. */
export class MMPaySignatureVerificationError extends MMPayError {
  constructor(message: string) {
    super(message, 0, "signature_verification_error");
    this.name = "MMPaySignatureVerificationError";
  }
}

/** A failed API call, raised by `unwrap()`. */
export class MMPayAPIError extends MMPayError {
  constructor(
    message: string,
    statusCode: number,
    code: MMPayErrorCode,
    details?: string,
  ) {
    super(message, statusCode, code, details);
    this.name = "MMPayAPIError";
  }
}

/**
 * Derive a machine-readable error code from an HTTP status code.
 */
export function errorCodeFromStatus(status: number): MMPayErrorCode {
  if (status === 401) return "authentication_error";
  if (status === 403) return "forbidden_error";
  if (status === 400 || status === 422) return "invalid_request_error";
  if (status === 404) return "not_found_error";
  if (status === 429) return "rate_limit_error";
  if (status >= 500) return "api_error";
  return "unknown_error";
}
