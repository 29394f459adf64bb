// ---------------------------------------------------------------------------
// MMPay SDK – Type Definitions
// ---------------------------------------------------------------------------
// Request payloads are declared with the key order they are serialised in:
// the server recomputes the signature over the exact bytes we send.
// ---------------------------------------------------------------------------

import type { MMPayErrorCode } from "./errors";
import type { Logger } from "./logger";

// ── Payments ───────────────────────────────────────────────────────────────

/** A single line item of an order. */
export interface PaymentItem {
  name: string;
  amount: number;
  quantity: number;
}

/** Parameters supplied by the merchant to create a payment. */
export interface PaymentRequest {
  /** Merchant-unique order identifier. */
  orderId: string;
  /** Total amount. Passed through to the API unvalidated. */
  amount: number;
  items: PaymentItem[];
  currency?: string;
  /** URL the API notifies when the payment settles. */
  callbackUrl?: string;
}

/** Body of a handshake call. */
export interface HandshakeRequest {
  orderId: string;
  nonce: string;
}

/**
 * Signed body of a create-payment call.
 *
 * `callbackUrl` and `currency` are only present when the caller supplied
 * them; an absent key and an `undefined` key sign differently.
 */
export interface CreatePaymentPayload {
  appId: string;
  nonce: string;
  amount: number;
  orderId: string;
  items: PaymentItem[];
  callbackUrl?: string;
  currency?: string;
}

/** Decoded handshake response. `token` is the session token ("btoken"). */
export interface HandshakeResponse {
  token?: string;
  [key: string]: unknown;
}

/** Decoded create-payment response. */
export interface PaymentResponse {
  [key: string]: unknown;
}

/** Which family of endpoints a resource talks to. */
export type Environment = "production" | "sandbox";

// ── Signing ────────────────────────────────────────────────────────────────

/** A serialised body together with the nonce and signature bound to it. */
export interface SignedEnvelope {
  /** Exact bytes transmitted and signed. */
  readonly body: string;
  readonly nonce: string;
  /** Lowercase hex HMAC-SHA256 over `${nonce}.${body}`. */
  readonly signature: string;
}

// ── Results ────────────────────────────────────────────────────────────────

export interface ApiSuccess<T> {
  readonly ok: true;
  readonly data: T;
}

export interface ApiFailure {
  readonly ok: false;
  /** Human-readable failure description. */
  readonly error: string;
  readonly code: MMPayErrorCode;
  /** HTTP status, or 0 when no response was received. */
  readonly statusCode: number;
  /** Raw response text, when a response was received. */
  readonly details?: string;
}

/**
 * Outcome of a remote call. Transport and HTTP failures are returned as
 * `ApiFailure` rather than thrown.
 */
export type ApiResult<T> = ApiSuccess<T> | ApiFailure;

// ── Client Config ──────────────────────────────────────────────────────────

/** Configuration options for initialising the MMPay client. */
export interface MMPayConfig {
  /** Merchant application identifier. */
  appId: string;
  /** Public key sent as the bearer token. */
  publishableKey: string;
  /** HMAC signing key. **Never transmitted and never exposed client-side.** */
  secretKey: string;
  /** API root, e.g. `https://api.example.com`. Trailing slashes are stripped. */
  apiBaseUrl: string;
  /**
   * Request timeout in milliseconds.
   * @default 30_000
   */
  timeout?: number;
  /**
   * Receives request traces and callback-mismatch diagnostics.
   * Defaults to a console logger at `warn` level.
   */
  logger?: Logger;
}

/** Validated and normalised configuration shared by every resource. */
export interface ResolvedConfig {
  readonly appId: string;
  readonly publishableKey: string;
  readonly secretKey: string;
  readonly apiBaseUrl: string;
  readonly timeout: number;
  readonly logger: Logger;
}

// ── Callbacks ──────────────────────────────────────────────────────────────

/** Decoded callback body delivered by the MMPay API. */
export interface CallbackEvent {
  [key: string]: unknown;
}
