// ---------------------------------------------------------------------------
// MMPay SDK – Public API Surface
// ---------------------------------------------------------------------------
// Everything re-exported here is part of the public contract.
// The transport (http.ts) is not exported.
// ---------------------------------------------------------------------------

// ── Main client ────────────────────────────────────────────────────────────
export { MMPay } from "./client";
export { PaymentsResource, ENDPOINTS } from "./resources/payments";
export { CallbacksResource } from "./resources/callbacks";

// ── Configuration ──────────────────────────────────────────────────────────
export {
  configFromEnv,
  mergeConfig,
  DEFAULT_TIMEOUT_MS,
  MAX_TIMEOUT_MS,
  ENV_VARS,
} from "./config";

// ── Signing ────────────────────────────────────────────────────────────────
export {
  serialize,
  generateNonce,
  generateSignature,
  signPayload,
} from "./signing";

// ── Results ────────────────────────────────────────────────────────────────
export { unwrap } from "./result";

// ── Logging ────────────────────────────────────────────────────────────────
export { ConsoleLogger } from "./logger";
export type { Logger, LogLevel, ConsoleLoggerOptions } from "./logger";

// ── Error classes ──────────────────────────────────────────────────────────
export {
  MMPayError,
  MMPayConfigurationError,
  MMPayInvalidArgumentError,
  MMPaySignatureVerificationError,
  MMPayAPIError,
} from "./errors";
export type { MMPayErrorCode } from "./errors";

// ── Types ──────────────────────────────────────────────────────────────────
export type {
  // Config
  MMPayConfig,
  // Payments
  PaymentItem,
  PaymentRequest,
  CreatePaymentPayload,
  HandshakeRequest,
  HandshakeResponse,
  PaymentResponse,
  Environment,
  // Signing
  SignedEnvelope,
  // Results
  ApiResult,
  ApiSuccess,
  ApiFailure,
  // Callbacks
  CallbackEvent,
} from "./types";

// ── Version ────────────────────────────────────────────────────────────────
export { SDK_VERSION } from "./version";
