// ---------------------------------------------------------------------------
// MMPay SDK – Main Client
// ---------------------------------------------------------------------------
// The primary entry point for SDK consumers.
//
//   - Resource style: `mmpay.sandbox.create(…)`, `mmpay.callbacks.verify(…)`
//   - Flat shorthands: `mmpay.pay(…)`, `mmpay.sandboxPay(…)`, `mmpay.verifyCb(…)`
//   - Resources are lazy properties
//   - No per-client mutable state: one instance may serve concurrent calls
// ---------------------------------------------------------------------------

import { configFromEnv, mergeConfig, resolveConfig } from "./config";
import { HttpClient } from "./http";
import { CallbacksResource } from "./resources/callbacks";
import { PaymentsResource } from "./resources/payments";
import type {
  ApiResult,
  HandshakeRequest,
  HandshakeResponse,
  MMPayConfig,
  PaymentRequest,
  PaymentResponse,
  ResolvedConfig,
} from "./types";

/**
 * The MMPay SDK client.
 *
 * @example
 * ```ts
 * import { MMPay } from "mmpay-sdk";
 *
 * const mmpay = new MMPay({
 *   appId: "app_123",
 *   publishableKey: "pk_test_...",
 *   secretKey: process.env.MMPAY_SECRET_KEY ?? "",
 *   apiBaseUrl: "https://api.example.com",
 * });
 *
 * const result = await mmpay.sandboxPay({
 *   orderId: "ORD-123",
 *   amount: 1000,
 *   items: [{ name: "T-shirt", amount: 1000, quantity: 1 }],
 * });
 *
 * if (result.ok) {
 *   console.log(result.data);
 * } else {
 *   console.error(result.code, result.error, result.details);
 * }
 * ```
 */
export class MMPay {
  /** Internal HTTP transport – shared across all resources. */
  private readonly http: HttpClient;
  private readonly config: ResolvedConfig;

  private _payments?: PaymentsResource;
  private _sandbox?: PaymentsResource;
  private _callbacks?: CallbacksResource;

  /**
   * @throws {MMPayConfigurationError} if a credential is missing or empty.
   */
  constructor(config: MMPayConfig) {
    this.config = resolveConfig(config);
    this.http = new HttpClient(this.config);
  }

  /**
   * Create a client from `MMPAY_APP_ID`, `MMPAY_PUBLISHABLE_KEY`,
   * `MMPAY_SECRET_KEY`, `MMPAY_API_BASE_URL` and optional `MMPAY_TIMEOUT_MS`.
   */
  static fromEnv(
    env: Record<string, string | undefined> = process.env,
    overrides: Partial<MMPayConfig> = {},
  ): MMPay {
    return new MMPay(mergeConfig(configFromEnv(env), overrides));
  }

  // ── Resource accessors ───────────────────────────────────────────────────

  /** Live payments (`/payments/handshake`, `/payments/create`). */
  get payments(): PaymentsResource {
    if (!this._payments) {
      this._payments = new PaymentsResource(this.http, this.config, "production");
    }
    return this._payments;
  }

  /** Sandbox payments (`/payments/sandbox-handshake`, `/payments/sandbox-create`). */
  get sandbox(): PaymentsResource {
    if (!this._sandbox) {
      this._sandbox = new PaymentsResource(this.http, this.config, "sandbox");
    }
    return this._sandbox;
  }

  /** Callback signature verification. */
  get callbacks(): CallbacksResource {
    if (!this._callbacks) {
      this._callbacks = new CallbacksResource(
        this.config.secretKey,
        this.config.logger,
      );
    }
    return this._callbacks;
  }

  // ── Shorthands ───────────────────────────────────────────────────────────

  handshake(request: HandshakeRequest): Promise<ApiResult<HandshakeResponse>> {
    return this.payments.handshake(request);
  }

  pay(params: PaymentRequest): Promise<ApiResult<PaymentResponse>> {
    return this.payments.create(params);
  }

  sandboxHandshake(
    request: HandshakeRequest,
  ): Promise<ApiResult<HandshakeResponse>> {
    return this.sandbox.handshake(request);
  }

  sandboxPay(params: PaymentRequest): Promise<ApiResult<PaymentResponse>> {
    return this.sandbox.create(params);
  }

  /**
   * Verify an inbound callback signature.
   *
   * @returns `false` on mismatch.
   * @throws {MMPayInvalidArgumentError} if any argument is empty.
   */
  verifyCb(payload: string, nonce: string, signature: string): boolean {
    return this.callbacks.verify(payload, nonce, signature);
  }
}
