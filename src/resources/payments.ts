// ---------------------------------------------------------------------------
// MMPay SDK – Payments Resource
// ---------------------------------------------------------------------------
// Handshake and create-payment calls. One class serves both production and
// sandbox; the environment only selects endpoint paths.
// ---------------------------------------------------------------------------

import type { HttpClient } from "../http";
import { HEADERS } from "../http";
import { generateNonce, signPayload } from "../signing";
import type {
  ApiResult,
  CreatePaymentPayload,
  Environment,
  HandshakeRequest,
  HandshakeResponse,
  PaymentRequest,
  PaymentResponse,
} from "../types";

/** Endpoint paths per environment. */
export const ENDPOINTS: Record<
  Environment,
  { readonly handshake: string; readonly create: string }
> = {
  production: {
    handshake: "/payments/handshake",
    create: "/payments/create",
  },
  sandbox: {
    handshake: "/payments/sandbox-handshake",
    create: "/payments/sandbox-create",
  },
};

/** Credentials a payments resource signs with. */
export interface SigningCredentials {
  readonly appId: string;
  readonly secretKey: string;
}

/**
 * Resource class for MMPay payments.
 *
 * @example
 * ```ts
 * const result = await mmpay.sandbox.create({
 *   orderId: "ORD-123",
 *   amount: 1000,
 *   items: [{ name: "T-shirt", amount: 1000, quantity: 1 }],
 * });
 *
 * if (!result.ok) console.error(result.error, result.details);
 * ```
 */
export class PaymentsResource {
  private readonly paths: { readonly handshake: string; readonly create: string };

  constructor(
    private readonly http: HttpClient,
    private readonly credentials: SigningCredentials,
    readonly environment: Environment,
  ) {
    this.paths = ENDPOINTS[environment];
  }

  /**
   * Open a payment session for an order.
   *
   * On success `data.token` holds the session token ("btoken") a following
   * create-payment call must carry. Nothing is stored on the client.
   */
  async handshake(
    request: HandshakeRequest,
  ): Promise<ApiResult<HandshakeResponse>> {
    const payload: HandshakeRequest = {
      orderId: request.orderId,
      nonce: request.nonce,
    };
    const envelope = signPayload(this.credentials.secretKey, payload);
    return this.http.post<HandshakeResponse>(this.paths.handshake, envelope);
  }

  /**
   * Create a payment.
   *
   * Signs the payment body, runs a handshake for the same order and nonce,
   * then posts the payment with the handshake's token. A failed handshake
   * is returned as-is and the payment is never posted.
   */
  async create(params: PaymentRequest): Promise<ApiResult<PaymentResponse>> {
    const nonce = generateNonce();
    const envelope = signPayload(
      this.credentials.secretKey,
      this.buildPayload(params, nonce),
      nonce,
    );

    const session = await this.handshake({ orderId: params.orderId, nonce });
    if (!session.ok) {
      return session;
    }

    const token = session.data.token;
    if (typeof token !== "string" || token.length === 0) {
      return {
        ok: false,
        error: "Handshake response did not include a session token",
        code: "missing_token_error",
        statusCode: 0,
        details: JSON.stringify(session.data),
      };
    }

    return this.http.post<PaymentResponse>(this.paths.create, envelope, {
      [HEADERS.btoken]: token,
    });
  }

  /** Build the signed body. Optional fields are only set when supplied. */
  private buildPayload(
    params: PaymentRequest,
    nonce: string,
  ): CreatePaymentPayload {
    const payload: CreatePaymentPayload = {
      appId: this.credentials.appId,
      nonce,
      amount: params.amount,
      orderId: params.orderId,
      items: params.items,
    };
    if (params.callbackUrl !== undefined) {
      payload.callbackUrl = params.callbackUrl;
    }
    if (params.currency !== undefined) {
      payload.currency = params.currency;
    }
    return payload;
  }
}
