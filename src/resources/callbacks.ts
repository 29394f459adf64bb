// ---------------------------------------------------------------------------
// MMPay SDK – Callback Verification
// ---------------------------------------------------------------------------
// Verifies payment callbacks delivered by MMPay to the merchant's
// `callbackUrl`. The API signs `${nonce}.${payload}` with the merchant's
// secret key, the same scheme used for outgoing requests.
//
// Call `verify()` before trusting any payment status a callback reports.
// ---------------------------------------------------------------------------

import {
  MMPayInvalidArgumentError,
  MMPaySignatureVerificationError,
} from "../errors";
import { isJsonObject } from "../http";
import { guardLogger } from "../logger";
import type { Logger } from "../logger";
import { constantTimeEqual, generateSignature } from "../signing";
import type { CallbackEvent } from "../types";

/**
 * Callback signature verification. Requires no HTTP access.
 *
 * @example
 * ```ts
 * app.post("/mmpay/callback", express.text({ type: "application/json" }), (req, res) => {
 *   const ok = mmpay.callbacks.verify(
 *     req.body,
 *     req.get("X-Mmpay-Nonce") ?? "",
 *     req.get("X-Mmpay-Signature") ?? "",
 *   );
 *   res.sendStatus(ok ? 200 : 400);
 * });
 * ```
 */
export class CallbacksResource {
  private readonly logger: Logger;

  constructor(
    private readonly secretKey: string,
    logger: Logger,
  ) {
    this.logger = guardLogger(logger);
  }

  /**
   * Check a callback's signature.
   *
   * @param payload - The raw request body, exactly as received.
   * @returns `false` when the signature does not match.
   * @throws {MMPayInvalidArgumentError} if any argument is empty.
   */
  verify(payload: string, nonce: string, signature: string): boolean {
    if (!payload || !nonce || !signature) {
      throw new MMPayInvalidArgumentError(
        "Callback verification failed: Missing payload, nonce, or signature.",
      );
    }

    const generated = generateSignature(this.secretKey, nonce, payload);
    if (!constantTimeEqual(generated, signature)) {
      this.logger.warn("Callback signature mismatch", {
        generated,
        expected: signature,
      });
      return false;
    }

    return true;
  }

  /**
   * Verify a callback and parse its JSON body.
   *
   * @throws {MMPayInvalidArgumentError} if any argument is empty.
   * @throws {MMPaySignatureVerificationError} if the signature does not match.
   * @throws {SyntaxError} if the payload is not valid JSON.
   * @throws {MMPayInvalidArgumentError} if the payload is not a JSON object.
   */
  constructEvent(
    payload: string,
    nonce: string,
    signature: string,
  ): CallbackEvent {
    if (!this.verify(payload, nonce, signature)) {
      throw new MMPaySignatureVerificationError("Signature did not match");
    }
    const parsed: unknown = JSON.parse(payload);
    if (!isJsonObject(parsed)) {
      throw new MMPayInvalidArgumentError(
        "Callback payload is not a JSON object.",
      );
    }
    const event: CallbackEvent = parsed;
    return event;
  }
}
