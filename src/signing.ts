// ---------------------------------------------------------------------------
// MMPay SDK – Request Signing
// ---------------------------------------------------------------------------
// Every request body is serialised exactly once. That single string is both
// what goes over the wire and what is signed:
//
//   signature = hex(HMAC-SHA256(secretKey, `${nonce}.${body}`))
//
// Callback verification uses the same scheme in reverse.
// ---------------------------------------------------------------------------

import { createHmac, timingSafeEqual } from "node:crypto";
import type { SignedEnvelope } from "./types";

/** Compact JSON: no whitespace, keys in insertion order. */
export function serialize(payload: object): string {
  return JSON.stringify(payload);
}

/** Epoch milliseconds as a decimal string. */
export function generateNonce(now: number = Date.now()): string {
  return String(Math.floor(now));
}

/** HMAC-SHA256 over `${nonce}.${body}` → lowercase hex. */
export function generateSignature(
  secretKey: string,
  nonce: string,
  body: string,
): string {
  return createHmac("sha256", secretKey)
    .update(`${nonce}.${body}`, "utf8")
    .digest("hex");
}

/**
 * Serialise `payload` and sign the result.
 *
 * @param nonce - Defaults to the current time.
 */
export function signPayload(
  secretKey: string,
  payload: object,
  nonce: string = generateNonce(),
): SignedEnvelope {
  const body = serialize(payload);
  return { body, nonce, signature: generateSignature(secretKey, nonce, body) };
}

/** Constant-time string comparison. */
export function constantTimeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, "utf8");
  const right = Buffer.from(b, "utf8");
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}
