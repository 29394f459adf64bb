// ---------------------------------------------------------------------------
// MMPay SDK – HTTP Transport Layer
// ---------------------------------------------------------------------------
// A thin, zero-dependency HTTP client built on the global `fetch()` API.
// Handles:
//   - Bearer token authentication
//   - Nonce / signature headers for pre-signed bodies
//   - Timeouts via AbortController
//   - Mapping every failure to an `ApiFailure` value
//
// Nothing here throws for remote or network failures. Nothing is retried
// either: the API has no idempotency keys.
//
// This module is intentionally kept internal. Consumers interact via the
// higher-level MMPay client class.
// ---------------------------------------------------------------------------

import { errorCodeFromStatus } from "./errors";
import { guardLogger } from "./logger";
import type { Logger } from "./logger";
import type { ApiFailure, ApiResult, ResolvedConfig, SignedEnvelope } from "./types";
import { SDK_VERSION } from "./version";

/** Header names understood by the MMPay API. */
export const HEADERS = {
  nonce: "X-Mmpay-Nonce",
  signature: "X-Mmpay-Signature",
  btoken: "X-Mmpay-Btoken",
} as const;

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Pull a human-readable message out of an API error body, if it has one. */
function extractApiMessage(text: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (!isJsonObject(parsed)) return undefined;
  if (typeof parsed.message === "string" && parsed.message) return parsed.message;
  if (typeof parsed.error === "string" && parsed.error) return parsed.error;
  return undefined;
}

/**
 * Internal HTTP client used by every resource module.
 *
 * Resources sign their own bodies (the create-payment signature must exist
 * before its handshake runs); the transport only attaches the envelope.
 */
export class HttpClient {
  private readonly publishableKey: string;
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly logger: Logger;

  constructor(config: ResolvedConfig) {
    this.publishableKey = config.publishableKey;
    this.baseUrl = config.apiBaseUrl;
    this.timeout = config.timeout;
    this.logger = guardLogger(config.logger);
  }

  /**
   * POST a signed body to the MMPay API.
   *
   * @param extraHeaders - Merged after the defaults (e.g. the btoken header).
   * @returns The decoded JSON object on 2xx, otherwise an `ApiFailure`.
   */
  async post<T extends object>(
    path: string,
    envelope: SignedEnvelope,
    extraHeaders?: Record<string, string>,
  ): Promise<ApiResult<T>> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);

    this.logger.debug("POST request", { path, nonce: envelope.nonce });

    try {
      const response = await fetch(url, {
        method: "POST",
        headers: this.buildHeaders(envelope, extraHeaders),
        body: envelope.body,
        signal: controller.signal,
      });
      const text = await response.text();

      this.logger.debug("POST response", { path, status: response.status });
      return this.parseResponse<T>(path, response, text);
    } catch (error) {
      if (controller.signal.aborted) {
        return this.fail(path, {
          ok: false,
          error: `Request timed out after ${this.timeout}ms`,
          code: "timeout_error",
          statusCode: 0,
        });
      }
      const reason = error instanceof Error ? error.message : String(error);
      return this.fail(path, {
        ok: false,
        error: `Network error: ${reason}`,
        code: "network_error",
        statusCode: 0,
      });
    } finally {
      clearTimeout(timer);
    }
  }

  // ── Private helpers ──────────────────────────────────────────────────────

  private parseResponse<T extends object>(
    path: string,
    response: Response,
    text: string,
  ): ApiResult<T> {
    if (!response.ok) {
      const message =
        extractApiMessage(text) ?? (response.statusText || "Request failed");
      return this.fail(path, {
        ok: false,
        error: `HTTP ${response.status}: ${message}`,
        code: errorCodeFromStatus(response.status),
        statusCode: response.status,
        details: text || undefined,
      });
    }

    const invalid = (error: string): ApiFailure => ({
      ok: false,
      error,
      code: "invalid_response_error",
      statusCode: response.status,
      details: text || undefined,
    });

    if (text.trim().length === 0) {
      return this.fail(path, invalid("Response body is empty"));
    }

    let data: T;
    try {
      data = JSON.parse(text);
    } catch {
      return this.fail(path, invalid("Response body is not valid JSON"));
    }
    if (!isJsonObject(data)) {
      return this.fail(path, invalid("Response body is not a JSON object"));
    }

    return { ok: true, data };
  }

  private fail(path: string, failure: ApiFailure): ApiFailure {
    this.logger.warn("MMPay request failed", {
      path,
      code: failure.code,
      statusCode: failure.statusCode,
      error: failure.error,
    });
    return failure;
  }

  /** Build default + signing headers for a request. */
  private buildHeaders(
    envelope: SignedEnvelope,
    extra?: Record<string, string>,
  ): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.publishableKey}`,
      "Content-Type": "application/json",
      Accept: "application/json",
      "User-Agent": `mmpay-sdk-node/${SDK_VERSION}`,
      [HEADERS.nonce]: envelope.nonce,
      [HEADERS.signature]: envelope.signature,
    };

    if (extra) {
      Object.assign(headers, extra);
    }

    return headers;
  }
}
