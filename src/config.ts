// ---------------------------------------------------------------------------
// MMPay SDK – Configuration
// ---------------------------------------------------------------------------

import { MMPayConfigurationError } from "./errors";
import { ConsoleLogger } from "./logger";
import type { MMPayConfig, ResolvedConfig } from "./types";

/** Default per-request timeout (ms). */
export const DEFAULT_TIMEOUT_MS = 30_000;

/** Longest delay `setTimeout` accepts (2^31 - 1 ms). */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Regex to match trailing slashes for base URL normalization. */
const TRAILING_SLASH_REGEX = /\/+$/;

const REQUIRED_FIELDS = [
  "appId",
  "publishableKey",
  "secretKey",
  "apiBaseUrl",
] as const;

/** Environment variable names read by `configFromEnv`. */
export const ENV_VARS = {
  appId: "MMPAY_APP_ID",
  publishableKey: "MMPAY_PUBLISHABLE_KEY",
  secretKey: "MMPAY_SECRET_KEY",
  apiBaseUrl: "MMPAY_API_BASE_URL",
  timeout: "MMPAY_TIMEOUT_MS",
} as const;

/**
 * Validate credentials and apply defaults.
 *
 * @throws {MMPayConfigurationError} naming the first missing or empty field,
 *   or on a non-positive timeout.
 */
export function resolveConfig(config: MMPayConfig): ResolvedConfig {
  for (const field of REQUIRED_FIELDS) {
    const value: unknown = config[field];
    if (typeof value !== "string" || value.trim().length === 0) {
      throw new MMPayConfigurationError(
        `\`${field}\` is required. Pass it in the MMPay config.`,
      );
    }
  }

  const timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new MMPayConfigurationError(
      `\`timeout\` must be a positive number of milliseconds, got ${timeout}.`,
    );
  }
  if (timeout > MAX_TIMEOUT_MS) {
    throw new MMPayConfigurationError(
      `\`timeout\` must not exceed ${MAX_TIMEOUT_MS}ms, got ${timeout}.`,
    );
  }

  return {
    appId: config.appId.trim(),
    publishableKey: config.publishableKey.trim(),
    // Used as an HMAC key verbatim; trimming would change every signature.
    secretKey: config.secretKey,
    apiBaseUrl: config.apiBaseUrl.trim().replace(TRAILING_SLASH_REGEX, ""),
    timeout,
    logger: config.logger ?? new ConsoleLogger(),
  };
}

/**
 * Layer `overrides` over `base`. Overrides left `undefined` keep the base
 * value.
 */
export function mergeConfig(
  base: MMPayConfig,
  overrides: Partial<MMPayConfig>,
): MMPayConfig {
  return {
    appId: overrides.appId ?? base.appId,
    publishableKey: overrides.publishableKey ?? base.publishableKey,
    secretKey: overrides.secretKey ?? base.secretKey,
    apiBaseUrl: overrides.apiBaseUrl ?? base.apiBaseUrl,
    timeout: overrides.timeout ?? base.timeout,
    logger: overrides.logger ?? base.logger,
  };
}

/**
 * Build an `MMPayConfig` from environment variables.
 *
 * Missing variables come back as empty strings so that `resolveConfig`
 * reports them by their config field name.
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env,
): MMPayConfig {
  const rawTimeout = env[ENV_VARS.timeout];

  const config: MMPayConfig = {
    appId: env[ENV_VARS.appId] ?? "",
    publishableKey: env[ENV_VARS.publishableKey] ?? "",
    secretKey: env[ENV_VARS.secretKey] ?? "",
    apiBaseUrl: env[ENV_VARS.apiBaseUrl] ?? "",
  };

  if (rawTimeout !== undefined && rawTimeout.trim() !== "") {
    const timeout = Number(rawTimeout);
    if (!Number.isInteger(timeout)) {
      throw new MMPayConfigurationError(
        `${ENV_VARS.timeout} must be an integer, got "${rawTimeout}".`,
      );
    }
    config.timeout = timeout;
  }

  return config;
}
