import { MMPayAPIError } from "./errors";
import type { ApiResult } from "./types";

/**
 * Return the data of a successful result, or throw the failure as an
 * `MMPayAPIError`. For callers who prefer `try`/`catch` over branching on
 * `result.ok`.
 */
export function unwrap<T>(result: ApiResult<T>): T {
  if (result.ok) {
    return result.data;
  }
  throw new MMPayAPIError(
    result.error,
    result.statusCode,
    result.code,
    result.details,
  );
}
