import type {
  AppBoundaryError,
  AppBoundarySource,
} from "../../core/entities/appError";
import type { HttpClientError } from "./httpJsonClient";

/**
 * Narrows transport-level failures into boundary codes shared by every adapter.
 */
export const mapHttpCode = (
  error: Pick<HttpClientError, "code" | "httpStatus">,
): AppBoundaryError["code"] => {
  if (error.httpStatus === 429) {
    return "rate_limited";
  }

  if (error.httpStatus === 401 || error.httpStatus === 403) {
    return "auth_invalid";
  }

  switch (error.code) {
    case "timeout":
      return "timeout";
    case "invalid_json":
      return "invalid_json";
    case "transport_error":
      return "transport_error";
    case "non_success_status":
      return "provider_error";
  }
};

export const toBoundaryError = (
  source: AppBoundarySource,
  provider: string,
  error: HttpClientError,
): AppBoundaryError => ({
  source,
  code: mapHttpCode(error),
  provider,
  message: error.message,
  retryable: error.retryable,
  httpStatus: error.httpStatus,
  retryAfterSeconds: error.retryAfterSeconds,
  cause: error.cause,
});
