import { err, ok, type Result } from "neverthrow";

type HttpMethod = "GET" | "POST";

export type HttpJsonRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  message: string;
  httpStatus?: number;
  retryAfterSeconds?: number;
  retryable: boolean;
  cause?: unknown;
};

/**
 * Reads a delta-seconds `Retry-After` value; HTTP-date forms are ignored.
 */
export const parseRetryAfterSeconds = (
  header: string | null,
): number | undefined => {
  if (header === null) {
    return undefined;
  }

  const trimmed = header.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }

  return Number.parseInt(trimmed, 10);
};

/**
 * Centralizes HTTP JSON IO so adapters share one timeout/status/JSON parsing policy.
 * Bodies come back as `unknown`; each adapter validates its own payload shape.
 * Makes exactly one request: retry policy belongs to the caller.
 */
export class HttpJsonClient {
  async requestJson(
    request: HttpJsonRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryAfterSeconds:
            response.status === 429
              ? parseRetryAfterSeconds(response.headers.get("retry-after"))
              : undefined,
          retryable,
        });
      }

      try {
        const payload: unknown = await response.json();
        return ok(payload);
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          retryable: false,
          cause: jsonError,
        });
      }
    } catch (error) {
      const isTimeoutError =
        error instanceof DOMException && error.name === "AbortError";

      if (isTimeoutError) {
        return err({
          code: "timeout",
          message: "HTTP request timed out.",
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
