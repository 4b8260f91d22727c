import { err, ok, type Result } from "neverthrow";
import type { SleepPort } from "../../core/ports/outboundPorts";

export type HttpTextRequest = {
  url: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

/**
 * Centralizes page IO so adapters share one timeout/retry/status policy.
 */
export class HttpClient {
  constructor(private readonly sleeper: SleepPort) {}

  /**
   * GETs a page body with bounded retries; 429, 5xx, timeouts and transport failures are retried with a
   * linearly growing pause.
   */
  async requestText(
    request: HttpTextRequest,
  ): Promise<Result<string, HttpClientError>> {
    const maxAttempts = request.retries + 1;
    let last: Result<string, HttpClientError> = err({
      code: "transport_error",
      message: "HTTP request exhausted retry attempts.",
      retryable: false,
    });

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      last = await this.performRequest(request);
      if (last.isOk()) {
        return last;
      }

      const hasAttemptsLeft = attempt < maxAttempts;
      if (!last.error.retryable || !hasAttemptsLeft) {
        return last;
      }

      await this.sleeper.sleep(request.retryDelayMs * attempt);
    }

    return last;
  }

  private async performRequest(
    request: HttpTextRequest,
  ): Promise<Result<string, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: "GET",
        headers: request.headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
        });
      }

      return ok(await response.text());
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
