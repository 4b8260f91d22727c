import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { TimeframeReadings } from "../../../core/entities/rsi";
import type {
  RsiFetchRequest,
  RsiProviderPort,
} from "../../../core/ports/inboundPorts";
import type { RandomPort, SleepPort } from "../../../core/ports/outboundPorts";
import { jitteredDelay } from "../../../application/services/pacing";
import { HttpClient, type HttpClientError } from "../../http/httpClient";
import { parseRsiFromPage } from "./technicalsPageParser";

export type TechnicalsPageOptions = {
  /** Page URL with `{SYMBOL}` and optionally `{TIMEFRAME}` placeholders. */
  urlTemplate: string;
  userAgent: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  timeframeDelayMs: number;
};

const PROVIDER = "technicals";

const toBoundaryError = (error: HttpClientError): AppBoundaryError => {
  const code =
    error.httpStatus === 429
      ? "rate_limited"
      : error.code === "timeout"
        ? "timeout"
        : error.code === "transport_error"
          ? "transport_error"
          : "provider_error";

  return {
    source: "rsi",
    code,
    provider: PROVIDER,
    message: error.message,
    retryable: error.retryable,
    httpStatus: error.httpStatus,
    cause: error.cause,
  };
};

/**
 * Reads RSI values from a public technicals page, one request per timeframe.
 */
export class TechnicalsPageRsiProvider implements RsiProviderPort {
  readonly name = PROVIDER;

  constructor(
    private readonly options: TechnicalsPageOptions,
    private readonly sleeper: SleepPort,
    private readonly random: RandomPort,
    private readonly httpClient = new HttpClient(sleeper),
  ) {
    if (!this.options.urlTemplate.includes("{SYMBOL}")) {
      throw new Error(
        "RSI_PAGE_URL_TEMPLATE must contain a {SYMBOL} placeholder.",
      );
    }
  }

  buildUrl(symbol: string, timeframe: string): string {
    return this.options.urlTemplate
      .replaceAll("{SYMBOL}", encodeURIComponent(symbol))
      .replaceAll("{TIMEFRAME}", encodeURIComponent(timeframe));
  }

  /**
   * Pages that load but show no value yield absent readings; only a symbol whose every request failed is an error.
   */
  async fetchAllTimeframes(
    request: RsiFetchRequest,
  ): Promise<Result<TimeframeReadings, AppBoundaryError>> {
    const readings: TimeframeReadings = {};
    let lastFailure: HttpClientError | undefined;
    let failures = 0;

    for (const [index, timeframe] of request.timeframes.entries()) {
      if (index > 0) {
        await this.sleeper.sleep(
          jitteredDelay(this.options.timeframeDelayMs, this.random),
        );
      }

      const response = await this.httpClient.requestText({
        url: this.buildUrl(request.symbol, timeframe),
        headers: {
          "User-Agent": this.options.userAgent,
          Accept: "text/html",
        },
        timeoutMs: this.options.timeoutMs,
        retries: this.options.retries,
        retryDelayMs: this.options.retryDelayMs,
      });

      if (response.isErr()) {
        lastFailure = response.error;
        failures += 1;
        readings[timeframe] = null;
        continue;
      }

      readings[timeframe] = parseRsiFromPage(response.value);
    }

    if (lastFailure && failures === request.timeframes.length) {
      return err(toBoundaryError(lastFailure));
    }

    return ok(readings);
  }
}
