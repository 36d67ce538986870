import type {
  PriceSeriesProviderPort,
  PriceSeriesRequest,
} from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { PricePoint } from "../../../core/entities/earnings";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { HttpJsonClient } from "../../http/httpJsonClient";
import { toBoundaryError } from "../../http/boundaryErrors";
import { toIsoDate } from "../utils/dateUtils";

const fmpHistoricalEnvelopeSchema = z.object({
  symbol: z.string().optional(),
  historical: z.array(z.unknown()).optional(),
});

const fmpHistoricalRowSchema = z.object({
  date: z.string().min(1),
  close: z.number().finite(),
});

/**
 * Reads daily closes from FMP's full price history endpoint.
 */
export class FmpPriceSeriesProvider implements PriceSeriesProviderPort {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly timeoutMs = 15_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error("FMP_API_KEY is required when DATA_PROVIDER is set to fmp.");
    }
  }

  /**
   * Returns closes in ascending date order; FMP lists newest first.
   */
  async fetchDailyCloses(
    request: PriceSeriesRequest,
  ): Promise<Result<PricePoint[], AppBoundaryError>> {
    const url = new URL(
      `/api/v3/historical-price-full/${encodeURIComponent(request.symbol)}`,
      this.baseUrl,
    );
    url.searchParams.set("from", toIsoDate(request.from));
    url.searchParams.set("to", toIsoDate(request.to));
    url.searchParams.set("apikey", this.apiKey);

    const response = await this.httpClient.requestJson({
      url: url.toString(),
      method: "GET",
      timeoutMs: this.timeoutMs,
    });

    if (response.isErr()) {
      return err(toBoundaryError("prices", "fmp", response.error));
    }

    const envelope = fmpHistoricalEnvelopeSchema.safeParse(response.value);
    if (!envelope.success) {
      return err({
        source: "prices",
        code: "malformed_response",
        provider: "fmp",
        message: "FMP price history payload was not an object with a historical list.",
        retryable: false,
        cause: envelope.error,
      });
    }

    const points = (envelope.data.historical ?? []).flatMap(
      (row): PricePoint[] => {
        const parsed = fmpHistoricalRowSchema.safeParse(row);
        return parsed.success
          ? [{ date: parsed.data.date, close: parsed.data.close }]
          : [];
      },
    );

    return ok(points.sort((left, right) => left.date.localeCompare(right.date)));
  }
}
