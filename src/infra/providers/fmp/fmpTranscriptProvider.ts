import type {
  TranscriptProviderPort,
  TranscriptRequest,
} from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { Transcript } from "../../../core/entities/earnings";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { HttpJsonClient } from "../../http/httpJsonClient";
import { toBoundaryError } from "../../http/boundaryErrors";
import { logger } from "../../../shared/logger/logger";

const fmpTranscriptSchema = z.object({
  symbol: z.string().min(1),
  date: z.string().min(1),
  year: z.coerce.number().int(),
  quarter: z.coerce.number().int().optional(),
  content: z.string(),
});

/**
 * Fetches one (symbol, year) batch of earnings-call transcripts per call.
 * Never retries: the transcript fetcher owns the rate-limit and backoff policy.
 */
export class FmpTranscriptProvider implements TranscriptProviderPort {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly userAgent: string,
    private readonly timeoutMs = 15_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error("FMP_API_KEY is required when DATA_PROVIDER is set to fmp.");
    }
  }

  async fetchTranscripts(
    request: TranscriptRequest,
  ): Promise<Result<Transcript[], AppBoundaryError>> {
    const url = new URL(
      `/api/v4/batch_earning_call_transcript/${encodeURIComponent(request.symbol)}`,
      this.baseUrl,
    );
    url.searchParams.set("year", String(request.year));
    url.searchParams.set("apikey", this.apiKey);

    const response = await this.httpClient.requestJson({
      url: url.toString(),
      method: "GET",
      headers: { "User-Agent": this.userAgent },
      timeoutMs: this.timeoutMs,
    });

    if (response.isErr()) {
      return err(toBoundaryError("transcripts", "fmp", response.error));
    }

    if (!Array.isArray(response.value)) {
      logger.warn(
        { symbol: request.symbol, year: request.year },
        "FMP transcript payload was not a list; treating as empty",
      );
      return ok([]);
    }

    const items: unknown[] = response.value;
    const transcripts = items.flatMap((item): Transcript[] => {
      const parsed = fmpTranscriptSchema.safeParse(item);
      return parsed.success ? [parsed.data] : [];
    });

    if (transcripts.length < items.length) {
      logger.warn(
        {
          symbol: request.symbol,
          year: request.year,
          dropped: items.length - transcripts.length,
        },
        "Dropped malformed FMP transcript records",
      );
    }

    return ok(transcripts);
  }
}
