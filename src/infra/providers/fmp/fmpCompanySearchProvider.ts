import type {
  CompanySearchMatch,
  CompanySearchProviderPort,
  CompanySearchRequest,
} from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { HttpJsonClient } from "../../http/httpJsonClient";
import { toBoundaryError } from "../../http/boundaryErrors";

const fmpSearchItemSchema = z.object({
  symbol: z.string().trim().min(1),
  name: z.string().nullish(),
  currency: z.string().nullish(),
  stockExchange: z.string().nullish(),
  exchangeShortName: z.string().nullish(),
});

/**
 * Adapts Financial Modeling Prep's name/ticker search into ranked company matches.
 */
export class FmpCompanySearchProvider implements CompanySearchProviderPort {
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

  async searchCompanies(
    request: CompanySearchRequest,
  ): Promise<Result<CompanySearchMatch[], AppBoundaryError>> {
    const url = new URL("/api/v3/search", this.baseUrl);
    url.searchParams.set("query", request.query);
    url.searchParams.set("limit", String(request.limit));
    url.searchParams.set("apikey", this.apiKey);

    const response = await this.httpClient.requestJson({
      url: url.toString(),
      method: "GET",
      timeoutMs: this.timeoutMs,
    });

    if (response.isErr()) {
      return err(toBoundaryError("company_search", "fmp", response.error));
    }

    if (!Array.isArray(response.value)) {
      return err({
        source: "company_search",
        code: "malformed_response",
        provider: "fmp",
        message: "FMP search payload was not a list.",
        retryable: false,
      });
    }

    const items: unknown[] = response.value;
    const matches = items.flatMap((item): CompanySearchMatch[] => {
      const parsed = fmpSearchItemSchema.safeParse(item);
      if (!parsed.success) {
        return [];
      }

      const { symbol, name, currency, stockExchange, exchangeShortName } =
        parsed.data;
      return [
        {
          symbol,
          name: name?.trim() || symbol,
          exchange: exchangeShortName ?? stockExchange ?? undefined,
          currency: currency ?? undefined,
        },
      ];
    });

    return ok(matches.slice(0, request.limit));
  }
}
