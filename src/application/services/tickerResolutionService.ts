import type { CompanySearchProviderPort } from "../../core/ports/inboundPorts";
import type { PipelineEventSinkPort } from "../../core/ports/outboundPorts";

/**
 * Maps a company name or ticker to a symbol via company search, trusting the caller's input
 * whenever search comes back empty or fails. Never blocks the pipeline.
 */
export class TickerResolutionService {
  constructor(
    private readonly companySearch: CompanySearchProviderPort,
    private readonly events: PipelineEventSinkPort,
  ) {}

  async resolveTicker(reference: string): Promise<string> {
    const result = await this.companySearch.searchCompanies({
      query: reference,
      limit: 1,
    });

    if (result.isErr()) {
      this.events.emit({
        type: "ticker_unresolved",
        reference,
        reason: result.error.message,
      });
      return reference;
    }

    const symbol = result.value[0]?.symbol;
    if (!symbol) {
      this.events.emit({
        type: "ticker_unresolved",
        reference,
        reason: "company search returned no matches",
      });
      return reference;
    }

    this.events.emit({ type: "ticker_resolved", reference, symbol });
    return symbol;
  }
}
