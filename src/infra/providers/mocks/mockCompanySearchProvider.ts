import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type {
  CompanySearchMatch,
  CompanySearchProviderPort,
  CompanySearchRequest,
} from "../../../core/ports/inboundPorts";

const MOCK_COMPANIES: CompanySearchMatch[] = [
  { symbol: "AAPL", name: "Apple Inc.", exchange: "NASDAQ", currency: "USD" },
  { symbol: "MSFT", name: "Microsoft Corporation", exchange: "NASDAQ", currency: "USD" },
  { symbol: "NVDA", name: "NVIDIA Corporation", exchange: "NASDAQ", currency: "USD" },
];

/**
 * Matches on symbol or a name substring so offline runs resolve common company names.
 */
export class MockCompanySearchProvider implements CompanySearchProviderPort {
  async searchCompanies(
    request: CompanySearchRequest,
  ): Promise<Result<CompanySearchMatch[], AppBoundaryError>> {
    const needle = request.query.trim().toLowerCase();
    if (!needle) {
      return ok([]);
    }

    return ok(
      MOCK_COMPANIES.filter(
        (company) =>
          company.symbol.toLowerCase() === needle ||
          company.name.toLowerCase().includes(needle),
      ).slice(0, request.limit),
    );
  }
}
