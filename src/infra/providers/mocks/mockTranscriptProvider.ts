import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { Transcript } from "../../../core/entities/earnings";
import type {
  TranscriptProviderPort,
  TranscriptRequest,
} from "../../../core/ports/inboundPorts";

const MOCK_TRANSCRIPT_YEAR = 2024;

/**
 * Serves one transcript per symbol for 2024 only, so queries for later years walk the year fallback.
 */
export class MockTranscriptProvider implements TranscriptProviderPort {
  async fetchTranscripts(
    request: TranscriptRequest,
  ): Promise<Result<Transcript[], AppBoundaryError>> {
    if (request.year !== MOCK_TRANSCRIPT_YEAR) {
      return ok([]);
    }

    const symbol = request.symbol.toUpperCase();
    return ok([
      {
        symbol,
        date: "2024-08-01 17:00:00",
        year: MOCK_TRANSCRIPT_YEAR,
        quarter: 3,
        content: [
          `Operator: Good day and welcome to the ${symbol} third quarter earnings conference call.`,
          "Chief Executive Officer: Revenue grew 5% year over year, and services reached a new all-time high.",
          "Chief Financial Officer: Gross margin was 46.3%, near the high end of our guidance range. We expect foreign exchange to remain a headwind.",
          "Analyst: Can you talk about demand trends in Greater China?",
          "Chief Executive Officer: We saw some softness, but we remain confident in the long term.",
        ].join("\n"),
      },
    ]);
  }
}
