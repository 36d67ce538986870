import { err, ok, type Result } from "neverthrow";
import type { PipelineError } from "../../core/entities/appError";
import type { EarningsCallReport } from "../../core/entities/earnings";
import type {
  ClockPort,
  PipelineEventSinkPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import type { AnalysisService } from "./analysisService";
import type { IntentExtractionService } from "./intentExtractionService";
import type { PriceWindowService } from "./priceWindowService";
import type { TickerResolutionService } from "./tickerResolutionService";
import type { TranscriptFetchService } from "./transcriptFetchService";

export const YEAR_DEFAULTED_NOTICE = "Year not specified, using current year.";

export type ReportRunOverrides = {
  maxAttempts?: number;
  maxYearFallbacks?: number;
};

/**
 * Runs intent → ticker → transcript → analysis → price window for one query.
 * The first failing stage ends the run; a partial report is never returned.
 */
export class EarningsReportService {
  constructor(
    private readonly intentExtractor: IntentExtractionService,
    private readonly tickerResolver: TickerResolutionService,
    private readonly transcriptFetcher: TranscriptFetchService,
    private readonly analyzer: AnalysisService,
    private readonly priceWindows: PriceWindowService,
    private readonly events: PipelineEventSinkPort,
    private readonly clock: ClockPort,
  ) {}

  async run(
    query: string,
    overrides: ReportRunOverrides = {},
  ): Promise<Result<EarningsCallReport, PipelineError>> {
    const intentResult = await this.intentExtractor.extractIntent(query);
    if (intentResult.isErr()) {
      logger.warn({ query, error: intentResult.error }, "Intent extraction failed");
      return err(intentResult.error);
    }

    const intent = intentResult.value;
    const notices: string[] = [];
    if (intent.year === this.clock.now().getUTCFullYear()) {
      this.events.emit({ type: "year_defaulted", year: intent.year });
      notices.push(YEAR_DEFAULTED_NOTICE);
    }

    const symbol = await this.tickerResolver.resolveTicker(
      intent.companyReference,
    );

    const fetched = await this.transcriptFetcher.fetchTranscript(
      symbol,
      intent.year,
      overrides.maxAttempts,
      overrides.maxYearFallbacks,
    );

    if (fetched.status === "not_found") {
      logger.warn(
        { symbol, yearsTried: fetched.yearsTried },
        "No transcript found after exhausting year fallbacks",
      );
      return err({
        stage: "transcript",
        code: "transcript_not_found",
        message: `No transcript found for ${symbol} in ${fetched.yearsTried.join(", ") || "any year"}.`,
      });
    }

    if (fetched.status === "aborted") {
      logger.error(
        { symbol, year: fetched.year, attempts: fetched.attempts, reason: fetched.reason },
        "Transcript fetch aborted after exhausting transient retries",
      );
      return err({
        stage: "transcript",
        code: "transcript_fetch_aborted",
        message: `Transcript fetch for ${symbol} (${fetched.year}) aborted: ${fetched.reason}`,
      });
    }

    const { transcript } = fetched;
    const analysisResult = await this.analyzer.analyze(transcript);
    if (analysisResult.isErr()) {
      logger.warn(
        { symbol: transcript.symbol, date: transcript.date, error: analysisResult.error },
        "Transcript analysis failed",
      );
      return err(analysisResult.error);
    }

    const priceWindow = await this.priceWindows.loadPriceWindow(
      transcript.symbol,
      transcript.date,
    );
    if (priceWindow.status === "unavailable") {
      logger.warn(
        { symbol: transcript.symbol, reason: priceWindow.reason },
        "Price window unavailable; report will omit the chart",
      );
    }

    return ok({
      query,
      intent,
      symbol,
      requestedYear: intent.year,
      transcript,
      analysis: analysisResult.value,
      priceWindow,
      notices,
    });
  }
}
