import { AnalysisService } from "../services/analysisService";
import { EarningsReportService } from "../services/earningsReportService";
import { IntentExtractionService } from "../services/intentExtractionService";
import { PriceWindowService } from "../services/priceWindowService";
import { TickerResolutionService } from "../services/tickerResolutionService";
import { TranscriptFetchService } from "../services/transcriptFetchService";
import type { AppEnv } from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import type {
  CompanySearchProviderPort,
  PriceSeriesProviderPort,
  TranscriptProviderPort,
} from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  LlmPort,
  PipelineEventSinkPort,
  SleeperPort,
} from "../../core/ports/outboundPorts";
import { TextPriceChart } from "../../infra/chart/textPriceChart";
import { FanOutEventSink, LoggingEventSink } from "../../infra/events/loggingEventSink";
import { HttpJsonClient } from "../../infra/http/httpJsonClient";
import { OllamaLlm } from "../../infra/llm/ollamaLlm";
import { OpenAiLlm } from "../../infra/llm/openAiLlm";
import { FmpCompanySearchProvider } from "../../infra/providers/fmp/fmpCompanySearchProvider";
import { FmpPriceSeriesProvider } from "../../infra/providers/fmp/fmpPriceSeriesProvider";
import { FmpTranscriptProvider } from "../../infra/providers/fmp/fmpTranscriptProvider";
import { MockCompanySearchProvider } from "../../infra/providers/mocks/mockCompanySearchProvider";
import { MockPriceSeriesProvider } from "../../infra/providers/mocks/mockPriceSeriesProvider";
import { MockTranscriptProvider } from "../../infra/providers/mocks/mockTranscriptProvider";
import { SystemClock, TimerSleeper } from "../../infra/system/systemPorts";

type DataProviders = {
  companySearch: CompanySearchProviderPort;
  transcripts: TranscriptProviderPort;
  prices: PriceSeriesProviderPort;
};

export type RuntimeOverrides = {
  clock?: ClockPort;
  sleeper?: SleeperPort;
  llm?: LlmPort;
  dataProviders?: DataProviders;
  eventSinks?: PipelineEventSinkPort[];
};

/**
 * Resolves the configured chat backend.
 */
const createLlm = (config: AppEnv, httpClient: HttpJsonClient): LlmPort => {
  if (config.LLM_PROVIDER === "openai") {
    return new OpenAiLlm(
      config.OPENAI_BASE_URL,
      config.OPENAI_API_KEY,
      config.OPENAI_MODEL,
      config.OPENAI_TIMEOUT_MS,
      httpClient,
    );
  }

  return new OllamaLlm(
    config.OLLAMA_BASE_URL,
    config.OLLAMA_CHAT_MODEL,
    config.OLLAMA_CHAT_TIMEOUT_MS,
    httpClient,
  );
};

/**
 * Resolves the configured market-data adapters while preserving a mock fallback for local development.
 */
const createDataProviders = (
  config: AppEnv,
  httpClient: HttpJsonClient,
): DataProviders => {
  if (config.DATA_PROVIDER === "fmp") {
    return {
      companySearch: new FmpCompanySearchProvider(
        config.FMP_BASE_URL,
        config.FMP_API_KEY,
        config.FMP_TIMEOUT_MS,
        httpClient,
      ),
      transcripts: new FmpTranscriptProvider(
        config.FMP_BASE_URL,
        config.FMP_API_KEY,
        config.FMP_USER_AGENT,
        config.FMP_TIMEOUT_MS,
        httpClient,
      ),
      prices: new FmpPriceSeriesProvider(
        config.FMP_BASE_URL,
        config.FMP_API_KEY,
        config.FMP_TIMEOUT_MS,
        httpClient,
      ),
    };
  }

  return {
    companySearch: new MockCompanySearchProvider(),
    transcripts: new MockTranscriptProvider(),
    prices: new MockPriceSeriesProvider(),
  };
};

/**
 * Centralizes runtime wiring so every entry point shares one composition root.
 */
export const createRuntime = (
  config: AppEnv,
  overrides: RuntimeOverrides = {},
) => {
  const clock = overrides.clock ?? new SystemClock();
  const sleeper = overrides.sleeper ?? new TimerSleeper();
  const events = new FanOutEventSink([
    new LoggingEventSink(logger),
    ...(overrides.eventSinks ?? []),
  ]);

  const httpClient = new HttpJsonClient();

  const llm = overrides.llm ?? createLlm(config, httpClient);
  const data =
    overrides.dataProviders ?? createDataProviders(config, httpClient);

  const intentExtractor = new IntentExtractionService(llm, clock);
  const tickerResolver = new TickerResolutionService(data.companySearch, events);
  const transcriptFetcher = new TranscriptFetchService(
    data.transcripts,
    sleeper,
    events,
    {
      maxAttempts: config.TRANSCRIPT_MAX_ATTEMPTS,
      maxYearFallbacks: config.TRANSCRIPT_MAX_YEAR_FALLBACKS,
      defaultRetryAfterSeconds: config.TRANSCRIPT_DEFAULT_RETRY_AFTER_SECONDS,
    },
  );
  const analyzer = new AnalysisService(llm, {
    temperature: config.ANALYSIS_TEMPERATURE,
    maxTokens: config.ANALYSIS_MAX_TOKENS,
  });
  const priceWindows = new PriceWindowService(
    data.prices,
    clock,
    config.PRICE_WINDOW_DAYS,
  );

  const reportService = new EarningsReportService(
    intentExtractor,
    tickerResolver,
    transcriptFetcher,
    analyzer,
    priceWindows,
    events,
    clock,
  );

  return {
    intentExtractor,
    tickerResolver,
    transcriptFetcher,
    analyzer,
    priceWindows,
    reportService,
    chartRenderer: new TextPriceChart(),
  };
};
