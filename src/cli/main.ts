import { Command, InvalidArgumentError } from "commander";
import {
  createRuntime,
  type RuntimeOverrides,
} from "../application/bootstrap/runtimeFactory";
import { toUserMessage } from "../core/entities/appError";
import { loadEnv, type AppEnv } from "../shared/config/env";
import { logger } from "../shared/logger/logger";
import { describePipelineEvent, formatEarningsReport } from "./reportFormatter";

export type CliIo = {
  out: (text: string) => void;
  err: (text: string) => void;
};

export type CliOptions = {
  config?: AppEnv;
  runtime?: RuntimeOverrides;
  io?: CliIo;
  setExitCode?: (code: number) => void;
};

type AnalyzeOptions = {
  json?: boolean;
  transcript?: boolean;
  maxAttempts?: number;
  maxYearFallbacks?: number;
};

const processIo: CliIo = {
  out: (text) => process.stdout.write(`${text}\n`),
  err: (text) => process.stderr.write(`${text}\n`),
};

const parsePositiveInt = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }

  return parsed;
};

/**
 * Defines a single command surface so every run shares the same fetch and analysis policies.
 */
export const buildCli = (options: CliOptions = {}) => {
  const io = options.io ?? processIo;
  const setExitCode =
    options.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  const config = () => options.config ?? loadEnv();

  const cli = new Command();
  cli
    .name("earnings-call-analyst")
    .description("Fetch and analyze earnings call transcripts");

  cli
    .command("analyze")
    .description("Analyze the earnings call a free-text query refers to")
    .argument("<query...>", "e.g. 'latest microsoft earnings call'")
    .option("--json", "Print the report as JSON")
    .option("--transcript", "Include the full transcript after the analysis")
    .option(
      "--max-attempts <n>",
      "Transient retries per year",
      parsePositiveInt,
    )
    .option(
      "--max-year-fallbacks <n>",
      "Years to try, starting with the requested one",
      parsePositiveInt,
    )
    .action(async (words: string[], opts: AnalyzeOptions) => {
      const query = words.join(" ").trim();
      const runtime = createRuntime(config(), {
        ...options.runtime,
        eventSinks: [
          ...(options.runtime?.eventSinks ?? []),
          {
            emit: (event) => {
              const line = describePipelineEvent(event);
              if (line) {
                io.err(line);
              }
            },
          },
        ],
      });

      const result = await runtime.reportService.run(query, {
        maxAttempts: opts.maxAttempts,
        maxYearFallbacks: opts.maxYearFallbacks,
      });

      if (result.isErr()) {
        logger.error({ query, error: result.error }, "Report run failed");
        io.err(toUserMessage(result.error));
        setExitCode(1);
        return;
      }

      const report = result.value;
      if (opts.json) {
        io.out(JSON.stringify(report, null, 2));
        return;
      }

      io.out(
        formatEarningsReport(
          report,
          runtime.chartRenderer.render(report.priceWindow),
          { includeTranscript: Boolean(opts.transcript) },
        ),
      );
    });

  cli
    .command("status")
    .description("Report resolved configuration")
    .action(() => {
      const resolved = config();
      logger.info(
        {
          llmProvider: resolved.LLM_PROVIDER,
          llmBaseUrl:
            resolved.LLM_PROVIDER === "openai"
              ? resolved.OPENAI_BASE_URL
              : resolved.OLLAMA_BASE_URL,
          llmModel:
            resolved.LLM_PROVIDER === "openai"
              ? resolved.OPENAI_MODEL
              : resolved.OLLAMA_CHAT_MODEL,
          openAiKeyConfigured: resolved.OPENAI_API_KEY.length > 0,
          dataProvider: resolved.DATA_PROVIDER,
          fmpBaseUrl: resolved.FMP_BASE_URL,
          fmpKeyConfigured: resolved.FMP_API_KEY.length > 0,
          transcriptMaxAttempts: resolved.TRANSCRIPT_MAX_ATTEMPTS,
          transcriptMaxYearFallbacks: resolved.TRANSCRIPT_MAX_YEAR_FALLBACKS,
          transcriptDefaultRetryAfterSeconds:
            resolved.TRANSCRIPT_DEFAULT_RETRY_AFTER_SECONDS,
          analysisTemperature: resolved.ANALYSIS_TEMPERATURE,
          analysisMaxTokens: resolved.ANALYSIS_MAX_TOKENS,
          priceWindowDays: resolved.PRICE_WINDOW_DAYS,
          troubleshooting: [
            "DATA_PROVIDER=mock serves 2024 transcripts only; later years walk the year fallback.",
            "Use --max-year-fallbacks to search further back.",
          ],
        },
        "Runtime status",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (
  argv: string[],
  options: CliOptions = {},
): Promise<void> => {
  const cli = buildCli(options);
  await cli.parseAsync(argv);
};
