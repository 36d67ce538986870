import "dotenv/config";
import { z } from "zod";

const supportedLlmProviders = ["ollama", "openai"] as const;
const supportedDataProviders = ["mock", "fmp"] as const;

export type LlmProviderName = (typeof supportedLlmProviders)[number];
export type DataProviderName = (typeof supportedDataProviders)[number];

export const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  LLM_PROVIDER: z.enum(supportedLlmProviders).default("ollama"),
  OLLAMA_BASE_URL: z.string().default("http://localhost:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_CHAT_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000),
  OPENAI_BASE_URL: z.string().default("https://api.openai.com"),
  OPENAI_API_KEY: z.string().default(""),
  OPENAI_MODEL: z.string().default("gpt-4o"),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  // Company search, transcripts and prices all come from one provider.
  DATA_PROVIDER: z.enum(supportedDataProviders).default("mock"),
  FMP_BASE_URL: z.string().default("https://financialmodelingprep.com"),
  FMP_API_KEY: z.string().default(""),
  FMP_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  FMP_USER_AGENT: z.string().default("Mozilla/5.0"),
  TRANSCRIPT_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  TRANSCRIPT_MAX_YEAR_FALLBACKS: z.coerce.number().int().positive().default(3),
  TRANSCRIPT_DEFAULT_RETRY_AFTER_SECONDS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(5),
  ANALYSIS_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  ANALYSIS_MAX_TOKENS: z.coerce.number().int().positive().default(2_000),
  PRICE_WINDOW_DAYS: z.coerce.number().int().positive().default(30),
});

export type AppEnv = z.infer<typeof envSchema>;

/**
 * Parses configuration once at the composition root; components receive plain values.
 */
export const loadEnv = (source: NodeJS.ProcessEnv = process.env): AppEnv =>
  envSchema.parse(source);
