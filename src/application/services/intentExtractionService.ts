import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { PipelineError } from "../../core/entities/appError";
import type { ExtractedIntent } from "../../core/entities/earnings";
import type {
  ClockPort,
  LlmPort,
  ToolDefinition,
} from "../../core/ports/outboundPorts";

export const EXTRACT_INFO_TOOL: ToolDefinition = {
  name: "extract_info",
  description: "Extract the year and ticker/company name from the user input",
  parameters: {
    type: "object",
    properties: {
      year: {
        type: "integer",
        description:
          "The year mentioned in the input, or the current year if not specified",
      },
      ticker_or_company: {
        type: "string",
        description: "The stock ticker or company name mentioned in the input",
      },
    },
    required: ["year", "ticker_or_company"],
  },
};

const extractInfoArgumentsSchema = z.object({
  year: z.union([
    z.number().int(),
    z
      .string()
      .regex(/^\d{4}$/)
      .transform((value) => Number.parseInt(value, 10)),
  ]),
  ticker_or_company: z.string().trim().min(1),
});

export const buildIntentInstruction = (currentYear: number): string =>
  [
    "As an experienced investment analyst, extract the ticker of the company and the year mentioned in the input.",
    "If a company name is mentioned, use your knowledge as an analyst to output its ticker.",
    `If no specific time frame is given, use the current year, ${currentYear}.`,
    `For example, for 'latest microsoft earnings call' call extract_info with {"ticker_or_company": "MSFT", "year": ${currentYear}}.`,
  ].join(" ");

/**
 * Turns a free-text request into a (year, company) pair through a single tool-call round trip.
 * Model misfires are terminal: a malformed call is not a transient condition.
 */
export class IntentExtractionService {
  constructor(
    private readonly llm: LlmPort,
    private readonly clock: ClockPort,
  ) {}

  async extractIntent(
    query: string,
  ): Promise<Result<ExtractedIntent, PipelineError>> {
    const currentYear = this.clock.now().getUTCFullYear();

    const response = await this.llm.extractStructured({
      systemInstruction: buildIntentInstruction(currentYear),
      userContent: query,
      tool: EXTRACT_INFO_TOOL,
    });

    if (response.isErr()) {
      return err({
        stage: "intent",
        code: "intent_extraction_failed",
        message: `Language model did not return a usable ${EXTRACT_INFO_TOOL.name} call: ${response.error.message}`,
        cause: response.error,
      });
    }

    const parsed = extractInfoArgumentsSchema.safeParse(response.value);
    if (!parsed.success) {
      return err({
        stage: "intent",
        code: "intent_extraction_failed",
        message: `Tool call arguments were malformed: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
          .join("; ")}`,
        cause: parsed.error,
      });
    }

    return ok({
      year: parsed.data.year,
      companyReference: parsed.data.ticker_or_company,
    });
  }
}
