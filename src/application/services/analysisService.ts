import { err, ok, type Result } from "neverthrow";
import type { PipelineError } from "../../core/entities/appError";
import type { Transcript } from "../../core/entities/earnings";
import type { LlmPort } from "../../core/ports/outboundPorts";

export const ANALYSIS_INSTRUCTION = `You are an experienced investment analyst with years of experience in analyzing earnings call transcripts. Your task is to:
1. Extract the speakers and their positions from the earnings call transcript.
2. Summarize the key points discussed in the call.
3. Provide an opinion on the prospects for the company based on the call.
4. Be aware of and adjust for the inherent positive bias often present in these transcripts.
5. Highlight any potential red flags or areas of concern, even if they're subtly mentioned.
6. Provide a balanced view, considering both positive and negative aspects discussed.
7. Summarize the questions asked.

Your analysis should be insightful, critical, and unbiased. Don't hesitate to point out inconsistencies or vague statements in the transcript.`;

export type AnalysisSettings = {
  temperature: number;
  maxTokens: number;
};

export const buildAnalysisPrompt = (transcript: Transcript): string =>
  `Please analyze this earnings call transcript and provide your insights:\n\n${transcript.content}`;

/**
 * Produces the critical summary of a transcript with a low-temperature, length-capped completion.
 */
export class AnalysisService {
  constructor(
    private readonly llm: LlmPort,
    private readonly settings: AnalysisSettings,
  ) {}

  async analyze(transcript: Transcript): Promise<Result<string, PipelineError>> {
    if (!transcript.content.trim()) {
      return err({
        stage: "analysis",
        code: "analysis_failed",
        message: `Transcript for ${transcript.symbol} on ${transcript.date} has no content to analyze.`,
      });
    }

    const response = await this.llm.complete({
      systemInstruction: ANALYSIS_INSTRUCTION,
      userContent: buildAnalysisPrompt(transcript),
      temperature: this.settings.temperature,
      maxTokens: this.settings.maxTokens,
    });

    if (response.isErr()) {
      return err({
        stage: "analysis",
        code: "analysis_failed",
        message: `Analysis completion failed: ${response.error.message}`,
        cause: response.error,
      });
    }

    const analysis = response.value.trim();
    if (!analysis) {
      return err({
        stage: "analysis",
        code: "analysis_failed",
        message: "Analysis completion returned empty content.",
      });
    }

    return ok(analysis);
  }
}
