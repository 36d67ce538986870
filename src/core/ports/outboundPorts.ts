import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { PriceWindow } from "../entities/earnings";
import type { PipelineEvent } from "../entities/events";

export type ToolDefinition = {
  name: string;
  description: string;
  /** JSON schema of the tool arguments. */
  parameters: Record<string, unknown>;
};

export type StructuredExtractionRequest = {
  systemInstruction: string;
  userContent: string;
  tool: ToolDefinition;
};

export type CompletionRequest = {
  systemInstruction: string;
  userContent: string;
  temperature: number;
  maxTokens: number;
};

export interface LlmPort {
  /**
   * Resolves to the raw arguments of the tool call the model made; callers validate the shape.
   */
  extractStructured(
    request: StructuredExtractionRequest,
  ): Promise<Result<unknown, AppBoundaryError>>;
  complete(request: CompletionRequest): Promise<Result<string, AppBoundaryError>>;
}

export interface ClockPort {
  now(): Date;
}

export interface SleeperPort {
  sleep(ms: number): Promise<void>;
}

export interface PipelineEventSinkPort {
  emit(event: PipelineEvent): void;
}

export interface ChartRendererPort {
  render(window: PriceWindow): string[];
}
