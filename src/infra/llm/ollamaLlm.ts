import type {
  CompletionRequest,
  LlmPort,
  StructuredExtractionRequest,
} from "../../core/ports/outboundPorts";
import type { AppBoundaryError } from "../../core/entities/appError";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { HttpJsonClient } from "../http/httpJsonClient";
import { toBoundaryError } from "../http/boundaryErrors";

const ollamaChatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().nullish(),
      tool_calls: z
        .array(
          z.object({
            function: z
              .object({ name: z.string().optional(), arguments: z.unknown() })
              .optional(),
          }),
        )
        .nullish(),
    })
    .optional(),
});

type OllamaChatResponse = z.infer<typeof ollamaChatResponseSchema>;

type OllamaMessage = { role: "system" | "user"; content: string };

/**
 * Encapsulates chat-model access so extraction and analysis stay portable across LLM providers.
 */
export class OllamaLlm implements LlmPort {
  constructor(
    private readonly baseUrl: string,
    private readonly model: string,
    private readonly timeoutMs = 15_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  /**
   * Ollama returns tool arguments already decoded, so they pass through unparsed.
   */
  async extractStructured(
    request: StructuredExtractionRequest,
  ): Promise<Result<unknown, AppBoundaryError>> {
    const response = await this.chat(
      [
        { role: "system", content: request.systemInstruction },
        { role: "user", content: request.userContent },
      ],
      {
        tools: [
          {
            type: "function",
            function: {
              name: request.tool.name,
              description: request.tool.description,
              parameters: request.tool.parameters,
            },
          },
        ],
        options: { temperature: 0 },
      },
    );

    if (response.isErr()) {
      return err(response.error);
    }

    const call = response.value.message?.tool_calls?.find(
      (candidate) => candidate.function?.name === request.tool.name,
    );
    if (!call?.function || call.function.arguments === undefined) {
      return err({
        source: "llm",
        code: "malformed_response",
        provider: "ollama",
        message: `Ollama chat payload did not contain a ${request.tool.name} tool call.`,
        retryable: false,
      });
    }

    return ok(call.function.arguments);
  }

  async complete(
    request: CompletionRequest,
  ): Promise<Result<string, AppBoundaryError>> {
    const response = await this.chat(
      [
        { role: "system", content: request.systemInstruction },
        { role: "user", content: request.userContent },
      ],
      {
        options: {
          temperature: request.temperature,
          num_predict: request.maxTokens,
        },
      },
    );

    if (response.isErr()) {
      return err(response.error);
    }

    const content = response.value.message?.content?.trim();
    if (!content) {
      return err({
        source: "llm",
        code: "malformed_response",
        provider: "ollama",
        message: "Ollama chat payload did not contain message.content.",
        retryable: false,
      });
    }

    return ok(content);
  }

  private async chat(
    messages: OllamaMessage[],
    extra: Record<string, unknown>,
  ): Promise<Result<OllamaChatResponse, AppBoundaryError>> {
    const response = await this.httpClient.requestJson({
      url: `${this.baseUrl}/api/chat`,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: {
        model: this.model,
        stream: false,
        messages,
        ...extra,
      },
      timeoutMs: this.timeoutMs,
    });

    if (response.isErr()) {
      return err(toBoundaryError("llm", "ollama", response.error));
    }

    const parsed = ollamaChatResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err({
        source: "llm",
        code: "malformed_response",
        provider: "ollama",
        message: "Ollama chat payload was not a chat response object.",
        retryable: false,
        cause: parsed.error,
      });
    }

    return ok(parsed.data);
  }
}
