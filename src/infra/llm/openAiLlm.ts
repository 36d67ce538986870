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

const openAiChatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  type: z.string().optional(),
                  function: z
                    .object({
                      name: z.string().optional(),
                      arguments: z.string().optional(),
                    })
                    .optional(),
                }),
              )
              .nullish(),
          })
          .optional(),
      }),
    )
    .optional(),
});

type OpenAiChatResponse = z.infer<typeof openAiChatResponseSchema>;

/**
 * Talks to an OpenAI-compatible chat-completions endpoint.
 */
export class OpenAiLlm implements LlmPort {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly model: string,
    private readonly timeoutMs = 60_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error(
        "OPENAI_API_KEY is required when LLM_PROVIDER is set to openai.",
      );
    }
  }

  /**
   * Forces the named tool; its arguments arrive as a JSON string and are decoded here.
   */
  async extractStructured(
    request: StructuredExtractionRequest,
  ): Promise<Result<unknown, AppBoundaryError>> {
    const response = await this.chat({
      messages: [
        { role: "system", content: request.systemInstruction },
        { role: "user", content: request.userContent },
      ],
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
      tool_choice: { type: "function", function: { name: request.tool.name } },
    });

    if (response.isErr()) {
      return err(response.error);
    }

    const rawArguments =
      response.value.choices?.[0]?.message?.tool_calls?.[0]?.function
        ?.arguments;
    if (rawArguments === undefined) {
      return err({
        source: "llm",
        code: "malformed_response",
        provider: "openai",
        message: "Chat completion did not contain a tool call.",
        retryable: false,
      });
    }

    try {
      const parsed: unknown = JSON.parse(rawArguments);
      return ok(parsed);
    } catch (parseError) {
      return err({
        source: "llm",
        code: "invalid_json",
        provider: "openai",
        message: "Tool call arguments were not valid JSON.",
        retryable: false,
        cause: parseError,
      });
    }
  }

  async complete(
    request: CompletionRequest,
  ): Promise<Result<string, AppBoundaryError>> {
    const response = await this.chat({
      messages: [
        { role: "system", content: request.systemInstruction },
        { role: "user", content: request.userContent },
      ],
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    });

    if (response.isErr()) {
      return err(response.error);
    }

    const content = response.value.choices?.[0]?.message?.content?.trim();
    if (!content) {
      return err({
        source: "llm",
        code: "malformed_response",
        provider: "openai",
        message: "Chat completion did not contain message content.",
        retryable: false,
      });
    }

    return ok(content);
  }

  private async chat(
    body: Record<string, unknown>,
  ): Promise<Result<OpenAiChatResponse, AppBoundaryError>> {
    const response = await this.httpClient.requestJson({
      url: new URL("/v1/chat/completions", this.baseUrl).toString(),
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.apiKey}`,
      },
      body: { model: this.model, ...body },
      timeoutMs: this.timeoutMs,
    });

    if (response.isErr()) {
      return err(toBoundaryError("llm", "openai", response.error));
    }

    const parsed = openAiChatResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err({
        source: "llm",
        code: "malformed_response",
        provider: "openai",
        message: "Chat completion payload was not a chat response object.",
        retryable: false,
        cause: parsed.error,
      });
    }

    return ok(parsed.data);
  }
}
