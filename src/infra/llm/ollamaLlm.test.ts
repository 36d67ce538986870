import { afterEach, describe, expect, it } from "vitest";
import { OllamaLlm } from "./ollamaLlm";

const originalFetch = globalThis.fetch;

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  globalThis.fetch = handler as typeof fetch;
};

afterEach(() => {
  globalThis.fetch = originalFetch;
});

const tool = {
  name: "extract_info",
  description: "Extract the year and ticker/company name from the user input",
  parameters: { type: "object", properties: {} },
};

describe("OllamaLlm", () => {
  it("returns decoded tool arguments from the matching tool call", async () => {
    let requestBody: unknown;
    let requestedUrl = "";
    setFetch(async (input, init) => {
      requestedUrl = String(input);
      requestBody = JSON.parse(String(init?.body));
      return new Response(
        JSON.stringify({
          message: {
            content: "",
            tool_calls: [
              {
                function: {
                  name: "extract_info",
                  arguments: { year: 2023, ticker_or_company: "Apple" },
                },
              },
            ],
          },
        }),
        { status: 200 },
      );
    });

    const llm = new OllamaLlm("http://ollama.test", "test-model", 1_000);
    const result = await llm.extractStructured({
      systemInstruction: "extract",
      userContent: "apple 2023",
      tool,
    });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value).toEqual({ year: 2023, ticker_or_company: "Apple" });
    expect(requestedUrl).toBe("http://ollama.test/api/chat");
    expect(requestBody).toEqual({
      model: "test-model",
      stream: false,
      messages: [
        { role: "system", content: "extract" },
        { role: "user", content: "apple 2023" },
      ],
      tools: [
        {
          type: "function",
          function: {
            name: "extract_info",
            description: tool.description,
            parameters: tool.parameters,
          },
        },
      ],
      options: { temperature: 0 },
    });
  });

  it("reports a malformed response when the model answers without a tool call", async () => {
    setFetch(
      async () =>
        new Response(JSON.stringify({ message: { content: "AAPL, 2024" } }), {
          status: 200,
        }),
    );

    const llm = new OllamaLlm("http://ollama.test", "test-model", 1_000);
    const result = await llm.extractStructured({
      systemInstruction: "extract",
      userContent: "apple",
      tool,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected malformed response");
    }

    expect(result.error.code).toBe("malformed_response");
    expect(result.error.retryable).toBe(false);
  });

  it("sends sampling options and trims completion content", async () => {
    let requestBody: unknown;
    setFetch(async (_input, init) => {
      requestBody = JSON.parse(String(init?.body));
      return new Response(
        JSON.stringify({ message: { content: "  Balanced view.  " } }),
        { status: 200 },
      );
    });

    const llm = new OllamaLlm("http://ollama.test", "test-model", 1_000);
    const result = await llm.complete({
      systemInstruction: "rubric",
      userContent: "transcript",
      temperature: 0.2,
      maxTokens: 2000,
    });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value).toBe("Balanced view.");
    expect(requestBody).toMatchObject({
      options: { temperature: 0.2, num_predict: 2000 },
    });
  });

  it("maps auth failures to auth_invalid", async () => {
    setFetch(async () => new Response("denied", { status: 401 }));

    const llm = new OllamaLlm("http://ollama.test", "test-model", 1_000);
    const result = await llm.complete({
      systemInstruction: "rubric",
      userContent: "transcript",
      temperature: 0.2,
      maxTokens: 10,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected auth error");
    }

    expect(result.error.source).toBe("llm");
    expect(result.error.code).toBe("auth_invalid");
    expect(result.error.httpStatus).toBe(401);
  });

  it("reports a non-object chat payload as malformed for both calls", async () => {
    setFetch(async () => new Response("null", { status: 200 }));

    const llm = new OllamaLlm("http://ollama.test", "test-model", 1_000);
    const extraction = await llm.extractStructured({
      systemInstruction: "extract",
      userContent: "apple 2023",
      tool,
    });
    const completion = await llm.complete({
      systemInstruction: "rubric",
      userContent: "transcript",
      temperature: 0.2,
      maxTokens: 10,
    });

    expect(extraction.isErr() && extraction.error.code).toBe(
      "malformed_response",
    );
    expect(completion.isErr() && completion.error.code).toBe(
      "malformed_response",
    );
  });
});
