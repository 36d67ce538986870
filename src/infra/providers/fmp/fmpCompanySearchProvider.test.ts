import { afterEach, describe, expect, it } from "vitest";
import { FmpCompanySearchProvider } from "./fmpCompanySearchProvider";

const originalFetch = globalThis.fetch;

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  globalThis.fetch = handler as typeof fetch;
};

afterEach(() => {
  globalThis.fetch = originalFetch;
});

describe("FmpCompanySearchProvider", () => {
  it("maps search payload into company matches", async () => {
    let requestedUrl = "";
    setFetch(async (input) => {
      requestedUrl = String(input);
      return new Response(
        JSON.stringify([
          {
            symbol: "AAPL",
            name: "Apple Inc.",
            currency: "USD",
            stockExchange: "NASDAQ Global Select",
            exchangeShortName: "NASDAQ",
          },
        ]),
        { status: 200 },
      );
    });

    const provider = new FmpCompanySearchProvider(
      "https://fmp.test",
      "test-key",
      1_000,
    );
    const result = await provider.searchCompanies({ query: "Apple", limit: 1 });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value).toEqual([
      { symbol: "AAPL", name: "Apple Inc.", exchange: "NASDAQ", currency: "USD" },
    ]);
    expect(requestedUrl).toBe(
      "https://fmp.test/api/v3/search?query=Apple&limit=1&apikey=test-key",
    );
  });

  it("skips records without a symbol", async () => {
    setFetch(
      async () =>
        new Response(JSON.stringify([{ name: "Nameless" }, { symbol: "MSFT" }]), {
          status: 200,
        }),
    );

    const provider = new FmpCompanySearchProvider("https://fmp.test", "test-key");
    const result = await provider.searchCompanies({ query: "micro", limit: 5 });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value).toEqual([
      { symbol: "MSFT", name: "MSFT", exchange: undefined, currency: undefined },
    ]);
  });

  it("maps non-success responses into boundary errors", async () => {
    setFetch(async () => new Response("forbidden", { status: 403 }));

    const provider = new FmpCompanySearchProvider("https://fmp.test", "test-key");
    const result = await provider.searchCompanies({ query: "Apple", limit: 1 });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected auth error");
    }

    expect(result.error).toMatchObject({
      source: "company_search",
      code: "auth_invalid",
      provider: "fmp",
      httpStatus: 403,
    });
  });

  it("requires an api key", () => {
    expect(() => new FmpCompanySearchProvider("https://fmp.test", "")).toThrow(
      "FMP_API_KEY is required when DATA_PROVIDER is set to fmp.",
    );
  });
});
