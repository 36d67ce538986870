import { describe, expect, it } from "vitest";
import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { Transcript } from "../../core/entities/earnings";
import type {
  TranscriptProviderPort,
  TranscriptRequest,
} from "../../core/ports/inboundPorts";
import type { SleeperPort } from "../../core/ports/outboundPorts";
import { DEFAULT_TRANSCRIPT_FETCH_POLICY } from "../../core/policies/transcriptFetchPolicy";
import { RecordingEventSink } from "../../infra/events/loggingEventSink";
import { TranscriptFetchService } from "./transcriptFetchService";

type ProviderResponse = Result<Transcript[], AppBoundaryError>;

class ScriptedTranscriptProvider implements TranscriptProviderPort {
  readonly requests: TranscriptRequest[] = [];

  constructor(
    private readonly respond: (
      request: TranscriptRequest,
      call: number,
    ) => ProviderResponse,
  ) {}

  async fetchTranscripts(request: TranscriptRequest): Promise<ProviderResponse> {
    this.requests.push(request);
    return this.respond(request, this.requests.length);
  }
}

class RecordingSleeper implements SleeperPort {
  readonly calls: number[] = [];

  async sleep(ms: number): Promise<void> {
    this.calls.push(ms);
  }
}

const transcriptFor = (year: number): Transcript => ({
  symbol: "AAPL",
  date: `${year}-08-01 17:00:00`,
  year,
  content: `Fiscal ${year} call`,
});

const rateLimited = (retryAfterSeconds?: number): ProviderResponse =>
  err({
    source: "transcripts",
    code: "rate_limited",
    provider: "fmp",
    message: "HTTP request failed with status 429.",
    retryable: true,
    httpStatus: 429,
    retryAfterSeconds,
  });

const transportError: ProviderResponse = err({
  source: "transcripts",
  code: "transport_error",
  provider: "fmp",
  message: "socket hang up",
  retryable: true,
});

const createService = (provider: TranscriptProviderPort) => {
  const sleeper = new RecordingSleeper();
  const events = new RecordingEventSink();
  const service = new TranscriptFetchService(
    provider,
    sleeper,
    events,
    DEFAULT_TRANSCRIPT_FETCH_POLICY,
  );
  return { service, sleeper, events };
};

describe("TranscriptFetchService", () => {
  it("waits out two rate limits and returns the transcript from the third attempt", async () => {
    const provider = new ScriptedTranscriptProvider((request, call) =>
      call <= 2 ? rateLimited(2) : ok([transcriptFor(request.year)]),
    );
    const { service, sleeper } = createService(provider);

    const outcome = await service.fetchTranscript("AAPL", 2024);

    expect(outcome).toEqual({
      status: "found",
      transcript: transcriptFor(2024),
      requestedYear: 2024,
      yearsTried: [2024],
      attempts: 3,
    });
    expect(sleeper.calls).toEqual([2_000, 2_000]);
    expect(provider.requests.map((request) => request.year)).toEqual([
      2024, 2024, 2024,
    ]);
  });

  it("falls back two years without transient retries when earlier years are empty", async () => {
    const provider = new ScriptedTranscriptProvider((request) =>
      request.year === 2022 ? ok([transcriptFor(2022)]) : ok([]),
    );
    const { service, sleeper, events } = createService(provider);

    const outcome = await service.fetchTranscript("AAPL", 2024, 5, 3);

    expect(outcome.status).toBe("found");
    if (outcome.status !== "found") {
      throw new Error("expected transcript");
    }

    expect(outcome.transcript).toEqual(transcriptFor(2022));
    expect(outcome.yearsTried).toEqual([2024, 2023, 2022]);
    expect(sleeper.calls).toEqual([]);
    expect(provider.requests).toEqual([
      { symbol: "AAPL", year: 2024 },
      { symbol: "AAPL", year: 2023 },
      { symbol: "AAPL", year: 2022 },
    ]);
    expect(events.events).toEqual([
      { type: "transcript_attempt", symbol: "AAPL", year: 2024, attempt: 1, maxAttempts: 5 },
      { type: "transcript_year_empty", symbol: "AAPL", year: 2024, nextYear: 2023 },
      { type: "transcript_attempt", symbol: "AAPL", year: 2023, attempt: 1, maxAttempts: 5 },
      { type: "transcript_year_empty", symbol: "AAPL", year: 2023, nextYear: 2022 },
      { type: "transcript_attempt", symbol: "AAPL", year: 2022, attempt: 1, maxAttempts: 5 },
      { type: "transcript_found", symbol: "AAPL", year: 2022, date: "2022-08-01 17:00:00" },
    ]);
  });

  it("aborts after five transport failures with exponential waits and no year fallback", async () => {
    const provider = new ScriptedTranscriptProvider(() => transportError);
    const { service, sleeper, events } = createService(provider);

    const outcome = await service.fetchTranscript("AAPL", 2024, 5, 3);

    expect(outcome).toEqual({
      status: "aborted",
      year: 2024,
      yearsTried: [2024],
      attempts: 5,
      reason: "socket hang up",
    });
    expect(provider.requests).toHaveLength(5);
    expect(provider.requests.every((request) => request.year === 2024)).toBe(true);
    expect(sleeper.calls).toEqual([1_000, 2_000, 4_000, 8_000, 16_000]);
    expect(events.events.at(-1)).toEqual({
      type: "transcript_aborted",
      symbol: "AAPL",
      year: 2024,
      attempts: 5,
      reason: "socket hang up",
    });
  });

  it("returns not found after all candidate years are empty and stops calling", async () => {
    const provider = new ScriptedTranscriptProvider(() => ok([]));
    const { service, sleeper, events } = createService(provider);

    const outcome = await service.fetchTranscript("AAPL", 2024, 5, 3);

    expect(outcome).toEqual({
      status: "not_found",
      yearsTried: [2024, 2023, 2022],
      attempts: 3,
    });
    expect(provider.requests).toHaveLength(3);
    expect(sleeper.calls).toEqual([]);
    expect(events.events.at(-1)).toEqual({
      type: "transcript_not_found",
      symbol: "AAPL",
      yearsTried: [2024, 2023, 2022],
    });
  });

  it("waits the default five seconds when Retry-After is missing", async () => {
    const provider = new ScriptedTranscriptProvider((request, call) =>
      call === 1 ? rateLimited() : ok([transcriptFor(request.year)]),
    );
    const { service, sleeper } = createService(provider);

    const outcome = await service.fetchTranscript("AAPL", 2024);

    expect(outcome.status).toBe("found");
    expect(sleeper.calls).toEqual([5_000]);
  });

  it("aborts when rate limiting persists through the attempt budget", async () => {
    const provider = new ScriptedTranscriptProvider(() => rateLimited(1));
    const { service, sleeper } = createService(provider);

    const outcome = await service.fetchTranscript("AAPL", 2024, 3, 3);

    expect(outcome).toEqual({
      status: "aborted",
      year: 2024,
      yearsTried: [2024],
      attempts: 3,
      reason: "rate limit exceeded",
    });
    expect(sleeper.calls).toEqual([1_000, 1_000, 1_000]);
  });

  it("retries other error statuses with backoff, then continues the year walk", async () => {
    const provider = new ScriptedTranscriptProvider((request, call) => {
      if (call === 1) {
        return err({
          source: "transcripts",
          code: "provider_error",
          provider: "fmp",
          message: "HTTP request failed with status 500.",
          retryable: true,
          httpStatus: 500,
        });
      }

      return request.year === 2023 ? ok([transcriptFor(2023)]) : ok([]);
    });
    const { service, sleeper } = createService(provider);

    const outcome = await service.fetchTranscript("AAPL", 2024);

    expect(outcome).toEqual({
      status: "found",
      transcript: transcriptFor(2023),
      requestedYear: 2024,
      yearsTried: [2024, 2023],
      attempts: 3,
    });
    expect(sleeper.calls).toEqual([1_000]);
  });

  it("returns the first transcript of a non-empty batch", async () => {
    const provider = new ScriptedTranscriptProvider(() =>
      ok([transcriptFor(2024), { ...transcriptFor(2024), date: "2024-05-02 17:00:00" }]),
    );
    const { service } = createService(provider);

    const outcome = await service.fetchTranscript("AAPL", 2024);

    expect(outcome.status === "found" && outcome.transcript.date).toBe(
      "2024-08-01 17:00:00",
    );
  });

  it("makes no calls when the year budget is zero", async () => {
    const provider = new ScriptedTranscriptProvider(() => ok([transcriptFor(2024)]));
    const { service } = createService(provider);

    const outcome = await service.fetchTranscript("AAPL", 2024, 5, 0);

    expect(outcome).toEqual({ status: "not_found", yearsTried: [], attempts: 0 });
    expect(provider.requests).toHaveLength(0);
  });
});
