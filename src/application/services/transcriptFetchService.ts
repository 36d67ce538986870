import type { AppBoundaryError } from "../../core/entities/appError";
import type { Transcript } from "../../core/entities/earnings";
import type { TranscriptProviderPort } from "../../core/ports/inboundPorts";
import type {
  PipelineEventSinkPort,
  SleeperPort,
} from "../../core/ports/outboundPorts";
import {
  initialFetchState,
  nextFetchStep,
  type AttemptOutcome,
  type TranscriptFetchPolicy,
  type TranscriptFetchState,
} from "../../core/policies/transcriptFetchPolicy";

export type TranscriptFetchOutcome =
  | {
      status: "found";
      transcript: Transcript;
      requestedYear: number;
      yearsTried: number[];
      attempts: number;
    }
  | { status: "not_found"; yearsTried: number[]; attempts: number }
  | {
      status: "aborted";
      year: number;
      yearsTried: number[];
      attempts: number;
      reason: string;
    };

const toAttemptOutcome = (
  result: Awaited<ReturnType<TranscriptProviderPort["fetchTranscripts"]>>,
): AttemptOutcome => {
  if (result.isOk()) {
    const [first] = result.value;
    return first ? { kind: "found", transcript: first } : { kind: "empty" };
  }

  return toFailureOutcome(result.error);
};

const toFailureOutcome = (error: AppBoundaryError): AttemptOutcome =>
  error.code === "rate_limited"
    ? { kind: "rate_limited", retryAfterSeconds: error.retryAfterSeconds }
    : { kind: "failed", reason: error.message };

/**
 * Drives the two-level fetch machine: bounded transient retries per year, then a bounded walk
 * back through earlier years when a year has no transcript. All waits go through the sleeper.
 */
export class TranscriptFetchService {
  constructor(
    private readonly provider: TranscriptProviderPort,
    private readonly sleeper: SleeperPort,
    private readonly events: PipelineEventSinkPort,
    private readonly policy: TranscriptFetchPolicy,
  ) {}

  async fetchTranscript(
    symbol: string,
    year: number,
    maxAttempts = this.policy.maxAttempts,
    maxYearFallbacks = this.policy.maxYearFallbacks,
  ): Promise<TranscriptFetchOutcome> {
    const yearsTried: number[] = [];
    let attempts = 0;
    let state: TranscriptFetchState | null = initialFetchState(
      year,
      maxAttempts,
      maxYearFallbacks,
    );

    while (state) {
      const currentYear = state.fallback.year;
      if (yearsTried.at(-1) !== currentYear) {
        yearsTried.push(currentYear);
      }

      attempts += 1;
      this.events.emit({
        type: "transcript_attempt",
        symbol,
        year: currentYear,
        attempt: state.retry.attempt + 1,
        maxAttempts: state.retry.maxAttempts,
      });

      const outcome = toAttemptOutcome(
        await this.provider.fetchTranscripts({ symbol, year: currentYear }),
      );
      const step = nextFetchStep(state, outcome, this.policy);

      switch (step.kind) {
        case "found":
          this.events.emit({
            type: "transcript_found",
            symbol,
            year: currentYear,
            date: step.transcript.date,
          });
          return {
            status: "found",
            transcript: step.transcript,
            requestedYear: year,
            yearsTried,
            attempts,
          };
        case "fallback":
          this.events.emit({
            type: "transcript_year_empty",
            symbol,
            year: currentYear,
            nextYear: step.next.fallback.year,
          });
          state = step.next;
          break;
        case "not_found":
          this.events.emit({
            type: "transcript_year_empty",
            symbol,
            year: currentYear,
            nextYear: null,
          });
          state = null;
          break;
        case "wait":
          this.events.emit(
            step.cause === "rate_limited"
              ? {
                  type: "transcript_rate_limited",
                  symbol,
                  year: currentYear,
                  attempt: state.retry.attempt + 1,
                  maxAttempts: state.retry.maxAttempts,
                  retryInSeconds: step.delaySeconds,
                }
              : {
                  type: "transcript_request_failed",
                  symbol,
                  year: currentYear,
                  attempt: state.retry.attempt + 1,
                  maxAttempts: state.retry.maxAttempts,
                  retryInSeconds: step.delaySeconds,
                  reason: step.reason,
                },
          );
          await this.sleeper.sleep(step.delaySeconds * 1_000);

          if (!step.next) {
            this.events.emit({
              type: "transcript_aborted",
              symbol,
              year: currentYear,
              attempts: state.retry.maxAttempts,
              reason: step.reason,
            });
            return {
              status: "aborted",
              year: currentYear,
              yearsTried,
              attempts,
              reason: step.reason,
            };
          }

          state = step.next;
          break;
      }
    }

    this.events.emit({ type: "transcript_not_found", symbol, yearsTried });
    return { status: "not_found", yearsTried, attempts };
  }
}
