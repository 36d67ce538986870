/**
 * Progress and degradation signals emitted while a report run executes.
 * Presentation layers subscribe through `PipelineEventSinkPort` instead of the core writing to a UI.
 */
export type TranscriptFetchEvent =
  | {
      type: "transcript_attempt";
      symbol: string;
      year: number;
      attempt: number;
      maxAttempts: number;
    }
  | {
      type: "transcript_rate_limited";
      symbol: string;
      year: number;
      attempt: number;
      maxAttempts: number;
      retryInSeconds: number;
    }
  | {
      type: "transcript_request_failed";
      symbol: string;
      year: number;
      attempt: number;
      maxAttempts: number;
      retryInSeconds: number;
      reason: string;
    }
  | {
      type: "transcript_year_empty";
      symbol: string;
      year: number;
      nextYear: number | null;
    }
  | {
      type: "transcript_found";
      symbol: string;
      year: number;
      date: string;
    }
  | {
      type: "transcript_not_found";
      symbol: string;
      yearsTried: number[];
    }
  | {
      type: "transcript_aborted";
      symbol: string;
      year: number;
      attempts: number;
      reason: string;
    };

export type PipelineEvent =
  | TranscriptFetchEvent
  | { type: "year_defaulted"; year: number }
  | { type: "ticker_resolved"; reference: string; symbol: string }
  | { type: "ticker_unresolved"; reference: string; reason: string };
