import type { Transcript } from "../entities/earnings";

export type TranscriptFetchPolicy = {
  maxAttempts: number;
  maxYearFallbacks: number;
  defaultRetryAfterSeconds: number;
};

export const DEFAULT_TRANSCRIPT_FETCH_POLICY: TranscriptFetchPolicy = {
  maxAttempts: 5,
  maxYearFallbacks: 3,
  defaultRetryAfterSeconds: 5,
};

/**
 * Attempt budget at the year currently being fetched; `attempt` is zero-based.
 */
export type TransientRetryState = {
  attempt: number;
  maxAttempts: number;
};

/**
 * Year walk; `yearsTried` counts the current year.
 */
export type YearFallbackState = {
  year: number;
  yearsTried: number;
  maxYears: number;
};

export type TranscriptFetchState = {
  retry: TransientRetryState;
  fallback: YearFallbackState;
};

export type AttemptOutcome =
  | { kind: "found"; transcript: Transcript }
  | { kind: "empty" }
  | { kind: "rate_limited"; retryAfterSeconds?: number }
  | { kind: "failed"; reason: string };

/**
 * `next: null` on a wait means the attempt budget is spent: wait out the backoff, then abort.
 */
export type FetchTransition =
  | { kind: "found"; transcript: Transcript }
  | {
      kind: "wait";
      cause: "rate_limited" | "request_failed";
      delaySeconds: number;
      reason: string;
      next: TranscriptFetchState | null;
    }
  | { kind: "fallback"; next: TranscriptFetchState }
  | { kind: "not_found" };

export const initialFetchState = (
  year: number,
  maxAttempts: number,
  maxYearFallbacks: number,
): TranscriptFetchState | null => {
  if (maxAttempts < 1 || maxYearFallbacks < 1) {
    return null;
  }

  return {
    retry: { attempt: 0, maxAttempts },
    fallback: { year, yearsTried: 1, maxYears: maxYearFallbacks },
  };
};

export const exponentialBackoffSeconds = (attempt: number): number =>
  2 ** attempt;

const consumeAttempt = (
  state: TranscriptFetchState,
): TranscriptFetchState | null => {
  const attempt = state.retry.attempt + 1;
  if (attempt >= state.retry.maxAttempts) {
    return null;
  }

  return { ...state, retry: { ...state.retry, attempt } };
};

const fallBackOneYear = (
  state: TranscriptFetchState,
): TranscriptFetchState | null => {
  if (state.fallback.yearsTried >= state.fallback.maxYears) {
    return null;
  }

  return {
    retry: { attempt: 0, maxAttempts: state.retry.maxAttempts },
    fallback: {
      ...state.fallback,
      year: state.fallback.year - 1,
      yearsTried: state.fallback.yearsTried + 1,
    },
  };
};

/**
 * Pure transition of the two-level fetch machine. Transient outcomes spend the attempt
 * budget of the current year; an empty result moves straight to the previous year.
 */
export const nextFetchStep = (
  state: TranscriptFetchState,
  outcome: AttemptOutcome,
  policy: Pick<TranscriptFetchPolicy, "defaultRetryAfterSeconds">,
): FetchTransition => {
  switch (outcome.kind) {
    case "found":
      return { kind: "found", transcript: outcome.transcript };
    case "empty": {
      const next = fallBackOneYear(state);
      return next ? { kind: "fallback", next } : { kind: "not_found" };
    }
    case "rate_limited":
      return {
        kind: "wait",
        cause: "rate_limited",
        delaySeconds: outcome.retryAfterSeconds ?? policy.defaultRetryAfterSeconds,
        reason: "rate limit exceeded",
        next: consumeAttempt(state),
      };
    case "failed":
      return {
        kind: "wait",
        cause: "request_failed",
        delaySeconds: exponentialBackoffSeconds(state.retry.attempt),
        reason: outcome.reason,
        next: consumeAttempt(state),
      };
  }
};
