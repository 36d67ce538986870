/**
 * Describes canonical error categories used at clean-architecture boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "rate_limited"
  | "auth_invalid"
  | "config_invalid"
  | "provider_error"
  | "transport_error"
  | "malformed_response"
  | "invalid_json"
  | "validation_error";

export type AppBoundarySource = "llm" | "company_search" | "transcripts" | "prices";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 */
export type AppBoundaryError = {
  source: AppBoundarySource;
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  retryAfterSeconds?: number;
  cause?: unknown;
};

export type PipelineStage = "intent" | "transcript" | "analysis";

export type PipelineErrorCode =
  | "intent_extraction_failed"
  | "transcript_not_found"
  | "transcript_fetch_aborted"
  | "analysis_failed";

/**
 * Terminal failure of one report run; only one is ever surfaced per request.
 */
export type PipelineError = {
  stage: PipelineStage;
  code: PipelineErrorCode;
  message: string;
  cause?: unknown;
};

export const UNABLE_TO_FETCH_MESSAGE =
  "Unable to fetch or analyze the transcript. Please try a different query.";

/**
 * Collapses pipeline failures into the single notice shown to end users.
 * Not-found and aborted fetches are logged apart but read the same.
 */
export const toUserMessage = (error: PipelineError): string => {
  switch (error.code) {
    case "intent_extraction_failed":
      return "Could not understand which company or year to analyze. Please rephrase the query.";
    case "transcript_not_found":
    case "transcript_fetch_aborted":
    case "analysis_failed":
      return UNABLE_TO_FETCH_MESSAGE;
  }
};
