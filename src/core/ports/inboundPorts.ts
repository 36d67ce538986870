import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { PricePoint, Transcript } from "../entities/earnings";

export type CompanySearchRequest = {
  query: string;
  limit: number;
};

export type CompanySearchMatch = {
  symbol: string;
  name: string;
  exchange?: string;
  currency?: string;
};

export type TranscriptRequest = {
  symbol: string;
  year: number;
};

export type PriceSeriesRequest = {
  symbol: string;
  from: Date;
  to: Date;
};

export interface CompanySearchProviderPort {
  searchCompanies(
    request: CompanySearchRequest,
  ): Promise<Result<CompanySearchMatch[], AppBoundaryError>>;
}

/**
 * One call per attempt: implementations must not retry, the transcript fetcher owns retry policy.
 * An empty list means no transcript exists for the year; rate limits surface as `rate_limited` errors.
 */
export interface TranscriptProviderPort {
  fetchTranscripts(
    request: TranscriptRequest,
  ): Promise<Result<Transcript[], AppBoundaryError>>;
}

export interface PriceSeriesProviderPort {
  fetchDailyCloses(
    request: PriceSeriesRequest,
  ): Promise<Result<PricePoint[], AppBoundaryError>>;
}
