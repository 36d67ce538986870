import type { EarningsCallReport } from "../core/entities/earnings";
import type { PipelineEvent } from "../core/entities/events";

/**
 * Renders a report for the terminal: header, notices, chart, analysis, then optionally the transcript.
 */
export const formatEarningsReport = (
  report: EarningsCallReport,
  chartLines: string[],
  options: { includeTranscript: boolean },
): string => {
  const lines: string[] = [];

  lines.push(
    `Transcript Analysis for ${report.transcript.symbol} - ${report.transcript.date}`,
  );
  report.notices.forEach((notice) => lines.push(`Note: ${notice}`));
  if (report.transcript.year !== report.requestedYear) {
    lines.push(
      `Note: No transcript for ${report.requestedYear}; showing ${report.transcript.year}.`,
    );
  }

  lines.push("");
  lines.push(...chartLines);
  lines.push("");
  lines.push("AI Analysis:");
  lines.push(report.analysis);

  lines.push("");
  if (options.includeTranscript) {
    lines.push("Full Transcript:");
    lines.push(report.transcript.content);
  } else {
    lines.push("(Re-run with --transcript to view the full transcript.)");
  }

  return lines.join("\n");
};

/**
 * Progress line for an event, or null for events that are only logged.
 */
export const describePipelineEvent = (event: PipelineEvent): string | null => {
  switch (event.type) {
    case "transcript_rate_limited":
      return `Rate limit exceeded. Retrying after ${event.retryInSeconds} seconds... (Attempt ${event.attempt}/${event.maxAttempts})`;
    case "transcript_request_failed":
      return `Request failed: ${event.reason} (Attempt ${event.attempt}/${event.maxAttempts}, waiting ${event.retryInSeconds}s)`;
    case "transcript_year_empty":
      return event.nextYear === null
        ? `No transcripts found for ${event.year}.`
        : `No transcripts found for ${event.year}. Trying ${event.nextYear}...`;
    case "transcript_not_found":
      return "Max retries for year reduction exceeded. No data found.";
    case "transcript_aborted":
      return `Giving up on ${event.symbol} ${event.year} after ${event.attempts} attempts.`;
    case "year_defaulted":
    case "ticker_resolved":
    case "ticker_unresolved":
    case "transcript_attempt":
    case "transcript_found":
      return null;
  }
};
