import type { Logger } from "pino";
import type { PipelineEvent } from "../../core/entities/events";
import type { PipelineEventSinkPort } from "../../core/ports/outboundPorts";

const WARN_EVENTS = new Set<PipelineEvent["type"]>([
  "transcript_rate_limited",
  "transcript_request_failed",
  "transcript_year_empty",
  "transcript_not_found",
  "transcript_aborted",
  "ticker_unresolved",
]);

/**
 * Writes every pipeline event as one structured log line.
 */
export class LoggingEventSink implements PipelineEventSinkPort {
  constructor(private readonly log: Logger) {}

  emit(event: PipelineEvent): void {
    if (WARN_EVENTS.has(event.type)) {
      this.log.warn({ event }, event.type);
      return;
    }

    this.log.info({ event }, event.type);
  }
}

/**
 * Forwards events to several subscribers, e.g. the log and a terminal progress view.
 */
export class FanOutEventSink implements PipelineEventSinkPort {
  constructor(private readonly sinks: PipelineEventSinkPort[]) {}

  emit(event: PipelineEvent): void {
    this.sinks.forEach((sink) => sink.emit(event));
  }
}

/**
 * Keeps events in memory; used by tests and callers that poll instead of subscribing.
 */
export class RecordingEventSink implements PipelineEventSinkPort {
  readonly events: PipelineEvent[] = [];

  emit(event: PipelineEvent): void {
    this.events.push(event);
  }
}
