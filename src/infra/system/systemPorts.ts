import type { ClockPort, SleeperPort } from "../../core/ports/outboundPorts";

/**
 * Adapts wall-clock access so time-sensitive logic remains deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

/**
 * Real backoff waits; tests swap in a recording sleeper so retry schedules run instantly.
 */
export class TimerSleeper implements SleeperPort {
  async sleep(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
