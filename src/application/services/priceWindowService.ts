import type { PriceWindow } from "../../core/entities/earnings";
import type { PriceSeriesProviderPort } from "../../core/ports/inboundPorts";
import type { ClockPort } from "../../core/ports/outboundPorts";
import {
  addDays,
  parseCallDate,
  toIsoDate,
} from "../../infra/providers/utils/dateUtils";

/**
 * Loads the closing-price series bracketing a call date for charting.
 * Failures degrade to an unavailable window; the chart is never a reason to fail a report.
 */
export class PriceWindowService {
  constructor(
    private readonly prices: PriceSeriesProviderPort,
    private readonly clock: ClockPort,
    private readonly windowDays: number,
  ) {}

  async loadPriceWindow(symbol: string, callDate: string): Promise<PriceWindow> {
    const marker = parseCallDate(callDate);
    if (!marker) {
      return {
        symbol,
        from: "",
        to: "",
        marker: callDate,
        points: [],
        status: "unavailable",
        reason: `Unrecognized call date '${callDate}'.`,
      };
    }

    const now = this.clock.now();
    const from = addDays(marker, -this.windowDays);
    const windowEnd = addDays(marker, this.windowDays);
    const to = windowEnd.getTime() < now.getTime() ? windowEnd : now;

    const base = {
      symbol,
      from: toIsoDate(from),
      to: toIsoDate(to),
      marker: toIsoDate(marker),
    };

    const result = await this.prices.fetchDailyCloses({ symbol, from, to });
    if (result.isErr()) {
      return {
        ...base,
        points: [],
        status: "unavailable",
        reason: result.error.message,
      };
    }

    if (result.value.length === 0) {
      return {
        ...base,
        points: [],
        status: "unavailable",
        reason: "No prices returned for the window.",
      };
    }

    return { ...base, points: result.value, status: "ok" };
  }
}
