import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { PricePoint } from "../../../core/entities/earnings";
import type {
  PriceSeriesProviderPort,
  PriceSeriesRequest,
} from "../../../core/ports/inboundPorts";
import { addDays, toIsoDate } from "../utils/dateUtils";

/**
 * Emits a deterministic weekday wave so chart rendering can be exercised without market data.
 */
export class MockPriceSeriesProvider implements PriceSeriesProviderPort {
  async fetchDailyCloses(
    request: PriceSeriesRequest,
  ): Promise<Result<PricePoint[], AppBoundaryError>> {
    const points: PricePoint[] = [];

    for (
      let day = new Date(request.from), index = 0;
      day.getTime() <= request.to.getTime();
      day = addDays(day, 1), index += 1
    ) {
      const weekday = day.getUTCDay();
      if (weekday === 0 || weekday === 6) {
        continue;
      }

      const close = 200 + 10 * Math.sin(index / 5) + index * 0.1;
      points.push({ date: toIsoDate(day), close: Number(close.toFixed(2)) });
    }

    return ok(points);
  }
}
