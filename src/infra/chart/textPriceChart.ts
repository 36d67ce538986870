import type { PriceWindow } from "../../core/entities/earnings";
import type { ChartRendererPort } from "../../core/ports/outboundPorts";

const LEVELS = ["▁", "▂", "▃", "▄", "▅", "▆", "▇", "█"] as const;

/**
 * Renders a price window as a one-line sparkline with a caret under the first session on or
 * after the call date.
 */
export class TextPriceChart implements ChartRendererPort {
  render(window: PriceWindow): string[] {
    const title = `${window.symbol} Stock Price (${window.from} to ${window.to})`;
    if (window.status === "unavailable" || window.points.length === 0) {
      return [title, `Price data unavailable: ${window.reason ?? "no prices"}`];
    }

    const closes = window.points.map((point) => point.close);
    const min = Math.min(...closes);
    const max = Math.max(...closes);
    const span = max - min;

    const line = closes
      .map((close) => {
        const index =
          span === 0
            ? 0
            : Math.round(((close - min) / span) * (LEVELS.length - 1));
        return LEVELS[index] ?? LEVELS[0];
      })
      .join("");

    const markerIndex = window.points.findIndex(
      (point) => point.date >= window.marker,
    );
    const markerLine =
      markerIndex === -1
        ? ""
        : `${" ".repeat(markerIndex)}^ Earnings Call ${window.marker}`;

    return [
      title,
      line,
      markerLine,
      `Range: ${min.toFixed(2)} - ${max.toFixed(2)} USD`,
    ].filter((row) => row.length > 0);
  }
}
