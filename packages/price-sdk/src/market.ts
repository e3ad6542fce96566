/**
 * Derived values over price points.
 */

import type { OutputMode, PricePoint } from "./types.js";

/** Last traded price: the point's price, or the candle's close. */
export function closePrice(point: PricePoint): number {
  return point.kind === "simple" ? point.price : point.close;
}

/** End of the period a point describes: its timestamp, or the candle's close time. */
export function pointTime(point: PricePoint): number {
  return point.kind === "simple" ? point.timestamp : point.closeTime;
}

/**
 * Market capitalization (close × supply).
 * Undefined when the point carries no supply.
 */
export function marketCap(point: PricePoint): number | undefined {
  if (point.supply === undefined) return undefined;
  return closePrice(point) * point.supply;
}

export function kindForMode(mode: OutputMode): PricePoint["kind"] {
  return mode === "simple" ? "simple" : "candle";
}
