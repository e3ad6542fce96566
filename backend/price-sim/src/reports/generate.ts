/**
 * Report generation - JSON + Markdown
 */

import { closePrice, encodeConfig, encodeSeries, marketCap, pointTime } from "@gbm-sim/price-sdk";
import type {
  OutputMode,
  PricePoint,
  PriceSeries,
  PriceSeriesJson,
  SimulationConfig,
  SimulationConfigJson,
} from "@gbm-sim/price-sdk";

export interface SeriesSummary {
  mode: OutputMode;
  points: number;
  /** Open time of the first candle, or the first point's timestamp */
  startTime: number;
  endTime: number;
  startPrice: number;
  endPrice: number;
  high: number;
  low: number;
  /** (end / start - 1) × 100 */
  returnPct: number;
  /** Sample std-dev of per-step log returns */
  realizedVolatility: number;
  totalVolume?: number;
  finalSupply?: number;
  finalMarketCap?: number;
}

export interface ReportJson {
  meta: {
    generatedAt: string;
    seed?: number;
  };
  config: SimulationConfigJson;
  summary: SeriesSummary;
  series: PriceSeriesJson;
}

function stdDev(values: number[]): number {
  if (values.length < 2) return 0;
  const mean = values.reduce((a, b) => a + b, 0) / values.length;
  const variance = values.reduce((s, v) => s + (v - mean) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

export function summarizeSeries(series: PriceSeries): SeriesSummary {
  const points: readonly PricePoint[] = series.points;
  const first = points[0];
  const last = points[points.length - 1];
  if (first === undefined || last === undefined) {
    throw new Error("Cannot summarize an empty series");
  }

  // the path starts at the first candle's open, or (simple) at the first recorded price
  const startPrice = first.kind === "candle" ? first.open : first.price;
  const closes = points.map(closePrice);
  const prices = first.kind === "candle" ? [first.open, ...closes] : closes;

  let high = -Infinity;
  let low = Infinity;
  let totalVolume: number | undefined;
  for (const p of points) {
    high = Math.max(high, p.kind === "candle" ? p.high : p.price);
    low = Math.min(low, p.kind === "candle" ? p.low : p.price);
    if (p.volume !== undefined) totalVolume = (totalVolume ?? 0) + p.volume;
  }

  const logReturns: number[] = [];
  for (let i = 1; i < prices.length; i++) {
    const prev = prices[i - 1];
    const curr = prices[i];
    if (prev > 0 && curr > 0) logReturns.push(Math.log(curr / prev));
  }

  const endPrice = closePrice(last);
  const cap = marketCap(last);
  return {
    mode: series.mode,
    points: points.length,
    startTime: first.kind === "candle" ? first.openTime : first.timestamp,
    endTime: pointTime(last),
    startPrice,
    endPrice,
    high,
    low,
    returnPct: (endPrice / startPrice - 1) * 100,
    realizedVolatility: stdDev(logReturns),
    ...(totalVolume !== undefined ? { totalVolume } : {}),
    ...(last.supply !== undefined ? { finalSupply: last.supply } : {}),
    ...(cap !== undefined ? { finalMarketCap: cap } : {}),
  };
}

export function toJson(config: SimulationConfig, series: PriceSeries): ReportJson {
  return {
    meta: {
      generatedAt: new Date().toISOString(),
      ...(config.seed !== undefined ? { seed: config.seed } : {}),
    },
    config: encodeConfig(config),
    summary: summarizeSeries(series),
    series: encodeSeries(series),
  };
}

export function toMarkdown(config: SimulationConfig, summary: SeriesSummary): string {
  const fmt = (n: number, d = 2) => n.toFixed(d);
  const iso = (t: number) => new Date(t).toISOString();

  const optionalRows = [
    summary.totalVolume !== undefined ? `| Total volume | ${fmt(summary.totalVolume, 0)} |` : undefined,
    summary.finalSupply !== undefined ? `| Final supply | ${fmt(summary.finalSupply, 0)} |` : undefined,
    summary.finalMarketCap !== undefined ? `| Final market cap | ${fmt(summary.finalMarketCap, 0)} |` : undefined,
  ].filter((row): row is string => row !== undefined);

  return `# Price Simulation Report

**Generated:** ${new Date().toISOString()}

## Configuration

| Parameter | Value |
|-----------|-------|
| Output mode | ${config.outputMode} |
| Data points | ${config.dataPoints} |
| Step interval | ${config.stepIntervalMs} ms |
| Initial price | ${config.initialPrice} |
| Drift | ${config.drift} |
| Volatility | ${config.volatility} |
| Seed | ${config.seed ?? "random"} |
${config.outputMode === "candlestick" ? `| Intra-step ticks | ${config.intraStepTicks} |\n` : ""}${
    config.priceRange ? `| Price range | ${config.priceRange.min} - ${config.priceRange.max} |\n` : ""
  }
## Results

| Metric | Value |
|--------|-------|
| Period | ${iso(summary.startTime)} → ${iso(summary.endTime)} |
| Start price | ${fmt(summary.startPrice)} |
| End price | ${fmt(summary.endPrice)} |
| High | ${fmt(summary.high)} |
| Low | ${fmt(summary.low)} |
| Return | ${fmt(summary.returnPct)}% |
| Realized volatility (per step) | ${fmt(summary.realizedVolatility * 100)}% |
${optionalRows.join("\n")}
`;
}
