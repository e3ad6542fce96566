/**
 * JSON interchange form.
 * Numbers stay numbers, timestamps are ISO-8601 strings, the step interval is
 * integer microseconds, and absent optional fields are omitted (never null).
 */

import { z } from "zod";
import { CONFIG_DEFAULTS } from "./defaults.js";
import type {
  AssetRecord,
  Candle,
  PricePoint,
  PriceSeries,
  SimplePoint,
  SimulationConfig,
  SimulationState,
} from "./types.js";

const isoTimestamp = z
  .string()
  .datetime({ offset: true })
  .transform((value) => Date.parse(value));

function toIso(timestamp: number): string {
  return new Date(timestamp).toISOString();
}

export const priceRangeSchema = z.object({
  min: z.number(),
  max: z.number(),
});

/** Shape only; numeric contracts are checked when the config is resolved. */
export const simulationConfigSchema = z
  .object({
    initialPrice: z.number(),
    drift: z.number(),
    volatility: z.number(),
    dataPoints: z.number().int(),
    stepIntervalMicros: z.number().int(),
    priceRange: priceRangeSchema.optional(),
    outputMode: z.enum(["simple", "candlestick"]).default(CONFIG_DEFAULTS.outputMode),
    includeVolume: z.boolean().default(CONFIG_DEFAULTS.includeVolume),
    baseVolume: z.number().optional(),
    volumeVolatility: z.number().default(CONFIG_DEFAULTS.volumeVolatility),
    circulatingSupply: z.number().optional(),
    supplyGrowthRate: z.number().optional(),
    seed: z.number().int().optional(),
    initialTimestamp: isoTimestamp.optional(),
    intraStepTicks: z.number().int().default(CONFIG_DEFAULTS.intraStepTicks),
    captureIntraStepPath: z.boolean().default(CONFIG_DEFAULTS.captureIntraStepPath),
  })
  .transform(({ stepIntervalMicros, ...rest }): SimulationConfig => ({
    ...rest,
    stepIntervalMs: stepIntervalMicros / 1000,
  }));

export const simplePointSchema = z
  .object({
    timestamp: isoTimestamp,
    price: z.number(),
    volume: z.number().optional(),
    supply: z.number().optional(),
  })
  .transform((point): SimplePoint => ({ kind: "simple", ...point }));

export const candleSchema = z
  .object({
    openTime: isoTimestamp,
    closeTime: isoTimestamp,
    open: z.number(),
    high: z.number(),
    low: z.number(),
    close: z.number(),
    volume: z.number(),
    supply: z.number().optional(),
    intraStepPrices: z.array(z.number()).optional(),
    intraStepTimestamps: z.array(isoTimestamp).optional(),
  })
  .superRefine((candle, ctx) => {
    const prices = candle.intraStepPrices;
    const times = candle.intraStepTimestamps;
    if ((prices === undefined) !== (times === undefined) || (prices && times && prices.length !== times.length)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "intraStepPrices and intraStepTimestamps must be present together with equal length",
        path: ["intraStepTimestamps"],
      });
    }
  })
  .transform((candle): Candle => ({ kind: "candle", ...candle }));

export const priceSeriesSchema = z.discriminatedUnion("mode", [
  z.object({ mode: z.literal("simple"), points: z.array(simplePointSchema) }),
  z.object({ mode: z.literal("candlestick"), points: z.array(candleSchema) }),
]);

export const assetSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  config: simulationConfigSchema,
  history: z.array(z.union([simplePointSchema, candleSchema])),
  currentPrice: z.number().optional(),
  currentSupply: z.number().optional(),
  lastUpdated: isoTimestamp.optional(),
});

export const simulationStateSchema = z.object({
  currentPrice: z.number(),
  currentSupply: z.number().optional(),
  currentTimestamp: isoTimestamp,
  pointsGenerated: z.number().int().nonnegative(),
  seed: z.number().int().optional(),
});

export type SimulationConfigJson = z.input<typeof simulationConfigSchema>;
export type SimplePointJson = z.input<typeof simplePointSchema>;
export type CandleJson = z.input<typeof candleSchema>;
export type PriceSeriesJson = z.input<typeof priceSeriesSchema>;
export type AssetJson = z.input<typeof assetSchema>;
export type SimulationStateJson = z.input<typeof simulationStateSchema>;

export function encodeConfig(config: SimulationConfig): SimulationConfigJson {
  return {
    initialPrice: config.initialPrice,
    drift: config.drift,
    volatility: config.volatility,
    dataPoints: config.dataPoints,
    stepIntervalMicros: Math.round(config.stepIntervalMs * 1000),
    ...(config.priceRange ? { priceRange: { min: config.priceRange.min, max: config.priceRange.max } } : {}),
    outputMode: config.outputMode,
    includeVolume: config.includeVolume,
    ...(config.baseVolume !== undefined ? { baseVolume: config.baseVolume } : {}),
    volumeVolatility: config.volumeVolatility,
    ...(config.circulatingSupply !== undefined ? { circulatingSupply: config.circulatingSupply } : {}),
    ...(config.supplyGrowthRate !== undefined ? { supplyGrowthRate: config.supplyGrowthRate } : {}),
    ...(config.seed !== undefined ? { seed: config.seed } : {}),
    ...(config.initialTimestamp !== undefined ? { initialTimestamp: toIso(config.initialTimestamp) } : {}),
    intraStepTicks: config.intraStepTicks,
    captureIntraStepPath: config.captureIntraStepPath,
  };
}

export function decodeConfig(json: unknown): SimulationConfig {
  return simulationConfigSchema.parse(json);
}

export function encodeSimplePoint(point: SimplePoint): SimplePointJson {
  return {
    timestamp: toIso(point.timestamp),
    price: point.price,
    ...(point.volume !== undefined ? { volume: point.volume } : {}),
    ...(point.supply !== undefined ? { supply: point.supply } : {}),
  };
}

export function encodeCandle(candle: Candle): CandleJson {
  return {
    openTime: toIso(candle.openTime),
    closeTime: toIso(candle.closeTime),
    open: candle.open,
    high: candle.high,
    low: candle.low,
    close: candle.close,
    volume: candle.volume,
    ...(candle.supply !== undefined ? { supply: candle.supply } : {}),
    ...(candle.intraStepPrices && candle.intraStepTimestamps
      ? {
          intraStepPrices: [...candle.intraStepPrices],
          intraStepTimestamps: candle.intraStepTimestamps.map(toIso),
        }
      : {}),
  };
}

export function encodePoint(point: PricePoint): SimplePointJson | CandleJson {
  return point.kind === "simple" ? encodeSimplePoint(point) : encodeCandle(point);
}

export function encodeSeries(series: PriceSeries): PriceSeriesJson {
  return series.mode === "simple"
    ? { mode: "simple", points: series.points.map(encodeSimplePoint) }
    : { mode: "candlestick", points: series.points.map(encodeCandle) };
}

export function decodeSeries(json: unknown): PriceSeries {
  return priceSeriesSchema.parse(json);
}

export function encodeAsset(asset: AssetRecord): AssetJson {
  return {
    id: asset.id,
    name: asset.name,
    config: encodeConfig(asset.config),
    history: asset.history.map(encodePoint),
    ...(asset.currentPrice !== undefined ? { currentPrice: asset.currentPrice } : {}),
    ...(asset.currentSupply !== undefined ? { currentSupply: asset.currentSupply } : {}),
    ...(asset.lastUpdated !== undefined ? { lastUpdated: toIso(asset.lastUpdated) } : {}),
  };
}

export function decodeAsset(json: unknown): AssetRecord {
  return assetSchema.parse(json);
}

export function encodeState(state: SimulationState): SimulationStateJson {
  return {
    currentPrice: state.currentPrice,
    ...(state.currentSupply !== undefined ? { currentSupply: state.currentSupply } : {}),
    currentTimestamp: toIso(state.currentTimestamp),
    pointsGenerated: state.pointsGenerated,
    ...(state.seed !== undefined ? { seed: state.seed } : {}),
  };
}

export function decodeState(json: unknown): SimulationState {
  return simulationStateSchema.parse(json);
}
