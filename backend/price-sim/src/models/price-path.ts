/**
 * Price path model
 * Geometric Brownian Motion, discretized: dS = drift·S·dt + volatility·S·dW
 */

import type {
  Candle,
  PriceRange,
  PriceSeries,
  SimplePoint,
  SimulationConfig,
  SimulationConfigInput,
} from "@gbm-sim/price-sdk";
import { resolveConfig } from "../config/defaults.js";
import type { Sampler } from "./distributions.js";
import { createSampler } from "./distributions.js";

/** Carried step to step within one generation call; never shared */
interface PathState {
  price: number;
  supply?: number;
  timestamp: number;
}

function initialState(config: SimulationConfig): PathState {
  return {
    price: config.initialPrice,
    supply: config.circulatingSupply,
    timestamp: config.initialTimestamp ?? Date.now(),
  };
}

function clamp(price: number, range: PriceRange | undefined): number {
  if (!range) return price;
  return Math.min(range.max, Math.max(range.min, price));
}

/** One GBM move of length dt (dt = 1 is a full step) */
function advancePrice(state: PathState, config: SimulationConfig, sampler: Sampler, dt: number): void {
  const shock = config.volatility * state.price * sampler.standardNormal() * Math.sqrt(dt);
  state.price = clamp(state.price + config.drift * state.price * dt + shock, config.priceRange);
}

function sampleVolume(config: SimulationConfig, sampler: Sampler): number | undefined {
  if (!config.includeVolume || config.baseVolume === undefined) return undefined;
  return sampler.logNormal(Math.log(config.baseVolume), config.volumeVolatility);
}

function growSupply(state: PathState, config: SimulationConfig): void {
  if (state.supply !== undefined && config.supplyGrowthRate !== undefined) {
    state.supply *= 1 + config.supplyGrowthRate;
  }
}

/**
 * Simulate `dataPoints` single-step price points.
 * Supply grows before each point is recorded, so the first point already
 * reflects one growth step.
 */
export function generateSimplePath(config: SimulationConfig, sampler: Sampler): SimplePoint[] {
  const state = initialState(config);
  const points: SimplePoint[] = [];

  for (let i = 0; i < config.dataPoints; i++) {
    advancePrice(state, config, sampler, 1);
    const volume = sampleVolume(config, sampler);
    growSupply(state, config);

    points.push({
      kind: "simple",
      timestamp: state.timestamp,
      price: state.price,
      ...(volume !== undefined ? { volume } : {}),
      ...(state.supply !== undefined ? { supply: state.supply } : {}),
    });
    state.timestamp += config.stepIntervalMs;
  }

  return points;
}

/**
 * Simulate `dataPoints` candles, each from `intraStepTicks` micro-steps.
 * Micro-shocks scale by sqrt(dt) so their sum has the variance of one full
 * step whatever the tick count.
 */
export function generateCandlePath(config: SimulationConfig, sampler: Sampler): Candle[] {
  const state = initialState(config);
  const candles: Candle[] = [];
  const ticks = config.intraStepTicks;
  const dt = 1 / ticks;

  for (let i = 0; i < config.dataPoints; i++) {
    const open = state.price;
    const openTime = state.timestamp;
    const closeTime = openTime + config.stepIntervalMs;
    let high = open;
    let low = open;
    // runs open..close: ticks + 1 entries
    const intraPrices: number[] = [open];
    const intraTimes: number[] = [openTime];

    for (let t = 1; t <= ticks; t++) {
      advancePrice(state, config, sampler, dt);
      high = Math.max(high, state.price);
      low = Math.min(low, state.price);
      if (config.captureIntraStepPath) {
        intraPrices.push(state.price);
        intraTimes.push(t === ticks ? closeTime : openTime + Math.round((config.stepIntervalMs * t) / ticks));
      }
    }

    const volume = sampleVolume(config, sampler);
    growSupply(state, config);

    candles.push({
      kind: "candle",
      openTime,
      closeTime,
      open,
      high,
      low,
      close: state.price,
      volume: volume ?? 0,
      ...(state.supply !== undefined ? { supply: state.supply } : {}),
      ...(config.captureIntraStepPath
        ? { intraStepPrices: intraPrices, intraStepTimestamps: intraTimes }
        : {}),
    });
    state.timestamp = closeTime;
  }

  return candles;
}

/**
 * Resolve + validate the config, seed a sampler and generate the series its
 * outputMode asks for. Runs to completion synchronously.
 */
export function generateSeries(input: SimulationConfigInput, sampler?: Sampler): PriceSeries {
  const config = resolveConfig(input);
  const rng = sampler ?? createSampler(config.seed);
  return config.outputMode === "simple"
    ? { mode: "simple", points: generateSimplePath(config, rng) }
    : { mode: "candlestick", points: generateCandlePath(config, rng) };
}
