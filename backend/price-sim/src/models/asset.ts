/**
 * Asset bundle: config + generated history + current state, for saving and
 * resuming a simulation.
 */

import { closePrice, kindForMode, pointTime } from "@gbm-sim/price-sdk";
import type {
  AssetRecord,
  PricePoint,
  SimulationConfig,
  SimulationConfigInput,
  SimulationState,
} from "@gbm-sim/price-sdk";
import { resolveConfig } from "../config/defaults.js";
import { InvalidStateError } from "../errors.js";

export interface CreateAssetParams {
  id: string;
  name: string;
  config: SimulationConfigInput;
}

export function createAsset(params: CreateAssetParams): AssetRecord {
  const config = resolveConfig(params.config);
  return {
    id: params.id,
    name: params.name,
    config,
    history: [],
    currentPrice: config.initialPrice,
    ...(config.circulatingSupply !== undefined ? { currentSupply: config.circulatingSupply } : {}),
    lastUpdated: config.initialTimestamp ?? Date.now(),
  };
}

/**
 * New record with `points` appended and current price/supply/time taken from
 * the last one. Points must match the asset's output mode.
 */
export function appendHistory(asset: AssetRecord, points: readonly PricePoint[]): AssetRecord {
  const last = points[points.length - 1];
  if (last === undefined) return asset;

  const expected = kindForMode(asset.config.outputMode);
  const mismatch = points.find((p) => p.kind !== expected);
  if (mismatch) {
    throw new InvalidStateError(
      `asset ${asset.id} records ${expected} points; cannot append a ${mismatch.kind} point`
    );
  }

  return {
    ...asset,
    history: [...asset.history, ...points],
    currentPrice: closePrice(last),
    currentSupply: last.supply ?? asset.currentSupply,
    lastUpdated: pointTime(last),
  };
}

/**
 * Config that continues the asset's path: starts at the current price and
 * supply, one step after the last recorded point.
 */
export function resumeConfig(asset: AssetRecord, additionalPoints?: number): SimulationConfig {
  const last = asset.history[asset.history.length - 1];
  let initialTimestamp = asset.config.initialTimestamp;
  if (last) {
    // a candle's close time is already the next open time
    initialTimestamp = last.kind === "simple" ? last.timestamp + asset.config.stepIntervalMs : last.closeTime;
  }

  return resolveConfig({
    ...asset.config,
    initialPrice: asset.currentPrice ?? asset.config.initialPrice,
    circulatingSupply: asset.currentSupply ?? asset.config.circulatingSupply,
    dataPoints: additionalPoints ?? asset.config.dataPoints,
    initialTimestamp,
  });
}

export function simulationState(asset: AssetRecord): SimulationState {
  return {
    currentPrice: asset.currentPrice ?? asset.config.initialPrice,
    ...(asset.currentSupply !== undefined ? { currentSupply: asset.currentSupply } : {}),
    currentTimestamp: asset.lastUpdated ?? asset.config.initialTimestamp ?? Date.now(),
    pointsGenerated: asset.history.length,
    ...(asset.config.seed !== undefined ? { seed: asset.config.seed } : {}),
  };
}
