/**
 * CLI config layering: base (defaults or config file) → env → flags
 */

import type { OutputMode, SimulationConfigInput } from "@gbm-sim/price-sdk";
import { InvalidConfigurationError } from "../errors.js";

export interface ConfigOverrides {
  points?: number;
  seed?: number;
  mode?: OutputMode;
  price?: number;
  drift?: number;
  volatility?: number;
  interval?: number;
  ticks?: number;
  captureIntra?: boolean;
  volume?: number;
  volumeVolatility?: number;
  supply?: number;
  supplyGrowth?: number;
  min?: number;
  max?: number;
}

export type EnvSource = Record<string, string | undefined>;

function envSeed(env: EnvSource): number | undefined {
  const raw = env.PRICE_SIM_SEED;
  if (raw === undefined || raw === "") return undefined;
  const seed = Number(raw);
  if (!Number.isSafeInteger(seed)) {
    throw new InvalidConfigurationError([`PRICE_SIM_SEED must be an integer (got "${raw}")`]);
  }
  return seed;
}

export function applyOverrides(
  base: SimulationConfigInput,
  overrides: ConfigOverrides,
  env: EnvSource = process.env
): SimulationConfigInput {
  const config: SimulationConfigInput = { ...base };

  const seed = overrides.seed ?? envSeed(env);
  if (seed !== undefined) config.seed = seed;
  if (overrides.points !== undefined) config.dataPoints = overrides.points;
  if (overrides.mode !== undefined) config.outputMode = overrides.mode;
  if (overrides.price !== undefined) config.initialPrice = overrides.price;
  if (overrides.drift !== undefined) config.drift = overrides.drift;
  if (overrides.volatility !== undefined) config.volatility = overrides.volatility;
  if (overrides.interval !== undefined) config.stepIntervalMs = overrides.interval;
  if (overrides.ticks !== undefined) config.intraStepTicks = overrides.ticks;
  if (overrides.captureIntra !== undefined) config.captureIntraStepPath = overrides.captureIntra;
  if (overrides.volume !== undefined) {
    config.includeVolume = true;
    config.baseVolume = overrides.volume;
  }
  if (overrides.volumeVolatility !== undefined) config.volumeVolatility = overrides.volumeVolatility;
  if (overrides.supply !== undefined) config.circulatingSupply = overrides.supply;
  if (overrides.supplyGrowth !== undefined) config.supplyGrowthRate = overrides.supplyGrowth;

  if (overrides.min !== undefined || overrides.max !== undefined) {
    const min = overrides.min ?? config.priceRange?.min;
    const max = overrides.max ?? config.priceRange?.max;
    if (min === undefined || max === undefined) {
      throw new InvalidConfigurationError(["--min and --max must be given together unless the config file sets priceRange"]);
    }
    config.priceRange = { min, max };
  }

  return config;
}
