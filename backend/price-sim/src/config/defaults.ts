/**
 * Simulation config defaults and contract checks
 */

import { CONFIG_DEFAULTS } from "@gbm-sim/price-sdk";
import type { SimulationConfig, SimulationConfigInput } from "@gbm-sim/price-sdk";
import { InvalidConfigurationError } from "../errors.js";

export const HOUR_MS = 60 * 60 * 1000;

/** Baseline used by the CLI when no config file is given */
export const DEFAULT_SIM_CONFIG: SimulationConfig = {
  initialPrice: 100,
  drift: 0.0001,
  volatility: 0.02,
  dataPoints: 100,
  stepIntervalMs: HOUR_MS,
  ...CONFIG_DEFAULTS,
};

function isPositive(n: number): boolean {
  return Number.isFinite(n) && n > 0;
}

function isNonNegative(n: number): boolean {
  return Number.isFinite(n) && n >= 0;
}

/**
 * Collect every contract violation (empty when the config is usable)
 */
export function configViolations(config: SimulationConfig): string[] {
  const violations: string[] = [];

  if (!isPositive(config.initialPrice)) violations.push("initialPrice must be > 0");
  if (!Number.isFinite(config.drift)) violations.push("drift must be finite");
  if (!isNonNegative(config.volatility)) violations.push("volatility must be >= 0");
  if (!Number.isInteger(config.dataPoints) || config.dataPoints <= 0) {
    violations.push("dataPoints must be a positive integer");
  }
  if (!isPositive(config.stepIntervalMs)) violations.push("stepIntervalMs must be > 0");
  if (!Number.isInteger(config.intraStepTicks) || config.intraStepTicks <= 0) {
    violations.push("intraStepTicks must be a positive integer");
  }
  if (!isNonNegative(config.volumeVolatility)) violations.push("volumeVolatility must be >= 0");

  if (config.includeVolume) {
    if (config.baseVolume === undefined) {
      violations.push("baseVolume is required when includeVolume is true");
    } else if (!isPositive(config.baseVolume)) {
      violations.push("baseVolume must be > 0");
    }
  }

  if (config.priceRange) {
    const { min, max } = config.priceRange;
    if (!Number.isFinite(min) || !Number.isFinite(max) || min >= max) {
      violations.push("priceRange.min must be < priceRange.max");
    }
  }

  if (config.circulatingSupply !== undefined && !isNonNegative(config.circulatingSupply)) {
    violations.push("circulatingSupply must be >= 0");
  }
  if (config.supplyGrowthRate !== undefined && !Number.isFinite(config.supplyGrowthRate)) {
    violations.push("supplyGrowthRate must be finite");
  }
  if (config.seed !== undefined && !Number.isSafeInteger(config.seed)) {
    violations.push("seed must be a safe integer");
  }
  if (config.initialTimestamp !== undefined && !Number.isFinite(config.initialTimestamp)) {
    violations.push("initialTimestamp must be finite");
  }

  return violations;
}

/**
 * Apply defaults and validate. Throws InvalidConfigurationError listing all violations.
 */
export function resolveConfig(input: SimulationConfigInput): SimulationConfig {
  const config: SimulationConfig = {
    ...input,
    outputMode: input.outputMode ?? CONFIG_DEFAULTS.outputMode,
    includeVolume: input.includeVolume ?? CONFIG_DEFAULTS.includeVolume,
    volumeVolatility: input.volumeVolatility ?? CONFIG_DEFAULTS.volumeVolatility,
    intraStepTicks: input.intraStepTicks ?? CONFIG_DEFAULTS.intraStepTicks,
    captureIntraStepPath: input.captureIntraStepPath ?? CONFIG_DEFAULTS.captureIntraStepPath,
  };

  const violations = configViolations(config);
  if (violations.length > 0) {
    throw new InvalidConfigurationError(violations);
  }
  return config;
}
