import { describe, it, expect } from "vitest";
import { InvalidConfigurationError, PriceSimError } from "../errors.js";
import { configViolations, DEFAULT_SIM_CONFIG, resolveConfig } from "./defaults.js";

const minimal = {
  initialPrice: 100,
  drift: 0,
  volatility: 0.02,
  dataPoints: 10,
  stepIntervalMs: 60_000,
};

function violationsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidConfigurationError) return err.violations;
    throw err;
  }
  return [];
}

describe("resolveConfig", () => {
  it("fills in defaults", () => {
    expect(resolveConfig(minimal)).toEqual({
      ...minimal,
      outputMode: "simple",
      includeVolume: false,
      volumeVolatility: 0.4,
      intraStepTicks: 10,
      captureIntraStepPath: false,
    });
  });

  it("keeps explicit values over defaults", () => {
    const config = resolveConfig({ ...minimal, outputMode: "candlestick", intraStepTicks: 50 });
    expect(config.outputMode).toBe("candlestick");
    expect(config.intraStepTicks).toBe(50);
  });

  it("accepts the CLI baseline", () => {
    expect(configViolations(DEFAULT_SIM_CONFIG)).toEqual([]);
  });

  it("reports every violated contract at once", () => {
    expect(violationsOf(() => resolveConfig({ ...minimal, initialPrice: -1, volatility: -0.1, dataPoints: 0 }))).toEqual([
      "initialPrice must be > 0",
      "volatility must be >= 0",
      "dataPoints must be a positive integer",
    ]);
  });

  it("requires baseVolume when volume is simulated", () => {
    expect(violationsOf(() => resolveConfig({ ...minimal, includeVolume: true }))).toEqual([
      "baseVolume is required when includeVolume is true",
    ]);
  });

  it("requires min < max in a price range", () => {
    expect(violationsOf(() => resolveConfig({ ...minimal, priceRange: { min: 10, max: 10 } }))).toEqual([
      "priceRange.min must be < priceRange.max",
    ]);
  });

  it("rejects non-integer ticks and seeds and negative volume volatility", () => {
    expect(
      violationsOf(() => resolveConfig({ ...minimal, intraStepTicks: 2.5, volumeVolatility: -1, seed: 0.5 }))
    ).toEqual([
      "intraStepTicks must be a positive integer",
      "volumeVolatility must be >= 0",
      "seed must be a safe integer",
    ]);
  });

  it("throws a coded PriceSimError", () => {
    let caught: unknown;
    try {
      resolveConfig({ ...minimal, stepIntervalMs: 0 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(PriceSimError);
    expect(caught instanceof PriceSimError && caught.code).toBe("INVALID_CONFIGURATION");
    expect(caught instanceof Error && caught.message).toBe("Invalid simulation config: stepIntervalMs must be > 0");
  });
});
