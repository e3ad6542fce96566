import { describe, it, expect, vi } from "vitest";
import { InvalidConfigurationError } from "../errors.js";
import type { RNG } from "./distributions.js";
import { createSampler, logNormal, normal, samplerFrom, standardNormal, uniform } from "./distributions.js";

function sequence(values: number[]): RNG {
  let i = 0;
  return () => values[i++ % values.length];
}

// u1 = e^-2 gives sqrt(-2 ln u1) = 2; u2 = 0.5 gives cos(pi) = -1
const MINUS_TWO = [Math.exp(-2), 0.5];

describe("uniform", () => {
  it("redraws an exact zero from the source", () => {
    const rng = vi.fn(sequence([0, 0, 0.25]));
    expect(uniform(rng)).toBe(0.25);
    expect(rng).toHaveBeenCalledTimes(3);
  });

  it("stays inside (0, 1) for a seeded source", () => {
    const sampler = createSampler(3);
    for (let i = 0; i < 1000; i++) {
      const u = sampler.uniform();
      expect(u).toBeGreaterThan(0);
      expect(u).toBeLessThan(1);
    }
  });
});

describe("standardNormal", () => {
  it("applies Box-Muller to a fresh pair of uniforms", () => {
    expect(standardNormal(sequence(MINUS_TWO))).toBeCloseTo(-2, 12);
  });

  it("consumes exactly two uniforms per draw", () => {
    const rng = vi.fn(sequence([0.3, 0.6]));
    standardNormal(rng);
    standardNormal(rng);
    expect(rng).toHaveBeenCalledTimes(4);
  });

  it("has mean ~0 and variance ~1", () => {
    const sampler = createSampler(7);
    const n = 20_000;
    const draws = Array.from({ length: n }, () => sampler.standardNormal());
    const mean = draws.reduce((a, b) => a + b, 0) / n;
    const variance = draws.reduce((s, x) => s + (x - mean) ** 2, 0) / (n - 1);
    expect(Math.abs(mean)).toBeLessThan(0.05);
    expect(Math.abs(variance - 1)).toBeLessThan(0.05);
  });
});

describe("normal / logNormal", () => {
  it("shifts and scales the standard normal", () => {
    expect(normal(sequence(MINUS_TWO), 10, 3)).toBeCloseTo(4, 10);
  });

  it("exponentiates the normal draw", () => {
    // exp(1 + 0.5 * -2) = exp(0)
    expect(logNormal(sequence(MINUS_TWO), 1, 0.5)).toBeCloseTo(1, 10);
  });

  it("is always positive", () => {
    const sampler = createSampler(11);
    for (let i = 0; i < 1000; i++) {
      expect(sampler.logNormal(Math.log(1_000_000), 0.8)).toBeGreaterThan(0);
    }
  });
});

describe("createSampler", () => {
  it("replays the same draws for the same seed", () => {
    const draw = (seed: number) => {
      const s = createSampler(seed);
      return [s.uniform(), s.standardNormal(), s.normal(5, 2), s.logNormal(0, 1), s.standardNormal()];
    };
    expect(draw(42)).toEqual(draw(42));
    expect(draw(42)).not.toEqual(draw(43));
  });

  it("rejects a seed that cannot be replayed", () => {
    expect(() => createSampler(1.5)).toThrow(InvalidConfigurationError);
    expect(() => createSampler(Number.NaN)).toThrow(InvalidConfigurationError);
  });

  it("wraps any RNG", () => {
    const sampler = samplerFrom(sequence(MINUS_TWO));
    expect(sampler.normal(0, 1)).toBeCloseTo(-2, 12);
  });
});
