/**
 * Distribution sampling for price paths
 * Uses seeded RNG for reproducibility
 */

import seedrandom from "seedrandom";
import { InvalidConfigurationError } from "../errors.js";

export interface RNG {
  (): number;
}

/** Uniform (0,1); an exact 0 from the source is redrawn so log() stays defined */
export function uniform(rng: RNG): number {
  let u = rng();
  while (u <= 0) u = rng();
  return u;
}

/**
 * Standard normal (Box-Muller).
 * Draws a fresh pair every call; the second normal of the pair is discarded.
 */
export function standardNormal(rng: RNG): number {
  const u1 = uniform(rng);
  const u2 = uniform(rng);
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/** Normal */
export function normal(rng: RNG, mu = 0, sigma = 1): number {
  return mu + sigma * standardNormal(rng);
}

/** Log-normal (trading volume): always > 0, right-skewed */
export function logNormal(rng: RNG, mu: number, sigma: number): number {
  return Math.exp(normal(rng, mu, sigma));
}

export interface Sampler {
  uniform(): number;
  standardNormal(): number;
  normal(mean: number, stddev: number): number;
  logNormal(meanOfLog: number, stddevOfLog: number): number;
}

export function samplerFrom(rng: RNG): Sampler {
  return {
    uniform: () => uniform(rng),
    standardNormal: () => standardNormal(rng),
    normal: (mean, stddev) => normal(rng, mean, stddev),
    logNormal: (meanOfLog, stddevOfLog) => logNormal(rng, meanOfLog, stddevOfLog),
  };
}

/**
 * Sampler over seedrandom. Same seed, same draw sequence.
 * Without a seed the source is auto-seeded and runs are not reproducible.
 */
export function createSampler(seed?: number): Sampler {
  if (seed !== undefined && !Number.isSafeInteger(seed)) {
    throw new InvalidConfigurationError([`seed must be a safe integer (got ${seed})`]);
  }
  const prng = seed === undefined ? seedrandom() : seedrandom(seed.toString());
  return samplerFrom(() => prng());
}
