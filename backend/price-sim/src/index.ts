/**
 * GBM price simulator: sampler, path generator, playback cursor.
 */

export * from "./errors.js";
export * from "./config/defaults.js";
export * from "./config/overrides.js";
export * from "./models/distributions.js";
export * from "./models/price-path.js";
export * from "./models/asset.js";
export * from "./sim/cursor.js";
export * from "./sim/playback.js";
export * from "./reports/generate.js";
