/**
 * Price SDK: records shared by the simulator and its consumers.
 * Types, market cap helpers, config defaults and the JSON interchange codec.
 */

export * from "./types.js";
export * from "./defaults.js";
export * from "./market.js";
export * from "./codec.js";
