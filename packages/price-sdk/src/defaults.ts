/**
 * Values applied to optional config fields when they are left out.
 */

import type { SimulationConfig } from "./types.js";

export const CONFIG_DEFAULTS = {
  outputMode: "simple",
  includeVolume: false,
  volumeVolatility: 0.4,
  intraStepTicks: 10,
  captureIntraStepPath: false,
} as const satisfies Partial<SimulationConfig>;
