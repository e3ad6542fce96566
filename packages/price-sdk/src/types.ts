/**
 * Price series records: simulation config, simple points, candles, assets.
 * Timestamps are epoch milliseconds; durations are milliseconds.
 */

export type OutputMode = "simple" | "candlestick";

export type PriceRange = {
  min: number;
  max: number;
};

export type SimulationConfig = {
  initialPrice: number;
  /** Deterministic trend per step (e.g. 0.0001 = +0.01% per step) */
  drift: number;
  /** Scale of the random component per step (e.g. 0.02 = 2%) */
  volatility: number;
  dataPoints: number;
  stepIntervalMs: number;
  priceRange?: PriceRange;
  outputMode: OutputMode;
  includeVolume: boolean;
  /** Mean volume; required when includeVolume is set */
  baseVolume?: number;
  /** Std-dev of log volume (e.g. 0.4 = ~40% variation) */
  volumeVolatility: number;
  circulatingSupply?: number;
  /** Per-step supply growth; negative is deflationary */
  supplyGrowthRate?: number;
  seed?: number;
  initialTimestamp?: number;
  /** Micro-steps per candle (candlestick mode only) */
  intraStepTicks: number;
  /** Keep every micro-step price on the candle (candlestick mode only) */
  captureIntraStepPath: boolean;
};

/** What callers write: fields with defaults may be left out. */
export type SimulationConfigInput = Omit<
  SimulationConfig,
  "outputMode" | "includeVolume" | "volumeVolatility" | "intraStepTicks" | "captureIntraStepPath"
> &
  Partial<
    Pick<
      SimulationConfig,
      "outputMode" | "includeVolume" | "volumeVolatility" | "intraStepTicks" | "captureIntraStepPath"
    >
  >;

export type SimplePoint = {
  readonly kind: "simple";
  readonly timestamp: number;
  readonly price: number;
  readonly volume?: number;
  readonly supply?: number;
};

export type Candle = {
  readonly kind: "candle";
  readonly openTime: number;
  readonly closeTime: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  /** 0 when volume is not simulated */
  readonly volume: number;
  readonly supply?: number;
  readonly intraStepPrices?: readonly number[];
  readonly intraStepTimestamps?: readonly number[];
};

export type PricePoint = SimplePoint | Candle;

export type PriceSeries =
  | { mode: "simple"; points: readonly SimplePoint[] }
  | { mode: "candlestick"; points: readonly Candle[] };

export type AssetRecord = {
  id: string;
  name: string;
  config: SimulationConfig;
  history: readonly PricePoint[];
  currentPrice?: number;
  currentSupply?: number;
  lastUpdated?: number;
};

export type SimulationState = {
  currentPrice: number;
  currentSupply?: number;
  currentTimestamp: number;
  pointsGenerated: number;
  seed?: number;
};
