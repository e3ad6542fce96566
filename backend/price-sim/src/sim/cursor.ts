/**
 * Playback cursor over a materialized price series.
 * Owns only an index; the series is generated once and never touched again.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type {
  Candle,
  OutputMode,
  PricePoint,
  PriceSeries,
  SimplePoint,
  SimulationConfigInput,
} from "@gbm-sim/price-sdk";
import { InvalidStateError, OutOfRangeError } from "../errors.js";
import { generateSeries } from "../models/price-path.js";

export interface PlayOptions {
  /** Pause between deliveries */
  intervalMs: number;
  /** Stops delivery; checked before every emission */
  signal?: AbortSignal;
  /** Continue from the current index instead of restarting at 0 */
  resume?: boolean;
}

export class PriceCursor {
  private index = 0;

  constructor(private readonly series: PriceSeries) {}

  /** Generate the whole series up front (the only randomness the cursor ever uses) */
  static fromConfig(input: SimulationConfigInput): PriceCursor {
    return new PriceCursor(generateSeries(input));
  }

  get mode(): OutputMode {
    return this.series.mode;
  }

  get currentIndex(): number {
    return this.index;
  }

  get total(): number {
    return this.series.points.length;
  }

  tick(): PricePoint | undefined {
    if (this.isExhausted()) return undefined;
    return this.series.points[this.index++];
  }

  /** Element at index + offset, without moving. Undefined when out of bounds. */
  peek(offset = 0): PricePoint | undefined {
    const at = this.index + offset;
    if (!Number.isInteger(at) || at < 0 || at >= this.total) return undefined;
    return this.series.points[at];
  }

  /** Advance by min(count, remaining); returns the amount actually advanced */
  skip(count: number): number {
    if (!Number.isInteger(count) || count < 0) {
      throw new OutOfRangeError(count, 0, Number.MAX_SAFE_INTEGER);
    }
    const step = Math.min(count, this.remainingCount());
    this.index += step;
    return step;
  }

  seekTo(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.total) {
      throw new OutOfRangeError(index, 0, this.total - 1);
    }
    this.index = index;
  }

  reset(): void {
    this.index = 0;
  }

  remainingCount(): number {
    return this.total - this.index;
  }

  progressFraction(): number {
    return this.total === 0 ? 1 : this.index / this.total;
  }

  isExhausted(): boolean {
    return this.index >= this.total;
  }

  hasMore(): boolean {
    return !this.isExhausted();
  }

  nextCandle(): Candle | undefined {
    this.expectMode("candlestick", "nextCandle");
    return asCandle(this.tick());
  }

  nextSimplePoint(): SimplePoint | undefined {
    this.expectMode("simple", "nextSimplePoint");
    return asSimplePoint(this.tick());
  }

  peekCandle(offset = 0): Candle | undefined {
    this.expectMode("candlestick", "peekCandle");
    return asCandle(this.peek(offset));
  }

  peekSimplePoint(offset = 0): SimplePoint | undefined {
    this.expectMode("simple", "peekSimplePoint");
    return asSimplePoint(this.peek(offset));
  }

  /** Everything from the current index on; the cursor does not move */
  peekRemaining(): PricePoint[] {
    return this.series.points.slice(this.index);
  }

  /** Everything from the current index on; leaves the cursor exhausted */
  consumeRemaining(): PricePoint[] {
    const rest = this.peekRemaining();
    this.index = this.total;
    return rest;
  }

  /** Independent cursor at index 0 over the same series */
  view(): PriceCursor {
    return new PriceCursor(this.series);
  }

  /**
   * Timed playback. Yields one element, then waits `intervalMs` before the
   * next; ends when the cursor is exhausted or the signal aborts.
   */
  async *play(options: PlayOptions): AsyncGenerator<PricePoint, void, undefined> {
    const { intervalMs, signal } = options;
    if (!options.resume) this.reset();

    while (!signal?.aborted) {
      const point = this.tick();
      if (point === undefined) return;
      yield point;
      if (this.isExhausted()) return;

      try {
        await sleep(intervalMs, undefined, { signal });
      } catch (err) {
        if (signal?.aborted) return;
        throw err;
      }
    }
  }

  candleStream(options: PlayOptions): AsyncGenerator<Candle, void, undefined> {
    this.expectMode("candlestick", "candleStream");
    return narrowStream(this.play(options), asCandle);
  }

  simplePointStream(options: PlayOptions): AsyncGenerator<SimplePoint, void, undefined> {
    this.expectMode("simple", "simplePointStream");
    return narrowStream(this.play(options), asSimplePoint);
  }

  private expectMode(mode: OutputMode, accessor: string): void {
    if (this.series.mode !== mode) {
      throw new InvalidStateError(
        `${accessor}() requires a ${mode} series; this cursor holds a ${this.series.mode} series`
      );
    }
  }
}

function asCandle(point: PricePoint | undefined): Candle | undefined {
  if (point === undefined) return undefined;
  if (point.kind !== "candle") throw new InvalidStateError(`expected a candle, got a ${point.kind} point`);
  return point;
}

function asSimplePoint(point: PricePoint | undefined): SimplePoint | undefined {
  if (point === undefined) return undefined;
  if (point.kind !== "simple") throw new InvalidStateError(`expected a simple point, got a ${point.kind}`);
  return point;
}

async function* narrowStream<T extends PricePoint>(
  source: AsyncGenerator<PricePoint, void, undefined>,
  narrow: (point: PricePoint) => T | undefined
): AsyncGenerator<T, void, undefined> {
  for await (const point of source) {
    const typed = narrow(point);
    if (typed !== undefined) yield typed;
  }
}
