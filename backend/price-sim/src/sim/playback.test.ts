import { describe, it, expect, vi } from "vitest";
import type { PricePoint } from "@gbm-sim/price-sdk";
import { PriceCursor } from "./cursor.js";
import { PlaybackHub, playCursor } from "./playback.js";

const config = {
  initialPrice: 100,
  drift: 0,
  volatility: 0.01,
  dataPoints: 5,
  stepIntervalMs: 60_000,
  initialTimestamp: Date.UTC(2024, 0, 1),
  seed: 42,
};

async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) yield item;
}

describe("PlaybackHub", () => {
  it("hands every item to every listener in order", async () => {
    const hub = new PlaybackHub<number>();
    const a: number[] = [];
    const b: number[] = [];
    hub.subscribe((n) => a.push(n));
    hub.subscribe((n) => b.push(n));

    const handle = hub.start(() => fromArray([1, 2, 3]));
    expect(await handle.done).toBe(3);
    expect(a).toEqual([1, 2, 3]);
    expect(b).toEqual([1, 2, 3]);
  });

  it("stops delivering to a listener once it unsubscribes", async () => {
    const hub = new PlaybackHub<number>();
    const b: number[] = [];
    let unsubscribeB = () => {};
    hub.subscribe(() => unsubscribeB());
    unsubscribeB = hub.subscribe((n) => b.push(n));
    expect(hub.listenerCount).toBe(2);

    await hub.start(() => fromArray([1, 2, 3])).done;
    // the first listener removes B during item 1, after the delivery snapshot was taken
    expect(b).toEqual([1]);
    expect(hub.listenerCount).toBe(1);
  });

  it("rejects done when a listener throws", async () => {
    const hub = new PlaybackHub<number>();
    const later = vi.fn();
    hub.subscribe((n) => {
      if (n === 2) throw new Error("listener failed");
    });
    hub.subscribe(later);

    await expect(hub.start(() => fromArray([1, 2, 3])).done).rejects.toThrow("listener failed");
    expect(later).toHaveBeenCalledTimes(1);
  });
});

describe("playCursor", () => {
  it("plays the whole cursor through the hub", async () => {
    const cursor = PriceCursor.fromConfig(config);
    const expected = cursor.view().consumeRemaining();
    const hub = new PlaybackHub<PricePoint>();
    const received: PricePoint[] = [];
    hub.subscribe((p) => received.push(p));

    expect(await playCursor(hub, cursor, { intervalMs: 1 }).done).toBe(5);
    expect(received).toEqual(expected);
  });

  it("closes during a pacing wait without emitting again", async () => {
    const cursor = PriceCursor.fromConfig(config);
    const hub = new PlaybackHub<PricePoint>();
    const received: PricePoint[] = [];
    hub.subscribe((p) => received.push(p));

    const handle = playCursor(hub, cursor, { intervalMs: 1_000 });
    await vi.waitFor(() => expect(received).toHaveLength(1));

    const started = Date.now();
    await handle.close();
    expect(Date.now() - started).toBeLessThan(500);
    expect(await handle.done).toBe(1);
    expect(received).toHaveLength(1);
    expect(cursor.currentIndex).toBe(1);
  });

  it("picks up where the cursor stopped when resuming", async () => {
    const cursor = PriceCursor.fromConfig(config);
    cursor.skip(3);
    const hub = new PlaybackHub<PricePoint>();
    expect(await playCursor(hub, cursor, { intervalMs: 1, resume: true }).done).toBe(2);
  });
});
