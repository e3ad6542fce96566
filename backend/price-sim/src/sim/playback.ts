/**
 * Playback fan-out: one paced producer loop, any number of passive listeners.
 */

import type { PricePoint } from "@gbm-sim/price-sdk";
import type { PlayOptions, PriceCursor } from "./cursor.js";

export type Listener<T> = (item: T) => void;

export interface PlaybackHandle {
  /** Resolves with the number of items delivered once the loop stops */
  done: Promise<number>;
  /** Stop delivery; resolves once the loop has stopped */
  close(): Promise<void>;
}

export class PlaybackHub<T> {
  private readonly listeners = new Set<Listener<T>>();

  get listenerCount(): number {
    return this.listeners.size;
  }

  subscribe(listener: Listener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Drain `source` in order, handing each item to every current listener.
   * A listener that throws stops the loop and rejects `done`.
   */
  start(source: (signal: AbortSignal) => AsyncIterable<T>): PlaybackHandle {
    const controller = new AbortController();

    const run = async (): Promise<number> => {
      let delivered = 0;
      for await (const item of source(controller.signal)) {
        if (controller.signal.aborted) break;
        for (const listener of [...this.listeners]) listener(item);
        delivered++;
      }
      return delivered;
    };

    const done = run();
    return {
      done,
      close: async () => {
        controller.abort();
        await done;
      },
    };
  }
}

/** Play a cursor through a hub; the hub's close() aborts the cursor's pacing wait */
export function playCursor(
  hub: PlaybackHub<PricePoint>,
  cursor: PriceCursor,
  options: Omit<PlayOptions, "signal">
): PlaybackHandle {
  return hub.start((signal) => cursor.play({ ...options, signal }));
}
