import { createRandom } from "../math/Random";
import type { Scene } from "../scene/Scene";
import { renderBand } from "./BandRenderer";
import type { BandJob, BandProgressCallback, BandResult, BandScheduler } from "./BandTypes";

/**
 * Renders bands on the calling thread, a batch at a time, yielding to the
 * event loop between batches so timers and I/O keep running.
 *
 * Used when worker threads are disabled or unavailable.
 */
export class MainThreadBandScheduler implements BandScheduler {
  private scene: Scene;

  /** Maximum bands to render before yielding. */
  private batchSize: number;

  private destroyed = false;

  constructor(scene: Scene, batchSize = 4) {
    this.scene = scene;
    this.batchSize = Math.max(1, batchSize);
  }

  async run(jobs: BandJob[], onProgress?: BandProgressCallback): Promise<BandResult[]> {
    const pending = [...jobs];
    const results: BandResult[] = [];

    while (pending.length > 0) {
      if (this.destroyed) {
        throw new Error("MainThreadBandScheduler was destroyed during a render");
      }

      const batch = pending.splice(0, this.batchSize);
      for (const job of batch) {
        results.push(renderBand(this.scene, job.band, createRandom(job.seed)));
      }
      onProgress?.(results.length, jobs.length);

      if (pending.length > 0) {
        await yieldToEventLoop();
      }
    }

    return results.sort((a, b) => a.index - b.index);
  }

  destroy(): void {
    this.destroyed = true;
  }
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
