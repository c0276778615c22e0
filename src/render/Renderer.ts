/**
 * Top-level render orchestration: partitions the image into bands, hands
 * them to a scheduler (worker pool, or the main thread as fallback), waits
 * for every band, and assembles the final RGB8 buffer.
 */

import { writePng } from "../image/ImageWriter";
import { deriveSeed, randomSeed } from "../math/Random";
import { buildScene } from "../scene/Scene";
import { resolveRenderSettings } from "../settings/RenderSettings";
import type { RenderSettings } from "../settings/RenderSettings";
import type { SceneDescription } from "../types";
import { assembleBands, partitionBands } from "./BandTypes";
import type { BandJob, BandProgressCallback, BandScheduler } from "./BandTypes";
import { MainThreadBandScheduler } from "./MainThreadBandScheduler";
import { WorkerBandScheduler } from "./WorkerBandScheduler";

export interface RenderResult {
  /** Row-major RGB8, top row first, `width * height * 3` bytes. */
  pixels: Uint8Array;
  width: number;
  height: number;
  elapsedMs: number;
}

export class Renderer {
  readonly settings: RenderSettings;

  constructor(settings: Partial<RenderSettings> = {}) {
    this.settings = resolveRenderSettings(settings);
  }

  async render(desc: SceneDescription, onProgress?: BandProgressCallback): Promise<RenderResult> {
    const started = performance.now();
    const seed = this.settings.seed ?? randomSeed();

    const jobs: BandJob[] = partitionBands(desc.height, this.settings.rowsPerBand).map((band) => ({
      band,
      seed: deriveSeed(seed, band.index),
    }));

    const scheduler = this.createScheduler(desc);
    try {
      const results = await scheduler.run(jobs, onProgress);
      return {
        pixels: assembleBands(results, desc.width, desc.height),
        width: desc.width,
        height: desc.height,
        elapsedMs: performance.now() - started,
      };
    } finally {
      scheduler.destroy();
    }
  }

  private createScheduler(desc: SceneDescription): BandScheduler {
    const { workers, workerScript, mainThreadBatchSize } = this.settings;

    if (workers !== 0) {
      const pool = new WorkerBandScheduler(desc, {
        poolSize: workers === "auto" ? undefined : workers,
        workerScript: workerScript ?? undefined,
      });
      if (!pool.fallbackToMainThread) return pool;
      pool.destroy();
    }

    return new MainThreadBandScheduler(buildScene(desc), mainThreadBatchSize);
  }
}

/** Render a scene and write it as a PNG. I/O errors propagate. */
export async function renderToFile(
  desc: SceneDescription,
  outputPath: string,
  settings: Partial<RenderSettings> = {},
): Promise<RenderResult> {
  const result = await new Renderer(settings).render(desc);
  await writePng(outputPath, result.pixels, result.width, result.height);
  return result;
}
