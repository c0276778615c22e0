export type WorkerCount = number | "auto";

/** How a render is executed. Scene content lives in the scene file, not here. */
export interface RenderSettings {
  /** Worker threads; "auto" sizes the pool from the CPU count, 0 renders on the main thread. */
  workers: WorkerCount;
  rowsPerBand: number;
  /** Master seed for every band stream; null draws a fresh one per render. */
  seed: number | null;
  /** Bands rendered between event-loop yields on the main thread. */
  mainThreadBatchSize: number;
  /** Override for the compiled worker entry point. */
  workerScript: string | null;
}

export const DEFAULT_RENDER_SETTINGS: RenderSettings = {
  workers: "auto",
  rowsPerBand: 8,
  seed: null,
  mainThreadBatchSize: 4,
  workerScript: null,
};

/**
 * Merge partial overrides onto the defaults. Undefined fields keep their
 * default; numeric fields are floored and clamped to their valid range.
 */
export function resolveRenderSettings(partial: Partial<RenderSettings> | null = null): RenderSettings {
  if (!partial) return { ...DEFAULT_RENDER_SETTINGS };

  const merged: RenderSettings = {
    workers: partial.workers ?? DEFAULT_RENDER_SETTINGS.workers,
    rowsPerBand: partial.rowsPerBand ?? DEFAULT_RENDER_SETTINGS.rowsPerBand,
    seed: partial.seed ?? DEFAULT_RENDER_SETTINGS.seed,
    mainThreadBatchSize: partial.mainThreadBatchSize ?? DEFAULT_RENDER_SETTINGS.mainThreadBatchSize,
    workerScript: partial.workerScript ?? DEFAULT_RENDER_SETTINGS.workerScript,
  };

  return {
    ...merged,
    workers: merged.workers === "auto" ? "auto" : Math.max(0, Math.floor(merged.workers)),
    rowsPerBand: Math.max(1, Math.floor(merged.rowsPerBand)),
    seed: merged.seed === null ? null : merged.seed >>> 0,
    mainThreadBatchSize: Math.max(1, Math.floor(merged.mainThreadBatchSize)),
  };
}
