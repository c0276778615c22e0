/**
 * Worker-thread pool for band rendering.
 *
 * Sends the scene to every worker once, then feeds band jobs to idle
 * workers until the queue drains. Results come back with their pixel
 * buffers transferred and are returned in band order.
 *
 * Flags `fallbackToMainThread` when the compiled worker script is missing
 * (e.g. running from TypeScript sources) or worker creation fails.
 */

import { existsSync } from "fs";
import { availableParallelism } from "os";
import * as path from "path";
import { Worker } from "worker_threads";
import { RenderError } from "../errors";
import type { SceneDescription } from "../types";
import type { BandJob, BandProgressCallback, BandResult, BandScheduler } from "./BandTypes";
import type {
  WorkerDestroyMessage,
  WorkerInitMessage,
  WorkerRenderBandMessage,
  WorkerToMainMessage,
} from "./worker/BandWorkerProtocol";

interface WorkerSlot {
  worker: Worker;
  busy: boolean;
  /** Index of the band currently being rendered, or null if idle. */
  currentBand: number | null;
}

interface ActiveRun {
  total: number;
  results: BandResult[];
  onProgress?: BandProgressCallback;
  resolve: (results: BandResult[]) => void;
  reject: (error: Error) => void;
}

export interface WorkerBandSchedulerOptions {
  /** Number of workers; defaults to one less than the available cores, 1-8. */
  poolSize?: number;
  /** Compiled worker entry point; defaults to the sibling `worker/bandWorker.js`. */
  workerScript?: string;
}

export function defaultPoolSize(): number {
  return Math.min(Math.max(availableParallelism() - 1, 1), 8);
}

export function defaultWorkerScript(): string {
  return path.join(__dirname, "worker", "bandWorker.js");
}

export class WorkerBandScheduler implements BandScheduler {
  private pool: WorkerSlot[] = [];
  private pendingQueue: WorkerRenderBandMessage[] = [];
  private active: ActiveRun | null = null;
  private destroyed = false;

  /** True if the pool could not be created; caller should render on the main thread. */
  fallbackToMainThread = false;

  constructor(scene: SceneDescription, options: WorkerBandSchedulerOptions = {}) {
    this.initPool(
      scene,
      options.poolSize ?? defaultPoolSize(),
      options.workerScript ?? defaultWorkerScript(),
    );
  }

  private initPool(scene: SceneDescription, poolSize: number, script: string): void {
    if (!existsSync(script)) {
      console.warn(
        `[WorkerBandScheduler] Worker script not found at ${script}, falling back to main thread`,
      );
      this.fallbackToMainThread = true;
      return;
    }

    const init: WorkerInitMessage = { type: "init", scene };

    try {
      for (let i = 0; i < Math.max(1, poolSize); i++) {
        const worker = new Worker(script);
        const slot: WorkerSlot = { worker, busy: false, currentBand: null };
        worker.on("message", (msg: WorkerToMainMessage) => {
          this.handleWorkerMessage(slot, msg);
        });
        worker.on("error", (e: Error) => {
          console.error("[WorkerBandScheduler] Worker error:", e.message);
          this.fail(new RenderError(`Worker failed: ${e.message}`, slot.currentBand, { cause: e }));
        });
        // Workers only exit when terminated; any other exit leaves the pool short
        worker.on("exit", (code: number) => {
          if (!this.destroyed) {
            this.fail(new RenderError(`Worker exited with code ${code}`, slot.currentBand));
          }
        });
        worker.postMessage(init);
        this.pool.push(slot);
      }
    } catch (e) {
      console.warn(
        "[WorkerBandScheduler] Worker creation failed, falling back to main thread:",
        e,
      );
      this.terminateAll();
      this.fallbackToMainThread = true;
    }
  }

  // ─── Scheduling ──────────────────────────────────────────────

  run(jobs: BandJob[], onProgress?: BandProgressCallback): Promise<BandResult[]> {
    if (this.fallbackToMainThread || this.destroyed) {
      return Promise.reject(new RenderError("Worker pool is not available"));
    }
    if (this.active) {
      return Promise.reject(new RenderError("A render is already in progress"));
    }
    if (jobs.length === 0) {
      return Promise.resolve([]);
    }

    return new Promise<BandResult[]>((resolve, reject) => {
      this.active = { total: jobs.length, results: [], onProgress, resolve, reject };
      this.pendingQueue = jobs.map((job) => ({
        type: "render-band",
        band: job.band,
        seed: job.seed,
      }));
      this.dispatchAll();
    });
  }

  get pending(): number {
    return this.pendingQueue.length + this.pool.filter((s) => s.busy).length;
  }

  get poolSize(): number {
    return this.pool.length;
  }

  // ─── Dispatching ─────────────────────────────────────────────

  private dispatchAll(): void {
    for (const slot of this.pool) {
      if (!slot.busy && this.pendingQueue.length > 0) {
        this.dispatchNext(slot);
      }
    }
  }

  private dispatchNext(slot: WorkerSlot): void {
    const msg = this.pendingQueue.shift();
    if (!msg) {
      slot.busy = false;
      slot.currentBand = null;
      return;
    }

    slot.busy = true;
    slot.currentBand = msg.band.index;
    slot.worker.postMessage(msg);
  }

  // ─── Result Handling ─────────────────────────────────────────

  private handleWorkerMessage(slot: WorkerSlot, msg: WorkerToMainMessage): void {
    switch (msg.type) {
      case "band-result":
        this.handleBandResult({
          index: msg.index,
          startRow: msg.startRow,
          rowCount: msg.rowCount,
          pixels: msg.pixels,
        });
        break;
      case "band-error":
        this.fail(new RenderError(`Band ${msg.index} failed: ${msg.error}`, msg.index));
        return;
      case "ready":
        // Worker initialized; jobs may already be queued on it
        return;
    }

    // Worker is now free; dispatch next job
    slot.busy = false;
    slot.currentBand = null;
    this.dispatchNext(slot);
  }

  private handleBandResult(result: BandResult): void {
    const run = this.active;
    if (!run) return;

    run.results.push(result);
    run.onProgress?.(run.results.length, run.total);

    if (run.results.length === run.total) {
      this.active = null;
      run.resolve([...run.results].sort((a, b) => a.index - b.index));
    }
  }

  private fail(error: RenderError): void {
    const run = this.active;
    this.active = null;
    this.pendingQueue = [];
    this.destroy();
    run?.reject(error);
  }

  // ─── Cleanup ─────────────────────────────────────────────────

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.pendingQueue = [];
    this.terminateAll();

    const run = this.active;
    this.active = null;
    run?.reject(new RenderError("Worker pool was destroyed during a render"));
  }

  private terminateAll(): void {
    const destroy: WorkerDestroyMessage = { type: "destroy" };
    for (const slot of this.pool) {
      slot.worker.postMessage(destroy);
      slot.worker.terminate().catch((e: unknown) => {
        console.warn("[WorkerBandScheduler] Worker terminate failed:", e);
      });
    }
    this.pool = [];
  }
}
