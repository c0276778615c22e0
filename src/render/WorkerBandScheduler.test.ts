/**
 * Unit tests for WorkerBandScheduler with a mocked worker_threads module.
 *
 * Covers:
 * - pool creation and scene initialization
 * - one band in flight per worker, next band on completion
 * - failure paths (band-error, worker error) and teardown
 * - main-thread fallback when the worker script is missing
 */

import { EventEmitter } from "events";
import { RenderError } from "../errors";
import { diffuse } from "../materials/Materials";
import type { SceneDescription } from "../types";
import { partitionBands } from "./BandTypes";
import type { BandJob } from "./BandTypes";
import { WorkerBandScheduler } from "./WorkerBandScheduler";
import type { MainToWorkerMessage, WorkerToMainMessage } from "./worker/BandWorkerProtocol";

// ─── Mock Worker ────────────────────────────────────────────────

class MockWorker extends EventEmitter {
  static instances: MockWorker[] = [];

  readonly script: string;
  readonly messages: MainToWorkerMessage[] = [];
  terminated = false;

  constructor(script: string) {
    super();
    this.script = script;
    MockWorker.instances.push(this);
  }

  postMessage(msg: MainToWorkerMessage): void {
    this.messages.push(msg);
  }

  terminate(): Promise<number> {
    this.terminated = true;
    return Promise.resolve(1);
  }

  /** Message types received, in order. */
  messageTypes(): string[] {
    return this.messages.map((m) => m.type);
  }

  /** Simulate a message from the worker. */
  reply(msg: WorkerToMainMessage): void {
    this.emit("message", msg);
  }

  /** Band indices this worker was asked to render, in order. */
  renderedBands(): number[] {
    return this.messages.flatMap((m) => (m.type === "render-band" ? [m.band.index] : []));
  }

  /** Reply with a filled result for the band currently assigned to this worker. */
  completeLast(width: number, value = 7): void {
    const last = this.messages.filter((m) => m.type === "render-band").pop();
    if (!last || last.type !== "render-band") throw new Error("worker has no band in flight");
    this.reply({
      type: "band-result",
      index: last.band.index,
      startRow: last.band.startRow,
      rowCount: last.band.rowCount,
      pixels: new Uint8Array(width * last.band.rowCount * 3).fill(value),
    });
  }
}

jest.mock("worker_threads", () => ({
  Worker: jest.fn((script: string) => new MockWorker(script)),
}));

// ─── Helpers ────────────────────────────────────────────────────

const scene: SceneDescription = {
  width: 2,
  height: 6,
  samplesPerPixel: 1,
  maxDepth: 2,
  sky: { kind: "gradient" },
  camera: {
    lookFrom: { x: 0, y: 0, z: 0 },
    lookAt: { x: 0, y: 0, z: -1 },
    vup: { x: 0, y: 1, z: 0 },
    vfov: 90,
    aspect: 1,
  },
  objects: [{ center: { x: 0, y: 0, z: -1 }, radius: 0.5, material: diffuse([0.5, 0.5, 0.5]) }],
};

function makeJobs(rowsPerBand: number): BandJob[] {
  return partitionBands(scene.height, rowsPerBand).map((band) => ({ band, seed: 100 + band.index }));
}

function makeScheduler(poolSize: number): WorkerBandScheduler {
  // Any existing file passes the script check; the mock never loads it
  return new WorkerBandScheduler(scene, { poolSize, workerScript: __filename });
}

// ─── Tests ──────────────────────────────────────────────────────

describe("WorkerBandScheduler", () => {
  beforeEach(() => {
    MockWorker.instances = [];
  });

  describe("initialization", () => {
    it("creates the pool and sends the scene to every worker", () => {
      const scheduler = makeScheduler(3);

      expect(scheduler.fallbackToMainThread).toBe(false);
      expect(scheduler.poolSize).toBe(3);
      expect(MockWorker.instances).toHaveLength(3);
      for (const worker of MockWorker.instances) {
        expect(worker.script).toBe(__filename);
        expect(worker.messages).toEqual([{ type: "init", scene }]);
      }

      scheduler.destroy();
    });

    it("falls back to the main thread when the worker script is missing", () => {
      const warn = jest.spyOn(console, "warn").mockImplementation(() => {});
      const scheduler = new WorkerBandScheduler(scene, {
        poolSize: 2,
        workerScript: "/nonexistent/bandWorker.js",
      });

      expect(scheduler.fallbackToMainThread).toBe(true);
      expect(MockWorker.instances).toHaveLength(0);
      expect(warn).toHaveBeenCalledTimes(1);
      warn.mockRestore();
    });

    it("rejects runs when the pool is unavailable", async () => {
      const warn = jest.spyOn(console, "warn").mockImplementation(() => {});
      const scheduler = new WorkerBandScheduler(scene, { workerScript: "/nonexistent/bandWorker.js" });

      await expect(scheduler.run(makeJobs(2))).rejects.toBeInstanceOf(RenderError);
      warn.mockRestore();
    });
  });

  describe("dispatching", () => {
    it("keeps one band in flight per worker", async () => {
      const scheduler = makeScheduler(2);
      const run = scheduler.run(makeJobs(2));
      const [w0, w1] = MockWorker.instances;

      expect(w0.renderedBands()).toEqual([0]);
      expect(w1.renderedBands()).toEqual([1]);
      expect(scheduler.pending).toBe(3);

      w1.completeLast(scene.width);
      expect(w1.renderedBands()).toEqual([1, 2]);

      w0.completeLast(scene.width);
      w1.completeLast(scene.width);

      const results = await run;
      expect(results.map((r) => r.index)).toEqual([0, 1, 2]);
      expect(scheduler.pending).toBe(0);
      scheduler.destroy();
    });

    it("passes each band's seed to the worker", () => {
      const scheduler = makeScheduler(1);
      void scheduler.run(makeJobs(6)).catch(() => {});

      const [w0] = MockWorker.instances;
      expect(w0.messages[1]).toEqual({
        type: "render-band",
        band: { index: 0, startRow: 0, rowCount: 6 },
        seed: 100,
      });
      scheduler.destroy();
    });

    it("ignores ready messages", async () => {
      const scheduler = makeScheduler(1);
      const run = scheduler.run(makeJobs(3));
      const [w0] = MockWorker.instances;

      w0.reply({ type: "ready" });
      expect(w0.renderedBands()).toEqual([0]);

      w0.completeLast(scene.width);
      w0.completeLast(scene.width);
      await expect(run).resolves.toHaveLength(2);
      scheduler.destroy();
    });

    it("reports progress for each band", async () => {
      const scheduler = makeScheduler(2);
      const onProgress = jest.fn();
      const run = scheduler.run(makeJobs(3), onProgress);
      const [w0, w1] = MockWorker.instances;

      w1.completeLast(scene.width);
      w0.completeLast(scene.width);
      await run;

      expect(onProgress.mock.calls).toEqual([[1, 2], [2, 2]]);
      scheduler.destroy();
    });

    it("resolves immediately with no jobs", async () => {
      const scheduler = makeScheduler(1);
      await expect(scheduler.run([])).resolves.toEqual([]);
      scheduler.destroy();
    });

    it("refuses a second concurrent run", async () => {
      const scheduler = makeScheduler(1);
      void scheduler.run(makeJobs(6)).catch(() => {});
      await expect(scheduler.run(makeJobs(6))).rejects.toThrow("already in progress");
      scheduler.destroy();
    });
  });

  describe("failures", () => {
    it("rejects on band-error and tears down the pool", async () => {
      const scheduler = makeScheduler(2);
      const run = scheduler.run(makeJobs(2));
      const [w0, w1] = MockWorker.instances;

      w1.reply({ type: "band-error", index: 1, error: "boom" });

      await expect(run).rejects.toThrow("Band 1 failed: boom");
      await expect(run).rejects.toMatchObject({ name: "RenderError", bandIndex: 1 });
      expect(w0.terminated).toBe(true);
      expect(w1.terminated).toBe(true);
      expect(scheduler.poolSize).toBe(0);
    });

    it("rejects when a worker emits an error", async () => {
      const error = jest.spyOn(console, "error").mockImplementation(() => {});
      const scheduler = makeScheduler(2);
      const run = scheduler.run(makeJobs(2));
      const [w0] = MockWorker.instances;

      w0.emit("error", new Error("worker crashed"));

      await expect(run).rejects.toMatchObject({
        message: "Worker failed: worker crashed",
        bandIndex: 0,
      });
      expect(error).toHaveBeenCalled();
      error.mockRestore();
    });

    it("rejects when a busy worker exits unexpectedly", async () => {
      const scheduler = makeScheduler(1);
      const run = scheduler.run(makeJobs(3));

      MockWorker.instances[0].emit("exit", 1);

      await expect(run).rejects.toThrow("Worker exited with code 1");
    });

    it("rejects when a busy worker exits cleanly", async () => {
      const scheduler = makeScheduler(2);
      const run = scheduler.run(makeJobs(2));

      MockWorker.instances[1].emit("exit", 0);

      await expect(run).rejects.toMatchObject({
        message: "Worker exited with code 0",
        bandIndex: 1,
      });
      expect(MockWorker.instances[0].terminated).toBe(true);
    });

    it("refuses later runs after an idle worker exits", async () => {
      const scheduler = makeScheduler(1);
      MockWorker.instances[0].emit("exit", 0);

      await expect(scheduler.run(makeJobs(3))).rejects.toThrow("Worker pool is not available");
    });

    it("asks each worker to shut down before terminating it", () => {
      const scheduler = makeScheduler(2);
      scheduler.destroy();

      for (const worker of MockWorker.instances) {
        expect(worker.messageTypes()).toEqual(["init", "destroy"]);
        expect(worker.terminated).toBe(true);
      }
    });

    it("ignores results after destroy", () => {
      const scheduler = makeScheduler(1);
      void scheduler.run(makeJobs(6)).catch(() => {});
      const [w0] = MockWorker.instances;

      scheduler.destroy();
      expect(w0.terminated).toBe(true);
      expect(() => w0.completeLast(scene.width)).not.toThrow();
    });
  });
});
