import { emissive } from "../materials/Materials";
import { buildScene } from "../scene/Scene";
import type { BandJob } from "./BandTypes";
import { partitionBands } from "./BandTypes";
import { MainThreadBandScheduler } from "./MainThreadBandScheduler";

const scene = buildScene({
  width: 3,
  height: 5,
  samplesPerPixel: 1,
  maxDepth: 3,
  sky: null,
  camera: {
    lookFrom: { x: 0, y: 0, z: 0 },
    lookAt: { x: 0, y: 0, z: -1 },
    vup: { x: 0, y: 1, z: 0 },
    vfov: 60,
    aspect: 0.6,
  },
  objects: [{ center: { x: 0, y: 0, z: 0 }, radius: 50, material: emissive() }],
});

function jobs(rowsPerBand: number): BandJob[] {
  return partitionBands(5, rowsPerBand).map((band) => ({ band, seed: band.index + 1 }));
}

describe("MainThreadBandScheduler", () => {
  it("renders every band and returns them in order", async () => {
    const scheduler = new MainThreadBandScheduler(scene, 2);
    const results = await scheduler.run(jobs(2));

    expect(results.map((r) => r.index)).toEqual([0, 1, 2]);
    expect(results.map((r) => r.rowCount)).toEqual([2, 2, 1]);
    expect(results[2].pixels).toHaveLength(9);
    expect(results.every((r) => r.pixels.every((b) => b === 255))).toBe(true);
  });

  it("reports progress after each batch", async () => {
    const scheduler = new MainThreadBandScheduler(scene, 2);
    const onProgress = jest.fn();
    await scheduler.run(jobs(1), onProgress);

    expect(onProgress.mock.calls).toEqual([[2, 5], [4, 5], [5, 5]]);
  });

  it("resolves with nothing for no jobs", async () => {
    await expect(new MainThreadBandScheduler(scene).run([])).resolves.toEqual([]);
  });

  it("rejects when destroyed mid-render", async () => {
    const scheduler = new MainThreadBandScheduler(scene, 1);
    const run = scheduler.run(jobs(1), (completed) => {
      if (completed === 1) scheduler.destroy();
    });

    await expect(run).rejects.toThrow("destroyed during a render");
  });
});
