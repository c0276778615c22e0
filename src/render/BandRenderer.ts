import { channelToByte, gammaCorrect } from "../color/Color";
import { rayColor } from "../integrator/RayColor";
import type { TraceContext } from "../integrator/RayColor";
import type { Random } from "../math/Random";
import type { Scene } from "../scene/Scene";
import type { Band, BandResult } from "./BandTypes";

/**
 * Render every pixel of a band with `samplesPerPixel` jittered camera rays.
 *
 * Image coordinates: s runs left to right, t bottom to top, so image row y
 * maps to t = (height - y) / (height - 1) and the buffer comes out top row
 * first. The averaged color goes through sqrt gamma before quantization.
 */
export function renderBand(scene: Scene, band: Band, random: Random): BandResult {
  const { width, height, samplesPerPixel, maxDepth, camera } = scene;
  const pixels = new Uint8Array(width * band.rowCount * 3);

  const ctx: TraceContext = {
    objects: scene.objects,
    lights: scene.lights,
    sky: scene.sky,
    random,
    lightSampling: true,
  };

  const sDenominator = Math.max(width - 1, 1);
  const tDenominator = Math.max(height - 1, 1);
  // samplesPerPixel = 0 leaves the band black instead of dividing by zero
  const scale = samplesPerPixel > 0 ? 1 / samplesPerPixel : 0;

  for (let row = 0; row < band.rowCount; row++) {
    const y = band.startRow + row;

    for (let x = 0; x < width; x++) {
      let r = 0;
      let g = 0;
      let b = 0;

      for (let sample = 0; sample < samplesPerPixel; sample++) {
        const s = (x + random()) / sDenominator;
        const t = (height - (y + random())) / tDenominator;
        const color = rayColor(camera.getRay(s, t), ctx, maxDepth, maxDepth);
        r += color[0];
        g += color[1];
        b += color[2];
      }

      const offset = (row * width + x) * 3;
      pixels[offset] = channelToByte(gammaCorrect(r * scale));
      pixels[offset + 1] = channelToByte(gammaCorrect(g * scale));
      pixels[offset + 2] = channelToByte(gammaCorrect(b * scale));
    }
  }

  return {
    index: band.index,
    startRow: band.startRow,
    rowCount: band.rowCount,
    pixels,
  };
}
