import { createNoise3D } from "simplex-noise";
import { lerpColor, channelToByte } from "../color/Color";
import { createRandom } from "../math/Random";
import type { NoiseTextureConfig, Texture } from "../types";

export const DEFAULT_NOISE_CONFIG: NoiseTextureConfig = {
  width: 256,
  height: 128,
  scale: 2,
  octaves: 4,
  seed: 1,
  colors: [
    [0.05, 0.1, 0.4],
    [0.3, 0.6, 0.25],
  ],
};

/**
 * Generates an equirectangular texture from 3D simplex noise sampled on the
 * unit sphere, so it wraps seamlessly in longitude and has no seam at the
 * poles. Pixel (x, y) maps to the same (u, v) the sphere lookup uses:
 * u = x / width, v = 1 - y / (height - 1), with v linear in the y axis.
 *
 * Same config gives the same pixels.
 */
export function generateNoiseTexture(partial: Partial<NoiseTextureConfig> = {}): Texture {
  const config: NoiseTextureConfig = { ...DEFAULT_NOISE_CONFIG, ...partial };
  const { width, height, scale, octaves, seed, colors } = config;
  const noise3D = createNoise3D(createRandom(seed));
  const pixels = new Uint8Array(width * height * 3);
  const TWO_PI = Math.PI * 2;
  const rowDenominator = Math.max(height - 1, 1);

  for (let y = 0; y < height; y++) {
    const dirY = 1 - 2 * (y / rowDenominator);
    const ring = Math.sqrt(Math.max(0, 1 - dirY * dirY));

    for (let x = 0; x < width; x++) {
      // Inverse of u = atan2(x, z) / 2π + 0.5
      const phi = (x / width - 0.5) * TWO_PI;
      const dirX = Math.sin(phi) * ring;
      const dirZ = Math.cos(phi) * ring;

      let value = 0;
      let amplitude = 1;
      let frequency = scale;
      let totalAmplitude = 0;
      for (let o = 0; o < Math.max(1, octaves); o++) {
        value += noise3D(dirX * frequency, dirY * frequency, dirZ * frequency) * amplitude;
        totalAmplitude += amplitude;
        amplitude *= 0.5;
        frequency *= 2;
      }

      // -1..1 -> 0..1
      const t = (value / totalAmplitude + 1) * 0.5;
      const color = lerpColor(colors[0], colors[1], t);

      const idx = (y * width + x) * 3;
      pixels[idx] = channelToByte(color[0]);
      pixels[idx + 1] = channelToByte(color[1]);
      pixels[idx + 2] = channelToByte(color[2]);
    }
  }

  return { width, height, pixels, source: { kind: "noise", config } };
}
