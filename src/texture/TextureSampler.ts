import { colorFromBytes } from "../color/Color";
import type { Color } from "../color/Color";
import type { TextureImage } from "../types";

/** Wrap a horizontal coordinate shifted by `offset` back into [0, 1). */
export function rotateU(u: number, offset: number): number {
  const r = u + offset;
  return r - Math.floor(r);
}

/**
 * Nearest-pixel lookup for a textured surface. Columns span the full width,
 * rows span height - 1 so v = 0 lands on the bottom row and v = 1 on the top.
 */
export function sampleSurfaceTexture(
  image: TextureImage,
  u: number,
  v: number,
  hOffset: number,
): Color {
  const x = Math.min(Math.floor(rotateU(u, hOffset) * image.width), image.width - 1);
  const y = clampRow(Math.floor((1 - v) * (image.height - 1)), image.height);
  return colorFromBytes(image.pixels, y * image.width + x);
}

/**
 * Nearest-pixel lookup for an environment map; u and v are expected in [0, 1].
 */
export function sampleEnvironment(image: TextureImage, u: number, v: number): Color {
  const x = Math.floor(u * (image.width - 1));
  const y = clampRow(Math.floor((1 - v) * (image.height - 1)), image.height);
  return colorFromBytes(image.pixels, y * image.width + x);
}

function clampRow(y: number, height: number): number {
  return Math.max(0, Math.min(height - 1, y));
}
