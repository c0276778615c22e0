/**
 * Linear RGB colors as `[r, g, b]` triples, nominally in 0-1.
 * Attenuation, radiance and albedo all share this representation.
 */

export type Color = readonly [number, number, number];

export const BLACK: Color = [0, 0, 0];
export const WHITE: Color = [1, 1, 1];
/** Top of the gradient sky. */
export const SKY_BLUE: Color = [0.5, 0.7, 1.0];

// ─── Arithmetic ──────────────────────────────────────────────

export function addColor(a: Color, b: Color): Color {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

/** Channel-wise product (attenuation applied to incoming light). */
export function mulColor(a: Color, b: Color): Color {
  return [a[0] * b[0], a[1] * b[1], a[2] * b[2]];
}

export function scaleColor(c: Color, s: number): Color {
  return [c[0] * s, c[1] * s, c[2] * s];
}

export function lerpColor(a: Color, b: Color, t: number): Color {
  return [
    (1 - t) * a[0] + t * b[0],
    (1 - t) * a[1] + t * b[1],
    (1 - t) * a[2] + t * b[2],
  ];
}

export function clamp01(v: number): number {
  if (v < 0) return 0;
  if (v > 1) return 1;
  return v;
}

export function clampColor(c: Color): Color {
  return [clamp01(c[0]), clamp01(c[1]), clamp01(c[2])];
}

// ─── 8-bit conversion ────────────────────────────────────────

/** Quantize a 0-1 channel to a byte, clamping out-of-range values. */
export function channelToByte(v: number): number {
  return Math.round(clamp01(v) * 255);
}

/** Square-root gamma (gamma 2) applied to a linear channel. */
export function gammaCorrect(v: number): number {
  return Math.sqrt(v);
}

/** Read the RGB8 pixel at `index` (pixel index, not byte offset) as a 0-1 color. */
export function colorFromBytes(pixels: Uint8Array, index: number): Color {
  const o = index * 3;
  return [pixels[o] / 255, pixels[o + 1] / 255, pixels[o + 2] / 255];
}
