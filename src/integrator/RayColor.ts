import { BLACK, addColor, clampColor, mulColor, scaleColor } from "../color/Color";
import type { Color } from "../color/Color";
import type { Sphere } from "../geometry/Sphere";
import { hitWorld } from "../geometry/World";
import { Ray } from "../math/Ray";
import type { Random } from "../math/Random";
import type { Vector3 } from "../math/Vector3";
import { scatter } from "../materials/Scatter";
import type { Sky } from "../types";
import { sampleSky } from "./Sky";

/** Offset that keeps a scattered ray from re-hitting its own surface. */
export const T_MIN = 0.001;

/** Per-light probability of taking a direct-lighting sample at a hit. */
export const LIGHT_SAMPLE_PROBABILITY = 0.1;
/** Glass mostly transmits, so it samples lights half as often. */
export const DIELECTRIC_LIGHT_SAMPLE_PROBABILITY = 0.05;

/** Depth budget of the sub-trace toward a light. */
const LIGHT_TRACE_MAX_DEPTH = 2;

export interface TraceContext {
  readonly objects: readonly Sphere[];
  readonly lights: readonly Sphere[];
  readonly sky: Sky | null;
  readonly random: Random;
  /** Off inside light sub-traces so they cannot recurse into more light samples. */
  readonly lightSampling: boolean;
}

/**
 * Radiance arriving along `ray`, estimated by recursive path tracing.
 *
 * `maxDepth` is the budget the path started with and `remainingDepth` what is
 * left of it; light sampling only runs on the first bounces of a path
 * (remainingDepth > maxDepth - 2).
 */
export function rayColor(
  ray: Ray,
  ctx: TraceContext,
  maxDepth: number,
  remainingDepth: number,
): Color {
  if (remainingDepth <= 0) return BLACK;

  const hit = hitWorld(ctx.objects, ray, T_MIN, Number.MAX_VALUE);
  if (!hit) return sampleSky(ctx.sky, ray.direction);

  const material = ctx.objects[hit.objectIndex].material;
  const result = scatter(material, ray, hit, ctx.random);
  // Absorbed rays would be absorbed toward the lights too
  if (!result) return BLACK;

  const { scattered, attenuation } = result;

  const probability = material.kind === "dielectric"
    ? DIELECTRIC_LIGHT_SAMPLE_PROBABILITY
    : LIGHT_SAMPLE_PROBABILITY;

  let light = BLACK;
  if (
    ctx.lightSampling &&
    ctx.lights.length > 0 &&
    ctx.random() > 1 - ctx.lights.length * probability &&
    remainingDepth > maxDepth - 2
  ) {
    light = sampleLights(hit.point, attenuation, ctx);
  }

  if (!scattered) return attenuation;

  const incoming = rayColor(scattered, ctx, maxDepth, remainingDepth - 1);
  return clampColor(addColor(light, mulColor(attenuation, incoming)));
}

/**
 * Direct contribution of every light, averaged. Rays aim at light centers and
 * are not tested for occlusion, so light can reach points a wall would shade.
 */
function sampleLights(
  point: Vector3,
  attenuation: Color,
  ctx: TraceContext,
): Color {
  const sub: TraceContext = { ...ctx, lightSampling: false };
  let sum = BLACK;
  for (const light of ctx.lights) {
    const toLight = new Ray(point, light.center.sub(point));
    const color = rayColor(toLight, sub, LIGHT_TRACE_MAX_DEPTH, 1);
    sum = addColor(sum, mulColor(attenuation, color));
  }
  return scaleColor(sum, 1 / ctx.lights.length);
}
