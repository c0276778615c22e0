/**
 * Material scattering.
 *
 * scatter() is a pure function of (material, incoming ray, hit, random source)
 * dispatched on the material tag:
 *
 *   null                               → absorbed, contributes black
 *   { scattered: Ray, attenuation }    → keep tracing, multiply by attenuation
 *   { scattered: null, attenuation }   → terminal emitter, attenuation is final radiance
 */

import { WHITE, mulColor } from "../color/Color";
import type { Color } from "../color/Color";
import type { HitRecord } from "../geometry/Sphere";
import { Ray } from "../math/Ray";
import { randomInUnitSphere } from "../math/Random";
import type { Random } from "../math/Random";
import type { Vector3 } from "../math/Vector3";
import { sampleSurfaceTexture } from "../texture/TextureSampler";
import type {
  DielectricMaterial,
  Material,
  MetalMaterial,
  TexturedMaterial,
} from "../types";
import { assertNever } from "./Materials";

export interface ScatterResult {
  scattered: Ray | null;
  attenuation: Color;
}

export function scatter(
  material: Material,
  rayIn: Ray,
  hit: HitRecord,
  random: Random,
): ScatterResult | null {
  switch (material.kind) {
    case "diffuse":
      return { scattered: diffuseRay(hit, random), attenuation: material.albedo };
    case "metal":
      return scatterMetal(material, rayIn, hit, random);
    case "dielectric":
      return scatterDielectric(material, rayIn, hit, random);
    case "textured":
      return scatterTextured(material, hit, random);
    case "emissive":
      return { scattered: null, attenuation: WHITE };
    default:
      return assertNever(material);
  }
}

// ─── Geometry helpers ───────────────────────────────────────

/** Mirror `v` about the surface normal `n`. */
export function reflect(v: Vector3, n: Vector3): Vector3 {
  return v.sub(n.scale(2 * v.dot(n)));
}

/**
 * Snell refraction of unit direction `uv` through a surface with normal `n`,
 * `etaRatio` = incident index / transmitted index.
 */
export function refract(uv: Vector3, n: Vector3, etaRatio: number): Vector3 {
  const cosTheta = Math.min(uv.negate().dot(n), 1);
  const perp = uv.add(n.scale(cosTheta)).scale(etaRatio);
  const parallel = n.scale(-Math.sqrt(Math.abs(1 - perp.lengthSquared())));
  return perp.add(parallel);
}

/** Schlick's approximation of Fresnel reflectance. */
export function reflectance(cosine: number, refIdx: number): number {
  let r0 = (1 - refIdx) / (1 + refIdx);
  r0 = r0 * r0;
  return r0 + (1 - r0) * Math.pow(1 - cosine, 5);
}

// ─── Per-material scatter ───────────────────────────────────

function diffuseRay(hit: HitRecord, random: Random): Ray {
  let direction = hit.normal.add(randomInUnitSphere(random));
  if (direction.nearZero()) {
    direction = hit.normal;
  }
  return new Ray(hit.point, direction);
}

function scatterMetal(
  material: MetalMaterial,
  rayIn: Ray,
  hit: HitRecord,
  random: Random,
): ScatterResult | null {
  const reflected = reflect(rayIn.direction, hit.normal);
  const direction = material.fuzz > 0
    ? reflected.add(randomInUnitSphere(random).scale(material.fuzz))
    : reflected;

  // Fuzzed below the surface: absorbed
  if (direction.dot(hit.normal) <= 0) return null;

  return { scattered: new Ray(hit.point, direction), attenuation: material.albedo };
}

function scatterDielectric(
  material: DielectricMaterial,
  rayIn: Ray,
  hit: HitRecord,
  random: Random,
): ScatterResult {
  const ior = material.refractiveIndex;
  const ratio = hit.frontFace ? 1 / ior : ior;

  const unitDirection = rayIn.direction.unit();
  const cosTheta = Math.min(unitDirection.negate().dot(hit.normal), 1);
  const sinTheta = Math.sqrt(1 - cosTheta * cosTheta);

  const cannotRefract = ratio * sinTheta > 1;
  const direction = cannotRefract || reflectance(cosTheta, ratio) > random()
    ? reflect(unitDirection, hit.normal)
    : refract(unitDirection, hit.normal, ratio);

  return { scattered: new Ray(hit.point, direction), attenuation: WHITE };
}

function scatterTextured(
  material: TexturedMaterial,
  hit: HitRecord,
  random: Random,
): ScatterResult {
  const texel = sampleSurfaceTexture(material.texture, hit.u, hit.v, material.hOffset);
  return {
    scattered: diffuseRay(hit, random),
    attenuation: mulColor(material.albedo, texel),
  };
}
