import type { Ray } from "../math/Ray";
import { hitSphere } from "./Sphere";
import type { HitRecord, Sphere } from "./Sphere";

/**
 * Closest-hit scan over every object. Each accepted hit shrinks the search
 * interval, so farther candidates are rejected by the quadratic test alone.
 */
export function hitWorld(
  objects: readonly Sphere[],
  ray: Ray,
  tMin: number,
  tMax: number,
): HitRecord | null {
  let closestSoFar = tMax;
  let closest: HitRecord | null = null;

  for (let i = 0; i < objects.length; i++) {
    const hit = hitSphere(objects[i], ray, tMin, closestSoFar, i);
    if (hit) {
      closestSoFar = hit.t;
      closest = hit;
    }
  }

  return closest;
}

/** Emissive spheres, in scene order. */
export function findLights(objects: readonly Sphere[]): Sphere[] {
  return objects.filter((s) => s.material.kind === "emissive");
}
