import type { Ray } from "../math/Ray";
import { Vector3 } from "../math/Vector3";
import type { Material, SphereDescription } from "../types";

export interface Sphere {
  readonly center: Vector3;
  readonly radius: number;
  readonly material: Material;
}

/**
 * Result of a successful intersection. Lives only as long as the trace step
 * that produced it.
 */
export interface HitRecord {
  t: number;
  point: Vector3;
  /** Always faces against the incoming ray. */
  normal: Vector3;
  /** True when the ray hit the side the geometric normal points toward. */
  frontFace: boolean;
  /** Equirectangular surface coordinates in [0, 1]. */
  u: number;
  v: number;
  /** Index of the hit sphere in the world list; the material is read from there. */
  objectIndex: number;
}

const TWO_PI = Math.PI * 2;

export function createSphere(desc: SphereDescription): Sphere {
  return {
    center: Vector3.from(desc.center),
    radius: desc.radius,
    material: desc.material,
  };
}

/**
 * Map a direction from the sphere center to (u, v) texture coordinates.
 * u wraps around the y axis, v runs bottom (0) to top (1).
 */
export function sphereUV(outward: Vector3): { u: number; v: number } {
  const n = outward.unit();
  return {
    u: Math.atan2(n.x, n.z) / TWO_PI + 0.5,
    v: n.y * 0.5 + 0.5,
  };
}

/**
 * Intersect a ray with a sphere. Returns the nearer root inside (tMin, tMax),
 * falling back to the farther one, or null.
 */
export function hitSphere(
  sphere: Sphere,
  ray: Ray,
  tMin: number,
  tMax: number,
  objectIndex = 0,
): HitRecord | null {
  const oc = ray.origin.sub(sphere.center);
  const a = ray.direction.lengthSquared();
  const halfB = oc.dot(ray.direction);
  const c = oc.lengthSquared() - sphere.radius * sphere.radius;
  const discriminant = halfB * halfB - a * c;

  if (discriminant < 0) return null;

  const sqrtd = Math.sqrt(discriminant);
  const roots = [(-halfB - sqrtd) / a, (-halfB + sqrtd) / a];

  for (const root of roots) {
    if (root <= tMin || root >= tMax) continue;

    const point = ray.at(root);
    const outward = point.sub(sphere.center).divScalar(sphere.radius);
    const frontFace = ray.direction.dot(outward) < 0;
    const { u, v } = sphereUV(point.sub(sphere.center));

    return {
      t: root,
      point,
      normal: frontFace ? outward : outward.negate(),
      frontFace,
      u,
      v,
      objectIndex,
    };
  }

  return null;
}
