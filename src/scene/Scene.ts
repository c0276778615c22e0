import { Camera } from "../camera/Camera";
import { createSphere } from "../geometry/Sphere";
import type { Sphere } from "../geometry/Sphere";
import { findLights } from "../geometry/World";
import type { SceneDescription, Sky } from "../types";

/**
 * Render-ready scene: the camera frame is computed and sphere centers are
 * vectors. Built once per render (once per worker) and never mutated.
 */
export interface Scene {
  readonly width: number;
  readonly height: number;
  readonly samplesPerPixel: number;
  readonly maxDepth: number;
  readonly sky: Sky | null;
  readonly camera: Camera;
  readonly objects: readonly Sphere[];
  /** Emissive subset of `objects`, used for light sampling. */
  readonly lights: readonly Sphere[];
}

export function buildScene(desc: SceneDescription): Scene {
  const objects = desc.objects.map(createSphere);
  return {
    width: desc.width,
    height: desc.height,
    samplesPerPixel: desc.samplesPerPixel,
    maxDepth: desc.maxDepth,
    sky: desc.sky,
    camera: new Camera(desc.camera),
    objects,
    lights: findLights(objects),
  };
}
