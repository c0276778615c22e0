/**
 * Material constructors and small helpers over the closed `Material` union.
 */

import type { Color } from "../color/Color";
import type {
  DielectricMaterial,
  DiffuseMaterial,
  EmissiveMaterial,
  Material,
  MetalMaterial,
  Texture,
  TexturedMaterial,
} from "../types";

export function diffuse(albedo: Color): DiffuseMaterial {
  return { kind: "diffuse", albedo };
}

export function metal(albedo: Color, fuzz: number): MetalMaterial {
  return { kind: "metal", albedo, fuzz };
}

export function dielectric(refractiveIndex: number): DielectricMaterial {
  return { kind: "dielectric", refractiveIndex };
}

export function textured(texture: Texture, hOffset = 0, albedo: Color = [1, 1, 1]): TexturedMaterial {
  return { kind: "textured", albedo, texture, hOffset };
}

export function emissive(): EmissiveMaterial {
  return { kind: "emissive" };
}

/** Copy of a textured material with its texture rotated by `turns`. Other kinds are returned as-is. */
export function rotateTexture(material: Material, turns: number): Material {
  if (material.kind !== "textured") return material;
  return { ...material, hOffset: material.hOffset + turns };
}

export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
