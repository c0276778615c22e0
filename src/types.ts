/**
 * Core type definitions for orbtrace.
 *
 * Everything here is plain data so that a scene description survives
 * structured cloning into worker threads unchanged.
 */

import type { Color } from "./color/Color";
import type { CameraParams } from "./camera/Camera";
import type { Vector3Like } from "./math/Vector3";

// --- Textures ---

/** Decoded image: packed RGB8, row-major, top row first. */
export interface TextureImage {
  pixels: Uint8Array;
  width: number;
  height: number;
}

export interface NoiseTextureConfig {
  width: number;
  height: number;
  /** Noise frequency on the unit sphere. */
  scale: number;
  octaves: number;
  seed: number;
  /** Colors blended from low to high noise values. */
  colors: [Color, Color];
}

export type TextureSource =
  | { kind: "file"; path: string }
  | { kind: "noise"; config: NoiseTextureConfig };

/** A decoded texture together with where it came from (for re-serialization). */
export interface Texture extends TextureImage {
  source: TextureSource;
}

// --- Materials ---

export interface DiffuseMaterial {
  readonly kind: "diffuse";
  readonly albedo: Color;
}

export interface MetalMaterial {
  readonly kind: "metal";
  readonly albedo: Color;
  /** Reflection blur radius, 0 = mirror. */
  readonly fuzz: number;
}

export interface DielectricMaterial {
  readonly kind: "dielectric";
  readonly refractiveIndex: number;
}

export interface TexturedMaterial {
  readonly kind: "textured";
  /** Tint multiplied into the texture lookup; white leaves it unchanged. */
  readonly albedo: Color;
  readonly texture: Texture;
  /** Horizontal texture rotation as a fraction of a turn. */
  readonly hOffset: number;
}

export interface EmissiveMaterial {
  readonly kind: "emissive";
}

export type Material =
  | DiffuseMaterial
  | MetalMaterial
  | DielectricMaterial
  | TexturedMaterial
  | EmissiveMaterial;

// --- Sky ---

export type Sky =
  | { kind: "gradient" }
  | { kind: "texture"; texture: Texture };

// --- Scene ---

export interface SphereDescription {
  center: Vector3Like;
  /** Negative radius flips normals inward (hollow shell). */
  radius: number;
  material: Material;
}

/** Serializable scene, as loaded from a file or sent to a worker. */
export interface SceneDescription {
  width: number;
  height: number;
  samplesPerPixel: number;
  maxDepth: number;
  /** null renders a black background. */
  sky: Sky | null;
  camera: CameraParams;
  objects: SphereDescription[];
}
