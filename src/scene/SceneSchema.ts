import { z } from "zod";
import type { ZodIssue } from "zod";
import { SceneValidationError } from "../errors";

/**
 * Schema of a scene file. Materials are externally tagged objects with a
 * single key naming the kind, e.g. `{"Metal": {"albedo": [..], "fuzz": 0.1}}`.
 */

const positiveInt = z.number().int().positive();

export const vector3Schema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number(),
});

export const colorSchema = z.tuple([z.number(), z.number(), z.number()]);

export const noiseSourceSchema = z.object({
  noise: z.object({
    width: positiveInt,
    height: positiveInt,
    scale: z.number().positive(),
    octaves: z.number().int().min(1).max(12),
    seed: z.number().int(),
    colors: z.tuple([colorSchema, colorSchema]),
  }),
});

/** A texture file path, or a procedural source. */
const pixelsSchema = z.union([z.string().min(1, "Texture path is required"), noiseSourceSchema]);

export const materialSchema = z.union([
  z.object({ Lambertian: z.object({ albedo: colorSchema }) }).strict(),
  z.object({ Metal: z.object({ albedo: colorSchema, fuzz: z.number().min(0) }) }).strict(),
  z.object({ Glass: z.object({ index_of_refraction: z.number().positive() }) }).strict(),
  z
    .object({
      Texture: z.object({
        albedo: colorSchema.default([1, 1, 1]),
        pixels: pixelsSchema,
        // Informational; the decoded image's size wins
        width: positiveInt.optional(),
        height: positiveInt.optional(),
        h_offset: z.number().default(0),
      }),
    })
    .strict(),
  z.object({ Light: z.object({}) }).strict(),
]);

export const sphereSchema = z.object({
  center: vector3Schema,
  radius: z.number().refine((r) => r !== 0, "Radius must be non-zero"),
  material: materialSchema,
});

/** `""` selects the gradient sky; a path or noise source an environment texture. */
export const skySchema = z.object({
  texture: z.union([z.string(), noiseSourceSchema]),
});

export const cameraSchema = z.object({
  look_from: vector3Schema,
  look_at: vector3Schema,
  vup: vector3Schema,
  vfov: z.number().gt(0).lt(180),
  aspect: z.number().positive(),
});

export const sceneSchema = z.object({
  width: positiveInt,
  height: positiveInt,
  samples_per_pixel: positiveInt,
  max_depth: positiveInt,
  sky: skySchema.nullable().optional(),
  camera: cameraSchema,
  objects: z.array(sphereSchema),
});

export type SceneJson = z.infer<typeof sceneSchema>;
export type MaterialJson = z.infer<typeof materialSchema>;
export type NoiseSourceJson = z.infer<typeof noiseSourceSchema>;
export type SkyJson = z.infer<typeof skySchema>;

export function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/** Validate parsed JSON as a scene. Throws SceneValidationError listing every issue. */
export function parseSceneJson(value: unknown): SceneJson {
  const result = sceneSchema.safeParse(value);
  if (!result.success) {
    throw new SceneValidationError(result.error.issues.map(formatIssue));
  }
  return result.data;
}
