import { readFile } from "fs/promises";
import * as path from "path";
import { errorMessage, SceneValidationError, TextureLoadError } from "../errors";
import { decodeImage } from "../image/ImageDecoder";
import { dielectric, diffuse, emissive, metal, textured } from "../materials/Materials";
import { generateNoiseTexture } from "../texture/NoiseTexture";
import type { Material, SceneDescription, Sky, Texture } from "../types";
import { parseSceneJson } from "./SceneSchema";
import type { MaterialJson, NoiseSourceJson, SceneJson } from "./SceneSchema";

/**
 * Resolves textures referenced by a scene. Files are read relative to
 * `baseDir`; each distinct source is decoded or generated once per load.
 */
class TextureResolver {
  private baseDir: string;
  private cache = new Map<string, Promise<Texture>>();

  constructor(baseDir: string) {
    this.baseDir = baseDir;
  }

  resolve(pixels: string | NoiseSourceJson): Promise<Texture> {
    const key = typeof pixels === "string" ? `file:${pixels}` : `noise:${JSON.stringify(pixels.noise)}`;
    let pending = this.cache.get(key);
    if (!pending) {
      pending = typeof pixels === "string"
        ? this.loadFile(pixels)
        : Promise.resolve(generateNoiseTexture(pixels.noise));
      this.cache.set(key, pending);
    }
    return pending;
  }

  private async loadFile(filePath: string): Promise<Texture> {
    const resolved = path.resolve(this.baseDir, filePath);

    let bytes: Uint8Array;
    try {
      bytes = await readFile(resolved);
    } catch (e) {
      throw new TextureLoadError(filePath, errorMessage(e), { cause: e });
    }

    try {
      const image = decodeImage(bytes);
      return { ...image, source: { kind: "file", path: filePath } };
    } catch (e) {
      throw new TextureLoadError(filePath, errorMessage(e), { cause: e });
    }
  }
}

async function toMaterial(json: MaterialJson, textures: TextureResolver): Promise<Material> {
  if ("Lambertian" in json) return diffuse(json.Lambertian.albedo);
  if ("Metal" in json) return metal(json.Metal.albedo, json.Metal.fuzz);
  if ("Glass" in json) return dielectric(json.Glass.index_of_refraction);
  if ("Texture" in json) {
    const { albedo, pixels, h_offset } = json.Texture;
    return textured(await textures.resolve(pixels), h_offset, albedo);
  }
  return emissive();
}

async function toSky(json: SceneJson["sky"], textures: TextureResolver): Promise<Sky | null> {
  if (!json) return null;
  if (json.texture === "") return { kind: "gradient" };
  return { kind: "texture", texture: await textures.resolve(json.texture) };
}

/**
 * Validate parsed scene JSON and resolve every texture it references.
 * Throws SceneValidationError or TextureLoadError; nothing is returned
 * until all textures are decoded.
 */
export async function loadScene(json: unknown, baseDir: string): Promise<SceneDescription> {
  const scene = parseSceneJson(json);
  const textures = new TextureResolver(baseDir);

  const [sky, materials] = await Promise.all([
    toSky(scene.sky, textures),
    Promise.all(scene.objects.map((object) => toMaterial(object.material, textures))),
  ]);

  return {
    width: scene.width,
    height: scene.height,
    samplesPerPixel: scene.samples_per_pixel,
    maxDepth: scene.max_depth,
    sky,
    camera: {
      lookFrom: scene.camera.look_from,
      lookAt: scene.camera.look_at,
      vup: scene.camera.vup,
      vfov: scene.camera.vfov,
      aspect: scene.camera.aspect,
    },
    objects: scene.objects.map((object, i) => ({
      center: object.center,
      radius: object.radius,
      material: materials[i],
    })),
  };
}

/** Read and load a scene file. Relative texture paths resolve against its directory. */
export async function loadSceneFile(filePath: string): Promise<SceneDescription> {
  const text = await readFile(filePath, "utf8");

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    throw new SceneValidationError([`(root): Invalid JSON: ${errorMessage(e)}`]);
  }

  return loadScene(json, path.dirname(path.resolve(filePath)));
}
