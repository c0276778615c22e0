import { assertNever } from "../materials/Materials";
import type { Color } from "../color/Color";
import type { Material, SceneDescription, Sky, Texture } from "../types";
import type { MaterialJson, NoiseSourceJson, SceneJson, SkyJson } from "./SceneSchema";

function rgb(c: Color): [number, number, number] {
  return [c[0], c[1], c[2]];
}

function textureSource(texture: Texture): string | NoiseSourceJson {
  const source = texture.source;
  switch (source.kind) {
    case "file":
      return source.path;
    case "noise": {
      const { width, height, scale, octaves, seed, colors } = source.config;
      return {
        noise: {
          width,
          height,
          scale,
          octaves,
          seed,
          colors: [rgb(colors[0]), rgb(colors[1])],
        },
      };
    }
    default:
      return assertNever(source);
  }
}

export function serializeMaterial(material: Material): MaterialJson {
  switch (material.kind) {
    case "diffuse":
      return { Lambertian: { albedo: rgb(material.albedo) } };
    case "metal":
      return { Metal: { albedo: rgb(material.albedo), fuzz: material.fuzz } };
    case "dielectric":
      return { Glass: { index_of_refraction: material.refractiveIndex } };
    case "textured":
      return {
        Texture: {
          albedo: rgb(material.albedo),
          pixels: textureSource(material.texture),
          width: material.texture.width,
          height: material.texture.height,
          h_offset: material.hOffset,
        },
      };
    case "emissive":
      return { Light: {} };
    default:
      return assertNever(material);
  }
}

function serializeSky(sky: Sky | null): SkyJson | null {
  if (!sky) return null;
  switch (sky.kind) {
    case "gradient":
      return { texture: "" };
    case "texture":
      return { texture: textureSource(sky.texture) };
    default:
      return assertNever(sky);
  }
}

/** Convert a scene back to its file format. Textures serialize as their source. */
export function serializeScene(desc: SceneDescription): SceneJson {
  const { camera } = desc;
  return {
    width: desc.width,
    height: desc.height,
    samples_per_pixel: desc.samplesPerPixel,
    max_depth: desc.maxDepth,
    sky: serializeSky(desc.sky),
    camera: {
      look_from: { x: camera.lookFrom.x, y: camera.lookFrom.y, z: camera.lookFrom.z },
      look_at: { x: camera.lookAt.x, y: camera.lookAt.y, z: camera.lookAt.z },
      vup: { x: camera.vup.x, y: camera.vup.y, z: camera.vup.z },
      vfov: camera.vfov,
      aspect: camera.aspect,
    },
    objects: desc.objects.map((object) => ({
      center: { x: object.center.x, y: object.center.y, z: object.center.z },
      radius: object.radius,
      material: serializeMaterial(object.material),
    })),
  };
}

export function sceneToJsonString(desc: SceneDescription): string {
  return JSON.stringify(serializeScene(desc), null, 2);
}
