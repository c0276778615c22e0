import type { Color } from "../color/Color";
import { dielectric, diffuse, emissive, metal, textured } from "../materials/Materials";
import { createRandom } from "../math/Random";
import { Vector3 } from "../math/Vector3";
import { generateNoiseTexture } from "../texture/NoiseTexture";
import type { Material, SceneDescription, SphereDescription } from "../types";

export type PresetName = "cover" | "test";

export const PRESET_NAMES: readonly PresetName[] = ["cover", "test"];

export function isPresetName(name: string): name is PresetName {
  return name === "cover" || name === "test";
}

const ASPECT = 800 / 600;

function sphere(x: number, y: number, z: number, radius: number, material: Material): SphereDescription {
  return { center: { x, y, z }, radius, material };
}

/**
 * The classic cover scene: a gray ground, a grid of small random spheres,
 * and three large ones (glass, brown diffuse, polished metal).
 * The grid is reproducible from `seed`.
 */
export function coverScene(seed: number): SceneDescription {
  const random = createRandom(seed);
  const objects: SphereDescription[] = [
    sphere(0, -1000, 0, 1000, diffuse([0.5, 0.5, 0.5])),
  ];

  const keepOut = new Vector3(4, 0.2, 0);
  for (let a = -11; a < 11; a++) {
    for (let b = -11; b < 11; b++) {
      const chooseMaterial = random();
      const center = new Vector3(a + 0.9 * random(), 0.2, b + 0.9 * random());
      if (center.sub(keepOut).length() < 0.9) continue;

      let material: Material;
      if (chooseMaterial < 0.8) {
        const albedo: Color = [random() * random(), random() * random(), random() * random()];
        material = diffuse(albedo);
      } else if (chooseMaterial < 0.95) {
        const albedo: Color = [
          0.5 * (1 + random()),
          0.5 * (1 + random()),
          0.5 * (1 + random()),
        ];
        material = metal(albedo, 0.5 * random());
      } else {
        material = dielectric(1.5);
      }
      objects.push(sphere(center.x, center.y, center.z, 0.2, material));
    }
  }

  objects.push(sphere(0, 1, 0, 1, dielectric(1.5)));
  objects.push(sphere(-4, 1, 0, 1, diffuse([0.4, 0.2, 0.1])));
  objects.push(sphere(4, 1, 0, 1, metal([0.7, 0.6, 0.5], 0)));

  return {
    width: 800,
    height: 600,
    samplesPerPixel: 64,
    maxDepth: 50,
    sky: { kind: "gradient" },
    camera: {
      lookFrom: { x: 13, y: 2, z: 3 },
      lookAt: { x: 0, y: 0, z: 0 },
      vup: { x: 0, y: 1, z: 0 },
      vfov: 20,
      aspect: ASPECT,
    },
    objects,
  };
}

/**
 * A small test scene: a noise-textured planet and moon, a mirror floor,
 * a large overhead light, a brushed metal sphere and a hollow glass sphere.
 *
 * `turn` (0-1) rotates the textures and swings the camera around the
 * planet, for animations.
 */
export function testScene(turn = 0): SceneDescription {
  const planet = generateNoiseTexture({
    width: 256,
    height: 128,
    scale: 2,
    octaves: 4,
    seed: 7,
    colors: [[0.05, 0.15, 0.5], [0.35, 0.55, 0.2]],
  });
  const moon = generateNoiseTexture({
    width: 64,
    height: 32,
    scale: 4,
    octaves: 3,
    seed: 11,
    colors: [[0.35, 0.35, 0.35], [0.8, 0.8, 0.8]],
  });

  const angle = turn * 2 * Math.PI;

  return {
    width: 800,
    height: 600,
    samplesPerPixel: 4,
    maxDepth: 50,
    sky: { kind: "gradient" },
    camera: {
      lookFrom: { x: -2 - 0.5 * Math.cos(angle), y: 1 + 0.5 * Math.sin(angle), z: 1 },
      lookAt: { x: 0, y: 0, z: -1 },
      vup: { x: 0, y: 1, z: 0 },
      vfov: 50,
      aspect: ASPECT,
    },
    objects: [
      sphere(0, 0, -1, 0.5, textured(planet, turn)),
      sphere(-1, 0.2, -1, 0.1, textured(moon, turn)),
      sphere(0, -100.5, -1, 100, metal([0.8, 0.8, 0.8], 0)),
      sphere(0, 16, 20, 15, emissive()),
      sphere(1, 0.5, -1, 0.5, metal([0.8, 0.6, 0.2], 0.1)),
      sphere(-1.2, 0, -1, 0.5, dielectric(1.5)),
      sphere(-1.2, 0, -1, -0.45, dielectric(1.5)),
    ],
  };
}

export function presetScene(name: PresetName, seed: number): SceneDescription {
  switch (name) {
    case "cover":
      return coverScene(seed);
    case "test":
      return testScene();
  }
}
