import { writeFile } from "fs/promises";
import { Command, InvalidArgumentError } from "commander";
import { framePath, writePng } from "../image/ImageWriter";
import { rotateTexture } from "../materials/Materials";
import { randomSeed } from "../math/Random";
import { Renderer } from "../render/Renderer";
import { isPresetName, PRESET_NAMES, presetScene } from "../scene/Presets";
import { loadSceneFile } from "../scene/SceneLoader";
import { sceneToJsonString } from "../scene/Serializer";
import type { RenderSettings } from "../settings/RenderSettings";
import type { SceneDescription } from "../types";

export interface RenderCommandOptions {
  output: string;
  width?: number;
  height?: number;
  samples?: number;
  depth?: number;
  workers?: number;
  rowsPerBand?: number;
  seed?: number;
  frames: number;
}

export interface PresetCommandOptions {
  output: string;
  seed?: number;
}

type Log = (line: string) => void;

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return n;
}

function parseNonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError("Must be a non-negative integer.");
  }
  return n;
}

/** Apply command-line overrides on top of a loaded scene. */
export function applySceneOverrides(
  desc: SceneDescription,
  options: Pick<RenderCommandOptions, "width" | "height" | "samples" | "depth">,
): SceneDescription {
  return {
    ...desc,
    width: options.width ?? desc.width,
    height: options.height ?? desc.height,
    samplesPerPixel: options.samples ?? desc.samplesPerPixel,
    maxDepth: options.depth ?? desc.maxDepth,
  };
}

/** Frame `index` of `count`: every textured material rotated by index / count of a turn. */
export function frameScene(desc: SceneDescription, index: number, count: number): SceneDescription {
  if (count <= 1) return desc;
  const turns = index / count;
  return {
    ...desc,
    objects: desc.objects.map((object) => ({
      ...object,
      material: rotateTexture(object.material, turns),
    })),
  };
}

export async function runRender(
  scenePath: string,
  options: RenderCommandOptions,
  log: Log = console.log,
): Promise<string[]> {
  const desc = applySceneOverrides(await loadSceneFile(scenePath), options);
  const settings: Partial<RenderSettings> = {
    workers: options.workers,
    rowsPerBand: options.rowsPerBand,
    // Frames share one seed so noise stays put while textures turn
    seed: options.seed ?? randomSeed(),
  };
  const renderer = new Renderer(settings);
  const written: string[] = [];

  for (let i = 0; i < options.frames; i++) {
    const filename = framePath(options.output, i, options.frames);
    log(`Rendering ${filename}`);
    const result = await renderer.render(frameScene(desc, i, options.frames));
    log(`Frame time: ${Math.round(result.elapsedMs)}ms`);
    await writePng(filename, result.pixels, result.width, result.height);
    written.push(filename);
  }

  return written;
}

export async function runPreset(name: string, options: PresetCommandOptions): Promise<void> {
  if (!isPresetName(name)) {
    throw new Error(`Unknown preset "${name}" (expected one of: ${PRESET_NAMES.join(", ")})`);
  }
  const desc = presetScene(name, options.seed ?? randomSeed());
  await writeFile(options.output, `${sceneToJsonString(desc)}\n`);
}

export function createProgram(log: Log = console.log): Command {
  const program = new Command();

  program
    .name("orbtrace")
    .description("Path tracer for sphere scenes")
    .version("0.1.0");

  program
    .command("render <scene>")
    .description("Render a scene file to PNG")
    .requiredOption("-o, --output <file>", "Output PNG path")
    .option("--width <px>", "Override image width", parsePositiveInt)
    .option("--height <px>", "Override image height", parsePositiveInt)
    .option("--samples <n>", "Override samples per pixel", parsePositiveInt)
    .option("--depth <n>", "Override maximum bounce depth", parsePositiveInt)
    .option("--workers <n>", "Worker threads (0 renders on the main thread)", parseNonNegativeInt)
    .option("--rows-per-band <n>", "Rows per unit of work", parsePositiveInt)
    .option("--seed <n>", "Random seed", parseNonNegativeInt)
    .option("--frames <n>", "Render n frames, turning textured spheres a full revolution (the camera stays put)", parsePositiveInt, 1)
    .action(async (scene: string, options: RenderCommandOptions) => {
      await runRender(scene, options, log);
    });

  program
    .command("preset <name>")
    .description(`Write a built-in scene as JSON (${PRESET_NAMES.join(", ")})`)
    .requiredOption("-o, --output <file>", "Output JSON path")
    .option("--seed <n>", "Random seed for generated content", parseNonNegativeInt)
    .action(async (name: string, options: PresetCommandOptions) => {
      await runPreset(name, options);
      log(`Wrote ${options.output}`);
    });

  return program;
}
