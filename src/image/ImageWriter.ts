import { mkdir, writeFile } from "fs/promises";
import * as path from "path";
import { encodePng } from "./PngEncoder";

/** Encode RGB8 pixels and write them to `filePath`, creating parent directories. */
export async function writePng(
  filePath: string,
  pixels: Uint8Array,
  width: number,
  height: number,
): Promise<void> {
  const png = encodePng(pixels, width, height);
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, png);
}

/**
 * Output path for frame `index` of an animation: `out.png` becomes
 * `out_000.png`. A single frame keeps the path as given.
 */
export function framePath(outputPath: string, index: number, frameCount: number): string {
  if (frameCount <= 1) return outputPath;
  const ext = path.extname(outputPath);
  const stem = outputPath.slice(0, outputPath.length - ext.length);
  return `${stem}_${String(index).padStart(3, "0")}${ext || ".png"}`;
}
