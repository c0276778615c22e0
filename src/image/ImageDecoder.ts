import { decode as decodeJpegData } from "jpeg-js";
import type { TextureImage } from "../types";
import { decodePng } from "./PngDecoder";
import { PNG_SIGNATURE } from "./PngEncoder";

const JPEG_SOI = [0xff, 0xd8, 0xff];

function startsWith(bytes: Uint8Array, prefix: ArrayLike<number>): boolean {
  if (bytes.length < prefix.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (bytes[i] !== prefix[i]) return false;
  }
  return true;
}

/** Decode a baseline or progressive JPEG into packed RGB8. */
export function decodeJpeg(bytes: Uint8Array): TextureImage {
  const { width, height, data } = decodeJpegData(bytes, { useTArray: true });

  // The decoder always yields RGBA
  const pixels = new Uint8Array(width * height * 3);
  for (let i = 0, o = 0; o < pixels.length; i += 4, o += 3) {
    pixels[o] = data[i];
    pixels[o + 1] = data[i + 1];
    pixels[o + 2] = data[i + 2];
  }
  return { pixels, width, height };
}

/** Decode a PNG or JPEG, chosen by its leading bytes. */
export function decodeImage(bytes: Uint8Array): TextureImage {
  if (startsWith(bytes, PNG_SIGNATURE)) return decodePng(bytes);
  if (startsWith(bytes, JPEG_SOI)) return decodeJpeg(bytes);
  throw new Error("Unsupported image format (expected PNG or JPEG)");
}
