import { unzlibSync } from "fflate";
import type { TextureImage } from "../types";
import { crc32, PNG_SIGNATURE } from "./PngEncoder";

const COLOR_GRAY = 0;
const COLOR_RGB = 2;
const COLOR_PALETTE = 3;
const COLOR_GRAY_ALPHA = 4;
const COLOR_RGBA = 6;

/** Samples per pixel for each supported color type. */
const CHANNELS: Record<number, number> = {
  [COLOR_GRAY]: 1,
  [COLOR_RGB]: 3,
  [COLOR_PALETTE]: 1,
  [COLOR_GRAY_ALPHA]: 2,
  [COLOR_RGBA]: 4,
};

interface PngHeader {
  width: number;
  height: number;
  bitDepth: number;
  colorType: number;
  interlace: number;
}

/**
 * Decode an 8-bit, non-interlaced PNG into packed RGB8. Alpha is dropped;
 * gray is expanded to three channels; palette indices are resolved.
 * Throws on anything else, or on a corrupt stream.
 */
export function decodePng(bytes: Uint8Array): TextureImage {
  if (bytes.length < PNG_SIGNATURE.length || PNG_SIGNATURE.some((b, i) => bytes[i] !== b)) {
    throw new Error("Not a PNG file");
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let header: PngHeader | null = null;
  let palette: Uint8Array | null = null;
  const idat: Uint8Array[] = [];

  let offset = PNG_SIGNATURE.length;
  while (offset + 12 <= bytes.length) {
    const length = view.getUint32(offset);
    const typeStart = offset + 4;
    const dataStart = offset + 8;
    const dataEnd = dataStart + length;
    if (dataEnd + 4 > bytes.length) {
      throw new Error("Truncated PNG chunk");
    }

    const type = String.fromCharCode(...bytes.subarray(typeStart, dataStart));
    if (crc32(bytes, typeStart, dataEnd) !== view.getUint32(dataEnd)) {
      throw new Error(`Bad CRC in ${type} chunk`);
    }
    const data = bytes.subarray(dataStart, dataEnd);

    if (type === "IHDR") {
      header = readHeader(data);
    } else if (type === "PLTE") {
      palette = data;
    } else if (type === "IDAT") {
      idat.push(data);
    } else if (type === "IEND") {
      break;
    }
    offset = dataEnd + 4;
  }

  if (!header) throw new Error("Missing IHDR chunk");
  if (idat.length === 0) throw new Error("Missing IDAT chunk");
  if (header.bitDepth !== 8) throw new Error(`Unsupported bit depth ${header.bitDepth}`);
  if (header.interlace !== 0) throw new Error("Interlaced PNGs are not supported");

  const channels = CHANNELS[header.colorType];
  if (channels === undefined) throw new Error(`Unsupported color type ${header.colorType}`);
  if (header.colorType === COLOR_PALETTE && !palette) throw new Error("Missing PLTE chunk");

  const raw = unzlibSync(concat(idat));
  const scanlines = unfilter(raw, header.width, header.height, channels);
  return {
    width: header.width,
    height: header.height,
    pixels: toRgb(scanlines, header.width * header.height, header.colorType, palette),
  };
}

function readHeader(data: Uint8Array): PngHeader {
  if (data.length !== 13) throw new Error("Malformed IHDR chunk");
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  return {
    width: view.getUint32(0),
    height: view.getUint32(4),
    bitDepth: data[8],
    colorType: data[9],
    interlace: data[12],
  };
}

function concat(parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/** Undo per-row filters (None, Sub, Up, Average, Paeth). Returns unfiltered samples. */
export function unfilter(raw: Uint8Array, width: number, height: number, bpp: number): Uint8Array {
  const stride = width * bpp;
  if (raw.length < (stride + 1) * height) {
    throw new Error("PNG image data is too short");
  }

  const out = new Uint8Array(stride * height);
  for (let y = 0; y < height; y++) {
    const filter = raw[y * (stride + 1)];
    const src = y * (stride + 1) + 1;
    const row = y * stride;
    const prev = row - stride;

    for (let i = 0; i < stride; i++) {
      const x = raw[src + i];
      const a = i >= bpp ? out[row + i - bpp] : 0;
      const b = y > 0 ? out[prev + i] : 0;
      const c = i >= bpp && y > 0 ? out[prev + i - bpp] : 0;

      let value: number;
      switch (filter) {
        case 0: value = x; break;
        case 1: value = x + a; break;
        case 2: value = x + b; break;
        case 3: value = x + ((a + b) >>> 1); break;
        case 4: value = x + paeth(a, b, c); break;
        default: throw new Error(`Unknown PNG filter type ${filter}`);
      }
      out[row + i] = value & 0xff;
    }
  }
  return out;
}

function paeth(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);
  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}

function toRgb(
  samples: Uint8Array,
  pixelCount: number,
  colorType: number,
  palette: Uint8Array | null,
): Uint8Array {
  const out = new Uint8Array(pixelCount * 3);
  for (let i = 0; i < pixelCount; i++) {
    const o = i * 3;
    switch (colorType) {
      case COLOR_GRAY:
      case COLOR_GRAY_ALPHA: {
        const g = samples[i * (colorType === COLOR_GRAY ? 1 : 2)];
        out[o] = g;
        out[o + 1] = g;
        out[o + 2] = g;
        break;
      }
      case COLOR_RGB:
      case COLOR_RGBA: {
        const s = i * (colorType === COLOR_RGB ? 3 : 4);
        out[o] = samples[s];
        out[o + 1] = samples[s + 1];
        out[o + 2] = samples[s + 2];
        break;
      }
      case COLOR_PALETTE: {
        const p = samples[i] * 3;
        if (!palette || p + 2 >= palette.length) {
          throw new Error(`Palette index ${samples[i]} out of range`);
        }
        out[o] = palette[p];
        out[o + 1] = palette[p + 1];
        out[o + 2] = palette[p + 2];
        break;
      }
    }
  }
  return out;
}
