/** A contiguous group of image rows rendered as one unit of work. */
export interface Band {
  index: number;
  startRow: number;
  rowCount: number;
}

/** A band plus the seed of its private random stream. */
export interface BandJob {
  band: Band;
  seed: number;
}

/** Rendered band: `width * rowCount * 3` RGB8 bytes, top row first. */
export interface BandResult {
  index: number;
  startRow: number;
  rowCount: number;
  pixels: Uint8Array;
}

export type BandProgressCallback = (completed: number, total: number) => void;

/**
 * Runs band jobs and resolves once every band is done (fork-join).
 * Rejects on the first failure; results are returned in band order.
 */
export interface BandScheduler {
  run(jobs: BandJob[], onProgress?: BandProgressCallback): Promise<BandResult[]>;
  destroy(): void;
}

/**
 * Split `height` rows into bands of `rowsPerBand` rows (the last band may be
 * shorter). Bands are disjoint and cover every row in order.
 */
export function partitionBands(height: number, rowsPerBand: number): Band[] {
  const step = Math.max(1, Math.floor(rowsPerBand));
  const bands: Band[] = [];
  for (let startRow = 0, index = 0; startRow < height; startRow += step, index++) {
    bands.push({
      index,
      startRow,
      rowCount: Math.min(step, height - startRow),
    });
  }
  return bands;
}

/**
 * Copy band results into one image buffer. Each band owns the disjoint
 * byte range starting at `startRow * width * 3`.
 */
export function assembleBands(
  results: readonly BandResult[],
  width: number,
  height: number,
): Uint8Array {
  const pixels = new Uint8Array(width * height * 3);
  const rowBytes = width * 3;
  for (const result of results) {
    const expected = result.rowCount * rowBytes;
    if (result.pixels.length !== expected) {
      throw new Error(
        `Band ${result.index} has ${result.pixels.length} bytes, expected ${expected}`,
      );
    }
    pixels.set(result.pixels, result.startRow * rowBytes);
  }
  return pixels;
}
