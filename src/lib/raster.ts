/**
 * Raster input and the per-scan working buffer.
 */

/** Row-major RGBA pixels, 4 bytes per pixel. `ImageData` and pngjs `PNG` both fit. */
export interface RgbaRaster {
  width: number;
  height: number;
  data: ArrayLike<number>;
}

export class RasterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RasterError';
  }
}

export function validateRaster(raster: RgbaRaster | null | undefined): RgbaRaster {
  if (!raster) {
    throw new RasterError('No image raster provided');
  }

  const { width, height, data } = raster;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new RasterError(`Invalid raster size ${width}x${height}`);
  }
  if (!data || data.length < width * height * 4) {
    throw new RasterError(
      `Raster data too short: expected ${width * height * 4} bytes, got ${data ? data.length : 0}`
    );
  }

  return raster;
}

/** Mean of the red, green and blue channels (0-255) */
export function meanIntensity(raster: RgbaRaster, index: number): number {
  const offset = index * 4;
  const { data } = raster;
  return Math.floor((data[offset] + data[offset + 1] + data[offset + 2]) / 3);
}

/**
 * Binary classification, running threshold sum and bullseye-candidate flag for
 * every pixel of one scan. Written once by the thresholder, read-only after.
 */
export class RasterBuffer {
  readonly width: number;
  readonly height: number;
  readonly runningSum: Int32Array;
  /** 0 = black, 1 = white */
  readonly classification: Uint8Array;
  readonly candidate: Uint8Array;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.runningSum = new Int32Array(width * height);
    this.classification = new Uint8Array(width * height);
    this.candidate = new Uint8Array(width * height);
  }

  index(x: number, y: number): number {
    return y * this.width + x;
  }

  inBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  /** Binary value of pixel (x, y): 0 black, 1 white */
  bw(x: number, y: number): number {
    return this.classification[this.index(x, y)];
  }

  isCandidate(x: number, y: number): boolean {
    return this.candidate[this.index(x, y)] === 1;
  }

  markCandidate(index: number): void {
    this.candidate[index] = 1;
  }

  /**
   * Majority vote of the 3x3 region around (x, y): 1 white, 0 black, -1 when
   * the region leaves the raster.
   */
  bw3x3(x: number, y: number): number {
    const whites = this.whiteCount3x3(x, y);
    if (whites < 0) return -1;
    return whites >= 5 ? 1 : 0;
  }

  /**
   * Average of the thresholded 3x3 region around (x, y) scaled to 0 (black)
   * through 255 (white), or -1 when the region leaves the raster.
   */
  sample3x3(x: number, y: number): number {
    const whites = this.whiteCount3x3(x, y);
    if (whites < 0) return -1;
    return Math.floor((whites * 0xff) / 9);
  }

  private whiteCount3x3(x: number, y: number): number {
    if (x < 1 || x > this.width - 2 || y < 1 || y > this.height - 2) {
      return -1;
    }

    let whites = 0;
    for (let j = y - 1; j <= y + 1; j++) {
      const row = j * this.width;
      for (let i = x - 1; i <= x + 1; i++) {
        whites += this.classification[row + i];
      }
    }
    return whites;
  }
}
