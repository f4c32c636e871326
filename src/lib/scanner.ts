/**
 * Scans a raster for TopCodes.
 *
 * The raster is swept once by the adaptive thresholder, which flags pixels
 * that sit in the middle of a black-white-black run with bullseye
 * proportions. Flagged pixels whose four neighbours are also flagged are then
 * decoded, skipping any that fall inside an already found bullseye.
 */

import { RasterError, validateRaster, type RasterBuffer, type RgbaRaster } from './raster';
import { thresholdRaster } from './threshold';
import { decodeTopCode, sampleDataRing, type SamplePoint } from './topcode-decoder';
import { createThresholdPreview } from './preview';
import { WIDTH, inBullseye, isValidTopCode, type TopCode } from './topcode';
import { resolveTuning, type TopCodeTuning } from './tuning';
import { debugLog } from './debug';

/** Default maximum diameter (in pixels) of a recognized code */
export const DEFAULT_MAX_CODE_DIAMETER = 640;

export type TopCodeDecodeFn = (buffer: RasterBuffer, x: number, y: number, tuning: TopCodeTuning) => TopCode | null;

export interface ScanOptions {
  /**
   * Largest code diameter to look for. Lower values reduce false positives
   * and the number of candidates tested, but codes larger than this are not
   * found.
   */
  maxCodeDiameter?: number;
  tuning?: Partial<TopCodeTuning>;
  /** Attach the threshold preview and data-ring samples to the result */
  collectDebugInfo?: boolean;
  /** Replaces the candidate decoder */
  decode?: TopCodeDecodeFn;
}

export interface ScanDebugInfo {
  /** RGBA pixels of the thresholded image, candidates in green */
  preview: Uint8ClampedArray;
  /** Data-ring samples per symbol, in symbol order */
  samples: SamplePoint[][];
}

export interface ScanResult {
  /** Symbols in discovery order (top to bottom, then left to right) */
  symbols: TopCode[];
  /** Pixels flagged by the thresholder */
  candidateCount: number;
  /** Candidates handed to the decoder */
  testedCount: number;
  width: number;
  height: number;
  debug?: ScanDebugInfo;
}

export type ScanOutcome =
  | { success: true; scan: ScanResult }
  | { success: false; error: string };

export interface FindCodesOptions {
  tuning: TopCodeTuning;
  decode?: TopCodeDecodeFn;
}

export function maxUnitForDiameter(diameter: number): number {
  if (!Number.isFinite(diameter) || diameter <= 0) {
    throw new RangeError(`Maximum code diameter must be a positive number, got ${diameter}`);
  }
  return Math.ceil(diameter / WIDTH);
}

/**
 * Returns true if point (x, y) is in the bullseye of an already found symbol.
 */
export function overlaps(symbols: readonly TopCode[], x: number, y: number): boolean {
  return symbols.some(symbol => inBullseye(symbol, x, y));
}

/**
 * Sweeps a thresholded buffer line by line and decodes every confirmed
 * candidate.
 */
export function findCodes(buffer: RasterBuffer, options: FindCodesOptions): { symbols: TopCode[]; testedCount: number } {
  const decode = options.decode ?? decodeTopCode;
  const { width, height } = buffer;
  const symbols: TopCode[] = [];
  let testedCount = 0;

  for (let y = 2; y < height - 2; y++) {
    for (let x = 0; x < width; x++) {
      const k = buffer.index(x, y);
      if (buffer.candidate[k] !== 1) continue;

      // Cross-shaped confirmation
      if (
        x === 0 ||
        x === width - 1 ||
        buffer.candidate[k - 1] !== 1 ||
        buffer.candidate[k + 1] !== 1 ||
        buffer.candidate[k - width] !== 1 ||
        buffer.candidate[k + width] !== 1
      ) {
        continue;
      }

      if (overlaps(symbols, x, y)) continue;

      testedCount++;
      const symbol = decode(buffer, x, y, options.tuning);
      if (symbol && isValidTopCode(symbol)) {
        symbols.push(symbol);
      }
    }
  }

  return { symbols, testedCount };
}

/**
 * Scans the given raster and returns all TopCodes found in it. Throws a
 * RasterError when no usable raster is given; finding nothing is not an error.
 */
export function scanRaster(raster: RgbaRaster | null | undefined, options: ScanOptions = {}): ScanResult {
  const source = validateRaster(raster);
  const tuning = resolveTuning(options.tuning);
  const maxUnit = maxUnitForDiameter(options.maxCodeDiameter ?? DEFAULT_MAX_CODE_DIAMETER);

  const { buffer, candidateCount } = thresholdRaster(source, { maxUnit, tuning });
  const { symbols, testedCount } = findCodes(buffer, { tuning, decode: options.decode });

  debugLog('scan', {
    width: source.width,
    height: source.height,
    candidateCount,
    testedCount,
    codes: symbols.map(s => s.code),
  });

  const result: ScanResult = {
    symbols,
    candidateCount,
    testedCount,
    width: source.width,
    height: source.height,
  };

  if (options.collectDebugInfo) {
    result.debug = {
      preview: createThresholdPreview(buffer),
      samples: symbols.map(symbol => sampleDataRing(buffer, symbol)),
    };
  }

  return result;
}

/**
 * Non-throwing variant of scanRaster for UI callers.
 */
export function scanTopCodes(raster: RgbaRaster | null | undefined, options: ScanOptions = {}): ScanOutcome {
  try {
    return { success: true, scan: scanRaster(raster, options) };
  } catch (err) {
    if (!(err instanceof RasterError) && !(err instanceof RangeError)) {
      throw err;
    }
    return { success: false, error: err.message };
  }
}
