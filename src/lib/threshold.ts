/**
 * Wellner adaptive thresholding with a bullseye run-length detector.
 *
 * "Adaptive Thresholding for the DigitalDesk", EuroPARC Technical Report
 * EPC-93-110. Rows are processed back and forth so the running sum stays
 * continuous where one row ends and the next begins.
 */

import { RasterBuffer, meanIntensity, type RgbaRaster } from './raster';
import { DEFAULT_TUNING, type TopCodeTuning } from './tuning';
import { debugLog } from './debug';

export type ScanDirection = 'left-to-right' | 'right-to-left';

export interface ScanlinePixel {
  index: number;
  x: number;
  isFirst: boolean;
  isLast: boolean;
}

export interface ThresholdOptions {
  /** Widest black ring (in pixels) a bullseye may have */
  maxUnit: number;
  tuning?: TopCodeTuning;
}

export interface ThresholdResult {
  buffer: RasterBuffer;
  /** Number of pixels flagged as bullseye candidates */
  candidateCount: number;
}

/** Seed of the running sum before the first pixel */
const INITIAL_SUM = 128;

/** Run-length levels of the bullseye detector */
const RunLevel = {
  White: 0,
  FirstBlack: 1,
  InnerWhite: 2,
  SecondBlack: 3,
} as const;

type RunLevel = (typeof RunLevel)[keyof typeof RunLevel];

export function scanlineDirection(row: number): ScanDirection {
  return row % 2 === 0 ? 'left-to-right' : 'right-to-left';
}

export function* scanlinePixels(width: number, row: number): Generator<ScanlinePixel> {
  const reverse = scanlineDirection(row) === 'right-to-left';
  const rowStart = row * width;

  for (let i = 0; i < width; i++) {
    const x = reverse ? width - 1 - i : i;
    yield { index: rowStart + x, x, isFirst: i === 0, isLast: i === width - 1 };
  }
}

/**
 * Ratio test for a black-white-black run triple: both black runs roughly the
 * same width, and the white run about as wide as the two together.
 */
export function isBullseyeRun(b1: number, w1: number, b2: number, maxUnit: number): boolean {
  if (b1 < 2 || b2 < 2 || b1 > maxUnit || b2 > maxUnit || w1 > maxUnit + maxUnit) {
    return false;
  }

  const spread = Math.abs(b1 + b2 - w1);
  if (spread > b1 + b2 || spread > w1) {
    return false;
  }

  const skew = Math.abs(b1 - b2);
  return skew <= b1 && skew <= b2;
}

/**
 * Binarizes the raster into a fresh buffer and flags bullseye candidates.
 */
export function thresholdRaster(raster: RgbaRaster, options: ThresholdOptions): ThresholdResult {
  const { width, height } = raster;
  const { maxUnit } = options;
  const tuning = options.tuning ?? DEFAULT_TUNING;
  const s = tuning.thresholdWindow;
  const buffer = new RasterBuffer(width, height);

  let sum = INITIAL_SUM;
  let candidateCount = 0;

  for (let row = 0; row < height; row++) {
    const reverse = scanlineDirection(row) === 'right-to-left';
    let level: RunLevel = RunLevel.White;
    let b1 = 0;
    let w1 = 0;
    let b2 = 0;

    for (const { index } of scanlinePixels(width, row)) {
      const intensity = meanIntensity(raster, index);

      // Approximate sum of the last s pixels
      sum += intensity - Math.floor(sum / s);

      // Factor in the sum from the previous row
      const threshold = row > 0
        ? Math.floor((sum + buffer.runningSum[index - width]) / (2 * s))
        : Math.floor(sum / s);

      const white = intensity < threshold * tuning.thresholdBias ? 0 : 1;
      buffer.classification[index] = white;
      buffer.runningSum[index] = sum;

      switch (level) {
        case RunLevel.White:
          if (white === 0) {
            level = RunLevel.FirstBlack;
            b1 = 1;
            w1 = 0;
            b2 = 0;
          }
          break;

        case RunLevel.FirstBlack:
          if (white === 0) {
            b1++;
          } else {
            level = RunLevel.InnerWhite;
            w1 = 1;
          }
          break;

        case RunLevel.InnerWhite:
          if (white === 0) {
            level = RunLevel.SecondBlack;
            b2 = 1;
          } else {
            w1++;
          }
          break;

        case RunLevel.SecondBlack:
          if (white === 0) {
            b2++;
            break;
          }

          // Black-white-black just ended: could be the middle of a bullseye
          if (isBullseyeRun(b1, w1, b2, maxUnit)) {
            const offset = 1 + b2 + Math.floor(w1 / 2);
            const mid = reverse ? index + offset : index - offset;
            buffer.markCandidate(mid - 1);
            buffer.markCandidate(mid);
            buffer.markCandidate(mid + 1);
            candidateCount += 3;
          }

          b1 = b2;
          w1 = 1;
          b2 = 0;
          level = RunLevel.InnerWhite;
          break;
      }
    }
  }

  debugLog('threshold', { width, height, maxUnit, candidateCount });

  return { buffer, candidateCount };
}
