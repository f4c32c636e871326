import { describe, it, expect } from 'vitest';
import { RasterBuffer, RasterError, meanIntensity, validateRaster } from './raster';
import { createThresholdPreview } from './preview';
import { DEFAULT_TUNING, resolveTuning } from './tuning';

function bufferWithWhites(width: number, height: number, whites: Array<[number, number]>): RasterBuffer {
  const buffer = new RasterBuffer(width, height);
  for (const [x, y] of whites) {
    buffer.classification[buffer.index(x, y)] = 1;
  }
  return buffer;
}

describe('validateRaster', () => {
  it('passes a complete raster through', () => {
    const raster = { width: 2, height: 1, data: new Uint8ClampedArray(8) };
    expect(validateRaster(raster)).toBe(raster);
  });

  it('rejects missing rasters and bad sizes', () => {
    expect(() => validateRaster(null)).toThrow(RasterError);
    expect(() => validateRaster({ width: 2.5, height: 1, data: new Uint8ClampedArray(12) })).toThrow(
      'Invalid raster size 2.5x1'
    );
  });

  it('names the error', () => {
    expect.assertions(2);
    try {
      validateRaster(undefined);
    } catch (err) {
      expect(err).toBeInstanceOf(RasterError);
      expect(err).toHaveProperty('name', 'RasterError');
    }
  });
});

describe('meanIntensity', () => {
  it('averages the color channels and ignores alpha', () => {
    const raster = { width: 2, height: 1, data: [0, 0, 0, 0, 10, 20, 31, 0] };
    expect(meanIntensity(raster, 0)).toBe(0);
    expect(meanIntensity(raster, 1)).toBe(20);
  });
});

describe('RasterBuffer', () => {
  it('takes a 3x3 majority vote', () => {
    const four = bufferWithWhites(5, 5, [[1, 1], [2, 1], [3, 1], [1, 2]]);
    expect(four.bw3x3(2, 2)).toBe(0);
    expect(four.sample3x3(2, 2)).toBe(113);

    const five = bufferWithWhites(5, 5, [[1, 1], [2, 1], [3, 1], [1, 2], [2, 2]]);
    expect(five.bw3x3(2, 2)).toBe(1);
    expect(five.sample3x3(2, 2)).toBe(141);
  });

  it('scales an all-white region to 255', () => {
    const buffer = new RasterBuffer(3, 3);
    buffer.classification.fill(1);
    expect(buffer.sample3x3(1, 1)).toBe(255);
  });

  it('returns -1 when the region leaves the raster', () => {
    const buffer = new RasterBuffer(5, 5);
    expect(buffer.bw3x3(0, 2)).toBe(-1);
    expect(buffer.bw3x3(4, 2)).toBe(-1);
    expect(buffer.sample3x3(2, 0)).toBe(-1);
    expect(buffer.sample3x3(2, 4)).toBe(-1);
    expect(buffer.sample3x3(3, 3)).toBe(0);
  });

  it('tracks candidate flags', () => {
    const buffer = new RasterBuffer(4, 4);
    buffer.markCandidate(buffer.index(2, 1));
    expect(buffer.isCandidate(2, 1)).toBe(true);
    expect(buffer.isCandidate(1, 2)).toBe(false);
    expect(buffer.inBounds(3, 3)).toBe(true);
    expect(buffer.inBounds(4, 0)).toBe(false);
  });
});

describe('createThresholdPreview', () => {
  it('paints classification and candidates', () => {
    const buffer = bufferWithWhites(3, 1, [[0, 0], [1, 0]]);
    buffer.markCandidate(1);

    expect(Array.from(createThresholdPreview(buffer))).toEqual([
      255, 255, 255, 255,
      0, 255, 0, 255,
      0, 0, 0, 255,
    ]);
  });
});

describe('resolveTuning', () => {
  it('defaults every constant', () => {
    expect(resolveTuning()).toEqual(DEFAULT_TUNING);
  });

  it('merges overrides', () => {
    expect(resolveTuning({ arcSteps: 4 })).toEqual({ ...DEFAULT_TUNING, arcSteps: 4 });
  });

  it('rejects unusable values', () => {
    expect(() => resolveTuning({ thresholdWindow: 1.5 })).toThrow(RangeError);
    expect(() => resolveTuning({ unitScaleSteps: -1 })).toThrow('unitScaleSteps must be a non-negative integer, got -1');
  });
});
