/**
 * Tests for scanner.ts
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  DEFAULT_MAX_CODE_DIAMETER,
  findCodes,
  maxUnitForDiameter,
  overlaps,
  scanRaster,
  scanTopCodes,
  type TopCodeDecodeFn,
} from './scanner';
import { RasterBuffer, RasterError } from './raster';
import { ARC, createTopCode, generateCodes } from './topcode';
import { DEFAULT_TUNING } from './tuning';
import { setDebugMode } from './debug';
import { angleDistance, createRaster, renderMarkers } from './testing/synthetic-topcode';

const CODES = generateCodes();

/** Candidate block at x 9..12, y 9..11: confirms (10, 10) and (11, 10) */
function blockBuffer(): RasterBuffer {
  const buffer = new RasterBuffer(20, 20);
  for (let y = 9; y <= 11; y++) {
    for (let x = 9; x <= 12; x++) {
      buffer.markCandidate(buffer.index(x, y));
    }
  }
  return buffer;
}

describe('maxUnitForDiameter', () => {
  it('rounds up to whole units', () => {
    expect(maxUnitForDiameter(DEFAULT_MAX_CODE_DIAMETER)).toBe(80);
    expect(maxUnitForDiameter(65)).toBe(9);
  });

  it('rejects non-positive diameters', () => {
    expect(() => maxUnitForDiameter(0)).toThrow(RangeError);
    expect(() => maxUnitForDiameter(Number.NaN)).toThrow(RangeError);
  });
});

describe('overlaps', () => {
  it('tests against the bullseye of each symbol', () => {
    const symbols = [createTopCode({ code: 31, x: 10, y: 10, unit: 3, orientation: 0 })];
    expect(overlaps(symbols, 12, 12)).toBe(true);
    expect(overlaps(symbols, 13, 11)).toBe(false);
    expect(overlaps([], 10, 10)).toBe(false);
  });
});

describe('findCodes', () => {
  it('skips candidates inside a found bullseye', () => {
    const decode = vi.fn<TopCodeDecodeFn>(() => createTopCode({ code: 31, x: 10, y: 10, unit: 3, orientation: 0 }));
    const { symbols, testedCount } = findCodes(blockBuffer(), { tuning: DEFAULT_TUNING, decode });

    expect(decode).toHaveBeenCalledTimes(1);
    expect(decode).toHaveBeenCalledWith(expect.any(RasterBuffer), 10, 10, DEFAULT_TUNING);
    expect(testedCount).toBe(1);
    expect(symbols).toHaveLength(1);
  });

  it('tests every confirmed candidate when nothing decodes', () => {
    const decode = vi.fn<TopCodeDecodeFn>(() => null);
    const { symbols, testedCount } = findCodes(blockBuffer(), { tuning: DEFAULT_TUNING, decode });

    expect(decode.mock.calls.map(([, x, y]) => [x, y])).toEqual([[10, 10], [11, 10]]);
    expect(testedCount).toBe(2);
    expect(symbols).toEqual([]);
  });

  it.each([-1, 0])('drops symbols with code %i', code => {
    const decode = vi.fn<TopCodeDecodeFn>(() => createTopCode({ code, x: 10, y: 10, unit: 3, orientation: 0 }));
    const { symbols, testedCount } = findCodes(blockBuffer(), { tuning: DEFAULT_TUNING, decode });

    expect(testedCount).toBe(2);
    expect(symbols).toEqual([]);
  });
});

describe('scanRaster', () => {
  afterEach(() => {
    setDebugMode(false);
    vi.restoreAllMocks();
  });

  it('finds a single marker', () => {
    const code = CODES[20];
    const result = scanRaster(renderMarkers(160, 160, [{ code, cx: 80, cy: 80, unit: 8 }]));

    expect(result.width).toBe(160);
    expect(result.height).toBe(160);
    expect(result.candidateCount).toBeGreaterThan(0);
    expect(result.testedCount).toBeGreaterThanOrEqual(1);
    expect(result.symbols).toHaveLength(1);

    const [symbol] = result.symbols;
    expect(symbol.code).toBe(code);
    expect(Math.abs(symbol.x - 80)).toBeLessThanOrEqual(1);
    expect(Math.abs(symbol.y - 80)).toBeLessThanOrEqual(1);
  });

  it('finds a rotated marker', () => {
    const code = CODES[70];
    const orientation = 7 * ARC;
    const result = scanRaster(renderMarkers(160, 160, [{ code, cx: 80, cy: 80, unit: 8, orientation }]));

    expect(result.symbols.map(s => s.code)).toEqual([code]);
    expect(angleDistance(result.symbols[0].orientation, orientation)).toBeLessThanOrEqual(0.3 * ARC);
  });

  it('reports markers left to right along the same row', () => {
    const result = scanRaster(
      renderMarkers(240, 120, [
        { code: CODES[5], cx: 60, cy: 60, unit: 8 },
        { code: CODES[60], cx: 180, cy: 60, unit: 8 },
      ])
    );

    expect(result.symbols.map(s => s.code)).toEqual([CODES[5], CODES[60]]);
  });

  it('finds nothing in blank rasters', () => {
    for (const value of [0x00, 0xff]) {
      const result = scanRaster(createRaster(64, 48, value));
      expect(result.candidateCount).toBe(0);
      expect(result.testedCount).toBe(0);
      expect(result.symbols).toEqual([]);
    }
  });

  it('does not report a marker cut off by the edge', () => {
    const result = scanRaster(renderMarkers(160, 160, [{ code: 31, cx: 12, cy: 80, unit: 8 }]));
    expect(result.symbols).toEqual([]);
  });

  it('skips markers larger than the maximum diameter', () => {
    const raster = renderMarkers(160, 160, [{ code: CODES[20], cx: 80, cy: 80, unit: 8 }]);
    const result = scanRaster(raster, { maxCodeDiameter: 24 });
    expect(result.symbols).toEqual([]);
  });

  it('uses the injected decoder', () => {
    const decode = vi.fn<TopCodeDecodeFn>(() => null);
    const result = scanRaster(renderMarkers(160, 160, [{ code: CODES[20], cx: 80, cy: 80, unit: 8 }]), { decode });

    expect(decode).toHaveBeenCalledTimes(result.testedCount);
    expect(result.symbols).toEqual([]);
  });

  it('attaches debug info on request', () => {
    const result = scanRaster(renderMarkers(160, 160, [{ code: CODES[20], cx: 80, cy: 80, unit: 8 }]), {
      collectDebugInfo: true,
    });

    expect(result.debug?.preview).toHaveLength(160 * 160 * 4);
    expect(result.debug?.samples).toHaveLength(1);
    expect(result.debug?.samples[0]).toHaveLength(65);
  });

  it('leaves debug info out by default', () => {
    const result = scanRaster(createRaster(16, 16));
    expect(result.debug).toBeUndefined();
  });

  it('returns the same result on repeated scans', () => {
    const raster = renderMarkers(160, 160, [{ code: CODES[33], cx: 80, cy: 80, unit: 8 }]);
    expect(scanRaster(raster)).toEqual(scanRaster(raster));
  });

  it('logs pipeline stages in debug mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setDebugMode(true);
    scanRaster(createRaster(16, 16));

    expect(log).toHaveBeenCalledWith('[TOPCODE DEBUG] scan:', {
      width: 16,
      height: 16,
      candidateCount: 0,
      testedCount: 0,
      codes: [],
    });
  });

  it('throws RasterError without a usable raster', () => {
    expect(() => scanRaster(null)).toThrow(RasterError);
    expect(() => scanRaster({ width: 4, height: 4, data: new Uint8ClampedArray(10) })).toThrow(
      'Raster data too short: expected 64 bytes, got 10'
    );
    expect(() => scanRaster({ width: 0, height: 4, data: [] })).toThrow('Invalid raster size 0x4');
  });

  it('throws RangeError for bad options', () => {
    expect(() => scanRaster(createRaster(16, 16), { maxCodeDiameter: -1 })).toThrow(RangeError);
    expect(() => scanRaster(createRaster(16, 16), { tuning: { arcSteps: 0 } })).toThrow(RangeError);
  });
});

describe('every canonical code', () => {
  const orientations = [3.2 * ARC, 8.7 * ARC];

  describe.each(orientations)('rotated by %f', orientation => {
    it.each(CODES)('reads back code %i', code => {
      const result = scanRaster(renderMarkers(160, 160, [{ code, cx: 80, cy: 80, unit: 8, orientation }]));

      expect(result.symbols.map(s => s.code)).toEqual([code]);
      const [symbol] = result.symbols;
      expect(Math.abs(symbol.x - 80)).toBeLessThanOrEqual(1);
      expect(Math.abs(symbol.y - 80)).toBeLessThanOrEqual(1);
      expect(angleDistance(symbol.orientation, orientation)).toBeLessThanOrEqual(0.3 * ARC);
    });
  });
});

describe('scanTopCodes', () => {
  it('wraps a successful scan', () => {
    const outcome = scanTopCodes(renderMarkers(160, 160, [{ code: CODES[20], cx: 80, cy: 80, unit: 8 }]));
    expect(outcome.success).toBe(true);
    if (outcome.success) {
      expect(outcome.scan.symbols.map(s => s.code)).toEqual([CODES[20]]);
    }
  });

  it('reports raster and option errors', () => {
    expect(scanTopCodes(undefined)).toEqual({ success: false, error: 'No image raster provided' });
    expect(scanTopCodes(createRaster(16, 16), { tuning: { thresholdWindow: 0 } })).toEqual({
      success: false,
      error: 'thresholdWindow must be a positive integer, got 0',
    });
  });

  it('rethrows unexpected errors', () => {
    const decode = vi.fn<TopCodeDecodeFn>(() => {
      throw new TypeError('decoder bug');
    });
    const raster = renderMarkers(160, 160, [{ code: CODES[20], cx: 80, cy: 80, unit: 8 }]);
    expect(() => scanTopCodes(raster, { decode })).toThrow(TypeError);
  });
});
