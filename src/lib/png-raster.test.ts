/**
 * Tests for png-raster.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PNG } from 'pngjs';
import { decodePngRaster, loadPngRaster, scanPngFile } from './png-raster';
import { generateCodes } from './topcode';
import { renderMarkers } from './testing/synthetic-topcode';
import type { RgbaRaster } from './raster';

const CODE = generateCodes()[25];

function encodePng(raster: RgbaRaster): Buffer {
  const png = new PNG({ width: raster.width, height: raster.height });
  for (let i = 0; i < png.data.length; i++) {
    png.data[i] = raster.data[i];
  }
  return PNG.sync.write(png);
}

describe('decodePngRaster', () => {
  it('decodes RGBA pixels', () => {
    const raster = renderMarkers(96, 96, [{ code: CODE, cx: 48, cy: 48, unit: 6 }]);
    const decoded = decodePngRaster(encodePng(raster));

    expect(decoded.width).toBe(96);
    expect(decoded.height).toBe(96);
    expect(Array.from(decoded.data)).toEqual(Array.from(raster.data));
  });

  it('throws on data that is not a PNG', () => {
    expect(() => decodePngRaster(Buffer.from('not an image'))).toThrow();
  });
});

describe('PNG files', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'topcode-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads a raster from disk', async () => {
    const path = join(dir, 'blank.png');
    await writeFile(path, encodePng(renderMarkers(20, 10, [])));

    const raster = await loadPngRaster(path);
    expect(raster.width).toBe(20);
    expect(raster.height).toBe(10);
  });

  it('rejects a missing file', async () => {
    await expect(loadPngRaster(join(dir, 'missing.png'))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('scans a file for markers', async () => {
    const path = join(dir, 'marker.png');
    await writeFile(path, encodePng(renderMarkers(160, 160, [{ code: CODE, cx: 80, cy: 80, unit: 8 }])));

    const result = await scanPngFile(path);
    expect(result.symbols.map(s => s.code)).toEqual([CODE]);
  });
});
