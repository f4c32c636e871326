/**
 * Node image source: PNG files decoded with pngjs.
 */

import { readFile } from 'node:fs/promises';
import { PNG } from 'pngjs';
import type { RgbaRaster } from './raster';
import { scanRaster, type ScanOptions, type ScanResult } from './scanner';
import { debugLog } from './debug';

export function decodePngRaster(data: Buffer): RgbaRaster {
  const png = PNG.sync.read(data);
  return { width: png.width, height: png.height, data: png.data };
}

/** Reads and decodes a PNG file. File system and decode errors propagate. */
export async function loadPngRaster(path: string): Promise<RgbaRaster> {
  const data = await readFile(path);
  const raster = decodePngRaster(data);
  debugLog('png', { path, width: raster.width, height: raster.height });
  return raster;
}

export async function scanPngFile(path: string, options: ScanOptions = {}): Promise<ScanResult> {
  const raster = await loadPngRaster(path);
  return scanRaster(raster, options);
}
