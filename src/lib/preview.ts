import type { RasterBuffer } from './raster';

const CANDIDATE_COLOR = [0x00, 0xff, 0x00] as const;

/**
 * Creates an RGBA view of the thresholded buffer: black and white pixels as
 * classified, bullseye candidates in green.
 */
export function createThresholdPreview(buffer: RasterBuffer): Uint8ClampedArray {
  const pixels = new Uint8ClampedArray(buffer.width * buffer.height * 4);

  for (let k = 0; k < buffer.classification.length; k++) {
    const offset = k * 4;
    if (buffer.candidate[k] === 1) {
      pixels[offset] = CANDIDATE_COLOR[0];
      pixels[offset + 1] = CANDIDATE_COLOR[1];
      pixels[offset + 2] = CANDIDATE_COLOR[2];
    } else {
      const value = buffer.classification[k] === 1 ? 0xff : 0x00;
      pixels[offset] = value;
      pixels[offset + 1] = value;
      pixels[offset + 2] = value;
    }
    pixels[offset + 3] = 0xff;
  }

  return pixels;
}
