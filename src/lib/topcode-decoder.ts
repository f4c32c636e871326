/**
 * Decodes a single TopCode given a point inside its bullseye.
 *
 * The decoder refines the center, measures the ring width, then reads the
 * data ring under a small grid of unit and angle adjustments, keeping the
 * reading with the highest confidence.
 */

import type { RasterBuffer } from './raster';
import { ARC, SECTORS, WIDTH, canonicalRotation, createTopCode, isChecksumValid, type TopCode } from './topcode';
import { DEFAULT_TUNING, type TopCodeTuning } from './tuning';
import { debugLog } from './debug';

export type RayAxis = 'x' | 'y';

export interface CodeReading {
  /** Raw 13-bit pattern, most significant bit read first (sector 12) */
  bits: number;
  confidence: number;
}

export interface SamplePoint {
  x: number;
  y: number;
  sector: number;
  /** Radial sample index across the symbol (0-7) */
  ring: number;
  /** 3x3 majority value: 0 black, 1 white */
  value: number;
}

/** Midpoint of the 0-255 sample scale */
const MID_SAMPLE = 128;

/**
 * Counts the pixels from (x, y) along one axis until the 3x3 majority value
 * changes. Returns -1 if the raster edge comes first.
 */
export function rayDistance(buffer: RasterBuffer, x: number, y: number, axis: RayAxis, step: 1 | -1): number {
  const start = buffer.bw3x3(x, y);
  if (start < 0) return -1;

  const limit = axis === 'x' ? buffer.width : buffer.height;
  let pos = (axis === 'x' ? x : y) + step;

  while (pos > 1 && pos < limit - 1) {
    const sample = axis === 'x' ? buffer.bw3x3(pos, y) : buffer.bw3x3(x, pos);
    if (sample < 0) return -1;
    if (sample !== start) {
      return Math.abs(pos - (axis === 'x' ? x : y));
    }
    pos += step;
  }

  return -1;
}

/**
 * Moves a seed point toward the middle of the bullseye using three parallel
 * rays in each direction.
 */
export function refineCenter(buffer: RasterBuffer, cx: number, cy: number): { x: number; y: number } | null {
  const rays = [
    [rayDistance(buffer, cx, cy, 'y', -1), rayDistance(buffer, cx - 1, cy, 'y', -1), rayDistance(buffer, cx + 1, cy, 'y', -1)],
    [rayDistance(buffer, cx, cy, 'y', 1), rayDistance(buffer, cx - 1, cy, 'y', 1), rayDistance(buffer, cx + 1, cy, 'y', 1)],
    [rayDistance(buffer, cx, cy, 'x', -1), rayDistance(buffer, cx, cy - 1, 'x', -1), rayDistance(buffer, cx, cy + 1, 'x', -1)],
    [rayDistance(buffer, cx, cy, 'x', 1), rayDistance(buffer, cx, cy - 1, 'x', 1), rayDistance(buffer, cx, cy + 1, 'x', 1)],
  ];

  if (rays.some(group => group.some(d => d < 0))) {
    return null;
  }

  const [up, down, left, right] = rays.map(group => group[0] + group[1] + group[2]);
  return {
    x: cx + (right - left) / 6,
    y: cy + (down - up) / 6,
  };
}

/**
 * Determines the unit length by counting the pixels between the center and
 * the outer edge of the black ring. North, south, east and west readings are
 * averaged. Returns -1 when the walk hits the raster margin or the walk
 * limit, or when the horizontal and vertical diameters disagree by more than
 * one unit.
 */
export function readUnit(buffer: RasterBuffer, x: number, y: number, tuning: TopCodeTuning = DEFAULT_TUNING): number {
  const sx = Math.round(x);
  const sy = Math.round(y);
  const { width, height } = buffer;

  // left, right, up, down
  const steps: Array<[number, number]> = [[-1, 0], [1, 0], [0, -1], [0, 1]];
  const sawBlack = [false, false, false, false];
  const dist = [0, 0, 0, 0];

  for (let i = 1; ; i++) {
    if (sx - i < 1 || sx + i >= width - 1 || sy - i < 1 || sy + i >= height - 1 || i > tuning.maxUnitWalk) {
      return -1;
    }

    for (let d = 0; d < 4; d++) {
      if (dist[d] > 0) continue;

      const sample = buffer.bw3x3(sx + steps[d][0] * i, sy + steps[d][1] * i);
      if (!sawBlack[d] && sample === 0) {
        sawBlack[d] = true;
      } else if (sawBlack[d] && sample === 1) {
        dist[d] = i;
      }
    }

    if (dist.every(v => v > 0)) {
      const [distL, distR, distU, distD] = dist;
      const unit = (distL + distR + distU + distD) / 8;
      return Math.abs(distR + distL - distU - distD) > unit ? -1 : unit;
    }
  }
}

/**
 * Reads the data ring with the given unit and arc adjustment.
 *
 * Each sector is sampled at eight points across the whole symbol. The white
 * bullseye and white ring samples must read white and the black ring samples
 * black, otherwise the attempt fails. Returns null on a failed ring check,
 * an off-raster sample, or a pattern without a valid checksum.
 */
export function readCode(buffer: RasterBuffer, cx: number, cy: number, unit: number, arcOffset: number): CodeReading | null {
  const core = new Array<number>(WIDTH).fill(0);
  let confidence = 0;
  let bits = 0;

  for (let sector = SECTORS - 1; sector >= 0; sector--) {
    const dx = Math.cos(ARC * sector + arcOffset);
    const dy = Math.sin(ARC * sector + arcOffset);

    // Take 8 samples across the diameter of the symbol
    for (let i = 0; i < WIDTH; i++) {
      const dist = (i - 3.5) * unit;
      const sample = buffer.sample3x3(Math.round(cx + dx * dist), Math.round(cy + dy * dist));
      if (sample < 0) return null;
      core[i] = sample;
    }

    // white rings
    if (core[1] <= MID_SAMPLE || core[3] <= MID_SAMPLE || core[4] <= MID_SAMPLE || core[6] <= MID_SAMPLE) {
      return null;
    }

    // black ring
    if (core[2] > MID_SAMPLE || core[5] > MID_SAMPLE) {
      return null;
    }

    confidence += core[1] + core[3] + core[4] + core[6] + (0xff - core[2]) + (0xff - core[5]);

    // data ring
    confidence += Math.abs(core[7] * 2 - 0xff);

    // opposite data ring
    confidence += 0xff - Math.abs(core[0] * 2 - 0xff);

    bits = (bits << 1) | (core[7] > MID_SAMPLE ? 1 : 0);
  }

  return isChecksumValid(bits) ? { bits, confidence } : null;
}

/**
 * Decodes the symbol whose bullseye contains (cx, cy). Returns null when no
 * reading passes the ring checks and the checksum.
 */
export function decodeTopCode(
  buffer: RasterBuffer,
  cx: number,
  cy: number,
  tuning: TopCodeTuning = DEFAULT_TUNING
): TopCode | null {
  const center = refineCenter(buffer, cx, cy);
  if (!center) {
    debugLog('decode', { seed: { cx, cy }, rejected: 'no-bullseye-edge' });
    return null;
  }

  const unit = readUnit(buffer, center.x, center.y, tuning);
  if (unit < 0) {
    debugLog('decode', { seed: { cx, cy }, center, rejected: 'unit' });
    return null;
  }

  // Try different unit and arc adjustments, keep the one that produces the
  // highest confidence reading
  let best: CodeReading | null = null;
  let bestUnit = unit;
  let bestArc = 0;

  for (let u = -tuning.unitScaleSteps; u <= tuning.unitScaleSteps; u++) {
    const candidateUnit = unit + unit * tuning.unitScaleStep * u;
    for (let a = 0; a < tuning.arcSteps; a++) {
      const arcOffset = (a * ARC) / tuning.arcSteps;
      const reading = readCode(buffer, center.x, center.y, candidateUnit, arcOffset);
      if (reading && reading.confidence > (best?.confidence ?? 0)) {
        best = reading;
        bestUnit = candidateUnit;
        bestArc = arcOffset;
      }
    }
  }

  if (!best) {
    debugLog('decode', { seed: { cx, cy }, center, unit, rejected: 'no-reading' });
    return null;
  }

  const { code, rotation } = canonicalRotation(best.bits);

  // Slightly overcorrect the arc adjustment: the ideal correction would be
  // half a sector, but the search carries a positive bias.
  const orientation = rotation * -ARC + bestArc - ARC * tuning.orientationBias;

  const topcode = createTopCode({ code, x: center.x, y: center.y, unit: bestUnit, orientation });
  debugLog('decode', { seed: { cx, cy }, code, unit: bestUnit, arcOffset: bestArc, confidence: best.confidence });
  return topcode;
}

/**
 * Samples the outer rings of a decoded symbol along each sector, for drawing
 * over the thresholded image.
 */
export function sampleDataRing(buffer: RasterBuffer, topcode: TopCode): SamplePoint[] {
  const points: SamplePoint[] = [];

  for (let sector = SECTORS - 1; sector >= 0; sector--) {
    const dx = Math.cos(ARC * sector + topcode.orientation);
    const dy = Math.sin(ARC * sector + topcode.orientation);

    for (let ring = 3; ring < WIDTH; ring++) {
      const dist = (ring - 3.5) * topcode.unit;
      const x = Math.round(topcode.x + dx * dist);
      const y = Math.round(topcode.y + dy * dist);
      const value = buffer.bw3x3(x, y);
      if (value >= 0) {
        points.push({ x, y, sector, ring, value });
      }
    }
  }

  return points;
}
