/**
 * TopCode symbol model.
 *
 * A TopCode is a circular fiducial eight units wide. From the center out it
 * has a white bullseye, a black ring, a white ring and a data ring split into
 * 13 sectors, one bit per sector (white = 1, black = 0). Only 13-bit values
 * with exactly five bits set are legal, and a marker's identity is the
 * smallest of its 13 cyclic rotations.
 */

/** Number of sectors in the data ring */
export const SECTORS = 13;

/** Width of a symbol in units (ring widths) */
export const WIDTH = 8;

/** Span of a data sector in radians */
export const ARC = (2 * Math.PI) / SECTORS;

export const CODE_MASK = (1 << SECTORS) - 1;

/** Number of set bits a legal code carries */
export const CHECKSUM_BITS = 5;

export interface TopCode {
  /** Canonical (minimal rotation) code value */
  readonly code: number;
  /** Horizontal center in pixels */
  readonly x: number;
  /** Vertical center in pixels */
  readonly y: number;
  /** Width of a single ring in pixels */
  readonly unit: number;
  /** unit * WIDTH */
  readonly diameter: number;
  /** Angular orientation in radians */
  readonly orientation: number;
}

export function createTopCode(fields: Omit<TopCode, 'diameter'>): TopCode {
  return Object.freeze({ ...fields, diameter: fields.unit * WIDTH });
}

export function isValidTopCode(topcode: TopCode): boolean {
  return topcode.code > 0;
}

/**
 * Returns true if the given point is inside the bullseye of the symbol.
 */
export function inBullseye(topcode: TopCode, px: number, py: number): boolean {
  const dx = topcode.x - px;
  const dy = topcode.y - py;
  return dx * dx + dy * dy <= topcode.unit * topcode.unit;
}

export function popcount13(bits: number): number {
  let sum = 0;
  for (let i = 0; i < SECTORS; i++) {
    sum += (bits >> i) & 0x01;
  }
  return sum;
}

/** Only codes with a checksum of 5 are valid. */
export function isChecksumValid(bits: number): boolean {
  return popcount13(bits) === CHECKSUM_BITS;
}

/** Rotates the 13-bit pattern one sector to the left. */
export function rotateLeft(bits: number): number {
  return ((bits << 1) & CODE_MASK) | ((bits & CODE_MASK) >> (SECTORS - 1));
}

export interface CanonicalCode {
  /** Smallest value among the 13 cyclic rotations */
  code: number;
  /** Number of left rotations that produced it (0 when already minimal) */
  rotation: number;
}

/**
 * Tries each of the possible rotations and returns the lowest. Ties keep the
 * earliest rotation.
 */
export function canonicalRotation(bits: number): CanonicalCode {
  let current = bits & CODE_MASK;
  let code = current;
  let rotation = 0;

  for (let i = 1; i <= SECTORS; i++) {
    current = rotateLeft(current);
    if (current < code) {
      code = current;
      rotation = i;
    }
  }

  return { code, rotation };
}

/**
 * Lists valid canonical code values in ascending order. There are exactly 99
 * of them (1287 checksum-valid patterns / 13 rotations).
 */
export function generateCodes(limit = 99): number[] {
  const codes: number[] = [];

  for (let base = 0; base <= CODE_MASK && codes.length < limit; base++) {
    if (isChecksumValid(base) && canonicalRotation(base).code === base) {
      codes.push(base);
    }
  }

  return codes;
}

/**
 * Formats the 13 least significant bits, most significant first, grouped in
 * nibbles from the right: `0 0000 0001 1111`.
 */
export function formatBits(bits: number): string {
  let out = '';
  for (let i = SECTORS - 1; i >= 0; i--) {
    out += ((bits >> i) & 0x01) === 1 ? '1' : '0';
    if (i > 0 && i % 4 === 0) {
      out += ' ';
    }
  }
  return out;
}

export function orientationDegrees(topcode: TopCode): number {
  return (topcode.orientation * 180) / Math.PI;
}
