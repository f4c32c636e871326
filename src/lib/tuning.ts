/**
 * Empirical tuning constants of the recognition pipeline.
 *
 * The defaults match the values printed markers have been calibrated against;
 * they are exposed so callers can experiment, not because other values are
 * known to work better.
 */
export interface TopCodeTuning {
  /** Window length (in pixels) of the Wellner running sum */
  thresholdWindow: number;
  /** A pixel is black when its intensity is below threshold * bias */
  thresholdBias: number;
  /** Fraction of a sector arc subtracted from the winning arc offset */
  orientationBias: number;
  /** Relative unit change between two neighbouring search steps */
  unitScaleStep: number;
  /** Number of unit steps tried on each side of the estimated unit */
  unitScaleSteps: number;
  /** Number of arc offsets tried across one sector */
  arcSteps: number;
  /** Farthest distance (in pixels) walked while measuring the unit */
  maxUnitWalk: number;
}

export const DEFAULT_TUNING: Readonly<TopCodeTuning> = {
  thresholdWindow: 30,
  thresholdBias: 0.975,
  orientationBias: 0.65,
  unitScaleStep: 0.05,
  unitScaleSteps: 2,
  arcSteps: 10,
  maxUnitWalk: 100,
};

export function resolveTuning(overrides: Partial<TopCodeTuning> = {}): TopCodeTuning {
  const tuning = { ...DEFAULT_TUNING, ...overrides };

  if (!Number.isInteger(tuning.thresholdWindow) || tuning.thresholdWindow < 1) {
    throw new RangeError(`thresholdWindow must be a positive integer, got ${tuning.thresholdWindow}`);
  }
  if (!Number.isInteger(tuning.unitScaleSteps) || tuning.unitScaleSteps < 0) {
    throw new RangeError(`unitScaleSteps must be a non-negative integer, got ${tuning.unitScaleSteps}`);
  }
  if (!Number.isInteger(tuning.arcSteps) || tuning.arcSteps < 1) {
    throw new RangeError(`arcSteps must be a positive integer, got ${tuning.arcSteps}`);
  }

  return tuning;
}
