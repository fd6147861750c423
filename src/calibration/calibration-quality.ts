/**
 * Centralized quality thresholds for pixel → angle calibration fits.
 *
 * Quality is based on the coefficient of determination (R²) of the fit.
 * R² = 1 − SS_res / SS_tot, so 1 is a perfect fit and values can drop below 0
 * for a fit worse than the mean. Whether a fit is good enough to use is the
 * caller's policy; MIN_ACCEPTED_R_SQUARED is the default cut-off.
 */

export const CALIBRATION_QUALITY_THRESHOLDS = {
  /** Sub-pixel consistency across the whole field of view */
  EXCELLENT: 0.999,
  /** Good for tracking */
  GOOD: 0.99,
  /** Usable, but re-measurement is advisable */
  ACCEPTABLE: 0.95,
  // Anything below ACCEPTABLE is Poor
} as const;

export const MIN_ACCEPTED_R_SQUARED = CALIBRATION_QUALITY_THRESHOLDS.ACCEPTABLE;

export type CalibrationQualityLevel = 'Excellent' | 'Good' | 'Acceptable' | 'Poor' | 'Unknown';

export interface CalibrationQuality {
  label: CalibrationQualityLevel;
  stars: 3 | 2 | 1 | 0;
  starDisplay: string;
  /** True when the fit meets MIN_ACCEPTED_R_SQUARED */
  usable: boolean;
}

const QUALITY_LEVELS: Record<CalibrationQualityLevel, CalibrationQuality> = {
  'Excellent': { label: 'Excellent', stars: 3, starDisplay: '★★★', usable: true },
  'Good': { label: 'Good', stars: 2, starDisplay: '★★', usable: true },
  'Acceptable': { label: 'Acceptable', stars: 1, starDisplay: '★', usable: true },
  'Poor': { label: 'Poor', stars: 0, starDisplay: '✗', usable: false },
  'Unknown': { label: 'Unknown', stars: 0, starDisplay: '?', usable: false },
};

/**
 * Classify a calibration fit by its R².
 * CANONICAL function - use this everywhere, never duplicate the thresholds.
 */
export function getCalibrationQuality(rSquared: number | undefined): CalibrationQuality {
  if (rSquared === undefined || !isFinite(rSquared)) {
    return { ...QUALITY_LEVELS['Unknown'] };
  }
  if (rSquared >= CALIBRATION_QUALITY_THRESHOLDS.EXCELLENT) {
    return { ...QUALITY_LEVELS['Excellent'] };
  }
  if (rSquared >= CALIBRATION_QUALITY_THRESHOLDS.GOOD) {
    return { ...QUALITY_LEVELS['Good'] };
  }
  if (rSquared >= CALIBRATION_QUALITY_THRESHOLDS.ACCEPTABLE) {
    return { ...QUALITY_LEVELS['Acceptable'] };
  }
  return { ...QUALITY_LEVELS['Poor'] };
}

/**
 * Format R² for display, e.g. "R²=0.9987".
 */
export function formatRSquared(rSquared: number | undefined): string {
  if (rSquared === undefined || !isFinite(rSquared)) {
    return '-';
  }
  return `R²=${rSquared.toFixed(4)}`;
}
