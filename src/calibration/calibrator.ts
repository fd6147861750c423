/**
 * Pixel → angle calibration.
 *
 * Fits a polynomial angleDeg = Σ c_k · pixel^k to paired samples of measured
 * pixel values and expected angles (degrees, usually from expectedAngle()).
 */

import { createCalibration, type Camera } from '../entities/camera';
import {
  CalibrationInputError,
  DegenerateFitError,
  InsufficientSamplesError,
  PoorCalibrationError,
} from '../estimation/errors';
import { log } from '../estimation/estimation-logger';
import { formatRSquared, getCalibrationQuality, MIN_ACCEPTED_R_SQUARED } from './calibration-quality';
import { solveNormalEquations } from '../utils/normal-equations';

export interface CalibrationFit {
  /** Ascending powers of the raw pixel value; coefficients[0] is the intercept */
  coefficients: number[];
  slope: number;
  intercept: number;
  rSquared: number;
  fitDegree: number;
  sampleCount: number;
}

export interface CalibrateCameraOptions {
  fitDegree?: number;
  /** Fits below this R² are reported as poor. Default MIN_ACCEPTED_R_SQUARED */
  minRSquared?: number;
  /** When true, a poor fit throws PoorCalibrationError and the camera keeps its old calibration */
  rejectBelowThreshold?: boolean;
  calibratedAt?: string;
}

/**
 * Evaluate a polynomial with ascending coefficients using Horner's scheme.
 */
export function evaluatePolynomial(coefficients: readonly number[], x: number): number {
  let result = 0;
  for (let k = coefficients.length - 1; k >= 0; k--) {
    result = result * x + coefficients[k];
  }
  return result;
}

function binomial(n: number, k: number): number {
  let result = 1;
  for (let i = 1; i <= k; i++) {
    result = (result * (n - k + i)) / i;
  }
  return result;
}

/**
 * Least-squares polynomial fit of expected angles against measured pixels.
 *
 * Pixels are centred and scaled to [-1, 1] before forming the normal
 * equations, then the coefficients are expanded back to raw pixel powers.
 *
 * @throws CalibrationInputError on mismatched lengths, non-finite values or a bad degree
 * @throws InsufficientSamplesError when fewer than fitDegree + 1 samples are given
 * @throws DegenerateFitError when the pixel values cannot support the fit
 */
export function fitCalibration(
  measuredPixels: readonly number[],
  expectedAnglesDeg: readonly number[],
  fitDegree: number = 1
): CalibrationFit {
  if (!Number.isInteger(fitDegree) || fitDegree < 1) {
    throw new CalibrationInputError(`Fit degree must be a positive integer, got ${fitDegree}`);
  }
  if (measuredPixels.length !== expectedAnglesDeg.length) {
    throw new CalibrationInputError(
      `Got ${measuredPixels.length} pixel values but ${expectedAnglesDeg.length} expected angles`
    );
  }
  const n = measuredPixels.length;
  if (n < fitDegree + 1) {
    throw new InsufficientSamplesError(n, fitDegree + 1);
  }
  if (!measuredPixels.every(Number.isFinite) || !expectedAnglesDeg.every(Number.isFinite)) {
    throw new CalibrationInputError('Calibration samples must be finite numbers');
  }

  const mean = measuredPixels.reduce((s, p) => s + p, 0) / n;
  const scale = Math.max(...measuredPixels.map(p => Math.abs(p - mean)));
  if (scale === 0) {
    throw new DegenerateFitError();
  }

  const A = measuredPixels.map(p => {
    const u = (p - mean) / scale;
    const row = new Array<number>(fitDegree + 1);
    row[0] = 1;
    for (let k = 1; k <= fitDegree; k++) {
      row[k] = row[k - 1] * u;
    }
    return row;
  });

  const scaled = solveNormalEquations(A, [...expectedAnglesDeg]);
  if (!scaled) {
    throw new DegenerateFitError(
      `Pixel values do not support a degree-${fitDegree} fit (need ${fitDegree + 1} distinct values)`
    );
  }

  // Σ a_k ((p − m)/s)^k  →  Σ c_j p^j
  const coefficients = new Array<number>(fitDegree + 1).fill(0);
  for (let k = 0; k <= fitDegree; k++) {
    const ak = scaled[k] / Math.pow(scale, k);
    for (let j = 0; j <= k; j++) {
      coefficients[j] += ak * binomial(k, j) * Math.pow(-mean, k - j);
    }
  }

  const angleMean = expectedAnglesDeg.reduce((s, a) => s + a, 0) / n;
  let ssRes = 0;
  let ssTot = 0;
  for (let i = 0; i < n; i++) {
    const residual = expectedAnglesDeg[i] - evaluatePolynomial(coefficients, measuredPixels[i]);
    ssRes += residual * residual;
    ssTot += (expectedAnglesDeg[i] - angleMean) ** 2;
  }
  // Constant angles: any exact fit explains everything, anything else explains nothing
  const rSquared = ssTot === 0 ? (ssRes <= 1e-12 * n ? 1 : 0) : 1 - ssRes / ssTot;

  return {
    coefficients,
    slope: coefficients[1],
    intercept: coefficients[0],
    rSquared,
    fitDegree,
    sampleCount: n,
  };
}

/**
 * Fit a calibration for `camera` and install it as one atomic swap.
 *
 * A fit below `minRSquared` is logged as a warning; with
 * `rejectBelowThreshold` it throws instead and the previous calibration stays.
 */
export function calibrateCamera(
  camera: Camera,
  measuredPixels: readonly number[],
  expectedAnglesDeg: readonly number[],
  options: CalibrateCameraOptions = {}
): CalibrationFit {
  const {
    fitDegree = 1,
    minRSquared = MIN_ACCEPTED_R_SQUARED,
    rejectBelowThreshold = false,
    calibratedAt = new Date().toISOString(),
  } = options;

  const fit = fitCalibration(measuredPixels, expectedAnglesDeg, fitDegree);
  const quality = getCalibrationQuality(fit.rSquared);

  if (fit.rSquared < minRSquared) {
    log(`[Calibration] WARNING: ${camera.name} fit is poor (${formatRSquared(fit.rSquared)} < ${minRSquared}), re-measure`);
    if (rejectBelowThreshold) {
      throw new PoorCalibrationError(camera.name, fit.rSquared, minRSquared);
    }
  }

  camera.applyCalibration(createCalibration(fit.coefficients, fit.rSquared, fit.sampleCount, calibratedAt));
  log(`[Calibration] ${camera.name}: slope=${fit.slope.toFixed(6)}, intercept=${fit.intercept.toFixed(4)}, ${formatRSquared(fit.rSquared)} ${quality.starDisplay}`);

  return fit;
}
