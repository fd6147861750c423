/**
 * Synthetic observations: the inverse of the calibration pipeline.
 *
 * Turns a known target position into the pixel each calibrated camera would
 * report, optionally with Gaussian pixel noise. Used to exercise the tracker
 * end to end without a detector.
 */

import { evaluatePolynomial } from '../calibration/calibrator';
import type { Camera, CameraCalibration } from '../entities/camera';
import type { TrackingSetup } from '../entities/tracking-setup';
import { expectedAngle } from '../estimation/angle-model';
import { UncalibratedCameraError } from '../estimation/errors';
import type { Frame } from '../services/frame-processor';
import type { Point2D } from '../utils/geometry2d';
import { gaussian } from './seeded-random';

const NEWTON_MAX_ITERATIONS = 50;
const NEWTON_TOLERANCE_DEG = 1e-10;

export interface SimulateFrameOptions {
  /** Standard deviation of additive pixel noise */
  pixelNoiseStd?: number;
  /** Round pixels to integers, as a detector would */
  roundPixels?: boolean;
}

function derivative(coefficients: readonly number[]): number[] {
  return coefficients.slice(1).map((c, k) => c * (k + 1));
}

/**
 * Pixel value whose calibrated angle is `angleDeg`.
 * Closed form for linear calibrations, Newton iteration from the linear guess otherwise.
 */
export function angleToPixel(angleDeg: number, calibration: CameraCalibration): number {
  if (calibration.fitDegree === 1) {
    if (calibration.slope === 0) {
      throw new Error('Cannot invert a calibration with zero slope');
    }
    return (angleDeg - calibration.intercept) / calibration.slope;
  }

  let pixel = calibration.slope !== 0 ? (angleDeg - calibration.intercept) / calibration.slope : 0;

  const dCoefficients = derivative(calibration.coefficients);
  for (let i = 0; i < NEWTON_MAX_ITERATIONS; i++) {
    const error = evaluatePolynomial(calibration.coefficients, pixel) - angleDeg;
    if (Math.abs(error) < NEWTON_TOLERANCE_DEG) {
      return pixel;
    }
    const slope = evaluatePolynomial(dCoefficients, pixel);
    if (slope === 0 || !Number.isFinite(slope)) {
      break;
    }
    pixel -= error / slope;
  }
  throw new Error(`Could not invert calibration for angle ${angleDeg}°`);
}

/**
 * Pixel at which `camera` would see `target`.
 */
export function pointToPixel(camera: Camera, target: Point2D): number {
  const calibration = camera.calibration;
  if (!calibration) {
    throw new UncalibratedCameraError(camera.name);
  }
  return angleToPixel(expectedAngle(camera, target), calibration);
}

export function addPixelNoise(pixel: number, std: number): number {
  if (std <= 0) {
    return pixel;
  }
  return pixel + gaussian() * std;
}

/**
 * One frame of pixels from every calibrated camera in `setup` observing `target`.
 */
export function simulateFrame(
  setup: TrackingSetup,
  target: Point2D,
  timestamp: number,
  options: SimulateFrameOptions = {}
): Frame {
  const { pixelNoiseStd = 0, roundPixels = false } = options;
  const pixels: Record<string, number> = {};

  for (const camera of setup.calibratedCameras) {
    const pixel = addPixelNoise(pointToPixel(camera, target), pixelNoiseStd);
    pixels[camera.name] = roundPixels ? Math.round(pixel) : pixel;
  }

  return { timestamp, pixels };
}
