/**
 * Live pixel → sight angle conversion.
 *
 * Unit boundary: calibration is expressed in degrees, the value handed to the
 * geometric pipeline is in radians.
 */

import type { Camera, CameraCalibration } from '../entities/camera';
import { UncalibratedCameraError } from '../estimation/errors';
import { degToRad } from '../utils/angles';
import { evaluatePolynomial } from './calibrator';

export interface Observation {
  cameraName: string;
  pixel: number;
  timestamp: number;
}

export interface SightAngle {
  cameraName: string;
  angleRad: number;
}

function calibratedDegrees(calibration: CameraCalibration, pixel: number): number {
  if (calibration.fitDegree === 1) {
    return calibration.slope * pixel + calibration.intercept;
  }
  return evaluatePolynomial(calibration.coefficients, pixel);
}

function requireCalibration(camera: Pick<Camera, 'name' | 'calibration'>): CameraCalibration {
  // Single read: the rest of the conversion works on this snapshot
  const calibration = camera.calibration;
  if (!calibration) {
    throw new UncalibratedCameraError(camera.name);
  }
  return calibration;
}

/**
 * Calibrated sight angle for `pixel`, in degrees (calibration units).
 */
export function pixelToAngleDeg(pixel: number, camera: Pick<Camera, 'name' | 'calibration'>): number {
  return calibratedDegrees(requireCalibration(camera), pixel);
}

/**
 * Calibrated sight angle for `pixel`, in radians, relative to the camera's
 * mounting azimuth.
 *
 * @throws UncalibratedCameraError when the camera has no calibration
 */
export function pixelToAngle(pixel: number, camera: Pick<Camera, 'name' | 'calibration'>): number {
  return degToRad(pixelToAngleDeg(pixel, camera));
}

export function observationToSightAngle(observation: Observation, camera: Pick<Camera, 'name' | 'calibration'>): SightAngle {
  if (observation.cameraName !== camera.name) {
    throw new Error(`Observation from "${observation.cameraName}" passed with camera "${camera.name}"`);
  }
  return { cameraName: camera.name, angleRad: pixelToAngle(observation.pixel, camera) };
}
