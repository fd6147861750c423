import { describe, it, expect, beforeEach } from '@jest/globals';
import { Camera } from '../../entities/camera';
import { expectedAngles } from '../../estimation/angle-model';
import {
  CalibrationInputError,
  DegenerateFitError,
  InsufficientSamplesError,
  isTrackingError,
  PoorCalibrationError,
} from '../../estimation/errors';
import { clearEstimationLogs, estimationLogs } from '../../estimation/estimation-logger';
import { calibrateCamera, evaluatePolynomial, fitCalibration } from '../calibrator';

describe('Calibrator', () => {
  beforeEach(() => {
    clearEstimationLogs();
  });

  describe('fitCalibration', () => {
    it('recovers a perfect line', () => {
      const pixels = [0, 1, 2, 3, 4];
      const angles = pixels.map(p => 2 * p + 3);

      const fit = fitCalibration(pixels, angles);

      expect(fit.slope).toBeCloseTo(2, 10);
      expect(fit.intercept).toBeCloseTo(3, 10);
      expect(fit.rSquared).toBeCloseTo(1, 10);
      expect(fit.fitDegree).toBe(1);
      expect(fit.sampleCount).toBe(5);
      expect(fit.coefficients).toHaveLength(2);
    });

    it('handles pixel values in the thousands', () => {
      const pixels = [100, 900, 1700, 2500, 4000];
      const angles = pixels.map(p => -0.025 * p + 60);

      const fit = fitCalibration(pixels, angles);

      expect(fit.slope).toBeCloseTo(-0.025, 10);
      expect(fit.intercept).toBeCloseTo(60, 8);
      expect(fit.rSquared).toBeCloseTo(1, 10);
    });

    it('computes R² for an imperfect line', () => {
      // Least squares: slope 1.3, intercept -0.2, SSres 0.3, SStot 8.75
      const fit = fitCalibration([0, 1, 2, 3], [0, 1, 2, 4]);

      expect(fit.slope).toBeCloseTo(1.3, 10);
      expect(fit.intercept).toBeCloseTo(-0.2, 10);
      expect(fit.rSquared).toBeCloseTo(1 - 0.3 / 8.75, 10);
    });

    it('fits higher degrees', () => {
      const pixels = [-2, -1, 0, 1, 2, 3];
      const angles = pixels.map(p => 0.5 * p * p - p + 2);

      const fit = fitCalibration(pixels, angles, 2);

      expect(fit.coefficients[0]).toBeCloseTo(2, 9);
      expect(fit.coefficients[1]).toBeCloseTo(-1, 9);
      expect(fit.coefficients[2]).toBeCloseTo(0.5, 9);
      expect(fit.slope).toBeCloseTo(-1, 9);
      expect(fit.intercept).toBeCloseTo(2, 9);
      expect(fit.rSquared).toBeCloseTo(1, 10);
    });

    it('treats constant angles fitted exactly as R² = 1', () => {
      const fit = fitCalibration([1, 2, 3], [7, 7, 7]);

      expect(fit.slope).toBeCloseTo(0, 10);
      expect(fit.intercept).toBeCloseTo(7, 10);
      expect(fit.rSquared).toBe(1);
    });

    it('fits angles produced by the angle model', () => {
      const camera = Camera.create('O', { position: { x: 0, y: 0 }, azimuthDeg: 45 });
      const points = [{ x: 3, y: 1 }, { x: 4, y: 4 }, { x: 2, y: 5 }, { x: 1, y: 6 }];
      const angles = expectedAngles(camera, points);
      // A detector with 40 px per degree and its centre column at 2304
      const pixels = angles.map(a => 2304 + 40 * a);

      const fit = fitCalibration(pixels, angles);

      expect(fit.slope).toBeCloseTo(1 / 40, 10);
      expect(fit.intercept).toBeCloseTo(-2304 / 40, 8);
      expect(fit.rSquared).toBeCloseTo(1, 10);
    });

    it('fails with InsufficientSamples below fitDegree + 1 samples', () => {
      expect(() => fitCalibration([1], [2])).toThrow(InsufficientSamplesError);
      expect(() => fitCalibration([], [])).toThrow(InsufficientSamplesError);
      expect(() => fitCalibration([1, 2], [3, 4], 2)).toThrow(InsufficientSamplesError);

      try {
        fitCalibration([1, 2], [3, 4], 2);
      } catch (error) {
        expect(error).toBeInstanceOf(InsufficientSamplesError);
        expect(isTrackingError(error)).toBe(true);
        if (error instanceof InsufficientSamplesError) {
          expect(error.code).toBe('InsufficientSamples');
          expect(error.sampleCount).toBe(2);
          expect(error.required).toBe(3);
        }
      }
    });

    it('fails with DegenerateFit when all pixels are identical', () => {
      expect(() => fitCalibration([5, 5, 5], [1, 2, 3])).toThrow(DegenerateFitError);
    });

    it('rejects malformed input', () => {
      expect(() => fitCalibration([1, 2, 3], [1, 2])).toThrow(CalibrationInputError);
      expect(() => fitCalibration([1, 2, NaN], [1, 2, 3])).toThrow(CalibrationInputError);
      expect(() => fitCalibration([1, 2, 3], [1, 2, 3], 0)).toThrow(CalibrationInputError);
      expect(() => fitCalibration([1, 2, 3], [1, 2, 3], 1.5)).toThrow(CalibrationInputError);
    });
  });

  describe('evaluatePolynomial', () => {
    it('uses ascending coefficients', () => {
      expect(evaluatePolynomial([3, 2], 4)).toBe(11);
      expect(evaluatePolynomial([1, 0, 0.5], 2)).toBe(3);
      expect(evaluatePolynomial([], 2)).toBe(0);
    });
  });

  describe('calibrateCamera', () => {
    it('installs the fit on the camera', () => {
      const camera = Camera.create('C1', { position: { x: 0, y: 0 }, azimuthDeg: 0 });
      const fit = calibrateCamera(camera, [0, 1, 2, 3, 4], [3, 5, 7, 9, 11], { calibratedAt: '2026-01-01T00:00:00.000Z' });

      expect(camera.isCalibrated).toBe(true);
      expect(camera.calibration?.slope).toBeCloseTo(2, 10);
      expect(camera.calibration?.intercept).toBeCloseTo(3, 10);
      expect(camera.calibration?.rSquared).toBe(fit.rSquared);
      expect(camera.calibration?.sampleCount).toBe(5);
      expect(camera.calibration?.calibratedAt).toBe('2026-01-01T00:00:00.000Z');
    });

    it('warns about a poor fit but still installs it by default', () => {
      const camera = Camera.create('C1', { position: { x: 0, y: 0 }, azimuthDeg: 0 });
      const fit = calibrateCamera(camera, [0, 1, 2, 3], [0, 3, 0, 3]);

      expect(fit.rSquared).toBeCloseTo(0.2, 10);
      expect(camera.isCalibrated).toBe(true);
      expect(estimationLogs).toContain('[Calibration] WARNING: C1 fit is poor (R²=0.2000 < 0.95), re-measure');
    });

    it('rejects a poor fit and keeps the previous calibration when asked', () => {
      const camera = Camera.create('C1', { position: { x: 0, y: 0 }, azimuthDeg: 0 });
      calibrateCamera(camera, [0, 1, 2], [1, 2, 3]);
      const previous = camera.calibration;

      expect(() => calibrateCamera(camera, [0, 1, 2, 3], [0, 3, 0, 3], { rejectBelowThreshold: true }))
        .toThrow(PoorCalibrationError);
      expect(camera.calibration).toBe(previous);
    });

    it('honours a custom threshold', () => {
      const camera = Camera.create('C1', { position: { x: 0, y: 0 }, azimuthDeg: 0 });

      expect(() => calibrateCamera(camera, [0, 1, 2, 3], [0, 1, 2, 4], { minRSquared: 0.99, rejectBelowThreshold: true }))
        .toThrow(PoorCalibrationError);
      expect(camera.isCalibrated).toBe(false);
    });
  });
});
