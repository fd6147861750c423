/**
 * Error taxonomy for calibration, geometry and fusion.
 *
 * Calibration-time: InsufficientSamples, DegenerateFit, CalibrationInput, PoorCalibration
 * Conversion-time:  UncalibratedCamera
 * Geometry-time:    UndefinedGeometry, ParallelSightLines, DivergentSightLines
 * Fusion-time:      NoValidPair
 */

export type TrackingErrorCode =
  | 'InsufficientSamples'
  | 'DegenerateFit'
  | 'CalibrationInput'
  | 'PoorCalibration'
  | 'UncalibratedCamera'
  | 'UndefinedGeometry'
  | 'ParallelSightLines'
  | 'DivergentSightLines'
  | 'NoValidPair'
  | 'EstimationInput'
  | 'SetupFile';

export class TrackingError extends Error {
  public readonly code: TrackingErrorCode;

  constructor(code: TrackingErrorCode, message: string) {
    super(message);
    this.name = 'TrackingError';
    this.code = code;
  }
}

export function isTrackingError(error: unknown): error is TrackingError {
  return error instanceof TrackingError;
}

export class InsufficientSamplesError extends TrackingError {
  public readonly sampleCount: number;
  public readonly required: number;

  constructor(sampleCount: number, required: number) {
    super('InsufficientSamples', `Calibration needs at least ${required} samples, got ${sampleCount}`);
    this.name = 'InsufficientSamplesError';
    this.sampleCount = sampleCount;
    this.required = required;
  }
}

export class DegenerateFitError extends TrackingError {
  constructor(message: string = 'All measured pixel values are identical') {
    super('DegenerateFit', message);
    this.name = 'DegenerateFitError';
  }
}

export class CalibrationInputError extends TrackingError {
  constructor(message: string) {
    super('CalibrationInput', message);
    this.name = 'CalibrationInputError';
  }
}

export class PoorCalibrationError extends TrackingError {
  public readonly cameraName: string;
  public readonly rSquared: number;
  public readonly minRSquared: number;

  constructor(cameraName: string, rSquared: number, minRSquared: number) {
    super(
      'PoorCalibration',
      `Calibration of camera "${cameraName}" rejected: R²=${rSquared.toFixed(4)} < ${minRSquared}`
    );
    this.name = 'PoorCalibrationError';
    this.cameraName = cameraName;
    this.rSquared = rSquared;
    this.minRSquared = minRSquared;
  }
}

export class UncalibratedCameraError extends TrackingError {
  public readonly cameraName: string;

  constructor(cameraName: string) {
    super('UncalibratedCamera', `Camera "${cameraName}" has no calibration`);
    this.name = 'UncalibratedCameraError';
    this.cameraName = cameraName;
  }
}

export class UndefinedGeometryError extends TrackingError {
  constructor(message: string) {
    super('UndefinedGeometry', message);
    this.name = 'UndefinedGeometryError';
  }
}

/**
 * Base for per-pair failures that fusion recovers from by excluding the pair.
 */
export class TriangulationError extends TrackingError {
  public readonly cameraNames: readonly [string, string];

  constructor(code: 'ParallelSightLines' | 'DivergentSightLines', cameraNames: readonly [string, string], message: string) {
    super(code, message);
    this.name = 'TriangulationError';
    this.cameraNames = cameraNames;
  }
}

export class ParallelSightLinesError extends TriangulationError {
  constructor(cameraNames: readonly [string, string]) {
    super('ParallelSightLines', cameraNames, `Sight lines of ${cameraNames[0]} and ${cameraNames[1]} are parallel`);
    this.name = 'ParallelSightLinesError';
  }
}

export class DivergentSightLinesError extends TriangulationError {
  public readonly depthA: number;
  public readonly depthB: number;

  constructor(cameraNames: readonly [string, string], depthA: number, depthB: number) {
    super(
      'DivergentSightLines',
      cameraNames,
      `Sight lines of ${cameraNames[0]} and ${cameraNames[1]} meet behind a camera (depths ${depthA.toFixed(3)}, ${depthB.toFixed(3)})`
    );
    this.name = 'DivergentSightLinesError';
    this.depthA = depthA;
    this.depthB = depthB;
  }
}

export class NoValidPairError extends TrackingError {
  public readonly candidatePairs: number;

  constructor(candidatePairs: number) {
    super('NoValidPair', `No camera pair produced a usable triangulation (${candidatePairs} candidate pairs)`);
    this.name = 'NoValidPairError';
    this.candidatePairs = candidatePairs;
  }
}

export class EstimationInputError extends TrackingError {
  constructor(message: string) {
    super('EstimationInput', message);
    this.name = 'EstimationInputError';
  }
}

export class SetupFileError extends TrackingError {
  public readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super('SetupFile', details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'SetupFileError';
    this.details = details;
  }
}
