export { Camera, createCalibration } from './entities/camera'
export type { CameraCalibration, CameraDto, CameraCalibrationDto } from './entities/camera'
export { TrackingSetup, TRACKING_SETUP_FORMAT_VERSION } from './entities/tracking-setup'
export type { TrackingSetupDto } from './entities/tracking-setup'

export { expectedAngle, expectedAngles } from './estimation/angle-model'
export { triangulate } from './estimation/triangulation'
export type { TriangulationResult } from './estimation/triangulation'
export { errorBound } from './estimation/error-estimation'
export { fuse, fuseEstimates, estimatePairs, pairWeight } from './estimation/fusion'
export type { AngleByCamera, FusedPosition, PositionEstimate, PairEstimation, FuseOptions } from './estimation/fusion'
export { refinePosition } from './estimation/position-refinement'
export type { RefinedPosition, RefinementOptions } from './estimation/position-refinement'
export * from './estimation/errors'
export * from './estimation/estimation-config'
export {
  log, logDebug, logOnce, setVerbosity, getVerbosity, setLogCallback, setMaxLogEntries, clearEstimationLogs, estimationLogs, DEFAULT_MAX_LOG_ENTRIES
} from './estimation/estimation-logger'

export { fitCalibration, calibrateCamera, evaluatePolynomial } from './calibration/calibrator'
export type { CalibrationFit, CalibrateCameraOptions } from './calibration/calibrator'
export { pixelToAngle, pixelToAngleDeg, observationToSightAngle } from './calibration/pixel-to-angle'
export type { Observation, SightAngle } from './calibration/pixel-to-angle'
export {
  getCalibrationQuality, formatRSquared, CALIBRATION_QUALITY_THRESHOLDS, MIN_ACCEPTED_R_SQUARED
} from './calibration/calibration-quality'
export type { CalibrationQuality, CalibrationQualityLevel } from './calibration/calibration-quality'

export { processFrame, processFrames, frameToSightAngles } from './services/frame-processor'
export type { Frame, FrameOutcome, ProcessFrameOptions } from './services/frame-processor'
export { loadSetupFile, saveSetupFile, loadSetupFromJson, saveSetupToJson } from './services/setup-file'
export { validateSetupDto } from './validation/validator'
export type { ValidationError, ValidationResult, SetupValidationResult } from './validation/validator'

export { angleToPixel, pointToPixel, addPixelNoise, simulateFrame } from './simulation/synthetic-observations'
export { setSeed, random, gaussian } from './simulation/seeded-random'

export { weightedCentroid2D, distance2D } from './utils/geometry2d'
export type { Point2D } from './utils/geometry2d'
export { degToRad, radToDeg, normalizeAngleDeg } from './utils/angles'
