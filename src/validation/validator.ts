// Validation framework for tracking setup files: strict, fail-fast, typed output

import type {CameraCalibrationDto, CameraDto} from '../entities/camera/CameraDto'
import {TRACKING_SETUP_FORMAT_VERSION, type TrackingSetupDto} from '../entities/tracking-setup/TrackingSetupDto'
import {MIN_ACCEPTED_R_SQUARED} from '../calibration/calibration-quality'

// Camera names are used as unique IDs
export type EntityId = string

export interface ValidationError {
  code: string
  message: string
  entityId?: EntityId
  field?: string
  severity: 'error' | 'warning'
}

export interface ValidationResult {
  isValid: boolean
  errors: ValidationError[]
  warnings: ValidationError[]
  summary: string
}

export interface SetupValidationResult extends ValidationResult {
  /** Present only when isValid */
  dto?: TrackingSetupDto
}

export const ValidationErrorCodes = {
  MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD',
  INVALID_FIELD_TYPE: 'INVALID_FIELD_TYPE',
  INVALID_FIELD_VALUE: 'INVALID_FIELD_VALUE',
  UNSUPPORTED_VERSION: 'UNSUPPORTED_VERSION',
  DUPLICATE_ID: 'DUPLICATE_ID',
  POOR_CALIBRATION: 'POOR_CALIBRATION'
} as const

export class ValidationHelpers {
  static createError(code: string, message: string, entityId?: EntityId, field?: string): ValidationError {
    return {code, message, entityId, field, severity: 'error'}
  }

  static createWarning(code: string, message: string, entityId?: EntityId, field?: string): ValidationError {
    return {code, message, entityId, field, severity: 'warning'}
  }

  static createSummary(errors: ValidationError[], warnings: ValidationError[]): string {
    if (errors.length === 0 && warnings.length === 0) {
      return 'Setup validation passed successfully'
    }

    const parts: string[] = []
    if (errors.length > 0) {
      parts.push(`${errors.length} error${errors.length === 1 ? '' : 's'}`)
    }
    if (warnings.length > 0) {
      parts.push(`${warnings.length} warning${warnings.length === 1 ? '' : 's'}`)
    }

    return errors.length > 0
      ? `Setup validation failed: ${parts.join(', ')}`
      : `Setup validation passed with ${parts.join(', ')}`
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

function validateCalibration(
  raw: unknown,
  cameraId: EntityId,
  errors: ValidationError[],
  warnings: ValidationError[]
): CameraCalibrationDto | undefined {
  if (!isRecord(raw)) {
    errors.push(ValidationHelpers.createError(
      ValidationErrorCodes.INVALID_FIELD_TYPE, 'Calibration must be an object', cameraId, 'calibration'))
    return undefined
  }

  const {coefficients, rSquared, sampleCount, calibratedAt} = raw
  const errorCount = errors.length

  if (!Array.isArray(coefficients) || coefficients.length < 2 || !coefficients.every(isFiniteNumber)) {
    errors.push(ValidationHelpers.createError(
      ValidationErrorCodes.INVALID_FIELD_VALUE,
      'Calibration coefficients must be an array of at least 2 finite numbers',
      cameraId, 'calibration.coefficients'))
  }
  if (!isFiniteNumber(rSquared)) {
    errors.push(ValidationHelpers.createError(
      ValidationErrorCodes.INVALID_FIELD_TYPE, 'Calibration rSquared must be a number', cameraId, 'calibration.rSquared'))
  }
  if (!isFiniteNumber(sampleCount) || !Number.isInteger(sampleCount) || sampleCount < 2) {
    errors.push(ValidationHelpers.createError(
      ValidationErrorCodes.INVALID_FIELD_VALUE, 'Calibration sampleCount must be an integer >= 2', cameraId, 'calibration.sampleCount'))
  }
  if (calibratedAt !== undefined && typeof calibratedAt !== 'string') {
    errors.push(ValidationHelpers.createError(
      ValidationErrorCodes.INVALID_FIELD_TYPE, 'Calibration calibratedAt must be a string', cameraId, 'calibration.calibratedAt'))
  }

  if (errors.length > errorCount
    || !Array.isArray(coefficients) || !coefficients.every(isFiniteNumber)
    || !isFiniteNumber(rSquared) || !isFiniteNumber(sampleCount)) {
    return undefined
  }

  if (rSquared < MIN_ACCEPTED_R_SQUARED) {
    warnings.push(ValidationHelpers.createWarning(
      ValidationErrorCodes.POOR_CALIBRATION,
      `Calibration R²=${rSquared} is below ${MIN_ACCEPTED_R_SQUARED}`,
      cameraId, 'calibration.rSquared'))
  }

  return {
    coefficients: [...coefficients],
    rSquared,
    sampleCount,
    calibratedAt: typeof calibratedAt === 'string' ? calibratedAt : undefined
  }
}

function validateCamera(
  raw: unknown,
  index: number,
  errors: ValidationError[],
  warnings: ValidationError[]
): CameraDto | undefined {
  const fallbackId = `cameras[${index}]`
  if (!isRecord(raw)) {
    errors.push(ValidationHelpers.createError(
      ValidationErrorCodes.INVALID_FIELD_TYPE, 'Camera entry must be an object', fallbackId))
    return undefined
  }

  const {name, position, azimuthDeg, calibration} = raw
  const id = typeof name === 'string' && name.trim().length > 0 ? name : fallbackId
  const errorCount = errors.length

  if (typeof name !== 'string' || name.trim().length === 0) {
    errors.push(ValidationHelpers.createError(
      ValidationErrorCodes.MISSING_REQUIRED_FIELD, "Required field 'name' is missing", id, 'name'))
  }
  if (!Array.isArray(position) || position.length !== 2 || !position.every(isFiniteNumber)) {
    errors.push(ValidationHelpers.createError(
      ValidationErrorCodes.INVALID_FIELD_VALUE, 'Position must be [x, y] with finite numbers', id, 'position'))
  }
  if (!isFiniteNumber(azimuthDeg)) {
    errors.push(ValidationHelpers.createError(
      ValidationErrorCodes.INVALID_FIELD_TYPE, 'azimuthDeg must be a finite number', id, 'azimuthDeg'))
  }

  const calibrationDto = calibration === undefined
    ? undefined
    : validateCalibration(calibration, id, errors, warnings)

  if (errors.length > errorCount
    || typeof name !== 'string'
    || !Array.isArray(position) || !position.every(isFiniteNumber)
    || !isFiniteNumber(azimuthDeg)) {
    return undefined
  }

  return {
    name,
    position: [position[0], position[1]],
    azimuthDeg,
    calibration: calibrationDto
  }
}

/**
 * Validate parsed JSON as a tracking setup. On success the typed DTO is returned
 * alongside the result; warnings (e.g. poor calibrations) do not invalidate it.
 */
export function validateSetupDto(raw: unknown): SetupValidationResult {
  const errors: ValidationError[] = []
  const warnings: ValidationError[] = []

  const finish = (dto?: TrackingSetupDto): SetupValidationResult => ({
    isValid: errors.length === 0,
    errors,
    warnings,
    summary: ValidationHelpers.createSummary(errors, warnings),
    dto: errors.length === 0 ? dto : undefined
  })

  if (!isRecord(raw)) {
    errors.push(ValidationHelpers.createError(ValidationErrorCodes.INVALID_FIELD_TYPE, 'Setup must be a JSON object'))
    return finish()
  }

  if (raw.version !== TRACKING_SETUP_FORMAT_VERSION) {
    errors.push(ValidationHelpers.createError(
      ValidationErrorCodes.UNSUPPORTED_VERSION,
      `Unsupported setup version ${String(raw.version)} (expected ${TRACKING_SETUP_FORMAT_VERSION})`,
      undefined, 'version'))
  }
  if (raw.name !== undefined && typeof raw.name !== 'string') {
    errors.push(ValidationHelpers.createError(ValidationErrorCodes.INVALID_FIELD_TYPE, 'name must be a string', undefined, 'name'))
  }
  if (!Array.isArray(raw.cameras)) {
    errors.push(ValidationHelpers.createError(
      ValidationErrorCodes.MISSING_REQUIRED_FIELD, "Required field 'cameras' is missing", undefined, 'cameras'))
    return finish()
  }

  const cameras: CameraDto[] = []
  const seen = new Set<string>()
  raw.cameras.forEach((entry: unknown, index: number) => {
    const camera = validateCamera(entry, index, errors, warnings)
    if (!camera) return
    if (seen.has(camera.name)) {
      errors.push(ValidationHelpers.createError(
        ValidationErrorCodes.DUPLICATE_ID, `Camera name "${camera.name}" is used more than once`, camera.name, 'name'))
      return
    }
    seen.add(camera.name)
    cameras.push(camera)
  })

  return finish({
    version: TRACKING_SETUP_FORMAT_VERSION,
    name: typeof raw.name === 'string' ? raw.name : undefined,
    cameras
  })
}
