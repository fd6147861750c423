import {makeAutoObservable, observable} from 'mobx'
import type {Point2D} from '../../utils/geometry2d'
import type {CameraDto} from './CameraDto'

/**
 * Pixel → angle calibration of one camera. Angles are in degrees.
 * Always replaced as a whole; instances are frozen.
 */
export interface CameraCalibration {
    /** Polynomial coefficients in ascending powers of the pixel value */
    readonly coefficients: readonly number[]
    readonly slope: number
    readonly intercept: number
    /** Coefficient of determination of the fit; may be negative */
    readonly rSquared: number
    readonly fitDegree: number
    readonly sampleCount: number
    readonly calibratedAt?: string
}

export function createCalibration(
    coefficients: readonly number[],
    rSquared: number,
    sampleCount: number,
    calibratedAt?: string
): CameraCalibration {
    if (coefficients.length < 2) {
        throw new Error(`Calibration needs at least 2 coefficients, got ${coefficients.length}`)
    }
    if (!coefficients.every(c => Number.isFinite(c))) {
        throw new Error('Calibration coefficients must be finite')
    }
    return Object.freeze({
        coefficients: Object.freeze([...coefficients]),
        slope: coefficients[1],
        intercept: coefficients[0],
        rSquared,
        fitDegree: coefficients.length - 1,
        sampleCount,
        calibratedAt
    })
}

/**
 * A fixed, bearing-only camera.
 *
 * Position and mounting azimuth never change after creation. The calibration
 * is held as a single reference: readers take one snapshot per conversion,
 * writers swap the whole record, so slope and intercept never tear.
 */
export class Camera {
    readonly name: string
    readonly position: Readonly<Point2D>
    /** Mounting azimuth in degrees, counter-clockwise from +x */
    readonly azimuthDeg: number
    calibration: CameraCalibration | undefined

    private constructor(
        name: string,
        position: Point2D,
        azimuthDeg: number,
        calibration: CameraCalibration | undefined
    ) {
        this.name = name
        this.position = Object.freeze({x: position.x, y: position.y})
        this.azimuthDeg = azimuthDeg
        this.calibration = calibration

        makeAutoObservable(this, {
            name: false,
            position: false,
            azimuthDeg: false,
            calibration: observable.ref
        }, {autoBind: true})
    }

    // ============================================================================
    // Factory methods
    // ============================================================================

    static create(
        name: string,
        options: {
            position: Point2D
            azimuthDeg?: number
            calibration?: CameraCalibration
        }
    ): Camera {
        if (name.trim().length === 0) {
            throw new Error('Camera name must not be empty')
        }
        const {x, y} = options.position
        const azimuthDeg = options.azimuthDeg ?? 0
        if (!Number.isFinite(x) || !Number.isFinite(y)) {
            throw new Error(`Camera "${name}" has a non-finite position`)
        }
        if (!Number.isFinite(azimuthDeg)) {
            throw new Error(`Camera "${name}" has a non-finite azimuth`)
        }
        return new Camera(name, {x, y}, azimuthDeg, options.calibration)
    }

    // ============================================================================
    // Calibration
    // ============================================================================

    get isCalibrated(): boolean {
        return this.calibration !== undefined
    }

    /**
     * Replace the calibration as one unit.
     */
    applyCalibration(calibration: CameraCalibration): void {
        this.calibration = Object.isFrozen(calibration)
            ? calibration
            : createCalibration(calibration.coefficients, calibration.rSquared, calibration.sampleCount, calibration.calibratedAt)
    }

    clearCalibration(): void {
        this.calibration = undefined
    }

    // ============================================================================
    // Serialization
    // ============================================================================

    serialize(): CameraDto {
        const calibration = this.calibration
        return {
            name: this.name,
            position: [this.position.x, this.position.y],
            azimuthDeg: this.azimuthDeg,
            calibration: calibration
                ? {
                    coefficients: [...calibration.coefficients],
                    rSquared: calibration.rSquared,
                    sampleCount: calibration.sampleCount,
                    calibratedAt: calibration.calibratedAt
                }
                : undefined
        }
    }

    static deserialize(dto: CameraDto): Camera {
        const calibration = dto.calibration
            ? createCalibration(
                dto.calibration.coefficients,
                dto.calibration.rSquared,
                dto.calibration.sampleCount,
                dto.calibration.calibratedAt
            )
            : undefined
        return Camera.create(dto.name, {
            position: {x: dto.position[0], y: dto.position[1]},
            azimuthDeg: dto.azimuthDeg,
            calibration
        })
    }
}
