/**
 * Angle unit helpers.
 *
 * Calibration speaks degrees; the geometric pipeline (triangulation, error
 * estimation, fusion) speaks radians. Conversions happen only through here.
 */

export const DEG_TO_RAD = Math.PI / 180
export const RAD_TO_DEG = 180 / Math.PI

export function degToRad(deg: number): number {
  return deg * DEG_TO_RAD
}

export function radToDeg(rad: number): number {
  return rad * RAD_TO_DEG
}

/**
 * Normalize an angle in degrees into (-180, 180].
 */
export function normalizeAngleDeg(deg: number): number {
  let a = deg % 360
  if (a > 180) a -= 360
  if (a <= -180) a += 360
  return a
}
