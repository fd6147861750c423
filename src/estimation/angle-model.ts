import type { Camera } from '../entities/camera';
import type { Point2D } from '../utils/geometry2d';
import { normalizeAngleDeg, radToDeg } from '../utils/angles';
import { GEOMETRY_EPSILON } from './estimation-config';
import { UndefinedGeometryError } from './errors';

type CameraPose = Pick<Camera, 'name' | 'position' | 'azimuthDeg'>;

/**
 * Angle (degrees, in (-180, 180]) at which `camera` sees `target`, measured
 * from the camera's mounting azimuth. This is what a perfectly calibrated
 * sensor would report.
 */
export function expectedAngle(camera: CameraPose, target: Point2D): number {
  const dx = target.x - camera.position.x;
  const dy = target.y - camera.position.y;

  if (Math.hypot(dx, dy) < GEOMETRY_EPSILON) {
    throw new UndefinedGeometryError(
      `Target (${target.x}, ${target.y}) coincides with camera "${camera.name}"`
    );
  }

  return normalizeAngleDeg(radToDeg(Math.atan2(dy, dx)) - camera.azimuthDeg);
}

/**
 * Vectorised expectedAngle: one angle per target, in input order.
 */
export function expectedAngles(camera: CameraPose, targets: readonly Point2D[]): number[] {
  return targets.map(target => expectedAngle(camera, target));
}
