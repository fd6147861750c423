import type { Camera } from '../entities/camera';
import { degToRad } from '../utils/angles';
import { PARALLEL_SIGHT_LINE_TOLERANCE } from './estimation-config';
import { DivergentSightLinesError, ParallelSightLinesError } from './errors';
import { logDebug } from './estimation-logger';

type CameraPose = Pick<Camera, 'name' | 'position' | 'azimuthDeg'>;

export interface TriangulationResult {
  x: number;
  y: number;
  /** Signed distance from camera A to the intersection along its sight line */
  depthA: number;
  /** Signed distance from camera B to the intersection along its sight line */
  depthB: number;
}

/**
 * Intersect the sight lines of two cameras.
 *
 * Each sight line starts at the camera position with world bearing
 * φ = azimuth + sight angle. The line y − y0 = tan(φ)(x − x0) is used in its
 * tangent-free form sin(φ)(x − x0) − cos(φ)(y − y0) = 0, so vertical lines
 * need no special casing. The 2×2 system is solved with Cramer's rule.
 *
 * Sight angles are in radians (the output of pixelToAngle).
 *
 * @throws ParallelSightLinesError when |sin(φA − φB)| < PARALLEL_SIGHT_LINE_TOLERANCE
 * @throws DivergentSightLinesError when the lines meet behind either camera
 */
export function triangulate(
  cameraA: CameraPose,
  angleARad: number,
  cameraB: CameraPose,
  angleBRad: number
): TriangulationResult {
  const phiA = degToRad(cameraA.azimuthDeg) + angleARad;
  const phiB = degToRad(cameraB.azimuthDeg) + angleBRad;

  const dAx = Math.cos(phiA);
  const dAy = Math.sin(phiA);
  const dBx = Math.cos(phiB);
  const dBy = Math.sin(phiB);

  // cross(dA, dB) = sin(φB − φA)
  const denom = dAx * dBy - dAy * dBx;
  if (Math.abs(denom) < PARALLEL_SIGHT_LINE_TOLERANCE) {
    throw new ParallelSightLinesError([cameraA.name, cameraB.name]);
  }

  // Solve A + tA·dA = B + tB·dB
  const wx = cameraB.position.x - cameraA.position.x;
  const wy = cameraB.position.y - cameraA.position.y;
  const depthA = (wx * dBy - wy * dBx) / denom;
  const depthB = (wx * dAy - wy * dAx) / denom;

  if (depthA <= 0 || depthB <= 0) {
    logDebug(`[Tri] ${cameraA.name}/${cameraB.name} diverge: depthA=${depthA.toFixed(3)}, depthB=${depthB.toFixed(3)}`);
    throw new DivergentSightLinesError([cameraA.name, cameraB.name], depthA, depthB);
  }

  return {
    x: cameraA.position.x + depthA * dAx,
    y: cameraA.position.y + depthA * dAy,
    depthA,
    depthB,
  };
}
