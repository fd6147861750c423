import type { Camera } from '../entities/camera';
import { degToRad } from '../utils/angles';
import { distance2D, type Point2D } from '../utils/geometry2d';
import { expectedAngle } from './angle-model';
import { DivergentSightLinesError, EstimationInputError, ParallelSightLinesError } from './errors';
import { triangulate } from './triangulation';

type CameraPose = Pick<Camera, 'name' | 'position' | 'azimuthDeg'>;

const PERTURBATIONS: ReadonlyArray<readonly [number, number]> = [
  [+1, +1],
  [+1, -1],
  [-1, +1],
  [-1, -1],
];

/**
 * Worst-case position error of a camera pair under angular noise.
 *
 * Both cameras' sight angles toward `target` are perturbed by ±deltaRad, the
 * four combinations are re-triangulated, and the largest distance from
 * `target` is returned. A combination whose sight lines are exactly parallel
 * is left out. One whose lines meet behind a camera has no bounded error,
 * so the whole bound is Infinity, as it is when every combination is parallel.
 */
export function errorBound(
  cameraA: CameraPose,
  cameraB: CameraPose,
  deltaRad: number,
  target: Point2D
): number {
  if (!Number.isFinite(deltaRad) || deltaRad < 0) {
    throw new EstimationInputError(`Angular perturbation must be a non-negative number, got ${deltaRad}`);
  }

  const angleA = degToRad(expectedAngle(cameraA, target));
  const angleB = degToRad(expectedAngle(cameraB, target));

  let maxError = -Infinity;
  for (const [signA, signB] of PERTURBATIONS) {
    try {
      const p = triangulate(cameraA, angleA + signA * deltaRad, cameraB, angleB + signB * deltaRad);
      maxError = Math.max(maxError, distance2D(p, target));
    } catch (error) {
      if (error instanceof DivergentSightLinesError) {
        return Infinity;
      }
      if (!(error instanceof ParallelSightLinesError)) {
        throw error;
      }
    }
  }

  return maxError === -Infinity ? Infinity : maxError;
}
