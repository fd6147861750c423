/**
 * Multi-camera fusion.
 *
 * Every unordered pair of cameras with a sight angle this frame is
 * triangulated, each estimate is weighted by the inverse of its error bound,
 * and the weighted centroid is the fused position. Pairs with parallel or
 * divergent sight lines, or whose intersection falls on a camera, are
 * skipped; the frame fails only when none remain.
 */

import type { Camera } from '../entities/camera';
import { degToRad } from '../utils/angles';
import { weightedCentroid2D } from '../utils/geometry2d';
import { errorBound } from './error-estimation';
import { MIN_ERROR_BOUND, resolveFusionOptions, type FusionOptions } from './estimation-config';
import { EstimationInputError, NoValidPairError, TriangulationError, UndefinedGeometryError } from './errors';
import { logDebug } from './estimation-logger';
import { triangulate } from './triangulation';

type CameraPose = Pick<Camera, 'name' | 'position' | 'azimuthDeg'>;

/** Sight angles in radians, keyed by camera name */
export type AngleByCamera = Readonly<Record<string, number>>;

export interface PositionEstimate {
  x: number;
  y: number;
  cameraNames: [string, string];
  /** Worst-case position error in metres; Infinity when it could not be bounded */
  errorBound: number;
}

export interface FusedPosition {
  x: number;
  y: number;
  timestamp: number;
  /** Camera pairs that contributed an estimate */
  pairCount: number;
  /** Distinct cameras appearing in the contributing pairs */
  cameraCount: number;
}

export interface PairEstimation {
  estimates: PositionEstimate[];
  /** Number of pairs attempted (both cameras had an angle) */
  candidatePairs: number;
}

export interface FuseOptions extends Partial<FusionOptions> {
  timestamp?: number;
}

/**
 * Inverse-error weight. A zero bound gets the designated maximum weight
 * 1 / MIN_ERROR_BOUND; an unbounded error gets weight 0.
 */
export function pairWeight(bound: number): number {
  if (!Number.isFinite(bound)) {
    return 0;
  }
  return 1 / Math.max(bound, MIN_ERROR_BOUND);
}

/**
 * Triangulate every valid camera pair and attach its error bound.
 */
export function estimatePairs(
  cameras: readonly CameraPose[],
  angleByCamera: AngleByCamera,
  options: Partial<FusionOptions> = {}
): PairEstimation {
  const { angularUncertaintyDeg } = resolveFusionOptions(options);
  const deltaRad = degToRad(angularUncertaintyDeg);

  const observed = cameras.filter(c => Object.prototype.hasOwnProperty.call(angleByCamera, c.name));
  for (const camera of observed) {
    if (!Number.isFinite(angleByCamera[camera.name])) {
      throw new EstimationInputError(`Sight angle of camera "${camera.name}" is not a finite number`);
    }
  }

  const estimates: PositionEstimate[] = [];
  let candidatePairs = 0;

  for (let i = 0; i < observed.length; i++) {
    for (let j = i + 1; j < observed.length; j++) {
      const a = observed[i];
      const b = observed[j];
      candidatePairs++;

      try {
        const point = triangulate(a, angleByCamera[a.name], b, angleByCamera[b.name]);
        const bound = errorBound(a, b, deltaRad, point);
        estimates.push({ x: point.x, y: point.y, cameraNames: [a.name, b.name], errorBound: bound });
        logDebug(`[Fusion] ${a.name}/${b.name}: (${point.x.toFixed(3)}, ${point.y.toFixed(3)}) ±${bound.toFixed(3)}m`);
      } catch (error) {
        // An intersection on top of a camera has no bearing to perturb
        if (!(error instanceof TriangulationError || error instanceof UndefinedGeometryError)) {
          throw error;
        }
        logDebug(`[Fusion] Skipping ${a.name}/${b.name}: ${error.code}`);
      }
    }
  }

  return { estimates, candidatePairs };
}

/**
 * Inverse-error weighted average of pairwise estimates.
 * The result does not depend on the order of `estimates`.
 *
 * @throws NoValidPairError when `estimates` is empty
 */
export function fuseEstimates(estimates: readonly PositionEstimate[], timestamp: number): FusedPosition {
  if (estimates.length === 0) {
    throw new NoValidPairError(0);
  }

  let weights = estimates.map(e => pairWeight(e.errorBound));
  if (weights.every(w => w === 0)) {
    weights = estimates.map(() => 1);
  }

  const { x, y } = weightedCentroid2D(estimates, weights);
  const cameraNames = new Set(estimates.flatMap(e => e.cameraNames));

  return { x, y, timestamp, pairCount: estimates.length, cameraCount: cameraNames.size };
}

/**
 * Fuse one frame of sight angles (radians) into a single position.
 *
 * @throws NoValidPairError when no camera pair yields a triangulation
 */
export function fuse(
  cameras: readonly CameraPose[],
  angleByCamera: AngleByCamera,
  options: FuseOptions = {}
): FusedPosition {
  const { timestamp = Date.now(), ...fusionOptions } = options;
  const { estimates, candidatePairs } = estimatePairs(cameras, angleByCamera, fusionOptions);

  if (estimates.length === 0) {
    throw new NoValidPairError(candidatePairs);
  }

  return fuseEstimates(estimates, timestamp);
}
