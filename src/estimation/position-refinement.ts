/**
 * Least-squares refinement of a fused position.
 *
 * Minimises, over all cameras with a sight angle, the sine of the angle
 * between each sight line and the direction from the camera to the
 * candidate point:
 *
 *   r_i = cross(d_i, p − c_i) / |p − c_i|
 *
 * solved with a dense Levenberg-Marquardt loop on the analytic Jacobian.
 * The fused position is the natural starting point.
 */

import type { Camera } from '../entities/camera';
import { degToRad } from '../utils/angles';
import type { Point2D } from '../utils/geometry2d';
import { choleskySolve } from '../utils/normal-equations';
import { GEOMETRY_EPSILON } from './estimation-config';
import { EstimationInputError, UndefinedGeometryError } from './errors';
import { logDebug } from './estimation-logger';
import type { AngleByCamera } from './fusion';

type CameraPose = Pick<Camera, 'name' | 'position' | 'azimuthDeg'>;

export interface RefinementOptions {
  maxIterations?: number;
  costTolerance?: number;
  gradientTolerance?: number;
  paramTolerance?: number;
}

export interface RefinedPosition extends Point2D {
  iterations: number;
  /** Sum of squared angular residuals (sin²) at the solution */
  finalCost: number;
  converged: boolean;
  convergenceReason: string;
}

interface SightRay {
  name: string;
  cx: number;
  cy: number;
  dx: number;
  dy: number;
}

interface Linearization {
  cost: number;
  /** Jᵀr */
  gradient: [number, number];
  /** JᵀJ, row-major 2×2 */
  normal: [[number, number], [number, number]];
}

const INITIAL_DAMPING = 1e-3;
const MAX_DAMPING = 1e10;
const DAMPING_FACTOR = 10;

function residual(ray: SightRay, px: number, py: number): number {
  const rx = px - ray.cx;
  const ry = py - ray.cy;
  return (ray.dx * ry - ray.dy * rx) / Math.hypot(rx, ry);
}

function costAt(rays: readonly SightRay[], px: number, py: number): number {
  let cost = 0;
  for (const ray of rays) {
    const r = residual(ray, px, py);
    cost += r * r;
  }
  return cost;
}

function linearize(rays: readonly SightRay[], px: number, py: number): Linearization {
  let cost = 0;
  let gx = 0;
  let gy = 0;
  let hxx = 0;
  let hxy = 0;
  let hyy = 0;

  for (const ray of rays) {
    const rx = px - ray.cx;
    const ry = py - ray.cy;
    const range = Math.hypot(rx, ry);
    const cross = ray.dx * ry - ray.dy * rx;
    const r = cross / range;
    const range3 = range * range * range;

    // ∂r/∂p = (−d_y, d_x)/|v| − cross·v/|v|³
    const jx = -ray.dy / range - (cross * rx) / range3;
    const jy = ray.dx / range - (cross * ry) / range3;

    cost += r * r;
    gx += jx * r;
    gy += jy * r;
    hxx += jx * jx;
    hxy += jx * jy;
    hyy += jy * jy;
  }

  return { cost, gradient: [gx, gy], normal: [[hxx, hxy], [hxy, hyy]] };
}

export function refinePosition(
  cameras: readonly CameraPose[],
  angleByCamera: AngleByCamera,
  initial: Point2D,
  options: RefinementOptions = {}
): RefinedPosition {
  const {
    maxIterations = 100,
    costTolerance = 1e-14,
    gradientTolerance = 1e-14,
    paramTolerance = 1e-12,
  } = options;

  const rays: SightRay[] = cameras
    .filter(c => Object.prototype.hasOwnProperty.call(angleByCamera, c.name))
    .map(c => {
      const phi = degToRad(c.azimuthDeg) + angleByCamera[c.name];
      return { name: c.name, cx: c.position.x, cy: c.position.y, dx: Math.cos(phi), dy: Math.sin(phi) };
    });

  if (rays.length < 2) {
    throw new EstimationInputError(`Refinement needs at least 2 sight lines, got ${rays.length}`);
  }
  for (const ray of rays) {
    if (Math.hypot(initial.x - ray.cx, initial.y - ray.cy) < GEOMETRY_EPSILON) {
      throw new UndefinedGeometryError(`Refinement cannot start on camera "${ray.name}"`);
    }
  }

  let x = initial.x;
  let y = initial.y;
  let lambda = INITIAL_DAMPING;
  let cost = costAt(rays, x, y);
  let iterations = 0;
  let converged = false;
  let convergenceReason = 'Max iterations reached';

  for (let iter = 0; iter < maxIterations; iter++) {
    iterations = iter + 1;
    const lin = linearize(rays, x, y);
    cost = lin.cost;

    if (cost < costTolerance) {
      converged = true;
      convergenceReason = 'Cost below threshold';
      break;
    }
    if (Math.hypot(lin.gradient[0], lin.gradient[1]) < gradientTolerance) {
      converged = true;
      convergenceReason = 'Gradient tolerance reached';
      break;
    }

    let accepted = false;
    while (!accepted && lambda <= MAX_DAMPING) {
      // Marquardt scaling: damp along the diagonal of JᵀJ
      const damped = [
        [lin.normal[0][0] * (1 + lambda), lin.normal[0][1]],
        [lin.normal[1][0], lin.normal[1][1] * (1 + lambda)],
      ];
      const step = choleskySolve(damped, [-lin.gradient[0], -lin.gradient[1]]);
      if (!step) {
        lambda *= DAMPING_FACTOR;
        continue;
      }

      const newCost = costAt(rays, x + step[0], y + step[1]);
      // NaN (a step onto a camera) never compares as an improvement
      if (newCost < cost) {
        x += step[0];
        y += step[1];
        lambda = Math.max(lambda / DAMPING_FACTOR, 1e-12);
        accepted = true;

        if (Math.hypot(step[0], step[1]) < paramTolerance) {
          converged = true;
          convergenceReason = 'Parameter tolerance reached';
        } else if (cost - newCost < costTolerance * cost) {
          converged = true;
          convergenceReason = 'Cost tolerance reached';
        }
        cost = newCost;
      } else {
        lambda *= DAMPING_FACTOR;
      }
    }

    if (!accepted) {
      // Even a fully damped gradient step cannot lower the cost
      converged = true;
      convergenceReason = 'No further improvement';
      break;
    }
    if (converged) {
      break;
    }
  }

  logDebug(`[Refine] ${iterations} iterations, cost=${cost.toExponential(3)} (${convergenceReason})`);

  return { x, y, iterations, finalCost: cost, converged, convergenceReason };
}
