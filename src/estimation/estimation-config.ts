/**
 * Estimation Configuration
 *
 * Numerical tolerances and fusion defaults.
 */

/**
 * Distances (metres) below this are treated as coincident points.
 */
export const GEOMETRY_EPSILON = 1e-9;

/**
 * Two sight lines are parallel when |sin(φA − φB)| falls below this value,
 * i.e. their bearings differ by less than ~1e-9 rad modulo π.
 */
export const PARALLEL_SIGHT_LINE_TOLERANCE = 1e-9;

/**
 * Error bounds are clamped to at least this value (metres) before inversion,
 * so a zero error bound maps to the designated maximum weight 1 / MIN_ERROR_BOUND.
 */
export const MIN_ERROR_BOUND = 1e-9;

export const MAX_PAIR_WEIGHT = 1 / MIN_ERROR_BOUND;

export interface FusionOptions {
  /** Angular measurement uncertainty used for per-pair error bounds, in degrees */
  angularUncertaintyDeg: number;
}

export const DEFAULT_FUSION_OPTIONS: FusionOptions = {
  angularUncertaintyDeg: 0.5,
};

let angularUncertaintyDeg = DEFAULT_FUSION_OPTIONS.angularUncertaintyDeg;

/**
 * Set the default angular uncertainty (degrees) used when a caller does not pass one.
 */
export function setDefaultAngularUncertaintyDeg(deg: number): void {
  if (!Number.isFinite(deg) || deg < 0) {
    throw new RangeError(`Angular uncertainty must be a non-negative number, got ${deg}`);
  }
  angularUncertaintyDeg = deg;
}

export function getDefaultAngularUncertaintyDeg(): number {
  return angularUncertaintyDeg;
}

export function resolveFusionOptions(options: Partial<FusionOptions> = {}): FusionOptions {
  return {
    angularUncertaintyDeg: options.angularUncertaintyDeg ?? angularUncertaintyDeg,
  };
}
