/**
 * 2D geometry utilities on plain {x, y} records (world frame, metres).
 */

export interface Point2D {
  x: number
  y: number
}

/**
 * Calculate the Euclidean distance between two 2D points.
 */
export function distance2D(a: Point2D, b: Point2D): number {
  return Math.hypot(b.x - a.x, b.y - a.y)
}

/**
 * Weighted centroid of a set of points: sum(w_i * p_i) / sum(w_i).
 *
 * Generic consensus routine, independent of how the points or weights were
 * produced. Weights must be finite and non-negative with a positive sum.
 */
export function weightedCentroid2D(points: readonly Point2D[], weights: readonly number[]): Point2D {
  if (points.length === 0) {
    throw new Error('weightedCentroid2D requires at least one point')
  }
  if (points.length !== weights.length) {
    throw new Error(`Got ${points.length} points but ${weights.length} weights`)
  }

  let sumW = 0
  let sumX = 0
  let sumY = 0
  for (let i = 0; i < points.length; i++) {
    const w = weights[i]
    if (!Number.isFinite(w) || w < 0) {
      throw new Error(`Invalid weight ${w} at index ${i}`)
    }
    sumW += w
    sumX += w * points[i].x
    sumY += w * points[i].y
  }

  if (sumW <= 0) {
    throw new Error('Sum of weights must be positive')
  }

  return { x: sumX / sumW, y: sumY / sumW }
}
