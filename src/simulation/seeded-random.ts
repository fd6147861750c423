/**
 * Seeded Pseudo-Random Number Generator
 *
 * Deterministic noise for simulated observations, so synthetic tracking runs
 * are reproducible. Uses a Linear Congruential Generator (LCG).
 *
 * Usage:
 *   import { setSeed, gaussian } from './seeded-random'
 *
 *   setSeed(42)
 *   const noise = gaussian() * std
 */

let state = Date.now() | 0

// Second Box-Muller sample, kept for the next call
let spareGaussian: number | null = null

/**
 * Set the random seed for reproducible results.
 */
export function setSeed(seed: number): void {
  state = seed | 0
  spareGaussian = null
}

export function getSeed(): number {
  return state
}

/**
 * Generate a random number in [0, 1) using LCG algorithm.
 */
export function random(): number {
  // LCG parameters (same as glibc)
  state = (state * 1664525 + 1013904223) | 0
  return (state >>> 0) / 0x100000000
}

/**
 * Standard normal sample (mean 0, std 1), Box-Muller transform.
 */
export function gaussian(): number {
  if (spareGaussian !== null) {
    const value = spareGaussian
    spareGaussian = null
    return value
  }
  // 1 - random() is in (0, 1], safe for log
  const u1 = 1 - random()
  const u2 = random()
  const radius = Math.sqrt(-2 * Math.log(u1))
  spareGaussian = radius * Math.sin(2 * Math.PI * u2)
  return radius * Math.cos(2 * Math.PI * u2)
}
