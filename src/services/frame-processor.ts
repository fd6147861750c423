/**
 * Per-frame tracking pipeline: pixels → sight angles → fused position.
 *
 * Input is one Frame of raw pixel readings keyed by camera name, as supplied
 * by the detector. Output is a FrameOutcome for the dashboard/store: either a
 * fused position or an explicit NoValidPair failure. Any other error
 * (e.g. an uncalibrated camera reporting a reading) propagates.
 */

import { pixelToAngle, type SightAngle } from '../calibration/pixel-to-angle'
import type { TrackingSetup } from '../entities/tracking-setup'
import type { FusionOptions } from '../estimation/estimation-config'
import { NoValidPairError } from '../estimation/errors'
import { log, logDebug, logOnce } from '../estimation/estimation-logger'
import { fuse, type FusedPosition } from '../estimation/fusion'
import { refinePosition, type RefinedPosition } from '../estimation/position-refinement'

export interface Frame {
  timestamp: number
  /** Raw pixel coordinate per camera name; cameras without an entry sit this frame out */
  pixels: Readonly<Record<string, number>>
}

export type FrameOutcome =
  | { status: 'fused'; position: FusedPosition; refined?: RefinedPosition }
  | { status: 'failed'; timestamp: number; reason: 'NoValidPair'; message: string }

export interface ProcessFrameOptions extends Partial<FusionOptions> {
  /** Also run least-squares refinement seeded with the fused position */
  refine?: boolean
}

/**
 * Convert a frame's pixels to sight angles (radians), in setup camera order.
 *
 * Unknown camera names are ignored with a one-time warning; non-finite
 * readings count as no detection.
 *
 * @throws UncalibratedCameraError when a camera without calibration reports a reading
 */
export function frameToSightAngles(setup: TrackingSetup, frame: Frame): SightAngle[] {
  for (const name of Object.keys(frame.pixels)) {
    if (!setup.hasCamera(name)) {
      logOnce(`[Frame] WARNING: ignoring readings from unknown camera "${name}"`)
    }
  }

  const angles: SightAngle[] = []
  for (const camera of setup.cameras) {
    if (!Object.prototype.hasOwnProperty.call(frame.pixels, camera.name)) {
      continue
    }
    const pixel = frame.pixels[camera.name]
    if (!Number.isFinite(pixel)) {
      logDebug(`[Frame] ${camera.name}: no detection at t=${frame.timestamp}`)
      continue
    }
    angles.push({ cameraName: camera.name, angleRad: pixelToAngle(pixel, camera) })
  }
  return angles
}

export function processFrame(
  setup: TrackingSetup,
  frame: Frame,
  options: ProcessFrameOptions = {}
): FrameOutcome {
  const { refine = false, ...fusionOptions } = options
  const cameras = setup.cameras

  const angleByCamera: Record<string, number> = {}
  for (const sight of frameToSightAngles(setup, frame)) {
    angleByCamera[sight.cameraName] = sight.angleRad
  }

  let position: FusedPosition
  try {
    position = fuse(cameras, angleByCamera, { ...fusionOptions, timestamp: frame.timestamp })
  } catch (error) {
    if (error instanceof NoValidPairError) {
      log(`[Frame] t=${frame.timestamp}: ${error.message}`)
      return { status: 'failed', timestamp: frame.timestamp, reason: 'NoValidPair', message: error.message }
    }
    throw error
  }

  if (!refine) {
    return { status: 'fused', position }
  }

  const refined = refinePosition(cameras, angleByCamera, position)
  return { status: 'fused', position, refined }
}

/**
 * Process a batch of frames in order; one outcome per frame.
 *
 * Only NoValidPair becomes a failed outcome. Any other error, such as an
 * uncalibrated camera reporting a reading, aborts the batch at that frame
 * and no outcomes are returned.
 */
export function processFrames(
  setup: TrackingSetup,
  frames: readonly Frame[],
  options: ProcessFrameOptions = {}
): FrameOutcome[] {
  return frames.map(frame => processFrame(setup, frame, options))
}
