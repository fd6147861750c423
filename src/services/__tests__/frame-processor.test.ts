import { describe, it, expect, beforeEach } from '@jest/globals'
import { Camera, createCalibration } from '../../entities/camera'
import { TrackingSetup } from '../../entities/tracking-setup'
import { UncalibratedCameraError } from '../../estimation/errors'
import { clearEstimationLogs, estimationLogs } from '../../estimation/estimation-logger'
import { simulateFrame } from '../../simulation/synthetic-observations'
import { frameToSightAngles, processFrame, processFrames } from '../frame-processor'

const calibration = createCalibration([-57.6, 0.025], 0.999, 8)
const target = { x: 5, y: 3 }

function makeSetup(): TrackingSetup {
  return TrackingSetup.create('Yard', [
    Camera.create('A', { position: { x: 0, y: 0 }, azimuthDeg: 0, calibration }),
    Camera.create('B', { position: { x: 10, y: 0 }, azimuthDeg: 90, calibration }),
    Camera.create('C', { position: { x: 5, y: 10 }, azimuthDeg: -90, calibration }),
  ])
}

describe('frame-processor', () => {
  beforeEach(() => {
    clearEstimationLogs()
  })

  describe('frameToSightAngles', () => {
    it('converts readings in setup camera order', () => {
      const setup = makeSetup()
      const angles = frameToSightAngles(setup, { timestamp: 0, pixels: { C: 2304, A: 2304 } })

      expect(angles.map(a => a.cameraName)).toEqual(['A', 'C'])
      expect(angles[0].angleRad).toBeCloseTo(0, 12)
      expect(angles[1].angleRad).toBeCloseTo(0, 12)
    })

    it('skips non-finite readings', () => {
      const setup = makeSetup()
      const angles = frameToSightAngles(setup, { timestamp: 0, pixels: { A: NaN, B: 2304 } })

      expect(angles.map(a => a.cameraName)).toEqual(['B'])
    })

    it('warns once about an unknown camera', () => {
      const setup = makeSetup()
      frameToSightAngles(setup, { timestamp: 0, pixels: { Z: 100 } })
      frameToSightAngles(setup, { timestamp: 1, pixels: { Z: 100 } })

      expect(estimationLogs).toEqual(['[Frame] WARNING: ignoring readings from unknown camera "Z"'])
    })

    it('fails when an uncalibrated camera reports', () => {
      const setup = makeSetup()
      setup.addCamera(Camera.create('D', { position: { x: 0, y: 10 } }))

      expect(() => frameToSightAngles(setup, { timestamp: 0, pixels: { D: 100 } })).toThrow(UncalibratedCameraError)
    })
  })

  describe('processFrame', () => {
    it('recovers a simulated target', () => {
      const setup = makeSetup()
      const outcome = processFrame(setup, simulateFrame(setup, target, 42))

      expect(outcome.status).toBe('fused')
      if (outcome.status === 'fused') {
        expect(outcome.position.x).toBeCloseTo(5, 6)
        expect(outcome.position.y).toBeCloseTo(3, 6)
        expect(outcome.position.timestamp).toBe(42)
        expect(outcome.position.pairCount).toBe(3)
        expect(outcome.position.cameraCount).toBe(3)
        expect(outcome.refined).toBeUndefined()
      }
    })

    it('fuses the remaining cameras when one has no detection', () => {
      const setup = makeSetup()
      const frame = simulateFrame(setup, target, 1)
      const outcome = processFrame(setup, { ...frame, pixels: { ...frame.pixels, A: NaN } })

      expect(outcome.status).toBe('fused')
      if (outcome.status === 'fused') {
        expect(outcome.position.pairCount).toBe(1)
        expect(outcome.position.cameraCount).toBe(2)
        expect(outcome.position.x).toBeCloseTo(5, 6)
        expect(outcome.position.y).toBeCloseTo(3, 6)
      }
    })

    it('refines the fused position on request', () => {
      const setup = makeSetup()
      const outcome = processFrame(setup, simulateFrame(setup, target, 2), { refine: true })

      expect(outcome.status).toBe('fused')
      if (outcome.status === 'fused') {
        expect(outcome.refined?.x).toBeCloseTo(5, 5)
        expect(outcome.refined?.y).toBeCloseTo(3, 5)
      }
    })

    it('reports a frame with a single reading as failed', () => {
      const setup = makeSetup()
      const outcome = processFrame(setup, { timestamp: 7, pixels: { A: 3000 } })
      const message = 'No camera pair produced a usable triangulation (0 candidate pairs)'

      expect(outcome).toEqual({ status: 'failed', timestamp: 7, reason: 'NoValidPair', message })
      expect(estimationLogs).toEqual([`[Frame] t=7: ${message}`])
    })

    it('reports parallel sight lines as failed', () => {
      const setup = TrackingSetup.create('Rail', [
        Camera.create('A', { position: { x: 0, y: 0 }, azimuthDeg: 0, calibration }),
        Camera.create('B', { position: { x: 0, y: 5 }, azimuthDeg: 0, calibration }),
      ])
      const outcome = processFrame(setup, { timestamp: 3, pixels: { A: 2304, B: 2304 } })

      expect(outcome.status).toBe('failed')
      if (outcome.status === 'failed') {
        expect(outcome.message).toBe('No camera pair produced a usable triangulation (1 candidate pairs)')
      }
    })
  })

  it('processes a batch in order', () => {
    const setup = makeSetup()
    const outcomes = processFrames(setup, [
      simulateFrame(setup, target, 1),
      { timestamp: 2, pixels: {} },
      simulateFrame(setup, { x: 2, y: 6 }, 3),
    ])

    expect(outcomes.map(o => o.status)).toEqual(['fused', 'failed', 'fused'])
    const last = outcomes[2]
    if (last.status === 'fused') {
      expect(last.position.x).toBeCloseTo(2, 6)
      expect(last.position.y).toBeCloseTo(6, 6)
    }
  })

  it('aborts a batch at the first reading from an uncalibrated camera', () => {
    const setup = makeSetup()
    setup.addCamera(Camera.create('D', { position: { x: 0, y: 10 } }))

    expect(() => processFrames(setup, [
      simulateFrame(setup, target, 1),
      { timestamp: 2, pixels: { A: 3000, D: 100 } },
      simulateFrame(setup, target, 3),
    ])).toThrow('Camera "D" has no calibration')
  })
})
