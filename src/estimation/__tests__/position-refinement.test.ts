import { describe, it, expect } from '@jest/globals';
import { Camera } from '../../entities/camera';
import { degToRad } from '../../utils/angles';
import { expectedAngle } from '../angle-model';
import { EstimationInputError, UndefinedGeometryError } from '../errors';
import { refinePosition } from '../position-refinement';

describe('refinePosition', () => {
  const cameras = [
    Camera.create('A', { position: { x: 0, y: 0 }, azimuthDeg: 0 }),
    Camera.create('B', { position: { x: 10, y: 0 }, azimuthDeg: 90 }),
    Camera.create('C', { position: { x: 5, y: 10 }, azimuthDeg: -90 }),
  ];

  function anglesToward(target: { x: number; y: number }): Record<string, number> {
    const angles: Record<string, number> = {};
    for (const camera of cameras) {
      angles[camera.name] = degToRad(expectedAngle(camera, target));
    }
    return angles;
  }

  it('converges onto the target from a nearby start', () => {
    const refined = refinePosition(cameras, anglesToward({ x: 5, y: 3 }), { x: 5.4, y: 2.7 });

    expect(refined.x).toBeCloseTo(5, 4);
    expect(refined.y).toBeCloseTo(3, 4);
    expect(refined.finalCost).toBeLessThan(1e-8);
    expect(refined.converged).toBe(true);
    expect(refined.iterations).toBeGreaterThan(0);
  });

  it('settles on a least-squares point when the sight lines disagree', () => {
    const angles = anglesToward({ x: 5, y: 3 });
    angles['B'] += degToRad(0.5);

    const refined = refinePosition(cameras, angles, { x: 5, y: 3 });

    expect(refined.converged).toBe(true);
    expect(refined.finalCost).toBeGreaterThan(0);
    expect(Math.hypot(refined.x - 5, refined.y - 3)).toBeLessThan(0.1);
  });

  it('stays put when the start is already exact', () => {
    const refined = refinePosition(cameras, anglesToward({ x: 2, y: 6 }), { x: 2, y: 6 });

    expect(refined.x).toBeCloseTo(2, 10);
    expect(refined.y).toBeCloseTo(6, 10);
    expect(refined.convergenceReason).toBe('Cost below threshold');
    expect(refined.iterations).toBe(1);
  });

  it('needs at least two sight lines', () => {
    expect(() => refinePosition(cameras, { A: 0.5 }, { x: 1, y: 1 })).toThrow(EstimationInputError);
  });

  it('refuses to start on a camera', () => {
    expect(() => refinePosition(cameras, anglesToward({ x: 5, y: 3 }), { x: 10, y: 0 }))
      .toThrow(UndefinedGeometryError);
  });
});
