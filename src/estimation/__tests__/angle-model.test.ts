import { describe, it, expect } from '@jest/globals';
import { Camera } from '../../entities/camera';
import { expectedAngle, expectedAngles } from '../angle-model';
import { UndefinedGeometryError } from '../errors';

describe('AngleModel', () => {
  const origin = Camera.create('O', { position: { x: 0, y: 0 }, azimuthDeg: 0 });

  it('measures counter-clockwise from +x', () => {
    expect(expectedAngle(origin, { x: 1, y: 1 })).toBeCloseTo(45, 12);
    expect(expectedAngle(origin, { x: 0, y: 2 })).toBeCloseTo(90, 12);
    expect(expectedAngle(origin, { x: 0, y: -2 })).toBeCloseTo(-90, 12);
  });

  it('is relative to the mounting azimuth', () => {
    const cam = Camera.create('C', { position: { x: 0, y: 0 }, azimuthDeg: 45 });
    expect(expectedAngle(cam, { x: 3, y: 3 })).toBeCloseTo(0, 12);

    const west = Camera.create('W', { position: { x: 0, y: 0 }, azimuthDeg: 90 });
    expect(expectedAngle(west, { x: -1, y: 0 })).toBeCloseTo(90, 12);
  });

  it('uses the camera position', () => {
    const cam = Camera.create('C', { position: { x: 10, y: 0 }, azimuthDeg: 90 });
    // atan2(5, -5) = 135°, minus 90°
    expect(expectedAngle(cam, { x: 5, y: 5 })).toBeCloseTo(45, 12);
  });

  it('normalizes into (-180, 180]', () => {
    const cam = Camera.create('C', { position: { x: 0, y: 0 }, azimuthDeg: 170 });
    // -45 - 170 = -215 → 145
    expect(expectedAngle(cam, { x: 1, y: -1 })).toBeCloseTo(145, 12);
  });

  it('signals undefined geometry when the target is at the camera', () => {
    const cam = Camera.create('C', { position: { x: 2, y: 3 }, azimuthDeg: 0 });
    expect(() => expectedAngle(cam, { x: 2, y: 3 })).toThrow(UndefinedGeometryError);
    try {
      expectedAngle(cam, { x: 2, y: 3 });
    } catch (error) {
      expect(error).toBeInstanceOf(UndefinedGeometryError);
      if (error instanceof UndefinedGeometryError) {
        expect(error.code).toBe('UndefinedGeometry');
      }
    }
  });

  it('is vectorised and preserves order', () => {
    const angles = expectedAngles(origin, [{ x: 1, y: 0 }, { x: 0, y: 1 }, { x: -1, y: 0 }, { x: 1, y: -1 }]);
    expect(angles).toHaveLength(4);
    expect(angles[0]).toBeCloseTo(0, 12);
    expect(angles[1]).toBeCloseTo(90, 12);
    expect(angles[2]).toBeCloseTo(180, 12);
    expect(angles[3]).toBeCloseTo(-45, 12);
    expect(expectedAngles(origin, [])).toEqual([]);
  });
});
