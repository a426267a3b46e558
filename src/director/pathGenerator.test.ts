import { describe, expect, it } from 'vitest';
import { TEST_CENTER, testParams, testRegistry } from '../testing/fixtures';
import { DegenerateGeometryError, InvalidParameterError, UnsupportedPresetError } from '../lib/errors';
import { angleDelta, bearingDeg, haversineM } from '../lib/geo';
import { PRESET_TAGS, type ShotParameters } from '../models/shot';
import { generatePath, sampleCountFor } from './pathGenerator';

const generate = (preset: string, params: ShotParameters, sampleCount = 192) =>
  generatePath({ registry: testRegistry, preset, params, sampleCount, terrainClearanceM: 30 });

describe('sampleCountFor', () => {
  it('samples once per frame', () => {
    expect(sampleCountFor(8, 24)).toBe(192);
  });

  it('never goes below the minimum', () => {
    expect(sampleCountFor(0.05, 24)).toBe(2);
    expect(sampleCountFor(8, 24, 500)).toBe(500);
  });

  it('rejects a non-positive duration', () => {
    expect(() => sampleCountFor(0, 24)).toThrow(InvalidParameterError);
  });
});

describe('generatePath', () => {
  it.each(PRESET_TAGS)('%s emits evenly spaced, finite keyframes', (preset) => {
    const keyframes = generate(preset, testParams());

    expect(keyframes).toHaveLength(192);
    keyframes.forEach((kf, i) => {
      expect(kf.t).toBeCloseTo((i * 8) / 192, 12);
      expect(kf.headingDeg).toBeGreaterThanOrEqual(0);
      expect(kf.headingDeg).toBeLessThan(360);
      expect(kf.altM).toBeGreaterThanOrEqual(30);
      expect([kf.lat, kf.lng, kf.altM, kf.tiltDeg, kf.rollDeg].every(Number.isFinite)).toBe(true);
    });
  });

  it('is deterministic', () => {
    const params = testParams({ easing: 'sine' });
    expect(generate('flythrough', params)).toEqual(generate('flythrough', params));
  });

  it('keeps an orbit on its radius, facing the target', () => {
    const keyframes = generate('orbit', testParams({ radiusM: 100, azimuthStartDeg: 0, azimuthEndDeg: 360 }));

    for (const kf of keyframes) {
      expect(haversineM(TEST_CENTER, kf)).toBeCloseTo(100, 6);
      expect(Math.abs(angleDelta(bearingDeg(kf, TEST_CENTER), kf.headingDeg))).toBeLessThan(1e-6);
    }
    // a full turn ends where it started
    expect(haversineM(keyframes[0], keyframes[keyframes.length - 1])).toBeLessThan(1e-6);
  });

  it('eases in: the first step is much shorter than a mid-shot step', () => {
    const keyframes = generate('orbit', testParams({ radiusM: 100 }));
    const first = haversineM(keyframes[0], keyframes[1]);
    const mid = haversineM(keyframes[95], keyframes[96]);
    expect(first).toBeLessThan(0.05 * mid);
  });

  it('turns a zero-radius orbit into a static hover', () => {
    const keyframes = generate('orbit', testParams({ radiusM: 0, azimuthStartDeg: 30, altitudeStartM: 80 }));

    for (const kf of keyframes) {
      expect(kf.lat).toBe(TEST_CENTER.lat);
      expect(kf.lng).toBe(TEST_CENTER.lng);
      expect(kf.altM).toBe(80);
      expect(kf.headingDeg).toBe(210);
    }
  });

  it('rejects a zero-radius flyby', () => {
    expect(() => generate('flyby', testParams({ radiusM: 0 }))).toThrow(DegenerateGeometryError);
  });

  it('rejects a flyby whose endpoints coincide', () => {
    expect(() => generate('flyby', testParams({ azimuthStartDeg: 45, azimuthEndDeg: 45 }))).toThrow(
      DegenerateGeometryError,
    );
  });

  it('rejects an unknown preset', () => {
    expect(() => generate('spiral', testParams())).toThrow(UnsupportedPresetError);
  });

  it('rejects a single sample', () => {
    expect(() => generate('orbit', testParams(), 1)).toThrow(InvalidParameterError);
  });

  it('raises low altitudes to the terrain clearance', () => {
    const keyframes = generate('orbit', testParams({ altitudeStartM: 10, altitudeEndM: 10 }));
    expect(keyframes.every((kf) => kf.altM === 30)).toBe(true);
  });

  it('climbs monotonically on an ascent even when given a falling range', () => {
    const keyframes = generate('ascent', testParams({ altitudeStartM: 100, altitudeEndM: 50 }));
    expect(keyframes[0].altM).toBe(50);
    expect(keyframes[keyframes.length - 1].altM).toBe(100);
    for (let i = 1; i < keyframes.length; i++) {
      expect(keyframes[i].altM).toBeGreaterThanOrEqual(keyframes[i - 1].altM);
    }
  });

  it('descends monotonically on a descent', () => {
    const keyframes = generate('descent', testParams({ altitudeStartM: 300, altitudeEndM: 150 }));
    expect(keyframes[0].altM).toBe(300);
    expect(keyframes[keyframes.length - 1].altM).toBe(150);
  });

  it('holds position on a pan and sweeps the heading around the target', () => {
    const keyframes = generate('pan', testParams({ azimuthStartDeg: 0, azimuthEndDeg: 60 }));
    const first = keyframes[0];
    const last = keyframes[keyframes.length - 1];

    expect(last.lat).toBe(first.lat);
    expect(last.lng).toBe(first.lng);
    expect(first.headingDeg).toBeCloseTo(150, 6);
    expect(last.headingDeg).toBeCloseTo(210, 6);
  });

  it('only tilts on a tilt reveal', () => {
    const keyframes = generate('tiltReveal', testParams({ tiltStartDeg: 10, tiltEndDeg: 70 }));
    expect(keyframes[0].tiltDeg).toBe(10);
    expect(keyframes[keyframes.length - 1].tiltDeg).toBe(70);
    expect(new Set(keyframes.map((kf) => `${kf.lat},${kf.lng},${kf.headingDeg}`)).size).toBe(1);
  });
});
