import { describe, expect, it, vi } from 'vitest';
import { TEST_CENTER, testConfig, testParams, testRegistry } from '../testing/fixtures';
import { InvalidParameterError } from '../lib/errors';
import { attachRecommendation } from './platformRecommender';
import {
  parameterDistance,
  parameterSignature,
  planShots,
  selectShotSpecs,
  validateShotParameters,
  type ShotOverride,
} from './shotPlanner';

vi.spyOn(console, 'log').mockImplementation(() => undefined);
vi.spyOn(console, 'warn').mockImplementation(() => undefined);

const config = testConfig();
const ctx = { config, registry: testRegistry };

const plan = (shotCount: number, overrides?: (ShotOverride | undefined)[]) =>
  planShots({ location: TEST_CENTER, shotCount, durationSec: 8, overrides, ...ctx });

describe('planShots', () => {
  it('plans an orbit, a flyby and a descent for a three-shot batch', () => {
    const report = plan(3);

    expect(report.failures).toEqual([]);
    expect(report.cancelled).toBe(false);
    expect(report.plans.map((p) => p.preset)).toEqual(['orbit', 'flyby', 'descent']);
    expect(report.plans.map((p) => p.id)).toEqual(['shot-01-orbit', 'shot-02-flyby', 'shot-03-descent']);
    expect(report.plans[0].title).toBe('Orbit #01');
    for (const p of report.plans) {
      expect(p.keyframes).toHaveLength(192);
      expect(p.metadata.source).toBe('generated');
    }
  });

  it('recommends a drone for the orbit and a helicopter for the flyby', () => {
    const [orbit, flyby] = plan(3).plans;
    expect(attachRecommendation(orbit, config.platform).platform).toBe('drone');
    expect(attachRecommendation(flyby, config.platform).platform).toBe('helicopter');
  });

  it('never repeats a preset on adjacent shots', () => {
    const report = plan(25);
    expect(report.failures).toEqual([]);
    expect(report.plans).toHaveLength(25);
    for (let i = 1; i < report.plans.length; i++) {
      expect(report.plans[i].preset).not.toBe(report.plans[i - 1].preset);
    }
  });

  it('reproduces the same batch for the same location', () => {
    expect(plan(4)).toEqual(plan(4));
  });

  it('varies parameters with the location', () => {
    const a = plan(1).plans[0];
    const b = planShots({ location: { lat: 48.8584, lng: 2.2945 }, shotCount: 1, durationSec: 8, ...ctx }).plans[0];
    expect(parameterSignature('orbit', a.params)).not.toBe(parameterSignature('orbit', b.params));
  });

  it('rejects an invalid batch up front', () => {
    expect(() => plan(0)).toThrow(InvalidParameterError);
    expect(() => plan(2.5)).toThrow(InvalidParameterError);
    expect(() => planShots({ location: { lat: 91, lng: 0 }, shotCount: 1, durationSec: 8, ...ctx })).toThrow(
      InvalidParameterError,
    );
    expect(() => planShots({ location: TEST_CENTER, shotCount: 1, durationSec: -1, ...ctx })).toThrow(
      InvalidParameterError,
    );
  });

  it('skips a shot with a bad override and keeps the rest', () => {
    const report = plan(3, [undefined, { radiusM: -5 }]);

    expect(report.plans.map((p) => p.id)).toEqual(['shot-01-orbit', 'shot-03-descent']);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]).toMatchObject({ index: 1, kind: 'InvalidParameter' });
  });

  it('reports an unknown preset override', () => {
    const report = plan(1, [{ preset: 'spiral' }]);
    expect(report.plans).toEqual([]);
    expect(report.failures[0]).toMatchObject({ index: 0, kind: 'UnsupportedPreset' });
  });

  it('reports degenerate geometry with the shot id', () => {
    const report = plan(2, [undefined, { radiusM: 0 }]);
    expect(report.plans.map((p) => p.id)).toEqual(['shot-01-orbit']);
    expect(report.failures).toEqual([
      {
        index: 1,
        shotId: 'shot-02-flyby',
        kind: 'DegenerateGeometry',
        message: expect.stringContaining('flyby'),
      },
    ]);
  });

  it('warns when diversity cannot be reached', () => {
    const fixed: ShotOverride = {
      preset: 'orbit',
      radiusM: 100,
      altitudeStartM: 50,
      altitudeEndM: 50,
      azimuthStartDeg: 0,
      azimuthEndDeg: 30,
      tiltStartDeg: 60,
      tiltEndDeg: 60,
    };
    const report = plan(2, [fixed, fixed]);

    expect(report.plans[0].metadata.warnings).toEqual([]);
    expect(report.plans[1].metadata.warnings).toEqual(['Diversity threshold 0.05 not met after 8 attempts']);
  });

  it('compares candidates with accepted shots of every preset', () => {
    const fixed: ShotOverride = {
      radiusM: 100,
      altitudeStartM: 80,
      altitudeEndM: 80,
      azimuthStartDeg: 0,
      azimuthEndDeg: 30,
      tiltStartDeg: 60,
      tiltEndDeg: 60,
    };
    const report = plan(2, [
      { ...fixed, preset: 'orbit' },
      { ...fixed, preset: 'pan' },
    ]);

    expect(report.plans.map((p) => p.preset)).toEqual(['orbit', 'pan']);
    expect(report.plans[1].metadata.warnings).toContain('Diversity threshold 0.05 not met after 8 attempts');
  });

  it('stops between shots when cancelled', () => {
    let checks = 0;
    const report = planShots({
      location: TEST_CENTER,
      shotCount: 3,
      durationSec: 8,
      shouldCancel: () => ++checks > 1,
      ...ctx,
    });

    expect(report.cancelled).toBe(true);
    expect(report.plans.map((p) => p.id)).toEqual(['shot-01-orbit']);
  });
});

describe('selectShotSpecs', () => {
  it('sizes each shot from the configured frame rate', () => {
    const { specs } = selectShotSpecs({
      location: TEST_CENTER,
      shotCount: 2,
      durationSec: 2,
      config: testConfig({ env: { FRAME_RATE: '30' } }),
      registry: testRegistry,
    });
    expect(specs.map((s) => s.sampleCount)).toEqual([60, 60]);
  });

  it('samples parameters inside the preset ranges', () => {
    const { specs } = selectShotSpecs({ location: TEST_CENTER, shotCount: 1, durationSec: 8, ...ctx });
    const { params } = specs[0];
    const ranges = config.ranges.orbit;

    expect(params.radiusM).toBeGreaterThanOrEqual(ranges.radiusM[0]);
    expect(params.radiusM).toBeLessThanOrEqual(ranges.radiusM[1]);
    expect(params.altitudeStartM).toBe(params.altitudeEndM);
    expect(Math.abs(params.azimuthEndDeg - params.azimuthStartDeg)).toBeGreaterThanOrEqual(20);
    expect(Math.abs(params.azimuthEndDeg - params.azimuthStartDeg)).toBeLessThanOrEqual(40);
    expect(ranges.easings).toContain(params.easing);
  });
});

describe('validateShotParameters', () => {
  it('accepts sensible parameters without warnings', () => {
    expect(validateShotParameters(testParams(), config)).toEqual([]);
  });

  it('warns about altitudes below the terrain clearance', () => {
    expect(validateShotParameters(testParams({ altitudeStartM: 10 }), config)).toEqual([
      'altitudeStartM 10.0 m raised to terrain clearance 30 m',
    ]);
  });

  it('warns about a tilt above the horizon', () => {
    expect(validateShotParameters(testParams({ tiltEndDeg: 100 }), config)).toEqual([
      'tiltEndDeg 100.0° looks above the horizon',
    ]);
  });

  it.each([
    ['negative radius', { radiusM: -1 }],
    ['radius past the limit', { radiusM: 20_001 }],
    ['negative altitude', { altitudeEndM: -1 }],
    ['tilt past 180', { tiltStartDeg: 181 }],
    ['infinite azimuth', { azimuthEndDeg: Infinity }],
    ['zero duration', { durationSec: 0 }],
  ])('rejects %s', (_label, override) => {
    expect(() => validateShotParameters(testParams(override), config)).toThrow(InvalidParameterError);
  });
});

describe('parameterDistance', () => {
  it('is zero for identical parameters', () => {
    expect(parameterDistance(testParams(), testParams())).toBe(0);
  });

  it('measures azimuth around the circle', () => {
    const a = testParams({ azimuthStartDeg: 350, azimuthEndDeg: 440 });
    const b = testParams({ azimuthStartDeg: 10, azimuthEndDeg: 100 });
    expect(parameterDistance(a, b)).toBeCloseTo(20 / 180, 12);
  });
});
