import { describe, expect, it } from 'vitest';
import { TEST_CENTER, keyframe, planFromKeyframes, testConfig } from '../testing/fixtures';
import { InvalidParameterError } from '../lib/errors';
import { destinationPoint } from '../lib/geo';
import { attachRecommendation, computeKinematicProfile, recommendPlatform } from './platformRecommender';

const thresholds = testConfig().platform;

/** Two keyframes one second apart, both at `altM`. */
const hoverAt = (altM: number) => [keyframe({ t: 0, altM }), keyframe({ t: 1, altM })];

describe('computeKinematicProfile', () => {
  it('derives speeds from consecutive keyframes', () => {
    const far = destinationPoint(TEST_CENTER, 90, 100);
    const profile = computeKinematicProfile([
      keyframe({ t: 0, altM: 50 }),
      keyframe({ t: 10, ...far, altM: 70 }),
    ]);

    expect(profile.durationSec).toBe(10);
    expect(profile.segmentCount).toBe(1);
    expect(profile.totalHorizontalDistanceM).toBeCloseTo(100, 6);
    expect(profile.avgHorizontalSpeedMps).toBeCloseTo(10, 6);
    expect(profile.maxHorizontalSpeedMps).toBeCloseTo(10, 6);
    expect(profile.maxVerticalRateMps).toBe(2);
    expect(profile.minAltitudeM).toBe(50);
    expect(profile.maxAltitudeM).toBe(70);
  });

  it('handles a single keyframe', () => {
    const profile = computeKinematicProfile([keyframe({ t: 0, altM: 42 })]);
    expect(profile).toEqual({
      durationSec: 0,
      segmentCount: 0,
      totalHorizontalDistanceM: 0,
      avgHorizontalSpeedMps: 0,
      maxHorizontalSpeedMps: 0,
      maxVerticalRateMps: 0,
      minHorizontalSpeedMps: 0,
      minAltitudeM: 42,
      maxAltitudeM: 42,
      avgAltitudeM: 42,
      minRadiusM: 0,
      avgRadiusM: 0,
      maxRadiusM: 0,
    });
  });

  it('measures radius from the given centre', () => {
    const east = destinationPoint(TEST_CENTER, 90, 100);
    const west = destinationPoint(TEST_CENTER, 270, 50);
    const profile = computeKinematicProfile(
      [keyframe({ t: 0, ...east }), keyframe({ t: 1, ...west }), keyframe({ t: 2, ...east })],
      TEST_CENTER,
    );
    expect(profile.minRadiusM).toBeCloseTo(50, 6);
    expect(profile.maxRadiusM).toBeCloseTo(100, 6);
    expect(profile.avgRadiusM).toBeCloseTo(250 / 3, 6);
    expect(profile.minHorizontalSpeedMps).toBeCloseTo(150, 4);
  });

  it('rejects an empty sequence', () => {
    expect(() => computeKinematicProfile([])).toThrow(InvalidParameterError);
  });

  it('rejects timestamps that do not increase', () => {
    expect(() => computeKinematicProfile([keyframe({ t: 1 }), keyframe({ t: 1 })])).toThrow(InvalidParameterError);
  });
});

describe('recommendPlatform', () => {
  it('picks a drone inside every limit, scored by the tightest margin', () => {
    const rec = recommendPlatform(hoverAt(60), thresholds);
    expect(rec.platform).toBe('drone');
    expect(rec.confidence).toBe(0.5);
    expect(rec.reasons).toEqual([
      'altitude 60.0 m within drone limit 120 m',
      'horizontal speed 0.0 m/s within drone limit 20 m/s',
      'vertical rate 0.0 m/s within drone limit 6 m/s',
    ]);
  });

  it('rounds confidence to three decimals', () => {
    expect(recommendPlatform(hoverAt(100), thresholds).confidence).toBe(0.167);
  });

  it('picks a helicopter past any helicopter threshold', () => {
    const rec = recommendPlatform(hoverAt(450), thresholds);
    expect(rec.platform).toBe('helicopter');
    expect(rec.confidence).toBe(0.5);
    expect(rec.reasons[0]).toBe('altitude 450.0 m beyond helicopter threshold 300 m');
  });

  it('caps helicopter confidence at 1', () => {
    expect(recommendPlatform(hoverAt(1000), thresholds).confidence).toBe(1);
  });

  it('picks a fast, low pass as a helicopter', () => {
    const far = destinationPoint(TEST_CENTER, 0, 40);
    const rec = recommendPlatform([keyframe({ t: 0, altM: 60 }), keyframe({ t: 1, ...far, altM: 60 })], thresholds);
    expect(rec.platform).toBe('helicopter');
    expect(rec.confidence).toBe(0.333);
  });

  it('says either between the limits, most sure halfway', () => {
    expect(recommendPlatform(hoverAt(210), thresholds)).toMatchObject({ platform: 'either', confidence: 1 });
    expect(recommendPlatform(hoverAt(165), thresholds)).toMatchObject({ platform: 'either', confidence: 0.5 });
  });

  it('scores either by the least certain metric', () => {
    const rec = recommendPlatform([keyframe({ t: 0, altM: 165 }), keyframe({ t: 1, altM: 173 })], thresholds);
    expect(rec.platform).toBe('either');
    expect(rec.confidence).toBe(0.589);
    expect(rec.reasons[2]).toBe('vertical rate 8.0 m/s between drone limit 6 and helicopter threshold 10 m/s');
  });

  it('does not modify its input', () => {
    const keyframes = Object.freeze(hoverAt(60).map((kf) => Object.freeze(kf)));
    const first = recommendPlatform(keyframes, thresholds);
    expect(recommendPlatform(keyframes, thresholds)).toEqual(first);
  });
});

describe('attachRecommendation', () => {
  it('writes the result into metadata only', () => {
    const keyframes = hoverAt(60);
    const plan = planFromKeyframes(keyframes);
    const rec = attachRecommendation(plan, thresholds);

    expect(plan.keyframes).toBe(keyframes);
    expect(plan.metadata).toMatchObject({
      platform: 'drone',
      confidence: 0.5,
      kinematics: rec.profile,
      reasons: rec.reasons,
    });
  });
});
