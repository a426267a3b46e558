// Shared builders for tests.

import { loadConfig, type AppConfig } from '../../lib/config';
import { generatePath } from '../director/pathGenerator';
import { createPresetRegistry } from '../director/presets';
import type { LatLng } from '../lib/geo';
import type { CameraKeyframe } from '../models/keyframe';
import type { PresetTag, ShotParameters, ShotPlan } from '../models/shot';

export const TEST_CENTER: LatLng = { lat: 40.7484, lng: -73.9857 };

export const testConfig = (overrides: Parameters<typeof loadConfig>[0] = {}): AppConfig =>
  loadConfig({ env: {}, ...overrides });

export const testRegistry = createPresetRegistry();

export function testParams(overrides: Partial<ShotParameters> = {}): ShotParameters {
  return {
    center: TEST_CENTER,
    durationSec: 8,
    radiusM: 200,
    altitudeStartM: 100,
    altitudeEndM: 150,
    azimuthStartDeg: 0,
    azimuthEndDeg: 90,
    tiltStartDeg: 60,
    tiltEndDeg: 70,
    easing: 'smoothstep',
    ...overrides,
  };
}

export function makePlan(
  args: {
    preset?: PresetTag;
    params?: Partial<ShotParameters>;
    sampleCount?: number;
    id?: string;
    title?: string;
    index?: number;
  } = {},
): ShotPlan {
  const preset = args.preset ?? 'orbit';
  const params = testParams(args.params);
  return {
    id: args.id ?? `shot-01-${preset}`,
    index: args.index ?? 0,
    title: args.title ?? 'Test shot',
    preset,
    params,
    keyframes: generatePath({
      registry: testRegistry,
      preset,
      params,
      sampleCount: args.sampleCount ?? 24,
      terrainClearanceM: 30,
    }),
    metadata: { source: 'generated', warnings: [] },
  };
}

export function keyframe(partial: Partial<CameraKeyframe> & { t: number }): CameraKeyframe {
  return {
    lat: TEST_CENTER.lat,
    lng: TEST_CENTER.lng,
    altM: 100,
    headingDeg: 0,
    tiltDeg: 60,
    rollDeg: 0,
    ...partial,
  };
}

export function planFromKeyframes(keyframes: CameraKeyframe[], overrides: Partial<ShotPlan> = {}): ShotPlan {
  const last = keyframes[keyframes.length - 1];
  return {
    id: 'shot-01-orbit',
    index: 0,
    title: 'Test shot',
    preset: 'orbit',
    params: testParams({ durationSec: last ? last.t + 1 : 1 }),
    keyframes,
    metadata: { source: 'generated', warnings: [] },
    ...overrides,
  };
}
