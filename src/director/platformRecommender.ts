/**
 * platformRecommender: 拍摄平台推荐
 *
 * 由关键帧序列计算运动学概要（水平速度、垂直速率、高度带），
 * 再与无人机上限 / 直升机极值比较，给出 drone / helicopter / either 及置信度。
 * 纯函数：不修改关键帧，相同输入得到相同结果。
 */

import type { PlatformThresholds } from '../../lib/config';
import { InvalidParameterError } from '../lib/errors';
import { haversineM, type LatLng } from '../lib/geo';
import type { CameraKeyframe } from '../models/keyframe';
import type { KinematicProfile, MotionSegment, Platform, ShotPlan } from '../models/shot';

export type PlatformRecommendation = {
  platform: Platform;
  /** [0, 1]，保留 3 位小数 */
  confidence: number;
  profile: KinematicProfile;
  reasons: string[];
};

type Metric = {
  name: 'altitude' | 'horizontal speed' | 'vertical rate';
  unit: string;
  value: number;
  limit: number;
  extreme: number;
};

const round3 = (n: number) => Math.round(n * 1000) / 1000;

export function segmentMetrics(keyframes: readonly CameraKeyframe[]): MotionSegment[] {
  const segments: MotionSegment[] = [];
  for (let i = 1; i < keyframes.length; i++) {
    const prev = keyframes[i - 1];
    const curr = keyframes[i];
    const dt = curr.t - prev.t;
    if (!(dt > 0)) {
      throw new InvalidParameterError(`Keyframe timestamps must increase (index ${i}: ${prev.t} → ${curr.t})`);
    }
    const horizontal = haversineM(prev, curr);
    const vertical = Math.abs(curr.altM - prev.altM);
    const distance3d = Math.hypot(horizontal, vertical);
    segments.push({
      index: i - 1,
      tStartSec: prev.t,
      tEndSec: curr.t,
      horizontalDistanceM: horizontal,
      verticalDistanceM: vertical,
      distance3dM: distance3d,
      horizontalSpeedMps: horizontal / dt,
      speedMps: distance3d / dt,
    });
  }
  return segments;
}

const mean = (values: readonly number[]) => values.reduce((a, b) => a + b, 0) / values.length;

/** 半径以 center 为准；未给出时取关键帧的平均位置 */
export function computeKinematicProfile(keyframes: readonly CameraKeyframe[], center?: LatLng): KinematicProfile {
  if (keyframes.length === 0) {
    throw new InvalidParameterError('Cannot profile an empty keyframe sequence');
  }

  const segments = segmentMetrics(keyframes);
  const speeds = segments.map((s) => s.horizontalSpeedMps);
  const totalDistance = segments.reduce((sum, s) => sum + s.horizontalDistanceM, 0);
  const maxVertical = Math.max(0, ...segments.map((s) => s.verticalDistanceM / (s.tEndSec - s.tStartSec)));

  const altitudes = keyframes.map((kf) => kf.altM);
  const origin = center ?? { lat: mean(keyframes.map((kf) => kf.lat)), lng: mean(keyframes.map((kf) => kf.lng)) };
  const radii = keyframes.map((kf) => haversineM(origin, kf));

  const durationSec = keyframes[keyframes.length - 1].t - keyframes[0].t;

  return {
    durationSec,
    segmentCount: segments.length,
    totalHorizontalDistanceM: totalDistance,
    avgHorizontalSpeedMps: durationSec > 0 ? totalDistance / durationSec : 0,
    maxHorizontalSpeedMps: Math.max(0, ...speeds),
    maxVerticalRateMps: maxVertical,
    minHorizontalSpeedMps: speeds.length > 0 ? Math.min(...speeds) : 0,
    minAltitudeM: Math.min(...altitudes),
    maxAltitudeM: Math.max(...altitudes),
    avgAltitudeM: mean(altitudes),
    minRadiusM: Math.min(...radii),
    avgRadiusM: mean(radii),
    maxRadiusM: Math.max(...radii),
  };
}

function metricsOf(profile: KinematicProfile, t: PlatformThresholds): Metric[] {
  return [
    { name: 'altitude', unit: 'm', value: profile.maxAltitudeM, limit: t.maxDroneAltitudeM, extreme: t.helicopterAltitudeM },
    {
      name: 'horizontal speed',
      unit: 'm/s',
      value: profile.maxHorizontalSpeedMps,
      limit: t.maxDroneSpeedMps,
      extreme: t.helicopterSpeedMps,
    },
    {
      name: 'vertical rate',
      unit: 'm/s',
      value: profile.maxVerticalRateMps,
      limit: t.maxDroneVerticalRateMps,
      extreme: t.helicopterVerticalRateMps,
    },
  ];
}

function describe(m: Metric): string {
  const v = `${m.name} ${m.value.toFixed(1)} ${m.unit}`;
  if (m.value <= m.limit) return `${v} within drone limit ${m.limit} ${m.unit}`;
  if (m.value > m.extreme) return `${v} beyond helicopter threshold ${m.extreme} ${m.unit}`;
  return `${v} between drone limit ${m.limit} and helicopter threshold ${m.extreme} ${m.unit}`;
}

export function recommendPlatform(
  keyframes: readonly CameraKeyframe[],
  thresholds: PlatformThresholds,
  center?: LatLng,
): PlatformRecommendation {
  const profile = computeKinematicProfile(keyframes, center);
  const metrics = metricsOf(profile, thresholds);
  const reasons = metrics.map(describe);

  const beyond = metrics.filter((m) => m.value > m.extreme);
  if (beyond.length > 0) {
    const excess = Math.max(...beyond.map((m) => (m.value - m.extreme) / m.extreme));
    return { platform: 'helicopter', confidence: round3(Math.min(1, excess)), profile, reasons };
  }

  const band = metrics.filter((m) => m.value > m.limit);
  if (band.length === 0) {
    const margin = Math.min(...metrics.map((m) => (m.limit - m.value) / m.limit));
    return { platform: 'drone', confidence: round3(margin), profile, reasons };
  }

  // 处于两者之间：离最近边界越远越确定
  const confidence = Math.min(
    ...band.map((m) => {
      const p = (m.value - m.limit) / (m.extreme - m.limit);
      return 2 * Math.min(p, 1 - p);
    }),
  );
  return { platform: 'either', confidence: round3(confidence), profile, reasons };
}

/** 把推荐结果写入 plan.metadata，关键帧与参数保持不变 */
export function attachRecommendation(plan: ShotPlan, thresholds: PlatformThresholds): PlatformRecommendation {
  const rec = recommendPlatform(plan.keyframes, thresholds, plan.params.center);
  plan.metadata.kinematics = rec.profile;
  plan.metadata.platform = rec.platform;
  plan.metadata.confidence = rec.confidence;
  plan.metadata.reasons = rec.reasons;
  return rec;
}
