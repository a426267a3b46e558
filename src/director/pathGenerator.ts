/**
 * pathGenerator: 预设 + 参数 → 关键帧序列
 *
 * 纯函数：相同输入必然得到相同输出。
 * 第 i 个采样的时间戳为 i · 时长 / 采样数；形状使用 u = i / (采样数 − 1)
 * 经过速度曲线后的进度，保证首尾速度为 0（C¹ 连续）。
 */

import { ease } from '../lib/easing';
import { DegenerateGeometryError, InvalidParameterError } from '../lib/errors';
import { normalizeHeading } from '../lib/geo';
import type { CameraKeyframe } from '../models/keyframe';
import type { ShotParameters } from '../models/shot';
import { getPreset, type PoseAt, type PresetPose, type PresetRegistry } from './presets';

export const MIN_SAMPLE_COUNT = 2;

/**
 * 采样数 = 时长 × 帧率（四舍五入），不少于 minSamples。
 *
 * @example sampleCountFor(8, 24) // => 192
 */
export function sampleCountFor(durationSec: number, frameRate: number, minSamples = MIN_SAMPLE_COUNT): number {
  if (!(durationSec > 0) || !Number.isFinite(durationSec)) {
    throw new InvalidParameterError(`durationSec must be a positive number, got ${durationSec}`);
  }
  if (!(frameRate > 0) || !Number.isFinite(frameRate)) {
    throw new InvalidParameterError(`frameRate must be a positive number, got ${frameRate}`);
  }
  return Math.max(Math.max(MIN_SAMPLE_COUNT, minSamples), Math.round(durationSec * frameRate));
}

/** 半径为 0 的静止悬停：位置与俯仰保持起始值，航向取环绕首帧的朝向 */
function hoverPose(params: ShotParameters): PoseAt {
  const pose: PresetPose = {
    lat: params.center.lat,
    lng: params.center.lng,
    altM: params.altitudeStartM,
    headingDeg: params.azimuthStartDeg + 180,
    tiltDeg: params.tiltStartDeg,
    rollDeg: 0,
  };
  return () => pose;
}

function isFinitePose(p: PresetPose): boolean {
  return [p.lat, p.lng, p.altM, p.headingDeg, p.tiltDeg, p.rollDeg].every(Number.isFinite);
}

export function generatePath(args: {
  registry: PresetRegistry;
  preset: string;
  params: ShotParameters;
  sampleCount: number;
  terrainClearanceM: number;
}): CameraKeyframe[] {
  const { registry, params, sampleCount, terrainClearanceM } = args;
  const preset = getPreset(registry, args.preset);

  if (!Number.isInteger(sampleCount) || sampleCount < MIN_SAMPLE_COUNT) {
    throw new InvalidParameterError(`sampleCount must be an integer >= ${MIN_SAMPLE_COUNT}, got ${sampleCount}`);
  }
  if (!(params.durationSec > 0) || !Number.isFinite(params.durationSec)) {
    throw new InvalidParameterError(`durationSec must be a positive number, got ${params.durationSec}`);
  }
  if (!(params.radiusM >= 0) || !Number.isFinite(params.radiusM)) {
    throw new InvalidParameterError(`radiusM must be >= 0, got ${params.radiusM}`);
  }

  let poseAt: PoseAt;
  if (params.radiusM === 0) {
    if (!preset.hoverTolerant) {
      throw new DegenerateGeometryError(`Preset "${preset.tag}" cannot fly a zero radius`);
    }
    poseAt = hoverPose(params);
  } else {
    poseAt = preset.prepare(params);
  }

  const interval = params.durationSec / sampleCount;
  const keyframes: CameraKeyframe[] = [];

  for (let i = 0; i < sampleCount; i++) {
    const u = i / (sampleCount - 1);
    const pose = poseAt(ease(params.easing, u));

    if (!isFinitePose(pose)) {
      throw new DegenerateGeometryError(`Preset "${preset.tag}" produced a non-finite pose at sample ${i}`);
    }

    keyframes.push({
      t: i * interval,
      lat: pose.lat,
      lng: pose.lng,
      altM: Math.max(terrainClearanceM, pose.altM),
      headingDeg: normalizeHeading(pose.headingDeg),
      tiltDeg: pose.tiltDeg,
      rollDeg: pose.rollDeg,
    });
  }

  return keyframes;
}
