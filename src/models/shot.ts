/**
 * ShotPlan: 镜头方案
 *
 * 一个完整参数化的运镜轨迹及其元数据。
 * 由 ShotPlanner 创建；PlatformRecommender 只写入 metadata；导出器只读。
 */

import type { Easing } from '../lib/easing';
import type { LatLng } from '../lib/geo';
import type { CameraKeyframe } from './keyframe';

/** 十种运镜预设 */
export const PRESET_TAGS = [
  'orbit',
  'flyby',
  'flythrough',
  'descent',
  'ascent',
  'pan',
  'reveal',
  'tiltReveal',
  'establishing',
  'crane',
] as const;

export type PresetTag = (typeof PRESET_TAGS)[number];

export function isPresetTag(value: string): value is PresetTag {
  return (PRESET_TAGS as readonly string[]).includes(value);
}

/** 导入的轨道没有预设，记为 imported */
export type ShotPreset = PresetTag | 'imported';

/** 生成轨迹所用的源参数 */
export type ShotParameters = {
  /** 拍摄目标（中心点） */
  center: LatLng;
  /** 镜头时长（秒） */
  durationSec: number;
  /** 环绕半径 / 最近距离（米），0 表示悬停 */
  radiusM: number;
  /** 高度区间（米） */
  altitudeStartM: number;
  altitudeEndM: number;
  /** 方位区间（度，可超过 360 表示多圈） */
  azimuthStartDeg: number;
  azimuthEndDeg: number;
  /** 俯仰区间（度） */
  tiltStartDeg: number;
  tiltEndDeg: number;
  /** 速度曲线 */
  easing: Easing;
};

/** 由关键帧差分得出的运动学摘要 */
export type KinematicProfile = {
  durationSec: number;
  segmentCount: number;
  totalHorizontalDistanceM: number;
  avgHorizontalSpeedMps: number;
  maxHorizontalSpeedMps: number;
  maxVerticalRateMps: number;
  /** 0 when there are no segments */
  minHorizontalSpeedMps: number;
  minAltitudeM: number;
  maxAltitudeM: number;
  avgAltitudeM: number;
  /** 到目标中心的水平距离 */
  minRadiusM: number;
  avgRadiusM: number;
  maxRadiusM: number;
};

/** 相邻两个关键帧之间的一段运动 */
export type MotionSegment = {
  index: number;
  tStartSec: number;
  tEndSec: number;
  horizontalDistanceM: number;
  verticalDistanceM: number;
  distance3dM: number;
  horizontalSpeedMps: number;
  /** 三维速度 */
  speedMps: number;
};

export type Platform = 'drone' | 'helicopter' | 'either';

export type ShotMetadata = {
  /** generated：规划器生成；imported：由工程轨道导入 */
  source: 'generated' | 'imported';
  /** 未被纠正的越界情况，逐条记录 */
  warnings: string[];
  kinematics?: KinematicProfile;
  platform?: Platform;
  /** 0~1 */
  confidence?: number;
  reasons?: string[];
};

export type ShotPlan = {
  id: string;
  /** 在批次中的序号（从 0 开始） */
  index: number;
  title: string;
  preset: ShotPreset;
  params: ShotParameters;
  readonly keyframes: readonly CameraKeyframe[];
  metadata: ShotMetadata;
};
