/**
 * shotPlanner: 镜头批次规划器
 *
 * 为一个地点挑选 N 组「预设 + 参数」组合并生成轨迹：
 * - 预设按 presetOrder 轮转，相邻镜头不重复；
 * - 参数由 (地点, 镜头序号, 尝试次数) 的哈希作种子采样，可复现且镜头间无共享状态；
 * - 与已接受的同预设镜头过于接近的候选会被重新采样。
 *
 * 单个镜头参数非法只会跳过该镜头并写入 failures，其余镜头照常生成。
 */

import type { AppConfig } from '../../lib/config';
import { isEasing } from '../lib/easing';
import { InvalidParameterError, ShotError, errorMessage, type ShotErrorKind } from '../lib/errors';
import { angleDelta, type LatLng } from '../lib/geo';
import { createRandom, fnv1a, shotSeedKey, type Random } from '../lib/seededRandom';
import type { PresetTag, ShotParameters, ShotPlan } from '../models/shot';
import { generatePath, sampleCountFor } from './pathGenerator';
import { getPreset, type ParameterRanges, type PresetRegistry } from './presets';

// ─── 类型 ────────────────────────────────────────────────

/** 单镜头覆盖项：未给出的字段由采样决定 */
export type ShotOverride = Partial<Omit<ShotParameters, 'center'>> & {
  preset?: string;
};

export type PlanRequest = {
  location: LatLng;
  shotCount: number;
  durationSec: number;
  /** 按镜头序号对齐的覆盖项，可稀疏 */
  overrides?: readonly (ShotOverride | undefined)[];
};

/** 已选定、尚未生成轨迹的镜头 */
export type ShotSpec = {
  index: number;
  id: string;
  title: string;
  preset: PresetTag;
  params: ShotParameters;
  sampleCount: number;
  warnings: string[];
};

export type ShotFailure = {
  index: number;
  shotId?: string;
  kind: ShotErrorKind | 'Unknown';
  message: string;
};

export type PlanningReport = {
  plans: ShotPlan[];
  failures: ShotFailure[];
  /** 是否在中途被取消（已完成的镜头仍在 plans 中） */
  cancelled: boolean;
};

type PlannerContext = {
  config: AppConfig;
  registry: PresetRegistry;
};

// ─── 参数采样 ────────────────────────────────────────────

function sampleParameters(rng: Random, ranges: ParameterRanges, center: LatLng, durationSec: number): ShotParameters {
  const direction = rng.next() < 0.5 ? -1 : 1;
  const azimuthStartDeg = rng.range(0, 360);
  const sweep = rng.range(...ranges.azimuthSweepDeg) * direction;
  const radiusM = rng.range(...ranges.radiusM);
  const altitudeStartM = rng.range(...ranges.altitudeM);
  const altitudeDeltaM = rng.range(...ranges.altitudeDeltaM);
  const tiltStartDeg = rng.range(...ranges.tiltDeg);
  const tiltDeltaDeg = rng.range(...ranges.tiltDeltaDeg);
  const easing = rng.pick(ranges.easings);

  return {
    center: { lat: center.lat, lng: center.lng },
    durationSec,
    radiusM,
    altitudeStartM,
    altitudeEndM: altitudeStartM + altitudeDeltaM,
    azimuthStartDeg,
    azimuthEndDeg: azimuthStartDeg + sweep,
    tiltStartDeg,
    tiltEndDeg: tiltStartDeg + tiltDeltaDeg,
    easing,
  };
}

function applyOverride(params: ShotParameters, override: ShotOverride | undefined): ShotParameters {
  if (!override) return params;
  return {
    center: params.center,
    durationSec: override.durationSec ?? params.durationSec,
    radiusM: override.radiusM ?? params.radiusM,
    altitudeStartM: override.altitudeStartM ?? params.altitudeStartM,
    altitudeEndM: override.altitudeEndM ?? params.altitudeEndM,
    azimuthStartDeg: override.azimuthStartDeg ?? params.azimuthStartDeg,
    azimuthEndDeg: override.azimuthEndDeg ?? params.azimuthEndDeg,
    tiltStartDeg: override.tiltStartDeg ?? params.tiltStartDeg,
    tiltEndDeg: override.tiltEndDeg ?? params.tiltEndDeg,
    easing: override.easing ?? params.easing,
  };
}

// ─── 多样性 ──────────────────────────────────────────────

/** 归一化参数向量距离；方位按圆周差计算 */
export function parameterDistance(a: ShotParameters, b: ShotParameters): number {
  const sweepA = a.azimuthEndDeg - a.azimuthStartDeg;
  const sweepB = b.azimuthEndDeg - b.azimuthStartDeg;
  const diffs = [
    (a.radiusM - b.radiusM) / 1000,
    (a.altitudeStartM - b.altitudeStartM) / 500,
    (a.altitudeEndM - b.altitudeEndM) / 500,
    angleDelta(a.azimuthStartDeg, b.azimuthStartDeg) / 180,
    (sweepA - sweepB) / 180,
    (a.tiltStartDeg - b.tiltStartDeg) / 90,
    (a.tiltEndDeg - b.tiltEndDeg) / 90,
  ];
  return Math.sqrt(diffs.reduce((sum, d) => sum + d * d, 0));
}

/** 预设 + 参数签名，用于判断两个镜头是否相同 */
export function parameterSignature(preset: PresetTag, p: ShotParameters): string {
  const r = (n: number) => n.toFixed(3);
  return [
    preset,
    r(p.radiusM),
    r(p.altitudeStartM),
    r(p.altitudeEndM),
    r(p.azimuthStartDeg),
    r(p.azimuthEndDeg),
    r(p.tiltStartDeg),
    r(p.tiltEndDeg),
    p.easing,
    r(p.durationSec),
  ].join('|');
}

// ─── 校验 ────────────────────────────────────────────────

function assertFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(`${name} must be a finite number, got ${value}`);
  }
}

function validateLocation(location: LatLng): void {
  assertFinite('latitude', location.lat);
  assertFinite('longitude', location.lng);
  if (location.lat < -90 || location.lat > 90) {
    throw new InvalidParameterError(`latitude must be within [-90, 90], got ${location.lat}`);
  }
  if (location.lng < -180 || location.lng > 180) {
    throw new InvalidParameterError(`longitude must be within [-180, 180], got ${location.lng}`);
  }
}

function validateDuration(durationSec: number, maxDurationSec: number): void {
  assertFinite('durationSec', durationSec);
  if (durationSec <= 0 || durationSec > maxDurationSec) {
    throw new InvalidParameterError(`durationSec must be within (0, ${maxDurationSec}], got ${durationSec}`);
  }
}

/**
 * 校验单个镜头参数。越界即抛 InvalidParameterError；
 * 不会被纠正的可疑值与被钳制到离地安全高度的高度以警告形式返回。
 */
export function validateShotParameters(params: ShotParameters, config: AppConfig): string[] {
  const warnings: string[] = [];

  validateLocation(params.center);
  validateDuration(params.durationSec, config.maxDurationSec);

  assertFinite('radiusM', params.radiusM);
  if (params.radiusM < 0 || params.radiusM > config.maxRadiusM) {
    throw new InvalidParameterError(`radiusM must be within [0, ${config.maxRadiusM}], got ${params.radiusM}`);
  }

  for (const [name, alt] of [
    ['altitudeStartM', params.altitudeStartM],
    ['altitudeEndM', params.altitudeEndM],
  ] as const) {
    assertFinite(name, alt);
    if (alt < 0 || alt > config.maxAltitudeM) {
      throw new InvalidParameterError(`${name} must be within [0, ${config.maxAltitudeM}], got ${alt}`);
    }
    if (alt < config.terrainClearanceM) {
      warnings.push(`${name} ${alt.toFixed(1)} m raised to terrain clearance ${config.terrainClearanceM} m`);
    }
  }

  assertFinite('azimuthStartDeg', params.azimuthStartDeg);
  assertFinite('azimuthEndDeg', params.azimuthEndDeg);

  for (const [name, tilt] of [
    ['tiltStartDeg', params.tiltStartDeg],
    ['tiltEndDeg', params.tiltEndDeg],
  ] as const) {
    assertFinite(name, tilt);
    if (tilt < 0 || tilt > 180) {
      throw new InvalidParameterError(`${name} must be within [0, 180], got ${tilt}`);
    }
    if (tilt > 90) {
      warnings.push(`${name} ${tilt.toFixed(1)}° looks above the horizon`);
    }
  }

  if (!isEasing(params.easing)) {
    throw new InvalidParameterError(`Unknown easing "${String(params.easing)}"`);
  }

  return warnings;
}

function toFailure(index: number, err: unknown, shotId?: string): ShotFailure {
  return {
    index,
    shotId,
    kind: err instanceof ShotError ? err.kind : 'Unknown',
    message: errorMessage(err),
  };
}

// ─── 选择 ────────────────────────────────────────────────

/**
 * 依次为每个镜头挑选预设与参数（不生成轨迹）。
 * 选择是顺序的（多样性检查依赖已接受的镜头），生成可并行。
 */
export function selectShotSpecs(args: PlanRequest & PlannerContext): {
  specs: ShotSpec[];
  failures: ShotFailure[];
} {
  const { location, shotCount, durationSec, overrides = [], config, registry } = args;

  validateLocation(location);
  validateDuration(durationSec, config.maxDurationSec);
  if (!Number.isInteger(shotCount) || shotCount < 1 || shotCount > config.maxShots) {
    throw new InvalidParameterError(`shotCount must be an integer within [1, ${config.maxShots}], got ${shotCount}`);
  }

  const specs: ShotSpec[] = [];
  const failures: ShotFailure[] = [];

  for (let index = 0; index < shotCount; index++) {
    const override = overrides[index];
    try {
      const definition = getPreset(registry, override?.preset ?? config.presetOrder[index % config.presetOrder.length]);
      const preset = definition.tag;
      const ranges = config.ranges[preset];

      let params: ShotParameters | undefined;
      let diverse = false;
      for (let attempt = 0; attempt < config.maxDiversityAttempts; attempt++) {
        const rng = createRandom(fnv1a(shotSeedKey(location, index, attempt)));
        params = applyOverride(sampleParameters(rng, ranges, location, durationSec), override);
        const candidate = params;
        if (specs.every((s) => parameterDistance(s.params, candidate) > config.diversityThreshold)) {
          diverse = true;
          break;
        }
      }
      if (!params) throw new InvalidParameterError('maxDiversityAttempts must be >= 1');

      const warnings = validateShotParameters(params, config);
      if (!diverse) {
        warnings.push(
          `Diversity threshold ${config.diversityThreshold} not met after ${config.maxDiversityAttempts} attempts`,
        );
      }

      const number = String(index + 1).padStart(2, '0');
      specs.push({
        index,
        id: `shot-${number}-${preset}`,
        title: `${definition.title} #${number}`,
        preset,
        params,
        sampleCount: sampleCountFor(params.durationSec, config.frameRate, config.minSampleCount),
        warnings,
      });
    } catch (err) {
      console.warn(`[ShotPlanner] Shot ${index + 1} skipped: ${errorMessage(err)}`);
      failures.push(toFailure(index, err));
    }
  }

  return { specs, failures };
}

// ─── 生成 ────────────────────────────────────────────────

/** 为一个已选定的镜头生成关键帧，得到 ShotPlan（纯函数） */
export function buildShotPlan(spec: ShotSpec, ctx: PlannerContext): ShotPlan {
  const keyframes = generatePath({
    registry: ctx.registry,
    preset: spec.preset,
    params: spec.params,
    sampleCount: spec.sampleCount,
    terrainClearanceM: ctx.config.terrainClearanceM,
  });

  return {
    id: spec.id,
    index: spec.index,
    title: spec.title,
    preset: spec.preset,
    params: spec.params,
    keyframes,
    metadata: {
      source: 'generated',
      warnings: [...spec.warnings],
    },
  };
}

/**
 * 规划整个批次：选择 → 逐镜头生成。
 * shouldCancel 在镜头之间检查；已生成的镜头保留。
 */
export function planShots(
  args: PlanRequest & PlannerContext & { shouldCancel?: () => boolean },
): PlanningReport {
  const { config, registry, shouldCancel } = args;
  const { specs, failures } = selectShotSpecs(args);
  const plans: ShotPlan[] = [];
  let cancelled = false;

  for (const spec of specs) {
    if (shouldCancel?.()) {
      cancelled = true;
      break;
    }
    try {
      plans.push(buildShotPlan(spec, { config, registry }));
    } catch (err) {
      console.warn(`[ShotPlanner] ${spec.id} failed: ${errorMessage(err)}`);
      failures.push(toFailure(spec.index, err, spec.id));
    }
  }

  failures.sort((a, b) => a.index - b.index);
  console.log(
    `[ShotPlanner] Planned ${plans.length}/${args.shotCount} shots at (${args.location.lat}, ${args.location.lng})` +
      (cancelled ? ' (cancelled)' : ''),
  );

  return { plans, failures, cancelled };
}
