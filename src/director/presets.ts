/**
 * presets: 运镜预设注册表
 *
 * 每个预设是归一化进度 s ∈ [0,1]（已过速度曲线）到机位姿态的参数化函数。
 * 注册表在启动时构建一次并冻结，显式传给 ShotPlanner，不在运行期修改。
 */

import type { Easing } from '../lib/easing';
import { lerp } from '../lib/easing';
import { DegenerateGeometryError, UnsupportedPresetError } from '../lib/errors';
import {
  LocalTangentFrame,
  bearingDeg,
  destinationPoint,
  haversineM,
  normalizeHeading,
  toDeg,
  toRad,
  type LatLng,
} from '../lib/geo';
import type { PresetTag, ShotParameters } from '../models/shot';
import { PRESET_TAGS, isPresetTag } from '../models/shot';

// ─── 类型 ────────────────────────────────────────────────

/** 单个采样点的姿态（高度钳制、航向归一化由生成器统一处理） */
export type PresetPose = {
  lat: number;
  lng: number;
  altM: number;
  headingDeg: number;
  tiltDeg: number;
  rollDeg: number;
};

export type PoseAt = (s: number) => PresetPose;

export type Range = readonly [min: number, max: number];

/** 规划器为该预设采样参数时使用的区间 */
export type ParameterRanges = {
  radiusM: Range;
  /** 起始高度 */
  altitudeM: Range;
  /** 结束高度 - 起始高度 */
  altitudeDeltaM: Range;
  /** 方位扫过角度（方向由随机数决定） */
  azimuthSweepDeg: Range;
  tiltDeg: Range;
  tiltDeltaDeg: Range;
  easings: readonly Easing[];
};

export type PresetDefinition = {
  tag: PresetTag;
  title: string;
  description: string;
  /** 半径为 0 时能否退化为静止悬停 */
  hoverTolerant: boolean;
  defaultRanges: ParameterRanges;
  /** 校验几何并返回采样函数；无法容忍的退化输入在此抛出 */
  prepare: (params: ShotParameters) => PoseAt;
};

export type PresetRegistry = Readonly<Record<PresetTag, Readonly<PresetDefinition>>>;

// ─── 几何小工具 ──────────────────────────────────────────

const MIN_SEPARATION_M = 1e-6;
const FLYTHROUGH_WEAVE_RATIO = 0.15;

const azimuthAt = (p: ShotParameters, s: number) => lerp(p.azimuthStartDeg, p.azimuthEndDeg, s);
const altitudeAt = (p: ShotParameters, s: number) => lerp(p.altitudeStartM, p.altitudeEndM, s);
const tiltAt = (p: ShotParameters, s: number) => lerp(p.tiltStartDeg, p.tiltEndDeg, s);

/** 指向中心的航向；与中心重合时退回 fallback */
function headingToCenter(pos: LatLng, center: LatLng, fallback: number): number {
  if (haversineM(pos, center) < MIN_SEPARATION_M) return fallback;
  return bearingDeg(pos, center);
}

/** 中心点沿方位 azimuth 距离 distance 处、带指向中心航向的姿态 */
function ringPose(p: ShotParameters, azimuth: number, distance: number, altM: number, tiltDeg: number): PresetPose {
  const pos = destinationPoint(p.center, azimuth, distance);
  return {
    ...pos,
    altM,
    headingDeg: headingToCenter(pos, p.center, azimuth + 180),
    tiltDeg,
    rollDeg: 0,
  };
}

type Vec2 = { east: number; north: number };

const ringPoint = (azimuth: number, distance: number): Vec2 => ({
  east: distance * Math.sin(toRad(azimuth)),
  north: distance * Math.cos(toRad(azimuth)),
});

const headingOf = (v: Vec2) => normalizeHeading(toDeg(Math.atan2(v.east, v.north)));

function assertNonCoincident(tag: PresetTag, a: Vec2, b: Vec2): void {
  if (Math.hypot(b.east - a.east, b.north - a.north) < MIN_SEPARATION_M) {
    throw new DegenerateGeometryError(
      `Preset "${tag}" needs distinct start and end points (radius > 0 and a non-zero azimuth span)`,
    );
  }
}

// ─── 预设定义 ────────────────────────────────────────────

const orbit: PresetDefinition = {
  tag: 'orbit',
  title: 'Orbit',
  description: 'Circles the target at a fixed radius, always looking at it.',
  hoverTolerant: true,
  defaultRanges: {
    radiusM: [60, 120],
    altitudeM: [40, 100],
    altitudeDeltaM: [0, 0],
    azimuthSweepDeg: [20, 40],
    tiltDeg: [55, 75],
    tiltDeltaDeg: [0, 0],
    easings: ['smoothstep', 'sine'],
  },
  prepare: (p) => (s) => ringPose(p, azimuthAt(p, s), p.radiusM, altitudeAt(p, s), tiltAt(p, s)),
};

const flyby: PresetDefinition = {
  tag: 'flyby',
  title: 'Flyby',
  description: 'Straight pass along the chord between two points on the radius, looking ahead.',
  hoverTolerant: false,
  defaultRanges: {
    radiusM: [300, 500],
    altitudeM: [150, 250],
    altitudeDeltaM: [0, 0],
    azimuthSweepDeg: [60, 100],
    tiltDeg: [65, 80],
    tiltDeltaDeg: [0, 0],
    easings: ['smoothstep', 'smootherstep'],
  },
  prepare: (p) => {
    const a = ringPoint(p.azimuthStartDeg, p.radiusM);
    const b = ringPoint(p.azimuthEndDeg, p.radiusM);
    assertNonCoincident('flyby', a, b);

    const frame = new LocalTangentFrame({ ...p.center, altM: 0 });
    const heading = headingOf({ east: b.east - a.east, north: b.north - a.north });

    return (s) => {
      const pos = frame.toGeodetic({
        east: lerp(a.east, b.east, s),
        north: lerp(a.north, b.north, s),
        up: 0,
      });
      return {
        lat: pos.lat,
        lng: pos.lng,
        altM: altitudeAt(p, s),
        headingDeg: heading,
        tiltDeg: tiltAt(p, s),
        rollDeg: 0,
      };
    };
  },
};

const flythrough: PresetDefinition = {
  tag: 'flythrough',
  title: 'Flythrough',
  description: 'Low corridor run entering on one side of the target and exiting on the other with an S-weave.',
  hoverTolerant: false,
  defaultRanges: {
    radiusM: [150, 300],
    altitudeM: [40, 80],
    altitudeDeltaM: [-20, 0],
    azimuthSweepDeg: [150, 210],
    tiltDeg: [75, 85],
    tiltDeltaDeg: [0, 0],
    easings: ['smoothstep', 'sine'],
  },
  prepare: (p) => {
    const a = ringPoint(p.azimuthStartDeg, p.radiusM);
    const b = ringPoint(p.azimuthEndDeg, p.radiusM);
    assertNonCoincident('flythrough', a, b);

    const frame = new LocalTangentFrame({ ...p.center, altM: 0 });
    const chord = { east: b.east - a.east, north: b.north - a.north };
    const chordLen = Math.hypot(chord.east, chord.north);
    const perp = { east: -chord.north / chordLen, north: chord.east / chordLen };
    const weave = FLYTHROUGH_WEAVE_RATIO * p.radiusM;

    // quadratic Bezier through the centre (control point at origin) plus a lateral sine weave
    return (s) => {
      const w = weave * Math.sin(2 * Math.PI * s);
      const dw = weave * 2 * Math.PI * Math.cos(2 * Math.PI * s);
      const k0 = (1 - s) * (1 - s);
      const k1 = s * s;
      const point = {
        east: k0 * a.east + k1 * b.east + w * perp.east,
        north: k0 * a.north + k1 * b.north + w * perp.north,
      };
      const tangent = {
        east: -2 * (1 - s) * a.east + 2 * s * b.east + dw * perp.east,
        north: -2 * (1 - s) * a.north + 2 * s * b.north + dw * perp.north,
      };
      const heading = Math.hypot(tangent.east, tangent.north) < MIN_SEPARATION_M ? headingOf(chord) : headingOf(tangent);
      const pos = frame.toGeodetic({ ...point, up: 0 });
      return {
        lat: pos.lat,
        lng: pos.lng,
        altM: altitudeAt(p, s),
        headingDeg: heading,
        tiltDeg: tiltAt(p, s),
        rollDeg: 0,
      };
    };
  },
};

const descent: PresetDefinition = {
  tag: 'descent',
  title: 'Descent',
  description: 'Drifts around the target while losing altitude monotonically.',
  hoverTolerant: true,
  defaultRanges: {
    radiusM: [200, 400],
    altitudeM: [250, 400],
    altitudeDeltaM: [-200, -120],
    azimuthSweepDeg: [10, 30],
    tiltDeg: [50, 65],
    tiltDeltaDeg: [0, 10],
    easings: ['smoothstep', 'smootherstep', 'sine'],
  },
  prepare: (p) => {
    const hi = Math.max(p.altitudeStartM, p.altitudeEndM);
    const lo = Math.min(p.altitudeStartM, p.altitudeEndM);
    return (s) => ringPose(p, azimuthAt(p, s), p.radiusM, lerp(hi, lo, s), tiltAt(p, s));
  },
};

const ascent: PresetDefinition = {
  tag: 'ascent',
  title: 'Ascent',
  description: 'Drifts around the target while gaining altitude monotonically.',
  hoverTolerant: true,
  defaultRanges: {
    radiusM: [150, 300],
    altitudeM: [60, 120],
    altitudeDeltaM: [120, 220],
    azimuthSweepDeg: [10, 30],
    tiltDeg: [60, 70],
    tiltDeltaDeg: [-15, -5],
    easings: ['smoothstep', 'smootherstep', 'sine'],
  },
  prepare: (p) => {
    const hi = Math.max(p.altitudeStartM, p.altitudeEndM);
    const lo = Math.min(p.altitudeStartM, p.altitudeEndM);
    return (s) => ringPose(p, azimuthAt(p, s), p.radiusM, lerp(lo, hi, s), tiltAt(p, s));
  },
};

const pan: PresetDefinition = {
  tag: 'pan',
  title: 'Pan',
  description: 'Camera holds position and sweeps its heading across the target.',
  hoverTolerant: true,
  defaultRanges: {
    radiusM: [100, 250],
    altitudeM: [60, 110],
    altitudeDeltaM: [0, 0],
    azimuthSweepDeg: [30, 90],
    tiltDeg: [70, 85],
    tiltDeltaDeg: [0, 0],
    easings: ['smoothstep', 'sine'],
  },
  prepare: (p) => {
    const pos = destinationPoint(p.center, p.azimuthStartDeg, p.radiusM);
    const base = headingToCenter(pos, p.center, p.azimuthStartDeg + 180);
    const span = p.azimuthEndDeg - p.azimuthStartDeg;
    return (s) => ({
      ...pos,
      altM: p.altitudeStartM,
      headingDeg: base - span / 2 + span * s,
      tiltDeg: tiltAt(p, s),
      rollDeg: 0,
    });
  },
};

const reveal: PresetDefinition = {
  tag: 'reveal',
  title: 'Reveal',
  description: 'Pulls back and climbs away from the target, widening the frame.',
  hoverTolerant: true,
  defaultRanges: {
    radiusM: [200, 400],
    altitudeM: [50, 90],
    altitudeDeltaM: [60, 150],
    azimuthSweepDeg: [0, 20],
    tiltDeg: [20, 35],
    tiltDeltaDeg: [30, 45],
    easings: ['smootherstep', 'sine'],
  },
  prepare: (p) => (s) =>
    ringPose(p, azimuthAt(p, s), lerp(0.35 * p.radiusM, p.radiusM, s), altitudeAt(p, s), tiltAt(p, s)),
};

const tiltReveal: PresetDefinition = {
  tag: 'tiltReveal',
  title: 'Tilt Reveal',
  description: 'Fixed position; the camera tilts up from the ground to the target.',
  hoverTolerant: true,
  defaultRanges: {
    radiusM: [150, 300],
    altitudeM: [60, 110],
    altitudeDeltaM: [0, 0],
    azimuthSweepDeg: [0, 0],
    tiltDeg: [5, 15],
    tiltDeltaDeg: [55, 70],
    easings: ['smoothstep', 'smootherstep'],
  },
  prepare: (p) => {
    const fixed = ringPose(p, p.azimuthStartDeg, p.radiusM, p.altitudeStartM, p.tiltStartDeg);
    return (s) => ({ ...fixed, tiltDeg: tiltAt(p, s) });
  },
};

const establishing: PresetDefinition = {
  tag: 'establishing',
  title: 'Establishing',
  description: 'High, wide and slow push-in that sets up the location.',
  hoverTolerant: true,
  defaultRanges: {
    radiusM: [800, 1500],
    altitudeM: [300, 500],
    altitudeDeltaM: [-80, -20],
    azimuthSweepDeg: [5, 15],
    tiltDeg: [60, 72],
    tiltDeltaDeg: [0, 5],
    easings: ['smootherstep', 'sine'],
  },
  prepare: (p) => (s) =>
    ringPose(p, azimuthAt(p, s), lerp(p.radiusM, 0.7 * p.radiusM, s), altitudeAt(p, s), tiltAt(p, s)),
};

const crane: PresetDefinition = {
  tag: 'crane',
  title: 'Crane',
  description: 'Rises close to the target with a slight approach while tilting down onto it.',
  hoverTolerant: true,
  defaultRanges: {
    radiusM: [80, 160],
    altitudeM: [35, 60],
    altitudeDeltaM: [60, 100],
    azimuthSweepDeg: [0, 10],
    tiltDeg: [80, 88],
    tiltDeltaDeg: [-25, -10],
    easings: ['smoothstep', 'smootherstep'],
  },
  prepare: (p) => (s) =>
    ringPose(p, azimuthAt(p, s), lerp(p.radiusM, 0.8 * p.radiusM, s), altitudeAt(p, s), tiltAt(p, s)),
};

// ─── 注册表 ──────────────────────────────────────────────

export function createPresetRegistry(): PresetRegistry {
  const table: Record<PresetTag, PresetDefinition> = {
    orbit,
    flyby,
    flythrough,
    descent,
    ascent,
    pan,
    reveal,
    tiltReveal,
    establishing,
    crane,
  };
  for (const tag of PRESET_TAGS) Object.freeze(table[tag]);
  return Object.freeze(table);
}

export function getPreset(registry: PresetRegistry, tag: string): Readonly<PresetDefinition> {
  if (!isPresetTag(tag)) throw new UnsupportedPresetError(tag);
  return registry[tag];
}
