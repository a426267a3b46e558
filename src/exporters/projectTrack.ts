/**
 * Project-track codec (Earth Studio .esp JSON).
 *
 * The camera lives in scenes[0].attributes as a cameraGroup holding
 * cameraPositionGroup → position → longitude / latitude / altitude and
 * cameraRotationGroup → rotationX / rotationY / rotationZ. Every keyframe
 * stores a relative value in [0, 1] and a time relative to the scene duration.
 *
 * Import validates the document and produces a ShotPlan plus the untouched
 * source document; exporting with that source rewrites only keyframe times and
 * values, so every other field survives a round trip.
 *
 * A 3D camera export (per-frame ECEF `cameraFrames` instead of keyframe
 * tracks) is imported too: frames are subsampled to a keyframe budget and the
 * camera is aimed at the target. It has no source document to write back into.
 */
import { z } from 'zod';
import { ExportFormatError, TrackParseError, errorMessage } from '../lib/errors';
import { bearingDeg, ecefToGeodetic, haversineM, normalizeHeading, toDeg, type LatLng } from '../lib/geo';
import type { CameraKeyframe, KeyframeInterpolation } from '../models/keyframe';
import type { ShotParameters, ShotPlan } from '../models/shot';

export const SUPPORTED_MODEL_VERSIONS = [15, 16] as const;
export const DEFAULT_MODEL_VERSION = 16;
export const DEFAULT_TRANSITION = 'linear';

const MAX_ALTITUDE_SPAN_M = 65_117_481;
const RELATIVE_TOLERANCE = 1e-12;

export const DEFAULT_CAMERA_EXPORT_FPS = 24;
export const DEFAULT_MAX_IMPORT_KEYFRAMES = 25;

// plausible distance from the Earth's centre for a camera position, in metres
const ECEF_MIN_M = 5_000_000;
const ECEF_MAX_M = 8_000_000;

// ── Track layout and relative encodings ──

type TrackName = 'longitude' | 'latitude' | 'altitude' | 'rotationX' | 'rotationY' | 'rotationZ';

interface TrackCodec {
    path: readonly string[];
    read: (kf: CameraKeyframe) => number;
    encode: (value: number) => number;
    decode: (relative: number) => number;
}

const TRACKS: Record<TrackName, TrackCodec> = {
    longitude: {
        path: ['cameraGroup', 'cameraPositionGroup', 'position', 'longitude'],
        read: (kf) => kf.lng,
        encode: (v) => (v + 180) / 360,
        decode: (r) => r * 360 - 180,
    },
    latitude: {
        path: ['cameraGroup', 'cameraPositionGroup', 'position', 'latitude'],
        read: (kf) => kf.lat,
        encode: (v) => (v + 89.9999) / 179.9998,
        decode: (r) => r * 179.9998 - 89.9999,
    },
    altitude: {
        path: ['cameraGroup', 'cameraPositionGroup', 'position', 'altitude'],
        read: (kf) => kf.altM,
        encode: (v) => (v - 1) / MAX_ALTITUDE_SPAN_M,
        decode: (r) => r * MAX_ALTITUDE_SPAN_M + 1,
    },
    rotationX: {
        path: ['cameraGroup', 'cameraRotationGroup', 'rotationX'],
        read: (kf) => kf.headingDeg,
        encode: (v) => v / 360,
        decode: (r) => normalizeHeading(r * 360),
    },
    rotationY: {
        path: ['cameraGroup', 'cameraRotationGroup', 'rotationY'],
        read: (kf) => kf.tiltDeg,
        encode: (v) => v / 180,
        decode: (r) => r * 180,
    },
    rotationZ: {
        path: ['cameraGroup', 'cameraRotationGroup', 'rotationZ'],
        read: (kf) => kf.rollDeg,
        encode: (v) => (v + 180) / 360,
        decode: (r) => r * 360 - 180,
    },
};

const TRACK_NAMES: readonly TrackName[] = ['longitude', 'latitude', 'altitude', 'rotationX', 'rotationY', 'rotationZ'];

// ── Public types ──

/** The document as read from disk; only keyframe times and values are ever rewritten. */
export interface ProjectTrackSource {
    readonly document: Record<string, unknown>;
    readonly modelVersion: number;
}

export interface TrackPoint {
    name: string;
    lat: number;
    lng: number;
    altM: number;
}

export interface ProjectTrackMeta {
    name: string;
    /** `project`: keyframed .esp; `camera-export`: per-frame 3D camera export */
    sourceKind: 'project' | 'camera-export';
    /** Absent for camera exports, which carry no model version */
    modelVersion?: number;
    frameRate: number;
    durationFrames: number;
    keyframeCount: number;
    /** Camera exports only: position unit detected (1 = metres, 100 = hectometres) */
    ecefScale?: number;
    trackPoints: TrackPoint[];
    warnings: string[];
}

export interface ImportedProjectTrack {
    plan: ShotPlan;
    /** Undefined for camera exports; re-exporting then builds a fresh document */
    track?: ProjectTrackSource;
    meta: ProjectTrackMeta;
}

export interface ProjectTrackImportOptions {
    /** Shot id for the imported plan; defaults to a slug of the project name. */
    id?: string;
    /** Keyframes below this altitude are kept but reported as warnings. */
    terrainClearanceM?: number;
    /** Camera exports: frame rate of `cameraFrames` (they carry none). */
    frameRate?: number;
    /** Camera exports: at most this many keyframes are kept. */
    maxKeyframes?: number;
    /** Camera exports: point to aim at; defaults to the first track point, then the path centroid. */
    target?: LatLng;
}

export interface ProjectTrackExportOptions {
    /** Imported document to write back into. Its settings win over the fields below. */
    source?: ProjectTrackSource;
    frameRate: number;
    width: number;
    height: number;
    modelVersion?: number;
}

// ── Schema ──

const transitionSchema = z.object({ type: z.string() });

const keyframeSchema = z.object({
    time: z.number().finite(),
    value: z.number().finite(),
    transitionIn: transitionSchema.optional(),
    transitionOut: transitionSchema.optional(),
});

type KeyframeNode = z.infer<typeof keyframeSchema>;

interface AttributeNode {
    type: string;
    keyframes?: KeyframeNode[];
    attributes?: AttributeNode[];
}

const attributeSchema: z.ZodType<AttributeNode> = z.lazy(() =>
    z.object({
        type: z.string(),
        keyframes: z.array(keyframeSchema).optional(),
        attributes: z.array(attributeSchema).optional(),
    }),
);

const documentSchema = z.object({
    modelVersion: z.number().int(),
    settings: z.object({
        name: z.string().optional(),
        frameRate: z.number().positive(),
        duration: z.number().positive(),
    }),
    scenes: z
        .array(
            z.object({
                attributes: z.array(attributeSchema),
            }),
        )
        .min(1),
    trackPoints: z.array(z.unknown()).optional(),
});

const trackPointSchema = z.object({
    name: z.string().optional(),
    coordinate: z.object({
        position: z.object({
            attributes: z
                .array(z.object({ value: z.object({ relative: z.number().finite() }) }))
                .min(3),
        }),
    }),
});

const vectorSchema = z.object({ x: z.number().finite(), y: z.number().finite(), z: z.number().finite() });

const cameraExportSchema = z.object({
    cameraFrames: z.array(z.object({ position: vectorSchema })).min(1),
    trackPoints: z.array(z.unknown()).optional(),
});

// ── Import ──

function findAttribute(nodes: readonly AttributeNode[] | undefined, path: readonly string[]): AttributeNode | undefined {
    let current: AttributeNode | undefined;
    let level = nodes;
    for (const type of path) {
        current = level?.find((n) => n.type === type);
        if (!current) return undefined;
        level = current.attributes;
    }
    return current;
}

function decodeTrackPoint(raw: unknown, index: number): TrackPoint | undefined {
    const parsed = trackPointSchema.safeParse(raw);
    if (!parsed.success) return undefined;
    const [lng, lat, alt] = parsed.data.coordinate.position.attributes;
    if (![lng, lat, alt].every((a) => isRelative(a.value.relative))) return undefined;
    return {
        name: parsed.data.name ?? `trackPoint ${index + 1}`,
        lng: TRACKS.longitude.decode(lng.value.relative),
        lat: TRACKS.latitude.decode(lat.value.relative),
        altM: TRACKS.altitude.decode(alt.value.relative),
    };
}

function isRelative(r: number): boolean {
    return r >= -RELATIVE_TOLERANCE && r <= 1 + RELATIVE_TOLERANCE;
}

function slugify(name: string): string {
    return name
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
}

function deriveParameters(keyframes: readonly CameraKeyframe[], center: LatLng, durationSec: number): ShotParameters {
    const first = keyframes[0];
    const last = keyframes[keyframes.length - 1];
    const distances = keyframes.map((kf) => haversineM(center, kf));
    const azimuthOf = (kf: CameraKeyframe, d: number) => (d > 0 ? bearingDeg(center, kf) : normalizeHeading(kf.headingDeg + 180));
    return {
        center,
        durationSec,
        radiusM: distances.reduce((a, b) => a + b, 0) / distances.length,
        altitudeStartM: first.altM,
        altitudeEndM: last.altM,
        azimuthStartDeg: azimuthOf(first, distances[0]),
        azimuthEndDeg: azimuthOf(last, distances[distances.length - 1]),
        tiltStartDeg: first.tiltDeg,
        tiltEndDeg: last.tiltDeg,
        easing: 'smoothstep',
    };
}

function readTrackPoints(raw: readonly unknown[] | undefined, warnings: string[]): TrackPoint[] {
    const trackPoints: TrackPoint[] = [];
    (raw ?? []).forEach((rawPoint, i) => {
        const point = decodeTrackPoint(rawPoint, i);
        if (point) trackPoints.push(point);
        else warnings.push(`trackPoints[${i}] is not a readable coordinate and was ignored`);
    });
    return trackPoints;
}

function centroid(keyframes: readonly CameraKeyframe[]): LatLng {
    return {
        lat: keyframes.reduce((sum, kf) => sum + kf.lat, 0) / keyframes.length,
        lng: keyframes.reduce((sum, kf) => sum + kf.lng, 0) / keyframes.length,
    };
}

function warnBelowClearance(keyframes: readonly CameraKeyframe[], clearance: number | undefined, warnings: string[]): void {
    if (clearance === undefined) return;
    const low = keyframes.filter((kf) => kf.altM < clearance).length;
    if (low > 0) warnings.push(`${low} keyframe(s) below terrain clearance ${clearance} m`);
}

function importedPlan(args: {
    name: string;
    id: string | undefined;
    fallbackId: string;
    keyframes: CameraKeyframe[];
    center: LatLng;
    durationSec: number;
    warnings: readonly string[];
}): ShotPlan {
    return {
        id: args.id ?? (slugify(args.name) || args.fallbackId),
        index: 0,
        title: args.name,
        preset: 'imported',
        params: deriveParameters(args.keyframes, args.center, args.durationSec),
        keyframes: args.keyframes,
        metadata: { source: 'imported', warnings: [...args.warnings] },
    };
}

export function importProjectTrack(text: string, options: ProjectTrackImportOptions = {}): ImportedProjectTrack {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        throw new TrackParseError(`Project track is not valid JSON: ${errorMessage(err)}`);
    }

    if (isRecord(raw) && 'cameraFrames' in raw) return importCameraExport(raw, options);

    const parsed = documentSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new TrackParseError(`Invalid project track at ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
    const doc = parsed.data;

    if (!SUPPORTED_MODEL_VERSIONS.some((v) => v === doc.modelVersion)) {
        throw new TrackParseError(
            `Unsupported modelVersion ${doc.modelVersion} (supported: ${SUPPORTED_MODEL_VERSIONS.join(', ')})`,
        );
    }

    const sceneAttributes = doc.scenes[0].attributes;
    const tracks = new Map<TrackName, KeyframeNode[]>();
    for (const name of TRACK_NAMES) {
        const node = findAttribute(sceneAttributes, TRACKS[name].path);
        if (!node?.keyframes) {
            throw new TrackParseError(`Missing camera track: ${TRACKS[name].path.join(' > ')}`);
        }
        tracks.set(name, node.keyframes);
    }

    const keyOf = (name: TrackName): KeyframeNode[] => tracks.get(name) ?? [];
    const reference = keyOf('longitude');
    if (reference.length === 0) {
        throw new TrackParseError('Camera tracks contain no keyframes');
    }
    for (const name of TRACK_NAMES) {
        const kfs = keyOf(name);
        if (kfs.length !== reference.length) {
            throw new TrackParseError(`Track ${name} has ${kfs.length} keyframes, longitude has ${reference.length}`);
        }
        kfs.forEach((kf, i) => {
            if (Math.abs(kf.time - reference[i].time) > 1e-9) {
                throw new TrackParseError(`Track ${name} keyframe ${i} is misaligned (time ${kf.time} vs ${reference[i].time})`);
            }
            if (!isRelative(kf.value)) {
                throw new TrackParseError(`Track ${name} keyframe ${i} has value ${kf.value} outside [0, 1]`);
            }
        });
    }
    for (let i = 1; i < reference.length; i++) {
        if (!(reference[i].time > reference[i - 1].time)) {
            throw new TrackParseError(`Keyframe times must increase (index ${i})`);
        }
    }

    const { frameRate, duration: durationFrames } = doc.settings;
    const durationSec = durationFrames / frameRate;
    const value = (name: TrackName, i: number) => TRACKS[name].decode(keyOf(name)[i].value);

    const keyframes: CameraKeyframe[] = reference.map((ref, i) => {
        const interpolation: KeyframeInterpolation = {
            in: ref.transitionIn?.type ?? DEFAULT_TRANSITION,
            out: ref.transitionOut?.type ?? DEFAULT_TRANSITION,
        };
        const kf: CameraKeyframe = {
            t: ref.time * durationSec,
            lat: value('latitude', i),
            lng: value('longitude', i),
            altM: value('altitude', i),
            headingDeg: value('rotationX', i),
            tiltDeg: value('rotationY', i),
            rollDeg: value('rotationZ', i),
            interpolation,
        };
        if (Math.abs(kf.lat) > 90 + 1e-9 || Math.abs(kf.lng) > 180 + 1e-9) {
            throw new TrackParseError(`Keyframe ${i} decodes to an impossible position (${kf.lat}, ${kf.lng})`);
        }
        return kf;
    });

    const warnings: string[] = [];
    const trackPoints = readTrackPoints(doc.trackPoints, warnings);
    const center: LatLng = trackPoints[0] ? { lat: trackPoints[0].lat, lng: trackPoints[0].lng } : centroid(keyframes);
    warnBelowClearance(keyframes, options.terrainClearanceM, warnings);

    const name = doc.settings.name?.trim() || 'Imported track';
    return {
        plan: importedPlan({ name, id: options.id, fallbackId: 'imported-track', keyframes, center, durationSec, warnings }),
        track: { document: toRecord(raw), modelVersion: doc.modelVersion },
        meta: {
            name,
            sourceKind: 'project',
            modelVersion: doc.modelVersion,
            frameRate,
            durationFrames,
            keyframeCount: keyframes.length,
            trackPoints,
            warnings,
        },
    };
}

// ── 3D camera export ──

/** 1 when positions are metres, 100 when they are stored scaled down by 100; undefined otherwise */
export function detectEcefScale(p: { x: number; y: number; z: number }): number | undefined {
    const magnitude = Math.hypot(p.x, p.y, p.z);
    if (magnitude > ECEF_MIN_M && magnitude < ECEF_MAX_M) return 1;
    if (magnitude * 100 > ECEF_MIN_M && magnitude * 100 < ECEF_MAX_M) return 100;
    return undefined;
}

/** Evenly spread frame indices, first and last included. */
export function subsampleIndices(total: number, maxKeyframes: number): number[] {
    if (total <= maxKeyframes) return Array.from({ length: total }, (_, i) => i);
    const step = (total - 1) / (maxKeyframes - 1);
    return Array.from({ length: maxKeyframes }, (_, i) => Math.round(step * i));
}

/** Tilt that points the camera at a ground target: 0 straight down, 90 at the horizon. */
function lookAtTiltDeg(camera: LatLng & { altM: number }, target: LatLng): number {
    return toDeg(Math.atan2(haversineM(camera, target), Math.max(camera.altM, 1)));
}

function importCameraExport(raw: Record<string, unknown>, options: ProjectTrackImportOptions): ImportedProjectTrack {
    const parsed = cameraExportSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new TrackParseError(`Invalid camera export at ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
    const frameRate = options.frameRate ?? DEFAULT_CAMERA_EXPORT_FPS;
    const maxKeyframes = options.maxKeyframes ?? DEFAULT_MAX_IMPORT_KEYFRAMES;
    if (!(frameRate > 0) || !Number.isInteger(maxKeyframes) || maxKeyframes < 2) {
        throw new TrackParseError(`Camera export needs frameRate > 0 and maxKeyframes >= 2 (got ${frameRate}, ${maxKeyframes})`);
    }

    const frames = parsed.data.cameraFrames;
    const scale = detectEcefScale(frames[0].position);
    if (scale === undefined) {
        throw new TrackParseError('cameraFrames positions are not Earth-centred coordinates in metres or hundreds of metres');
    }
    const positions = frames.map(({ position: p }) => ecefToGeodetic({ x: p.x * scale, y: p.y * scale, z: p.z * scale }));

    const warnings: string[] = [];
    const trackPoints = readTrackPoints(parsed.data.trackPoints, warnings);
    const target: LatLng =
        options.target ??
        (trackPoints[0]
            ? { lat: trackPoints[0].lat, lng: trackPoints[0].lng }
            : {
                  lat: positions.reduce((sum, p) => sum + p.lat, 0) / positions.length,
                  lng: positions.reduce((sum, p) => sum + p.lng, 0) / positions.length,
              });

    const keyframes: CameraKeyframe[] = subsampleIndices(positions.length, maxKeyframes).map((index) => {
        const p = positions[index];
        return {
            t: index / frameRate,
            lat: p.lat,
            lng: p.lng,
            altM: p.altM,
            headingDeg: bearingDeg(p, target),
            tiltDeg: lookAtTiltDeg(p, target),
            rollDeg: 0,
        };
    });
    warnBelowClearance(keyframes, options.terrainClearanceM, warnings);

    const name = 'Camera export';
    const durationSec = frames.length / frameRate;
    return {
        plan: importedPlan({ name, id: options.id, fallbackId: 'camera-export', keyframes, center: target, durationSec, warnings }),
        meta: {
            name,
            sourceKind: 'camera-export',
            frameRate,
            durationFrames: frames.length,
            keyframeCount: keyframes.length,
            ecefScale: scale,
            trackPoints,
            warnings,
        },
    };
}

// ── Export ──

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRecord(value: unknown): Record<string, unknown> {
    if (!isRecord(value)) throw new TrackParseError('Project track must be a JSON object');
    return value;
}

function childAttribute(node: Record<string, unknown>, type: string): Record<string, unknown> | undefined {
    const attributes: unknown = node.attributes;
    if (!Array.isArray(attributes)) return undefined;
    const children: unknown[] = attributes;
    return children.filter(isRecord).find((child) => child.type === type);
}

function resolveTrack(scene: Record<string, unknown>, path: readonly string[]): Record<string, unknown> | undefined {
    let node: Record<string, unknown> | undefined = scene;
    for (const type of path) {
        node = node && childAttribute(node, type);
    }
    return node;
}

function encodeValue(name: TrackName, kf: CameraKeyframe, where: string): number {
    const value = TRACKS[name].read(kf);
    const relative = TRACKS[name].encode(value);
    if (!Number.isFinite(relative) || !isRelative(relative)) {
        throw new ExportFormatError(`${name} ${value} at ${where} is outside the range a project track can store`);
    }
    return relative;
}

function transitionsFor(kf: CameraKeyframe): { transitionIn: { type: string }; transitionOut: { type: string } } {
    return {
        transitionIn: { type: kf.interpolation?.in ?? DEFAULT_TRANSITION },
        transitionOut: { type: kf.interpolation?.out ?? DEFAULT_TRANSITION },
    };
}

function buildDocument(plan: ShotPlan, options: ProjectTrackExportOptions): Record<string, unknown> {
    const { frameRate, width, height } = options;
    if (!(frameRate > 0)) throw new ExportFormatError(`frameRate must be positive, got ${frameRate}`);
    const durationFrames = Math.max(1, Math.round(plan.params.durationSec * frameRate));
    const group = (type: string, attributes: unknown[]) => ({ type, attributes });
    const track = (type: string) => ({ type, keyframes: [] });
    const { center } = plan.params;

    return {
        modelVersion: options.modelVersion ?? DEFAULT_MODEL_VERSION,
        settings: {
            name: plan.title,
            frameRate,
            dimensions: { width, height },
            duration: durationFrames,
            timeFormat: 'frames',
        },
        scenes: [
            {
                duration: durationFrames,
                attributes: [
                    group('cameraGroup', [
                        group('cameraPositionGroup', [
                            group('position', [track('longitude'), track('latitude'), track('altitude')]),
                        ]),
                        group('cameraRotationGroup', [track('rotationX'), track('rotationY'), track('rotationZ')]),
                    ]),
                ],
            },
        ],
        trackPoints: [
            {
                name: 'target',
                coordinate: {
                    position: {
                        attributes: [
                            { type: 'longitude', value: { relative: TRACKS.longitude.encode(center.lng) } },
                            { type: 'latitude', value: { relative: TRACKS.latitude.encode(center.lat) } },
                            { type: 'altitude', value: { relative: 0 } },
                        ],
                    },
                },
            },
        ],
    };
}

export function exportProjectTrack(plan: ShotPlan, options: ProjectTrackExportOptions): string {
    if (plan.keyframes.length === 0) {
        throw new ExportFormatError(`Shot ${plan.id} has no keyframes`);
    }

    const doc = options.source ? structuredClone(options.source.document) : buildDocument(plan, options);
    const settings = doc.settings;
    const scenes: unknown = doc.scenes;
    const scene = Array.isArray(scenes) ? toSceneRecord(scenes) : undefined;
    if (!isRecord(settings) || !scene) {
        throw new ExportFormatError('Source project track has no settings or scenes');
    }
    const frameRate = settings.frameRate;
    const currentFrames = settings.duration;
    if (typeof frameRate !== 'number' || !(frameRate > 0) || typeof currentFrames !== 'number') {
        throw new ExportFormatError('Source project track settings lack frameRate or duration');
    }

    // stretch the scene if the plan now runs past its end
    const lastT = plan.keyframes[plan.keyframes.length - 1].t;
    let durationFrames = currentFrames;
    if (lastT > durationFrames / frameRate) {
        durationFrames = Math.ceil(lastT * frameRate);
        settings.duration = durationFrames;
        if (typeof scene.duration === 'number') scene.duration = durationFrames;
    }
    const durationSec = durationFrames / frameRate;

    for (const name of TRACK_NAMES) {
        const node = resolveTrack(scene, TRACKS[name].path);
        if (!node) {
            throw new ExportFormatError(`Source project track has no ${TRACKS[name].path.join(' > ')} track`);
        }
        const existing: unknown = node.keyframes;
        const previous: unknown[] = Array.isArray(existing) ? existing : [];
        node.keyframes = plan.keyframes.map((kf, i) => {
            const base = previous[i];
            const where = `${plan.id}[${i}]`;
            return {
                ...(isRecord(base) ? base : transitionsFor(kf)),
                time: kf.t / durationSec,
                value: encodeValue(name, kf, where),
            };
        });
    }

    return `${JSON.stringify(doc, null, 2)}\n`;
}

function toSceneRecord(scenes: unknown[]): Record<string, unknown> | undefined {
    const first = scenes[0];
    return isRecord(first) ? first : undefined;
}
