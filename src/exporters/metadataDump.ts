/**
 * Metadata dump: one JSON record per shot and a batch summary (JSON + CSV)
 * for the downstream overlay / encoding step.
 */
import { computeKinematicProfile, segmentMetrics } from '../director/platformRecommender';
import type { ShotFailure } from '../director/shotPlanner';
import type { LatLng } from '../lib/geo';
import type { CameraKeyframe } from '../models/keyframe';
import type { KinematicProfile, MotionSegment, Platform, ShotParameters, ShotPlan, ShotPreset } from '../models/shot';

export interface ShotMetadataRecord {
    shotId: string;
    title: string;
    preset: ShotPreset;
    source: 'generated' | 'imported';
    params: ShotParameters;
    keyframes: readonly CameraKeyframe[];
    kinematics: KinematicProfile;
    /** One entry per pair of consecutive keyframes */
    segments: MotionSegment[];
    recommendation: { platform: Platform; confidence: number; reasons: string[] } | null;
    warnings: string[];
}

export interface BatchInput {
    location: LatLng;
    shotCount: number;
    durationSec: number;
    frameRate: number;
}

export interface SummaryRow {
    index: number;
    shotId: string;
    title: string;
    preset: ShotPreset;
    platform: Platform | '';
    confidence: number | null;
    keyframeCount: number;
    durationSec: number;
    avgSpeedMps: number;
    maxSpeedMps: number;
    maxVerticalRateMps: number;
    minAltitudeM: number;
    maxAltitudeM: number;
    avgAltitudeM: number;
    avgRadiusM: number;
    warnings: number;
}

export interface BatchSummary {
    runId: string;
    createdAt: string;
    input: BatchInput;
    results: SummaryRow[];
    failures: ShotFailure[];
}

const round2 = (n: number) => Math.round(n * 100) / 100;

export function buildShotMetadata(plan: ShotPlan): ShotMetadataRecord {
    const { metadata } = plan;
    return {
        shotId: plan.id,
        title: plan.title,
        preset: plan.preset,
        source: metadata.source,
        params: plan.params,
        keyframes: plan.keyframes,
        kinematics: metadata.kinematics ?? computeKinematicProfile(plan.keyframes, plan.params.center),
        segments: segmentMetrics(plan.keyframes),
        recommendation:
            metadata.platform !== undefined && metadata.confidence !== undefined
                ? { platform: metadata.platform, confidence: metadata.confidence, reasons: metadata.reasons ?? [] }
                : null,
        warnings: [...metadata.warnings],
    };
}

export function exportShotMetadata(plan: ShotPlan): string {
    return `${JSON.stringify(buildShotMetadata(plan), null, 2)}\n`;
}

function summaryRow(plan: ShotPlan): SummaryRow {
    const k = plan.metadata.kinematics ?? computeKinematicProfile(plan.keyframes, plan.params.center);
    return {
        index: plan.index,
        shotId: plan.id,
        title: plan.title,
        preset: plan.preset,
        platform: plan.metadata.platform ?? '',
        confidence: plan.metadata.confidence ?? null,
        keyframeCount: plan.keyframes.length,
        durationSec: round2(plan.params.durationSec),
        avgSpeedMps: round2(k.avgHorizontalSpeedMps),
        maxSpeedMps: round2(k.maxHorizontalSpeedMps),
        maxVerticalRateMps: round2(k.maxVerticalRateMps),
        minAltitudeM: round2(k.minAltitudeM),
        maxAltitudeM: round2(k.maxAltitudeM),
        avgAltitudeM: round2(k.avgAltitudeM),
        avgRadiusM: round2(k.avgRadiusM),
        warnings: plan.metadata.warnings.length,
    };
}

export function buildBatchSummary(args: {
    runId: string;
    input: BatchInput;
    plans: readonly ShotPlan[];
    failures?: readonly ShotFailure[];
    createdAt?: string;
}): BatchSummary {
    return {
        runId: args.runId,
        createdAt: args.createdAt ?? new Date().toISOString(),
        input: args.input,
        results: [...args.plans].sort((a, b) => a.index - b.index).map(summaryRow),
        failures: [...(args.failures ?? [])],
    };
}

const CSV_COLUMNS: readonly (keyof SummaryRow)[] = [
    'index',
    'shotId',
    'title',
    'preset',
    'platform',
    'confidence',
    'keyframeCount',
    'durationSec',
    'avgSpeedMps',
    'maxSpeedMps',
    'maxVerticalRateMps',
    'minAltitudeM',
    'maxAltitudeM',
    'avgAltitudeM',
    'avgRadiusM',
    'warnings',
];

export function csvField(value: string | number | null): string {
    const text = value === null ? '' : String(value);
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** RFC 4180: CRLF line breaks, header row first. */
export function summaryToCsv(summary: BatchSummary): string {
    const lines = [CSV_COLUMNS.join(',')];
    for (const row of summary.results) {
        lines.push(CSV_COLUMNS.map((col) => csvField(row[col])).join(','));
    }
    return `${lines.join('\r\n')}\r\n`;
}
