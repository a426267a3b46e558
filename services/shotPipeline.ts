/**
 * Shot pipeline: plan → recommend → export → write, one shot at a time.
 *
 * Shared by the HTTP routes and the CLI. Selection happens up front (it is
 * sequential because of the diversity check); each selected shot then becomes
 * one BatchQueue item whose executor builds, classifies, exports and publishes
 * that shot. When the job settles, the batch tour and the summary are written.
 *
 * Run directory layout:
 *   <outputDir>/<runId>/tour/<shotId>.kml, tour/tours.kml
 *   <outputDir>/<runId>/jsx/<shotId>.jsx
 *   <outputDir>/<runId>/esp/<shotId>.esp
 *   <outputDir>/<runId>/metadata/<shotId>.json, summary.json, summary.csv
 */
import { randomUUID } from 'node:crypto';
import path from 'node:path';
import type { AppConfig } from '../lib/config';
import type { BatchQueue } from '../server/batchQueue';
import {
    attachRecommendation,
    buildShotPlan,
    planShots,
    selectShotSpecs,
    type PlanRequest,
    type PlanningReport,
    type PresetRegistry,
    type ShotFailure,
    type ShotSpec,
} from '../src/director';
import {
    buildBatchSummary,
    exportBatchTour,
    exportShotFormats,
    importProjectTrack,
    publishArtifact,
    requestsFor,
    summaryToCsv,
    type BatchSummary,
    type ExportRequest,
    type ImportedProjectTrack,
} from '../src/exporters';
import { ExportFormatError, errorMessage, isShotError } from '../src/lib/errors';
import type { ExportArtifact, ExportFormat } from '../src/models/artifact';
import { EXPORT_FORMATS } from '../src/models/artifact';
import type { ShotPlan } from '../src/models/shot';
import type { BatchJob, BatchJobSnapshot, ExportFailure, ShotTaskResult } from '../types';

export interface PipelineContext {
    config: AppConfig;
    registry: PresetRegistry;
}

export interface BatchRunRequest extends PlanRequest {
    formats?: readonly ExportFormat[];
    runId?: string;
    concurrency?: number;
}

export interface BatchRun {
    job: BatchJob;
    runId: string;
    runDir: string;
    /** Shots rejected during selection; they never become queue items */
    selectionFailures: ShotFailure[];
}

/** e.g. run-20261018-091502-1a2b3c */
export function createRunId(date = new Date()): string {
    const stamp = date.toISOString().replace(/[-:]/g, '').replace('T', '-').slice(0, 15);
    return `run-${stamp}-${randomUUID().slice(0, 6)}`;
}

// ── Plan only ──

/** Plans and classifies a batch in memory; nothing is written. */
export function planAndRecommend(request: PlanRequest, ctx: PipelineContext): PlanningReport {
    const report = planShots({ ...request, config: ctx.config, registry: ctx.registry });
    for (const plan of report.plans) attachRecommendation(plan, ctx.config.platform);
    return report;
}

// ── One shot ──

/** Exports a plan in every requested format and publishes the artifacts that succeeded. */
export async function exportAndPublish(
    plan: ShotPlan,
    requests: readonly ExportRequest[],
    runDir: string,
): Promise<Pick<ShotTaskResult, 'artifacts' | 'export_errors'>> {
    const artifacts: string[] = [];
    const exportErrors: ExportFailure[] = [];

    for (const outcome of exportShotFormats(plan, requests)) {
        if (!outcome.ok) {
            exportErrors.push({ format: outcome.format, kind: outcome.kind, message: outcome.message });
            continue;
        }
        try {
            const written = await publishArtifact(runDir, outcome.artifact);
            artifacts.push(path.relative(runDir, written));
        } catch (err) {
            // a failed write only loses this artifact
            console.warn(`[ShotPipeline] ${plan.id} → ${outcome.artifact.name} write failed: ${errorMessage(err)}`);
            exportErrors.push({
                format: outcome.artifact.format,
                kind: isShotError(err) ? err.kind : 'Unknown',
                message: errorMessage(err),
            });
        }
    }

    return { artifacts, export_errors: exportErrors };
}

export async function runShot(
    spec: ShotSpec,
    ctx: PipelineContext & { runDir: string; requests: readonly ExportRequest[] },
): Promise<{ plan: ShotPlan; result: ShotTaskResult }> {
    const plan = buildShotPlan(spec, ctx);
    const rec = attachRecommendation(plan, ctx.config.platform);
    const written = await exportAndPublish(plan, ctx.requests, ctx.runDir);

    if (ctx.requests.length > 0 && written.artifacts.length === 0) {
        throw new ExportFormatError(
            `Every export failed for ${plan.id}: ${written.export_errors.map((e) => `${e.format}: ${e.message}`).join('; ')}`,
        );
    }

    return {
        plan,
        result: { ...written, platform: rec.platform, confidence: rec.confidence },
    };
}

// ── Batch ──

function itemFailures(snapshot: BatchJobSnapshot): ShotFailure[] {
    return snapshot.items
        .filter((item) => item.status === 'failed')
        .map((item) => ({
            index: item.shot_index,
            shotId: item.shot_id,
            kind: item.error_kind ?? 'Unknown',
            message: item.error ?? '',
        }));
}

/** Writes tours.kml (when tours were requested) and the JSON/CSV summary. */
export async function writeBatchOutputs(args: {
    runId: string;
    runDir: string;
    request: PlanRequest;
    frameRate: number;
    formats: readonly ExportFormat[];
    plans: readonly ShotPlan[];
    failures: readonly ShotFailure[];
}): Promise<BatchSummary> {
    const plans = [...args.plans].sort((a, b) => a.index - b.index);

    if (args.formats.includes('tour') && plans.length > 0) {
        await publishArtifact(args.runDir, exportBatchTour(plans, { documentName: args.runId }));
    }

    const summary = buildBatchSummary({
        runId: args.runId,
        input: {
            location: args.request.location,
            shotCount: args.request.shotCount,
            durationSec: args.request.durationSec,
            frameRate: args.frameRate,
        },
        plans,
        failures: [...args.failures].sort((a, b) => a.index - b.index),
    });

    const summaryArtifacts: ExportArtifact[] = [
        Object.freeze({
            name: 'summary.json',
            format: 'metadata',
            shotId: 'batch',
            mediaType: 'application/json',
            content: `${JSON.stringify(summary, null, 2)}\n`,
        }),
        Object.freeze({
            name: 'summary.csv',
            format: 'metadata',
            shotId: 'batch',
            mediaType: 'text/csv',
            content: summaryToCsv(summary),
        }),
    ];
    for (const artifact of summaryArtifacts) await publishArtifact(args.runDir, artifact);

    return summary;
}

/**
 * Selects shots and queues one item per shot. Throws InvalidParameterError
 * for a batch-level problem (location, shot count, duration).
 */
export function startBatch(request: BatchRunRequest, ctx: PipelineContext & { queue: BatchQueue }): BatchRun {
    const { config, registry, queue } = ctx;
    const formats = [...(request.formats ?? EXPORT_FORMATS)];
    const requests = requestsFor(formats, config);
    const runId = request.runId ?? createRunId();
    const runDir = path.join(config.server.outputDir, runId);

    const { specs, failures } = selectShotSpecs({ ...request, config, registry });
    const specById = new Map(specs.map((s) => [s.id, s]));
    const plans = new Map<string, ShotPlan>();

    const job = queue.createJob({
        runId,
        formats,
        concurrency: request.concurrency ?? config.workerCount,
        items: specs.map((s) => ({ shotId: s.id, shotIndex: s.index, preset: s.preset })),
        executor: async (item) => {
            const spec = specById.get(item.shot_id);
            if (!spec) throw new Error(`No shot spec for ${item.shot_id}`);
            const { plan, result } = await runShot(spec, { config, registry, runDir, requests });
            plans.set(plan.id, plan);
            return result;
        },
        onSettled: async (snapshot) => {
            const summary = await writeBatchOutputs({
                runId,
                runDir,
                request,
                frameRate: config.frameRate,
                formats,
                plans: [...plans.values()],
                failures: [...failures, ...itemFailures(snapshot)],
            });
            console.log(`[ShotPipeline] ${runId}: summary written (${summary.results.length} shots)`);
        },
    });

    console.log(`[ShotPipeline] ${runId}: queued ${specs.length} shots (${failures.length} rejected) → ${runDir}`);
    return { job, runId, runDir, selectionFailures: failures };
}

// ── Track import ──

export interface TrackImportResult {
    imported: ImportedProjectTrack;
    artifacts: ExportArtifact[];
    exportErrors: ExportFailure[];
}

/**
 * Imports a project track, classifies it and re-exports it. The project-track
 * export writes back into the imported document; a 3D camera export has none,
 * so it gets a fresh one.
 */
export function importAndReexport(
    text: string,
    ctx: PipelineContext & { formats?: readonly ExportFormat[]; id?: string },
): TrackImportResult {
    const imported = importProjectTrack(text, {
        id: ctx.id,
        terrainClearanceM: ctx.config.terrainClearanceM,
        frameRate: ctx.config.frameRate,
    });
    attachRecommendation(imported.plan, ctx.config.platform);

    const requests = requestsFor(ctx.formats ?? EXPORT_FORMATS, ctx.config).map((r): ExportRequest =>
        r.format === 'project-track' ? { format: r.format, options: { ...r.options, source: imported.track } } : r,
    );

    const artifacts: ExportArtifact[] = [];
    const exportErrors: ExportFailure[] = [];
    for (const outcome of exportShotFormats(imported.plan, requests)) {
        if (outcome.ok) artifacts.push(outcome.artifact);
        else exportErrors.push({ format: outcome.format, kind: outcome.kind, message: outcome.message });
    }
    return { imported, artifacts, exportErrors };
}

