/**
 * BatchQueue: In-process concurrent task queue for batch shot generation.
 *
 * Design:
 *   - Jobs are stored in-memory per queue instance (Map<jobId, BatchJobState>)
 *   - Each job has N items (one per shot); up to `concurrency` items run simultaneously
 *   - Cancellation is cooperative: sets a flag, checked between shots
 *   - Progress is queryable at any time via getJobStatus()
 *   - onSettled runs once per worker pass, after the last item finishes
 */

import { randomUUID } from 'node:crypto';
import { ShotError, errorMessage } from '../src/lib/errors';
import type { ExportFormat } from '../src/models/artifact';
import type { ShotPreset } from '../src/models/shot';
import type { BatchJob, BatchJobItem, BatchJobSnapshot, ShotTaskResult } from '../types';

// ── Internal types ──

export type TaskExecutor = (item: BatchJobItem, job: BatchJob) => Promise<ShotTaskResult>;

export type SettledHook = (snapshot: BatchJobSnapshot) => Promise<void>;

interface BatchJobState {
    job: BatchJob;
    items: BatchJobItem[];
    cancelRequested: boolean;
    executor: TaskExecutor;
    onSettled?: SettledHook;
    /** The async worker task for executing this job's items */
    workerPromise?: Promise<void>;
}

export interface BatchQueueOptions {
    /** Upper bound for any job's concurrency */
    maxConcurrency: number;
}

const now = () => new Date().toISOString();

export class BatchQueue {
    private readonly jobs = new Map<string, BatchJobState>();

    constructor(private readonly options: BatchQueueOptions) {}

    /**
     * Create a new batch job with items and start processing.
     */
    createJob(params: {
        jobId?: string;
        runId: string;
        formats: ExportFormat[];
        items: Array<{ shotId: string; shotIndex: number; preset: ShotPreset }>;
        concurrency?: number;
        executor: TaskExecutor;
        onSettled?: SettledHook;
    }): BatchJob {
        const jobId = params.jobId ?? randomUUID();
        const created = now();
        const concurrency = Math.max(1, Math.min(params.concurrency ?? this.options.maxConcurrency, this.options.maxConcurrency));

        const job: BatchJob = {
            id: jobId,
            run_id: params.runId,
            total: params.items.length,
            done: 0,
            succeeded: 0,
            failed: 0,
            status: 'pending',
            created_at: created,
            updated_at: created,
            concurrency,
            formats: [...params.formats],
        };

        const items: BatchJobItem[] = params.items.map((item) => ({
            id: randomUUID(),
            job_id: jobId,
            shot_id: item.shotId,
            shot_index: item.shotIndex,
            preset: item.preset,
            status: 'queued',
        }));

        const state: BatchJobState = {
            job,
            items,
            cancelRequested: false,
            executor: params.executor,
            onSettled: params.onSettled,
        };

        this.jobs.set(jobId, state);

        // Start processing asynchronously
        state.workerPromise = this.runJobWorker(state);

        return { ...job };
    }

    /**
     * Get current status of a batch job (snapshot).
     */
    getJobStatus(jobId: string): BatchJobSnapshot | null {
        const state = this.jobs.get(jobId);
        if (!state) return null;
        return snapshotOf(state);
    }

    /**
     * Resolves once the current worker pass (and its onSettled hook) has finished.
     */
    async waitForJob(jobId: string): Promise<BatchJobSnapshot | null> {
        const state = this.jobs.get(jobId);
        if (!state) return null;
        await state.workerPromise;
        return snapshotOf(state);
    }

    /**
     * Request cancellation of a running batch job.
     * Running items will complete, but no new items will start.
     */
    cancelJob(jobId: string): boolean {
        const state = this.jobs.get(jobId);
        if (!state) return false;
        if (state.job.status === 'completed' || state.job.status === 'cancelled' || state.job.status === 'failed') {
            return false;
        }

        state.cancelRequested = true;
        return true;
    }

    /**
     * Retry all failed items in a batch job.
     */
    retryFailedItems(jobId: string, executor?: TaskExecutor): boolean {
        const state = this.jobs.get(jobId);
        if (!state) return false;
        if (state.job.status === 'running' || state.job.status === 'pending') return false; // Can't retry while running

        // Reset failed items to queued
        let hasRetries = false;
        for (const item of state.items) {
            if (item.status === 'failed') {
                item.status = 'queued';
                item.error = undefined;
                item.error_kind = undefined;
                item.started_at = undefined;
                item.completed_at = undefined;
                item.artifacts = undefined;
                item.export_errors = undefined;
                hasRetries = true;
            }
        }

        if (!hasRetries) return false;

        // Reset job counters
        state.job.failed = 0;
        state.job.done = state.items.filter((i) => i.status === 'succeeded').length;
        state.job.status = 'pending';
        state.cancelRequested = false;
        state.job.updated_at = now();
        if (executor) state.executor = executor;

        // Restart worker
        state.workerPromise = this.runJobWorker(state);
        return true;
    }

    /**
     * Clean up a completed/cancelled/failed job from memory.
     */
    removeJob(jobId: string): void {
        this.jobs.delete(jobId);
    }

    /**
     * List all jobs (for debugging).
     */
    listJobs(): BatchJob[] {
        return Array.from(this.jobs.values()).map((s) => ({ ...s.job }));
    }

    // ═══════════════════════════════════════════════════════════════
    // Internal: Concurrent worker
    // ═══════════════════════════════════════════════════════════════

    private async runJobWorker(state: BatchJobState): Promise<void> {
        // Let the caller receive the job before the first item starts
        await Promise.resolve();

        state.job.status = 'running';
        state.job.updated_at = now();

        const queue = state.items.filter((i) => i.status === 'queued');
        let queueIndex = 0;

        // Semaphore-style concurrency control
        const runNext = async (): Promise<void> => {
            while (queueIndex < queue.length) {
                // Check cancellation
                if (state.cancelRequested) return;

                const item = queue[queueIndex++];
                if (!item || item.status !== 'queued') continue;

                item.status = 'running';
                item.started_at = now();
                state.job.updated_at = now();

                try {
                    const result = await state.executor(item, state.job);
                    item.status = 'succeeded';
                    item.artifacts = result.artifacts;
                    item.export_errors = result.export_errors;
                    item.platform = result.platform;
                    item.confidence = result.confidence;
                    item.completed_at = now();
                    state.job.succeeded += 1;
                } catch (err) {
                    item.status = 'failed';
                    item.error = errorMessage(err) || 'Unknown error';
                    item.error_kind = err instanceof ShotError ? err.kind : 'Unknown';
                    item.completed_at = now();
                    state.job.failed += 1;
                    console.error(`[BatchQueue] Item ${item.id} (shot ${item.shot_id}) failed:`, item.error);
                }

                state.job.done += 1;
                state.job.updated_at = now();
            }
        };

        // Launch `concurrency` workers in parallel
        const workers: Promise<void>[] = [];
        for (let i = 0; i < state.job.concurrency; i++) {
            workers.push(runNext());
        }

        await Promise.all(workers);

        // Final status
        if (state.cancelRequested) {
            // Mark remaining queued items as cancelled
            for (const item of state.items) {
                if (item.status === 'queued') {
                    item.status = 'cancelled';
                }
            }
            state.job.status = 'cancelled';
        } else if (state.job.failed > 0 && state.job.succeeded === 0) {
            state.job.status = 'failed';
        } else {
            state.job.status = 'completed';
        }

        state.job.updated_at = now();
        console.log(
            `[BatchQueue] Job ${state.job.id} ${state.job.status}: ${state.job.succeeded} succeeded, ${state.job.failed} failed of ${state.job.total}`,
        );

        if (state.onSettled) {
            try {
                await state.onSettled(snapshotOf(state));
            } catch (err) {
                console.error(`[BatchQueue] Job ${state.job.id} settle hook failed:`, errorMessage(err));
            }
        }
    }
}

function snapshotOf(state: BatchJobState): BatchJobSnapshot {
    return {
        job: { ...state.job, formats: [...state.job.formats] },
        items: state.items.map((i) => ({ ...i })),
    };
}
