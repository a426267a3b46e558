/**
 * Batch Shot Generation API Routes
 *
 * POST /api/batch/generate            - Start a batch job (plan, classify and export N shots)
 * GET  /api/batch/:jobId              - Get job status & item progress
 * POST /api/batch/:jobId/cancel       - Cancel a running batch job
 * POST /api/batch/:jobId/retry        - Retry failed items in a batch job
 */
import { Router } from 'express';
import { startBatch, type PipelineContext } from '../../services/shotPipeline';
import type { BatchQueue } from '../batchQueue';
import { sendError, sendValidationError } from '../httpErrors';
import { batchBodySchema, toPlanRequest } from './requestSchemas';

export function createBatchRouter(ctx: PipelineContext & { queue: BatchQueue }): Router {
    const batchRouter = Router();
    const { queue } = ctx;

    // ═══════════════════════════════════════════════════════════════
    // POST /api/batch/generate
    // ═══════════════════════════════════════════════════════════════
    batchRouter.post('/generate', (req, res) => {
        const parsed = batchBodySchema.safeParse(req.body);
        if (!parsed.success) return sendValidationError(res, parsed.error, 'Batch');

        try {
            const run = startBatch(
                {
                    ...toPlanRequest(parsed.data),
                    formats: parsed.data.formats,
                    concurrency: parsed.data.concurrency,
                },
                ctx,
            );
            console.log(`[Batch] Job ${run.job.id} started: ${run.job.total} shots → ${run.runId}`);
            res.status(202).json({
                job: run.job,
                run_id: run.runId,
                output_url: `/output/${run.runId}`,
                rejected: run.selectionFailures,
            });
        } catch (err) {
            sendError(res, err, 'Batch');
        }
    });

    // ═══════════════════════════════════════════════════════════════
    // GET /api/batch/:jobId
    // ═══════════════════════════════════════════════════════════════
    batchRouter.get('/:jobId', (req, res) => {
        const status = queue.getJobStatus(req.params.jobId);
        if (!status) {
            return res.status(404).json({ error: 'Job not found' });
        }
        res.json(status);
    });

    // ═══════════════════════════════════════════════════════════════
    // POST /api/batch/:jobId/cancel
    // ═══════════════════════════════════════════════════════════════
    batchRouter.post('/:jobId/cancel', (req, res) => {
        const ok = queue.cancelJob(req.params.jobId);
        if (!ok) {
            return res.status(400).json({ error: 'Job cannot be cancelled (not found or already done)' });
        }
        console.log(`[Batch] Cancel requested for job ${req.params.jobId}`);
        res.json({ ok: true });
    });

    // ═══════════════════════════════════════════════════════════════
    // POST /api/batch/:jobId/retry
    // ═══════════════════════════════════════════════════════════════
    batchRouter.post('/:jobId/retry', (req, res) => {
        const ok = queue.retryFailedItems(req.params.jobId);
        if (!ok) {
            return res.status(400).json({ error: 'No failed items to retry or job is still running' });
        }
        console.log(`[Batch] Retrying failed items of job ${req.params.jobId}`);
        res.json({ ok: true, job: queue.getJobStatus(req.params.jobId)?.job });
    });

    return batchRouter;
}
