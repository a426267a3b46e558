/**
 * Shot planning API Routes
 * - POST /plan - Plan and classify a batch of shots in memory (nothing is written)
 * - GET  /presets - List the preset table with its default parameter ranges
 */
import { Router } from 'express';
import { PRESET_TAGS } from '../../src/models/shot';
import { planAndRecommend, type PipelineContext } from '../../services/shotPipeline';
import { sendError, sendValidationError } from '../httpErrors';
import { planBodySchema, toPlanRequest } from './requestSchemas';

export function createShotsRouter(ctx: PipelineContext): Router {
    const shotsRouter = Router();

    // ═══════════════════════════════════════════════════════════════
    // POST /api/shots/plan
    // ═══════════════════════════════════════════════════════════════
    shotsRouter.post('/plan', (req, res) => {
        const parsed = planBodySchema.safeParse(req.body);
        if (!parsed.success) return sendValidationError(res, parsed.error, 'Shots');

        try {
            const report = planAndRecommend(toPlanRequest(parsed.data), ctx);
            res.json({
                plans: report.plans,
                failures: report.failures,
            });
        } catch (err) {
            sendError(res, err, 'Shots');
        }
    });

    // ═══════════════════════════════════════════════════════════════
    // GET /api/shots/presets
    // ═══════════════════════════════════════════════════════════════
    shotsRouter.get('/presets', (_req, res) => {
        res.json({
            order: ctx.config.presetOrder,
            presets: PRESET_TAGS.map((tag) => {
                const preset = ctx.registry[tag];
                return {
                    tag,
                    title: preset.title,
                    description: preset.description,
                    hover_tolerant: preset.hoverTolerant,
                    ranges: ctx.config.ranges[tag],
                };
            }),
        });
    });

    return shotsRouter;
}
