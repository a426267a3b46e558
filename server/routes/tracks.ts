/**
 * Project track API Routes
 * - POST /import - Parse an Earth Studio project, classify it and re-export it
 *
 * Query: ?formats=tour,project-track&id=my-shot
 */
import express, { Router } from 'express';
import { EXPORT_FORMATS, isExportFormat, type ExportFormat } from '../../src/models/artifact';
import { importAndReexport, type PipelineContext } from '../../services/shotPipeline';
import { sendError } from '../httpErrors';

function parseFormats(raw: unknown): ExportFormat[] | string {
    if (typeof raw !== 'string' || raw.trim() === '') return [...EXPORT_FORMATS];
    const formats: ExportFormat[] = [];
    for (const part of raw.split(',').map((s) => s.trim())) {
        if (!isExportFormat(part)) return `Unknown format "${part}" (expected one of ${EXPORT_FORMATS.join(', ')})`;
        formats.push(part);
    }
    return formats;
}

export function createTracksRouter(ctx: PipelineContext): Router {
    const tracksRouter = Router();

    // JSON bodies arrive already parsed by express.json; anything else as text
    tracksRouter.post('/import', express.text({ type: () => true, limit: '20mb' }), (req, res) => {
        const body: unknown = req.body;
        const text = typeof body === 'string' ? body : JSON.stringify(body);
        if (!text || text === '{}') {
            return res.status(400).json({ error: 'Missing project track in request body' });
        }

        const formats = parseFormats(req.query.formats);
        if (typeof formats === 'string') return res.status(400).json({ error: formats });
        const id = typeof req.query.id === 'string' && req.query.id ? req.query.id : undefined;

        try {
            const { imported, artifacts, exportErrors } = importAndReexport(text, { ...ctx, formats, id });
            console.log(`[Tracks] Imported "${imported.meta.name}" (${imported.meta.keyframeCount} keyframes)`);
            res.json({
                plan: imported.plan,
                meta: imported.meta,
                artifacts,
                export_errors: exportErrors,
            });
        } catch (err) {
            sendError(res, err, 'Tracks');
        }
    });

    return tracksRouter;
}
