/**
 * Express application factory. Everything it needs is passed in, so tests and
 * the CLI can build one with their own configuration and queue.
 */
import path from 'node:path';
import express from 'express';
import cors from 'cors';
import type { AppConfig } from '../lib/config';
import type { PresetRegistry } from '../src/director/presets';
import type { BatchQueue } from './batchQueue';
import { createBatchRouter } from './routes/batch';
import { createShotsRouter } from './routes/shots';
import { createTracksRouter } from './routes/tracks';

export interface AppDeps {
    config: AppConfig;
    registry: PresetRegistry;
    queue: BatchQueue;
    /** CORS origins; all origins when omitted */
    allowedOrigins?: (string | RegExp)[];
}

export function createApp(deps: AppDeps): express.Express {
    const app = express();

    // 中间件
    app.use(cors({ origin: deps.allowedOrigins ?? true }));
    app.use(express.json({ limit: '20mb' }));

    // 路由
    app.use('/api/shots', createShotsRouter(deps));
    app.use('/api/batch', createBatchRouter(deps));
    app.use('/api/tracks', createTracksRouter(deps));

    // 导出文件
    app.use('/output', express.static(path.resolve(deps.config.server.outputDir)));

    // 健康检查
    app.get('/api/health', (_req, res) => {
        res.json({
            status: 'ok',
            outputDir: deps.config.server.outputDir,
            workers: deps.config.workerCount,
            jobs: deps.queue.listJobs().length,
        });
    });

    return app;
}
