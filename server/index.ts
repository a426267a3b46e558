/**
 * Express API Server: 镜头规划 / 批量导出服务
 */
import { loadConfig, loadEnvFiles } from '../lib/config';
import { createPresetRegistry } from '../src/director/presets';
import { BatchQueue } from './batchQueue';
import { createApp } from './app';

// 加载 .env.local / .env
loadEnvFiles();

const config = loadConfig();

// ★ Restrict origins in production via CORS_ORIGINS (comma separated)
const allowedOrigins = process.env.NODE_ENV === 'production' && process.env.CORS_ORIGINS
    ? process.env.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean)
    : undefined;

const app = createApp({
    config,
    registry: createPresetRegistry(),
    queue: new BatchQueue({ maxConcurrency: config.workerCount }),
    allowedOrigins,
});

export default app;

app.listen(config.server.port, () => {
    console.log(`\n🎬 Aerial Previz API Server`);
    console.log(`   Running on http://localhost:${config.server.port}`);
    console.log(`   Output dir: ${config.server.outputDir}`);
    console.log(`   Workers: ${config.workerCount}\n`);
});
