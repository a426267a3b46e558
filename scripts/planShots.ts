/**
 * planShots: 命令行批量生成 / 轨道导入
 *
 * 用法：
 *   npx tsx scripts/planShots.ts --lat 40.7484 --lng -73.9857 --shots 3 --duration 8
 *   npx tsx scripts/planShots.ts --lat 40.7484 --lng -73.9857 --formats tour,metadata --out ./output
 *   npx tsx scripts/planShots.ts --esp ./my-track.esp --out ./output
 *
 * 批量模式把产物写入 <out>/<runId>/；导入模式写入 <out>/<id>/。
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { loadConfig, loadEnvFiles, type AppConfig } from '../lib/config';
import { BatchQueue } from '../server/batchQueue';
import { createPresetRegistry } from '../src/director/presets';
import { publishArtifact } from '../src/exporters';
import { InvalidParameterError, errorMessage } from '../src/lib/errors';
import { EXPORT_FORMATS, isExportFormat, type ExportFormat } from '../src/models/artifact';
import { importAndReexport, startBatch } from '../services/shotPipeline';

// ─── 参数 ────────────────────────────────────────────────

const { values } = parseArgs({
  options: {
    lat: { type: 'string' },
    lng: { type: 'string' },
    shots: { type: 'string', default: '3' },
    duration: { type: 'string', default: '8' },
    fps: { type: 'string' },
    formats: { type: 'string' },
    out: { type: 'string' },
    esp: { type: 'string' },
    id: { type: 'string' },
  },
});

function toNumber(name: string, raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || raw.trim() === '' || !Number.isFinite(value)) {
    throw new InvalidParameterError(`--${name} must be a number, got "${raw ?? ''}"`);
  }
  return value;
}

function toFormats(raw: string | undefined): ExportFormat[] {
  if (!raw) return [...EXPORT_FORMATS];
  return raw.split(',').map((part) => {
    const format = part.trim();
    if (!isExportFormat(format)) {
      throw new InvalidParameterError(`Unknown format "${format}" (expected ${EXPORT_FORMATS.join(', ')})`);
    }
    return format;
  });
}

// ─── 执行 ────────────────────────────────────────────────

async function runImport(config: AppConfig, file: string, formats: ExportFormat[]): Promise<void> {
  const text = await readFile(file, 'utf8');
  const id = values.id ?? path.basename(file, path.extname(file));
  const { imported, artifacts, exportErrors } = importAndReexport(text, {
    config,
    registry: createPresetRegistry(),
    formats,
    id,
  });

  const runDir = path.join(config.server.outputDir, imported.plan.id);
  for (const artifact of artifacts) {
    const written = await publishArtifact(runDir, artifact);
    console.log(`  ✅ ${written}`);
  }
  for (const failure of exportErrors) {
    console.log(`  ❌ ${failure.format}: ${failure.message}`);
  }

  const { meta, plan } = imported;
  const origin = meta.modelVersion === undefined ? `3D camera export, ${meta.durationFrames} frames` : `modelVersion ${meta.modelVersion}`;
  console.log(`\n导入: ${meta.name}  (${origin}, ${meta.keyframeCount} keyframes)`);
  console.log(`平台: ${plan.metadata.platform ?? '-'}  置信度: ${plan.metadata.confidence ?? '-'}`);
  for (const warning of plan.metadata.warnings) console.log(`  ⚠️  ${warning}`);
}

async function runBatch(config: AppConfig, formats: ExportFormat[]): Promise<void> {
  const queue = new BatchQueue({ maxConcurrency: config.workerCount });
  const run = startBatch(
    {
      location: { lat: toNumber('lat', values.lat), lng: toNumber('lng', values.lng) },
      shotCount: toNumber('shots', values.shots),
      durationSec: toNumber('duration', values.duration),
      formats,
    },
    { config, registry: createPresetRegistry(), queue },
  );

  const snapshot = await queue.waitForJob(run.job.id);
  if (!snapshot) throw new Error(`Job ${run.job.id} disappeared from the queue`);

  console.log(`\n=== ${run.runId} → ${run.runDir} ===\n`);
  for (const item of [...snapshot.items].sort((a, b) => a.shot_index - b.shot_index)) {
    const icon = item.status === 'succeeded' ? '✅' : '❌';
    const platform = item.platform ? `${item.platform} (${item.confidence})` : item.error ?? item.status;
    console.log(`  ${icon} ${item.shot_id}  ${platform}`);
    for (const e of item.export_errors ?? []) console.log(`      ⚠️  ${e.format}: ${e.message}`);
  }
  for (const f of run.selectionFailures) {
    console.log(`  ❌ shot ${f.index + 1}: [${f.kind}] ${f.message}`);
  }

  if (snapshot.job.succeeded === 0) process.exitCode = 1;
}

async function main(): Promise<void> {
  loadEnvFiles();
  const config = loadConfig({
    overrides: {
      server: values.out ? { outputDir: values.out } : undefined,
      frameRate: values.fps ? toNumber('fps', values.fps) : undefined,
    },
  });
  const formats = toFormats(values.formats);

  if (values.esp) await runImport(config, values.esp, formats);
  else await runBatch(config, formats);
}

main().catch((err: unknown) => {
  console.error(`[planShots] ${errorMessage(err)}`);
  process.exitCode = 1;
});
