/**
 * Atomic artifact publishing: write to a temp file beside the target, flush,
 * close, then rename over the final path. A failed write leaves nothing at
 * the final path and removes the temp file.
 */
import { randomUUID } from 'node:crypto';
import { mkdir, open, rename, rm } from 'node:fs/promises';
import path from 'node:path';
import { ExportFormatError } from '../lib/errors';
import type { ExportArtifact, ExportFormat } from '../models/artifact';

/** Run-directory subfolder per format. */
export const FORMAT_DIRS: Readonly<Record<ExportFormat, string>> = {
    tour: 'tour',
    'compositing-script': 'jsx',
    'project-track': 'esp',
    metadata: 'metadata',
};

export async function writeArtifact(targetPath: string, content: string): Promise<string> {
    const dir = path.dirname(targetPath);
    await mkdir(dir, { recursive: true });

    const tmpPath = path.join(dir, `.${path.basename(targetPath)}.${randomUUID()}.tmp`);
    let published = false;
    try {
        const handle = await open(tmpPath, 'wx');
        try {
            await handle.writeFile(content, 'utf8');
            await handle.sync();
        } finally {
            await handle.close();
        }
        await rename(tmpPath, targetPath);
        published = true;
    } finally {
        if (!published) await rm(tmpPath, { force: true });
    }
    return targetPath;
}

export function artifactPath(runDir: string, artifact: Pick<ExportArtifact, 'name' | 'format'>): string {
    if (artifact.name !== path.basename(artifact.name) || artifact.name.startsWith('.') || artifact.name === '') {
        throw new ExportFormatError(`Artifact name "${artifact.name}" is not a plain file name`);
    }
    return path.join(runDir, FORMAT_DIRS[artifact.format], artifact.name);
}

/** Writes the artifact under its format folder in runDir and returns the final path. */
export async function publishArtifact(runDir: string, artifact: ExportArtifact): Promise<string> {
    return writeArtifact(artifactPath(runDir, artifact), artifact.content);
}
