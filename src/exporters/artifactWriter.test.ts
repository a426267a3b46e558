import { mkdir, mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ExportFormatError } from '../lib/errors';
import { artifactPath, publishArtifact, writeArtifact } from './artifactWriter';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'artifact-writer-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('writeArtifact', () => {
  it('writes the content and leaves no temp file behind', async () => {
    const target = path.join(dir, 'nested', 'shot.kml');
    await expect(writeArtifact(target, '<kml/>\n')).resolves.toBe(target);

    expect(await readFile(target, 'utf8')).toBe('<kml/>\n');
    expect(await readdir(path.join(dir, 'nested'))).toEqual(['shot.kml']);
  });

  it('replaces an existing file', async () => {
    const target = path.join(dir, 'shot.json');
    await writeArtifact(target, 'old');
    await writeArtifact(target, 'new');
    expect(await readFile(target, 'utf8')).toBe('new');
  });

  it('cleans up when the rename fails', async () => {
    const target = path.join(dir, 'taken');
    await mkdir(path.join(target, 'child'), { recursive: true });

    await expect(writeArtifact(target, 'data')).rejects.toThrow();
    expect(await readdir(dir)).toEqual(['taken']);
  });
});

describe('artifactPath', () => {
  it('files artifacts under their format folder', () => {
    expect(artifactPath('/runs/r1', { name: 'shot-01-orbit.jsx', format: 'compositing-script' })).toBe(
      path.join('/runs/r1', 'jsx', 'shot-01-orbit.jsx'),
    );
  });

  it.each(['../escape.kml', 'a/b.kml', '.hidden', ''])('rejects %j', (name) => {
    expect(() => artifactPath('/runs/r1', { name, format: 'tour' })).toThrow(ExportFormatError);
  });
});

describe('publishArtifact', () => {
  it('writes into the run directory', async () => {
    const written = await publishArtifact(dir, {
      name: 'shot-01-orbit.esp',
      format: 'project-track',
      shotId: 'shot-01-orbit',
      mediaType: 'application/json',
      content: '{}\n',
    });

    expect(written).toBe(path.join(dir, 'esp', 'shot-01-orbit.esp'));
    expect(await readFile(written, 'utf8')).toBe('{}\n');
  });

  it('rejects rather than throws for a bad name', async () => {
    await expect(
      publishArtifact(dir, { name: '../x', format: 'tour', shotId: 'x', mediaType: 'text/plain', content: '' }),
    ).rejects.toBeInstanceOf(ExportFormatError);
  });
});
