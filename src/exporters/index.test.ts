import { describe, expect, it, vi } from 'vitest';
import { makePlan, testConfig } from '../testing/fixtures';
import { EXPORT_FORMATS } from '../models/artifact';
import { exportBatchTour, exportShot, exportShotFormats, requestsFor } from './index';

vi.spyOn(console, 'warn').mockImplementation(() => undefined);

const config = testConfig();
const plan = makePlan({ sampleCount: 48 });

describe('exportShot', () => {
  it('names each artifact after the shot and the format', () => {
    const artifacts = requestsFor(EXPORT_FORMATS, config).map((request) => exportShot(plan, request));

    expect(artifacts.map((a) => a.name)).toEqual([
      'shot-01-orbit.kml',
      'shot-01-orbit.jsx',
      'shot-01-orbit.esp',
      'shot-01-orbit.json',
    ]);
    expect(artifacts.map((a) => a.mediaType)).toEqual([
      'application/vnd.google-earth.kml+xml',
      'text/javascript',
      'application/json',
      'application/json',
    ]);
    expect(artifacts.every((a) => a.shotId === 'shot-01-orbit' && a.content.length > 0)).toBe(true);
  });

  it('freezes artifacts', () => {
    expect(Object.isFrozen(exportShot(plan, { format: 'metadata' }))).toBe(true);
  });
});

describe('exportShotFormats', () => {
  it('isolates a failing format from the others', () => {
    const outcomes = exportShotFormats(plan, [
      { format: 'tour' },
      // 48 samples over 8 s cannot land on distinct frames at 1 fps
      { format: 'compositing-script', options: { width: 1920, height: 1080, frameRate: 1, unitsPerMeter: 1 } },
      { format: 'metadata' },
    ]);

    expect(outcomes.map((o) => o.ok)).toEqual([true, false, true]);
    expect(outcomes[1]).toMatchObject({
      ok: false,
      format: 'compositing-script',
      shotId: 'shot-01-orbit',
      kind: 'ExportFormatError',
    });
  });
});

describe('exportBatchTour', () => {
  it('puts every shot in tours.kml', () => {
    const other = makePlan({ preset: 'pan', id: 'shot-02-pan' });
    const artifact = exportBatchTour([plan, other]);

    expect(artifact).toMatchObject({ name: 'tours.kml', format: 'tour', shotId: 'batch' });
    expect(artifact.content).toContain('<gx:Tour id="shot-01-orbit">');
    expect(artifact.content).toContain('<gx:Tour id="shot-02-pan">');
  });
});

describe('requestsFor', () => {
  it('takes frame settings from configuration', () => {
    expect(requestsFor(['compositing-script', 'project-track'], config)).toEqual([
      { format: 'compositing-script', options: { width: 1920, height: 1080, frameRate: 24, unitsPerMeter: 1 } },
      { format: 'project-track', options: { width: 1920, height: 1080, frameRate: 30 } },
    ]);
  });
});
