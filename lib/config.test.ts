import { describe, expect, it } from 'vitest';
import { InvalidParameterError } from '../src/lib/errors';
import { DEFAULT_PRESET_ORDER, deepMerge, loadConfig } from './config';

describe('loadConfig', () => {
    it('falls back to documented defaults', () => {
        const config = loadConfig({ env: {} });

        expect(config.frameRate).toBe(24);
        expect(config.server).toEqual({ port: 3002, outputDir: 'output' });
        expect(config.platform).toEqual({
            maxDroneAltitudeM: 120,
            maxDroneSpeedMps: 20,
            maxDroneVerticalRateMps: 6,
            helicopterAltitudeM: 300,
            helicopterSpeedMps: 30,
            helicopterVerticalRateMps: 10,
        });
        expect(config.presetOrder).toEqual(DEFAULT_PRESET_ORDER);
        expect(config.ranges.orbit.radiusM).toEqual([60, 120]);
        expect(config.export.projectTrack.frameRate).toBe(30);
    });

    it('reads environment variables', () => {
        const config = loadConfig({ env: { FRAME_RATE: '30', MAX_DRONE_SPEED_MPS: '15', OUTPUT_DIR: '/tmp/out' } });
        expect(config.frameRate).toBe(30);
        expect(config.platform.maxDroneSpeedMps).toBe(15);
        expect(config.server.outputDir).toBe('/tmp/out');
    });

    it('ignores blank environment variables', () => {
        expect(loadConfig({ env: { FRAME_RATE: '  ' } }).frameRate).toBe(24);
    });

    it('lets per-call overrides win and merges nested ranges', () => {
        const config = loadConfig({
            env: { FRAME_RATE: '30' },
            overrides: { frameRate: 60, ranges: { orbit: { radiusM: [10, 20] } } },
        });
        expect(config.frameRate).toBe(60);
        expect(config.ranges.orbit.radiusM).toEqual([10, 20]);
        expect(config.ranges.orbit.altitudeM).toEqual([40, 100]);
    });

    it('deep-freezes the result', () => {
        const config = loadConfig({ env: {} });
        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.ranges.orbit.radiusM)).toBe(true);
    });

    it('rejects a non-numeric value', () => {
        expect(() => loadConfig({ env: { FRAME_RATE: 'fast' } })).toThrow(InvalidParameterError);
        expect(() => loadConfig({ env: { FRAME_RATE: 'fast' } })).toThrow(/frameRate/);
    });

    it('rejects helicopter thresholds below the drone limits', () => {
        expect(() => loadConfig({ env: { HELICOPTER_ALTITUDE_M: '100' } })).toThrow(/platform\.helicopterAltitudeM/);
    });

    it('rejects an inverted range', () => {
        expect(() => loadConfig({ env: {}, overrides: { ranges: { flyby: { radiusM: [500, 300] } } } })).toThrow(
            /range min must be <= max/,
        );
    });
});

describe('deepMerge', () => {
    it('merges objects and replaces arrays', () => {
        expect(deepMerge({ a: { b: 1, c: [1, 2] }, d: 1 }, { a: { c: [3] }, d: undefined })).toEqual({
            a: { b: 1, c: [3] },
            d: 1,
        });
    });
});
