/**
 * Runtime configuration.
 *
 * Every tunable (sampling rate, parameter ranges, platform thresholds, export
 * settings) has a documented default here and can be overridden by environment
 * variables or per call. The result is validated with zod and deep-frozen;
 * core functions receive it explicitly, nothing reads process.env after load.
 */
import dotenv from 'dotenv';
import { z } from 'zod';
import { createPresetRegistry, type ParameterRanges } from '../src/director/presets';
import { EASINGS } from '../src/lib/easing';
import { InvalidParameterError } from '../src/lib/errors';
import { PRESET_TAGS, type PresetTag } from '../src/models/shot';

// ── Schema ──

const rangeSchema = z
    .tuple([z.number(), z.number()])
    .refine(([min, max]) => min <= max, { message: 'range min must be <= max' });

const parameterRangesSchema = z.object({
    radiusM: rangeSchema.refine(([min]) => min >= 0, { message: 'radius must be >= 0' }),
    altitudeM: rangeSchema,
    altitudeDeltaM: rangeSchema,
    azimuthSweepDeg: rangeSchema,
    tiltDeg: rangeSchema,
    tiltDeltaDeg: rangeSchema,
    easings: z.array(z.enum(EASINGS)).min(1),
});

const presetRangesSchema = z.object({
    orbit: parameterRangesSchema,
    flyby: parameterRangesSchema,
    flythrough: parameterRangesSchema,
    descent: parameterRangesSchema,
    ascent: parameterRangesSchema,
    pan: parameterRangesSchema,
    reveal: parameterRangesSchema,
    tiltReveal: parameterRangesSchema,
    establishing: parameterRangesSchema,
    crane: parameterRangesSchema,
});

const positive = z.coerce.number().positive();

const platformSchema = z
    .object({
        maxDroneAltitudeM: positive.default(120),
        maxDroneSpeedMps: positive.default(20),
        maxDroneVerticalRateMps: positive.default(6),
        helicopterAltitudeM: positive.default(300),
        helicopterSpeedMps: positive.default(30),
        helicopterVerticalRateMps: positive.default(10),
    })
    .refine((t) => t.helicopterAltitudeM > t.maxDroneAltitudeM, {
        message: 'helicopterAltitudeM must exceed maxDroneAltitudeM',
        path: ['helicopterAltitudeM'],
    })
    .refine((t) => t.helicopterSpeedMps > t.maxDroneSpeedMps, {
        message: 'helicopterSpeedMps must exceed maxDroneSpeedMps',
        path: ['helicopterSpeedMps'],
    })
    .refine((t) => t.helicopterVerticalRateMps > t.maxDroneVerticalRateMps, {
        message: 'helicopterVerticalRateMps must exceed maxDroneVerticalRateMps',
        path: ['helicopterVerticalRateMps'],
    });

const frameSettingsSchema = z.object({
    width: z.coerce.number().int().positive(),
    height: z.coerce.number().int().positive(),
    frameRate: positive,
});

const configSchema = z.object({
    server: z.object({
        port: z.coerce.number().int().min(1).max(65535).default(3002),
        outputDir: z.string().min(1).default('output'),
    }),
    /** Sampling rate of generated keyframes (samples per second of shot time). */
    frameRate: positive.default(24),
    minSampleCount: z.coerce.number().int().min(2).default(2),
    workerCount: z.coerce.number().int().min(1).max(32).default(4),
    maxShots: z.coerce.number().int().min(1).default(50),
    maxDurationSec: positive.default(600),
    terrainClearanceM: z.coerce.number().min(0).default(30),
    maxAltitudeM: positive.default(10_000),
    maxRadiusM: positive.default(20_000),
    diversityThreshold: z.coerce.number().min(0).default(0.05),
    maxDiversityAttempts: z.coerce.number().int().min(1).default(8),
    presetOrder: z.array(z.enum(PRESET_TAGS)).min(1),
    ranges: presetRangesSchema,
    platform: platformSchema,
    export: z.object({
        compositing: frameSettingsSchema.extend({
            unitsPerMeter: positive.default(1),
        }),
        projectTrack: frameSettingsSchema,
    }),
});

export type AppConfig = Readonly<z.infer<typeof configSchema>>;
export type PlatformThresholds = AppConfig['platform'];
export type PresetRanges = Record<PresetTag, ParameterRanges>;

/** Deep-partial override accepted by loadConfig. */
export type ConfigOverrides = {
    [K in keyof z.input<typeof configSchema>]?: DeepPartial<z.input<typeof configSchema>[K]>;
};
type DeepPartial<T> = T extends readonly unknown[] ? T : T extends object ? { [K in keyof T]?: DeepPartial<T[K]> } : T;

// ── Defaults ──

export const DEFAULT_PRESET_ORDER: readonly PresetTag[] = [
    'orbit',
    'flyby',
    'descent',
    'reveal',
    'pan',
    'ascent',
    'establishing',
    'crane',
    'tiltReveal',
    'flythrough',
];

function defaultRanges(): Record<string, unknown> {
    const registry = createPresetRegistry();
    return Object.fromEntries(
        PRESET_TAGS.map((tag) => {
            const r = registry[tag].defaultRanges;
            return [tag, { ...r, easings: [...r.easings] }];
        }),
    );
}

function defaultInput(): Record<string, unknown> {
    return {
        server: {},
        presetOrder: [...DEFAULT_PRESET_ORDER],
        ranges: defaultRanges(),
        platform: {},
        export: {
            compositing: { width: 1920, height: 1080, frameRate: 24 },
            projectTrack: { width: 1920, height: 1080, frameRate: 30 },
        },
    };
}

// ── Env mapping ──

type Env = Record<string, string | undefined>;

function fromEnv(env: Env): Record<string, unknown> {
    const pick = (key: string) => {
        const v = env[key]?.trim();
        return v ? v : undefined;
    };
    return prune({
        server: { port: pick('API_SERVER_PORT'), outputDir: pick('OUTPUT_DIR') },
        frameRate: pick('FRAME_RATE'),
        workerCount: pick('WORKER_COUNT'),
        maxShots: pick('MAX_SHOTS'),
        terrainClearanceM: pick('TERRAIN_CLEARANCE_M'),
        diversityThreshold: pick('DIVERSITY_THRESHOLD'),
        platform: {
            maxDroneAltitudeM: pick('MAX_DRONE_ALTITUDE_M'),
            maxDroneSpeedMps: pick('MAX_DRONE_SPEED_MPS'),
            maxDroneVerticalRateMps: pick('MAX_DRONE_VERTICAL_RATE_MPS'),
            helicopterAltitudeM: pick('HELICOPTER_ALTITUDE_M'),
            helicopterSpeedMps: pick('HELICOPTER_SPEED_MPS'),
            helicopterVerticalRateMps: pick('HELICOPTER_VERTICAL_RATE_MPS'),
        },
    });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function prune(obj: Record<string, unknown>): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
        if (v === undefined) continue;
        out[k] = isPlainObject(v) ? prune(v) : v;
    }
    return out;
}

/** Objects merge recursively, arrays and scalars replace. */
export function deepMerge(base: Record<string, unknown>, patch: Record<string, unknown>): Record<string, unknown> {
    const out: Record<string, unknown> = { ...base };
    for (const [k, v] of Object.entries(patch)) {
        if (v === undefined) continue;
        const prev = out[k];
        out[k] = isPlainObject(prev) && isPlainObject(v) ? deepMerge(prev, v) : v;
    }
    return out;
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null) {
        for (const v of Object.values(value)) deepFreeze(v);
        Object.freeze(value);
    }
    return value;
}

// ── Public API ──

/** Load .env.local then .env into process.env (existing variables win). */
export function loadEnvFiles(): void {
    dotenv.config({ path: '.env.local' });
    dotenv.config();
}

export function loadConfig(options: { env?: Env; overrides?: ConfigOverrides } = {}): AppConfig {
    const { env = process.env, overrides = {} } = options;

    const input = deepMerge(deepMerge(defaultInput(), fromEnv(env)), prune({ ...overrides }));
    const parsed = configSchema.safeParse(input);

    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new InvalidParameterError(`Invalid configuration: ${details}`);
    }

    return deepFreeze(parsed.data);
}
