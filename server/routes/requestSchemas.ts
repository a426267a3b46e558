/**
 * Request bodies shared by the shot and batch routes.
 */
import { z } from 'zod';
import type { PlanRequest, ShotOverride } from '../../src/director/shotPlanner';
import { EASINGS } from '../../src/lib/easing';
import { EXPORT_FORMATS } from '../../src/models/artifact';

const overrideSchema = z
    .object({
        preset: z.string(),
        durationSec: z.number(),
        radiusM: z.number(),
        altitudeStartM: z.number(),
        altitudeEndM: z.number(),
        azimuthStartDeg: z.number(),
        azimuthEndDeg: z.number(),
        tiltStartDeg: z.number(),
        tiltEndDeg: z.number(),
        easing: z.enum(EASINGS),
    })
    .partial()
    .strict();

export const planBodySchema = z.object({
    lat: z.number(),
    lng: z.number(),
    shot_count: z.number().int().default(3),
    duration_sec: z.number().default(8),
    overrides: z.array(overrideSchema.nullable()).optional(),
});

export const batchBodySchema = planBodySchema.extend({
    formats: z.array(z.enum(EXPORT_FORMATS)).min(1).optional(),
    concurrency: z.number().int().min(1).optional(),
});

export type PlanBody = z.infer<typeof planBodySchema>;

export function toPlanRequest(body: PlanBody): PlanRequest {
    const overrides: (ShotOverride | undefined)[] | undefined = body.overrides?.map((o) => o ?? undefined);
    return {
        location: { lat: body.lat, lng: body.lng },
        shotCount: body.shot_count,
        durationSec: body.duration_sec,
        overrides,
    };
}
