import { describe, expect, it } from 'vitest';
import { batchBodySchema, planBodySchema, toPlanRequest } from './requestSchemas';

describe('planBodySchema', () => {
    it('fills in defaults and maps to a plan request', () => {
        const body = planBodySchema.parse({ lat: 40.7484, lng: -73.9857 });
        expect(toPlanRequest(body)).toEqual({
            location: { lat: 40.7484, lng: -73.9857 },
            shotCount: 3,
            durationSec: 8,
            overrides: undefined,
        });
    });

    it('turns null overrides into gaps', () => {
        const body = planBodySchema.parse({ lat: 0, lng: 0, overrides: [null, { radiusM: 50, preset: 'pan' }] });
        expect(toPlanRequest(body).overrides).toEqual([undefined, { radiusM: 50, preset: 'pan' }]);
    });

    it('rejects unknown override fields and easings', () => {
        expect(planBodySchema.safeParse({ lat: 0, lng: 0, overrides: [{ radius: 50 }] }).success).toBe(false);
        expect(planBodySchema.safeParse({ lat: 0, lng: 0, overrides: [{ easing: 'bounce' }] }).success).toBe(false);
    });

    it('requires coordinates', () => {
        expect(planBodySchema.safeParse({ lat: 0 }).success).toBe(false);
    });
});

describe('batchBodySchema', () => {
    it('accepts known formats only', () => {
        expect(batchBodySchema.parse({ lat: 0, lng: 0, formats: ['tour', 'metadata'] }).formats).toEqual([
            'tour',
            'metadata',
        ]);
        expect(batchBodySchema.safeParse({ lat: 0, lng: 0, formats: ['gif'] }).success).toBe(false);
        expect(batchBodySchema.safeParse({ lat: 0, lng: 0, formats: [] }).success).toBe(false);
    });
});
