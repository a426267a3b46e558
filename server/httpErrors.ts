/**
 * Maps thrown errors to JSON error responses.
 *
 *   InvalidParameter / UnsupportedPreset        → 400
 *   DegenerateGeometry / ExportFormat / TrackParse → 422
 *   anything else                               → 500
 */
import type { Response } from 'express';
import type { ZodError } from 'zod';
import { errorMessage, isShotError, type ShotErrorKind } from '../src/lib/errors';

const STATUS_BY_KIND: Record<ShotErrorKind, number> = {
    InvalidParameter: 400,
    UnsupportedPreset: 400,
    DegenerateGeometry: 422,
    ExportFormatError: 422,
    TrackParseError: 422,
};

export function statusForError(err: unknown): number {
    return isShotError(err) ? STATUS_BY_KIND[err.kind] : 500;
}

export function sendError(res: Response, err: unknown, tag: string): void {
    const status = statusForError(err);
    const message = errorMessage(err) || 'Internal error';
    if (status >= 500) console.error(`[${tag}] Error:`, message);
    else console.warn(`[${tag}] Rejected (${status}):`, message);
    res.status(status).json(isShotError(err) ? { error: message, kind: err.kind } : { error: message });
}

export function sendValidationError(res: Response, err: ZodError, tag: string): void {
    const details = err.issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`);
    console.warn(`[${tag}] Invalid request:`, details.join('; '));
    res.status(400).json({ error: 'Invalid request body', details });
}
