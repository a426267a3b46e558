import { describe, expect, it } from 'vitest';
import {
    DegenerateGeometryError,
    ExportFormatError,
    InvalidParameterError,
    TrackParseError,
    UnsupportedPresetError,
} from '../src/lib/errors';
import { statusForError } from './httpErrors';

describe('statusForError', () => {
    it('maps caller mistakes to 400', () => {
        expect(statusForError(new InvalidParameterError('bad radius'))).toBe(400);
        expect(statusForError(new UnsupportedPresetError('spiral'))).toBe(400);
    });

    it('maps unprocessable input to 422', () => {
        expect(statusForError(new DegenerateGeometryError('zero radius'))).toBe(422);
        expect(statusForError(new ExportFormatError('duplicate frame'))).toBe(422);
        expect(statusForError(new TrackParseError('bad json'))).toBe(422);
    });

    it('maps anything else to 500', () => {
        expect(statusForError(new Error('boom'))).toBe(500);
        expect(statusForError('boom')).toBe(500);
    });
});
