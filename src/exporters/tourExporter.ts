/**
 * Tour-file codec (KML 2.2 + gx extensions).
 *
 * One <gx:Tour> per shot, one <gx:FlyTo> per keyframe. Each step's
 * <gx:duration> is the interval since the previous keyframe (0 for the first),
 * so the viewer flies each interval towards the next keyframe.
 */
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import { ExportFormatError, TrackParseError, errorMessage } from '../lib/errors';
import type { CameraKeyframe } from '../models/keyframe';
import type { ShotPlan } from '../models/shot';

export const KML_NAMESPACE = 'http://www.opengis.net/kml/2.2';
export const GX_NAMESPACE = 'http://www.google.com/kml/ext/2.2';

export interface TourExportOptions {
    documentName?: string;
    description?: string;
}

export interface ParsedTour {
    id?: string;
    name: string;
    keyframes: CameraKeyframe[];
}

// ── Escaping ──

// Code points XML 1.0 cannot carry, including unpaired surrogates.
const INVALID_XML_CHARS =
    /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

export function escapeXml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;')
        .replace(INVALID_XML_CHARS, (ch) => `\\u${ch.charCodeAt(0).toString(16).toUpperCase().padStart(4, '0')}`);
}

function fixed(value: number, digits: number, what: string): string {
    if (!Number.isFinite(value)) {
        throw new ExportFormatError(`Cannot write non-finite ${what} (${value}) to a tour file`);
    }
    return value.toFixed(digits);
}

// ── Export ──

function flyToLines(kf: CameraKeyframe, durationSec: number, where: string): string[] {
    return [
        '        <gx:FlyTo>',
        `          <gx:duration>${fixed(durationSec, 6, `duration at ${where}`)}</gx:duration>`,
        '          <gx:flyToMode>smooth</gx:flyToMode>',
        '          <Camera>',
        `            <longitude>${fixed(kf.lng, 10, `longitude at ${where}`)}</longitude>`,
        `            <latitude>${fixed(kf.lat, 10, `latitude at ${where}`)}</latitude>`,
        `            <altitude>${fixed(kf.altM, 2, `altitude at ${where}`)}</altitude>`,
        `            <heading>${fixed(kf.headingDeg, 4, `heading at ${where}`)}</heading>`,
        `            <tilt>${fixed(kf.tiltDeg, 4, `tilt at ${where}`)}</tilt>`,
        `            <roll>${fixed(kf.rollDeg, 4, `roll at ${where}`)}</roll>`,
        '            <altitudeMode>absolute</altitudeMode>',
        '          </Camera>',
        '        </gx:FlyTo>',
    ];
}

function tourLines(plan: ShotPlan): string[] {
    const lines = [
        `    <gx:Tour id="${escapeXml(plan.id)}">`,
        `      <name>${escapeXml(plan.title)}</name>`,
        '      <gx:Playlist>',
    ];
    plan.keyframes.forEach((kf, i) => {
        const duration = i === 0 ? 0 : kf.t - plan.keyframes[i - 1].t;
        lines.push(...flyToLines(kf, duration, `${plan.id}[${i}]`));
    });
    lines.push('      </gx:Playlist>', '    </gx:Tour>');
    return lines;
}

function targetLines(plan: ShotPlan): string[] {
    const { center } = plan.params;
    return [
        '    <Placemark>',
        `      <name>${escapeXml(`${plan.title} target`)}</name>`,
        '      <Point>',
        `        <coordinates>${fixed(center.lng, 10, 'target longitude')},${fixed(center.lat, 10, 'target latitude')},0</coordinates>`,
        '      </Point>',
        '    </Placemark>',
    ];
}

export function exportTour(plans: readonly ShotPlan[], options: TourExportOptions = {}): string {
    if (plans.length === 0) {
        throw new ExportFormatError('A tour file needs at least one shot');
    }
    for (const plan of plans) {
        if (plan.keyframes.length === 0) {
            throw new ExportFormatError(`Shot ${plan.id} has no keyframes`);
        }
    }

    const name = options.documentName ?? (plans.length === 1 ? plans[0].title : `${plans.length} aerial shots`);
    const description = options.description ?? plans.map((p) => `${p.id} (${p.preset})`).join(', ');

    const lines = [
        '<?xml version="1.0" encoding="UTF-8"?>',
        `<kml xmlns="${KML_NAMESPACE}" xmlns:gx="${GX_NAMESPACE}">`,
        '  <Document>',
        `    <name>${escapeXml(name)}</name>`,
        `    <description>${escapeXml(description)}</description>`,
        ...plans.flatMap(targetLines),
        ...plans.flatMap(tourLines),
        '  </Document>',
        '</kml>',
        '',
    ];
    return lines.join('\n');
}

// ── Parse ──

const numeric = z.string().transform((raw, ctx) => {
    const value = Number(raw.trim());
    if (raw.trim() === '' || !Number.isFinite(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: "${raw}"` });
        return z.NEVER;
    }
    return value;
});

const flyToSchema = z.object({
    'gx:duration': numeric.optional(),
    Camera: z.object({
        longitude: numeric,
        latitude: numeric,
        altitude: numeric,
        heading: numeric.optional(),
        tilt: numeric.optional(),
        roll: numeric.optional(),
    }),
});

const tourSchema = z.object({
    '@_id': z.string().optional(),
    name: z.string().optional(),
    'gx:Playlist': z.object({
        'gx:FlyTo': z.array(flyToSchema).min(1),
    }),
});

const kmlSchema = z.object({
    kml: z.object({
        Document: z.object({
            'gx:Tour': z.array(tourSchema).default([]),
        }),
    }),
});

const ARRAY_TAGS = new Set(['gx:Tour', 'gx:FlyTo', 'Placemark']);

export function parseTour(xml: string): ParsedTour[] {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
        throw new TrackParseError(`Malformed tour file: ${validation.err.msg} (line ${validation.err.line})`);
    }

    const parser = new XMLParser({
        ignoreAttributes: false,
        attributeNamePrefix: '@_',
        parseTagValue: false,
        isArray: (tagName) => ARRAY_TAGS.has(tagName),
    });

    let raw: unknown;
    try {
        raw = parser.parse(xml);
    } catch (err) {
        throw new TrackParseError(`Malformed tour file: ${errorMessage(err)}`);
    }

    const parsed = kmlSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new TrackParseError(`Invalid tour file at ${issue.path.join('.')}: ${issue.message}`);
    }

    return parsed.data.kml.Document['gx:Tour'].map((tour) => {
        let t = 0;
        const keyframes = tour['gx:Playlist']['gx:FlyTo'].map((step, i): CameraKeyframe => {
            if (i > 0) t += step['gx:duration'] ?? 0;
            const cam = step.Camera;
            return {
                t,
                lat: cam.latitude,
                lng: cam.longitude,
                altM: cam.altitude,
                headingDeg: cam.heading ?? 0,
                tiltDeg: cam.tilt ?? 0,
                rollDeg: cam.roll ?? 0,
            };
        });
        return { id: tour['@_id'], name: tour.name ?? '', keyframes };
    });
}
