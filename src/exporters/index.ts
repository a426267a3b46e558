/**
 * Export dispatch.
 *
 * ExportRequest is a closed union: adding a format without handling it here
 * fails the type-check at assertNever.
 */
import type { AppConfig } from '../../lib/config';
import { ExportFormatError, ShotError, errorMessage, type ShotErrorKind } from '../lib/errors';
import type { ExportArtifact, ExportFormat } from '../models/artifact';
import type { ShotPlan } from '../models/shot';
import { exportCompositingScript, type CompositingScriptOptions } from './compositingScript';
import { exportShotMetadata } from './metadataDump';
import { exportProjectTrack, type ProjectTrackExportOptions } from './projectTrack';
import { exportTour, type TourExportOptions } from './tourExporter';

export * from './artifactWriter';
export * from './compositingScript';
export * from './metadataDump';
export * from './projectTrack';
export * from './tourExporter';

export type ExportRequest =
    | { format: 'tour'; options?: TourExportOptions }
    | { format: 'compositing-script'; options: CompositingScriptOptions }
    | { format: 'project-track'; options: ProjectTrackExportOptions }
    | { format: 'metadata' };

export type ExportOutcome =
    | { ok: true; artifact: ExportArtifact }
    | { ok: false; format: ExportFormat; shotId: string; kind: ShotErrorKind | 'Unknown'; message: string };

export const FORMAT_FILES: Readonly<Record<ExportFormat, { extension: string; mediaType: string }>> = {
    tour: { extension: 'kml', mediaType: 'application/vnd.google-earth.kml+xml' },
    'compositing-script': { extension: 'jsx', mediaType: 'text/javascript' },
    'project-track': { extension: 'esp', mediaType: 'application/json' },
    metadata: { extension: 'json', mediaType: 'application/json' },
};

export function assertNever(value: never): never {
    throw new ExportFormatError(`Unhandled export request: ${JSON.stringify(value)}`);
}

function freezeArtifact(name: string, format: ExportFormat, shotId: string, content: string): ExportArtifact {
    return Object.freeze({ name, format, shotId, mediaType: FORMAT_FILES[format].mediaType, content });
}

function render(plan: ShotPlan, request: ExportRequest): string {
    switch (request.format) {
        case 'tour':
            return exportTour([plan], request.options);
        case 'compositing-script':
            return exportCompositingScript(plan, request.options);
        case 'project-track':
            return exportProjectTrack(plan, request.options);
        case 'metadata':
            return exportShotMetadata(plan);
        default:
            return assertNever(request);
    }
}

export function exportShot(plan: ShotPlan, request: ExportRequest): ExportArtifact {
    const content = render(plan, request);
    return freezeArtifact(`${plan.id}.${FORMAT_FILES[request.format].extension}`, request.format, plan.id, content);
}

/** Runs each request independently; one failing format does not stop the others. */
export function exportShotFormats(plan: ShotPlan, requests: readonly ExportRequest[]): ExportOutcome[] {
    return requests.map((request): ExportOutcome => {
        try {
            return { ok: true, artifact: exportShot(plan, request) };
        } catch (err) {
            console.warn(`[Export] ${plan.id} → ${request.format} failed: ${errorMessage(err)}`);
            return {
                ok: false,
                format: request.format,
                shotId: plan.id,
                kind: err instanceof ShotError ? err.kind : 'Unknown',
                message: errorMessage(err),
            };
        }
    });
}

/** All shots in one tour document (tour/tours.kml). */
export function exportBatchTour(plans: readonly ShotPlan[], options?: TourExportOptions): ExportArtifact {
    return freezeArtifact('tours.kml', 'tour', 'batch', exportTour(plans, options));
}

/** Requests for the given formats, with frame settings taken from configuration. */
export function requestsFor(formats: readonly ExportFormat[], config: AppConfig): ExportRequest[] {
    return formats.map((format): ExportRequest => {
        switch (format) {
            case 'tour':
                return { format };
            case 'compositing-script':
                return { format, options: { ...config.export.compositing } };
            case 'project-track':
                return { format, options: { ...config.export.projectTrack } };
            case 'metadata':
                return { format };
            default:
                return assertNever(format);
        }
    });
}
