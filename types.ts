// ═══════════════════════════════════════════════════════════════
// Batch Job System: queued shot generation and export
// ═══════════════════════════════════════════════════════════════

import type { ShotErrorKind } from './src/lib/errors';
import type { ExportFormat } from './src/models/artifact';
import type { Platform, ShotPreset } from './src/models/shot';

export type BatchJobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';
export type BatchItemStatus = 'queued' | 'running' | 'succeeded' | 'failed' | 'cancelled';

/** A batch job (e.g. "plan, classify and export 6 shots around a landmark") */
export interface BatchJob {
  id: string;                    // UUID
  run_id: string;                // Output folder name under OUTPUT_DIR
  total: number;                 // Total items
  done: number;                  // Completed (succeeded + failed)
  succeeded: number;
  failed: number;
  status: BatchJobStatus;
  created_at: string;
  updated_at: string;
  concurrency: number;           // Max concurrent shots
  formats: ExportFormat[];
}

export interface ExportFailure {
  format: ExportFormat;
  kind: ShotErrorKind | 'Unknown';
  message: string;
}

/** A single shot within a batch job */
export interface BatchJobItem {
  id: string;                    // UUID
  job_id: string;
  shot_id: string;
  shot_index: number;            // For display ordering (0-based)
  preset: ShotPreset;
  status: BatchItemStatus;
  artifacts?: string[];          // Written files, relative to the run directory
  export_errors?: ExportFailure[];
  platform?: Platform;
  confidence?: number;
  error?: string;                // Error message (on failure)
  error_kind?: ShotErrorKind | 'Unknown';
  started_at?: string;
  completed_at?: string;
}

/** What a shot executor reports back for a succeeded item */
export interface ShotTaskResult {
  artifacts: string[];
  export_errors: ExportFailure[];
  platform?: Platform;
  confidence?: number;
}

/** Point-in-time copy of a job for status polling */
export interface BatchJobSnapshot {
  job: BatchJob;
  items: BatchJobItem[];
}
