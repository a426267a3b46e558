/**
 * ExportArtifact: 导出产物
 *
 * 一个具名的文本载荷及其目标格式；生成后冻结，不可修改。
 */

export const EXPORT_FORMATS = ['tour', 'compositing-script', 'project-track', 'metadata'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function isExportFormat(value: string): value is ExportFormat {
  return (EXPORT_FORMATS as readonly string[]).includes(value);
}

export type ExportArtifact = Readonly<{
  /** 文件名，例如 shot-01-orbit.kml */
  name: string;
  format: ExportFormat;
  /** 来源镜头 ID；批次级产物为 "batch" */
  shotId: string;
  mediaType: string;
  content: string;
}>;
