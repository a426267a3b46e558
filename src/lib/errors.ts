/**
 * errors: 镜头规划 / 导出的错误分类
 *
 * 所有错误都继承 ShotError，并带有 `kind` 判别字段，
 * 方便路由层按类型映射 HTTP 状态码，批处理层按类型写入失败报告。
 */

export type ShotErrorKind =
  | 'InvalidParameter'
  | 'DegenerateGeometry'
  | 'UnsupportedPreset'
  | 'ExportFormatError'
  | 'TrackParseError';

export abstract class ShotError extends Error {
  abstract readonly kind: ShotErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** 半径 / 高度 / 时长 / 镜头数量等参数越界 */
export class InvalidParameterError extends ShotError {
  readonly kind = 'InvalidParameter' as const;
}

/** 预设无法容忍的零半径或起止点重合 */
export class DegenerateGeometryError extends ShotError {
  readonly kind = 'DegenerateGeometry' as const;
}

export class UnsupportedPresetError extends ShotError {
  readonly kind = 'UnsupportedPreset' as const;

  constructor(readonly preset: string) {
    super(`Unsupported preset: "${preset}"`);
  }
}

/** 数值无法在目标格式中表示等结构性导出失败 */
export class ExportFormatError extends ShotError {
  readonly kind = 'ExportFormatError' as const;
}

/** 工程轨道文件损坏或版本不受支持 */
export class TrackParseError extends ShotError {
  readonly kind = 'TrackParseError' as const;
}

export function isShotError(err: unknown): err is ShotError {
  return err instanceof ShotError;
}

/** 从任意 throw 值中取出可读消息 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
