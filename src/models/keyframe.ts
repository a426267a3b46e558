/**
 * CameraKeyframe: 摄影机关键帧
 *
 * 一个带时间戳的机位采样：位置（经纬度 + 绝对高度）与朝向（航向 / 俯仰 / 横滚）。
 * 同一镜头内 t 严格递增且等间隔（时长 / 采样数）。
 */

/** 工程轨道中声明的过渡类型（auto / linear / ease / hold …），原样保存 */
export type TransitionType = string;

/** 关键帧插值方式，仅存储，内部模型不据此改变采样 */
export type KeyframeInterpolation = {
  in: TransitionType;
  out: TransitionType;
};

export type CameraKeyframe = {
  /** 距镜头起点的秒数 */
  t: number;
  /** 纬度（度） */
  lat: number;
  /** 经度（度） */
  lng: number;
  /** 绝对高度（米，椭球高），不低于离地安全高度 */
  altM: number;
  /** 航向 [0, 360)，正北为 0，顺时针 */
  headingDeg: number;
  /** 俯仰：0 = 垂直向下，90 = 平视地平线 */
  tiltDeg: number;
  /** 横滚（度） */
  rollDeg: number;
  /** 视场角（度），可选 */
  fovDeg?: number;
  /** 导入轨道时声明的插值方式 */
  interpolation?: KeyframeInterpolation;
};
