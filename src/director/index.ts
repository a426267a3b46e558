/**
 * director 模块入口
 *
 * 统一导出"导演"层：预设注册表、轨迹生成、镜头规划、平台推荐。
 */

export * from './presets';
export * from './pathGenerator';
export * from './shotPlanner';
export * from './platformRecommender';
