/**
 * 空间索引数据类型定义
 *
 * 坐标约定：经度在前、纬度在后，与 GeoJSON 一致
 */

/**
 * 地理坐标点
 */
export interface GeoPoint {
  longitude: number;
  latitude: number;
}

/**
 * 职位记录，入库后不可变
 */
export interface Job {
  readonly title: string;
  readonly location: Readonly<GeoPoint>;
}

/**
 * 半径查询命中项
 */
export interface RadiusMatch {
  job: Job;
  /** 与查询中心的大圆距离（千米） */
  distanceKm: number;
}

/**
 * 半径查询选项
 */
export interface RadiusSearchOptions {
  /** 职位名称过滤（大小写不敏感的完全匹配） */
  title?: string;
  /** 按距离升序返回 */
  sortByDistance?: boolean;
  /** 最大结果数量 */
  limit?: number;
}

/**
 * R-Tree 构造选项
 */
export interface RTreeOptions {
  /**
   * 单个节点最多容纳的子节点/条目数
   *
   * @default 30
   * @minimum 2
   * @maximum 1024
   */
  maxFanout?: number;

  /**
   * 非根节点最少容纳的子节点/条目数，叶子与内部节点共用
   *
   * @default floor(maxFanout / 2)
   * @minimum 1
   */
  minFanout?: number;

  /**
   * 点位外扩的度数，使单点也拥有非零面积的 MBR
   *
   * @default 0.2
   * @minimum 1e-6
   */
  padDegrees?: number;
}

export const DEFAULT_MAX_FANOUT = 30;
export const DEFAULT_PAD_DEGREES = 0.2;

/**
 * 外扩下限：低于坐标的浮点精度时外扩后矩形面积会退化为 0
 */
export const MIN_PAD_DEGREES = 1e-6;

/**
 * 索引统计信息
 */
export interface RTreeStats {
  size: number;
  height: number;
  nodeCount: number;
  leafCount: number;
  /** 累计分裂次数（含内部节点） */
  splitCount: number;
  maxFanout: number;
  minFanout: number;
}

export function createJob(title: string, longitude: number, latitude: number): Job {
  return Object.freeze({ title, location: Object.freeze({ longitude, latitude }) });
}

/**
 * 判断输入是否为合法坐标点
 */
export function isGeoPoint(value: unknown): value is GeoPoint {
  if (value === null || typeof value !== 'object') return false;
  if (!('longitude' in value) || !('latitude' in value)) return false;
  const { longitude, latitude } = value;
  return (
    typeof longitude === 'number' &&
    Number.isFinite(longitude) &&
    typeof latitude === 'number' &&
    Number.isFinite(latitude)
  );
}

/**
 * 判断输入是否符合 R-Tree 构造选项的基本约束
 */
export function isRTreeOptions(value: unknown): value is RTreeOptions {
  if (value === null || typeof value !== 'object') {
    return false;
  }

  const options = value as Record<string, unknown>;

  const ensureOptionalNumber = (
    key: keyof RTreeOptions,
    { min, max, integer }: { min?: number; max?: number; integer?: boolean } = {},
  ): boolean => {
    if (!(key in options) || options[key] === undefined) return true;
    const candidate = options[key];
    if (typeof candidate !== 'number' || !Number.isFinite(candidate)) return false;
    if (integer && !Number.isInteger(candidate)) return false;
    if (min !== undefined && candidate < min) return false;
    if (max !== undefined && candidate > max) return false;
    return true;
  };

  if (!ensureOptionalNumber('maxFanout', { min: 2, max: 1024, integer: true })) {
    return false;
  }

  const maxFanout =
    typeof options.maxFanout === 'number' ? options.maxFanout : DEFAULT_MAX_FANOUT;
  if (!ensureOptionalNumber('minFanout', { min: 1, max: Math.floor(maxFanout / 2), integer: true })) {
    return false;
  }

  if (!ensureOptionalNumber('padDegrees', { min: MIN_PAD_DEGREES, max: 90 })) {
    return false;
  }

  return true;
}

/**
 * 断言输入符合 R-Tree 构造选项要求
 */
export function assertRTreeOptions(
  value: unknown,
  message?: string,
): asserts value is RTreeOptions {
  if (!isRTreeOptions(value)) {
    throw new TypeError(
      message ??
        'R-Tree 选项格式错误：maxFanout 须为 2..1024 的整数，minFanout 须为 1..floor(maxFanout/2) 的整数，padDegrees 须为 1e-6..90 之间的数',
    );
  }
}
