// =======================
// 分层导出
// =======================

// 空间索引层：R-Tree 与半径查询
export * as Spatial from './spatial/index.js';

// =======================
// 核心导出
// =======================

export { RTree, resolveRTreeOptions } from './spatial/rtree.js';
export { Rect } from './spatial/rect.js';
export { GeometryUtils, EARTH_RADIUS_KM } from './spatial/geometry.js';
export { QueryExecutor } from './spatial/query.js';
export { SharedSpatialIndex } from './spatial/sharedIndex.js';
export { build, insert, radiusSearch } from './spatial/index.js';
export {
  SpatialIndexError,
  EmptyInputError,
  InvariantViolationError,
} from './spatial/errors.js';
export {
  createJob,
  isGeoPoint,
  isRTreeOptions,
  assertRTreeOptions,
  DEFAULT_MAX_FANOUT,
  DEFAULT_PAD_DEGREES,
  MIN_PAD_DEGREES,
} from './spatial/types.js';
export type {
  GeoPoint,
  Job,
  RadiusMatch,
  RadiusSearchOptions,
  RTreeOptions,
  RTreeStats,
} from './spatial/types.js';

// =======================
// 数据访问与维护
// =======================

export { JobStore, DEFAULT_RADIUS_KM, DEFAULT_CACHE_SIZE } from './jobs/jobStore.js';
export type { JobStoreOptions, JobStoreStats } from './jobs/jobStore.js';
export { parseJobsCsv, loadJobsCsv, splitCsvLine, parseCoordinate } from './jobs/csv.js';
export type { ParsedJobs, SkippedRow, SkipReason } from './jobs/csv.js';
export { checkTree } from './maintenance/check.js';
export type { TreeCheckResult, TreeCheckError, TreeCheckReason } from './maintenance/check.js';
export { ReadWriteLock } from './utils/rwlock.js';
export type { ReleaseLock } from './utils/rwlock.js';
