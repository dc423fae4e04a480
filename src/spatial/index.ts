// 空间索引对外接口：供数据访问层调用的 build / insert / radiusSearch

import { RTree } from './rtree.js';
import type { GeoPoint, Job, RTreeOptions } from './types.js';

export function build(jobs: Iterable<Job>, options: RTreeOptions = {}): RTree {
  return RTree.build(jobs, options);
}

export function insert(tree: RTree, job: Job): void {
  tree.insert(job);
}

/**
 * 查询不会抛错，未命中时返回空数组
 */
export function radiusSearch(
  tree: RTree,
  center: GeoPoint,
  radiusKm: number,
  title?: string,
): Job[] {
  return tree.rangeQuery(center, radiusKm, title);
}

export { RTree, resolveRTreeOptions } from './rtree.js';
export { Rect } from './rect.js';
export { GeometryUtils, EARTH_RADIUS_KM } from './geometry.js';
export { QueryExecutor, titleMatches } from './query.js';
export type { CandidateSource } from './query.js';
export { SharedSpatialIndex } from './sharedIndex.js';
export { NodeArena, nodeSize } from './node.js';
export type { Entry, LeafNode, InternalNode, NodeId, RTreeNode } from './node.js';
export { linearSplit, linearPickSeeds } from './split.js';
export type { Bounded, SplitGroups } from './split.js';
export { SpatialIndexError, EmptyInputError, InvariantViolationError } from './errors.js';
export type { SpatialIndexErrorCode } from './errors.js';
export * from './types.js';
