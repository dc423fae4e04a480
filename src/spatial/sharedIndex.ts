/**
 * 共享空间索引
 *
 * 单个 R-Tree 由一把读写锁保护：插入独占，查询共享。
 * 树上的操作均为同步调用，在持锁期间一次执行完毕。
 */

import { checkTree } from '../maintenance/check.js';
import type { TreeCheckResult } from '../maintenance/check.js';
import { ReadWriteLock } from '../utils/rwlock.js';
import { QueryExecutor } from './query.js';
import { RTree } from './rtree.js';
import type {
  GeoPoint,
  Job,
  RTreeOptions,
  RTreeStats,
  RadiusMatch,
  RadiusSearchOptions,
} from './types.js';

export class SharedSpatialIndex {
  private readonly lock = new ReadWriteLock();
  private readonly executor: QueryExecutor;

  constructor(private readonly tree: RTree) {
    this.executor = new QueryExecutor(tree);
  }

  /**
   * 批量构建应在索引被共享之前完成
   */
  static build(jobs: Iterable<Job>, options: RTreeOptions = {}): SharedSpatialIndex {
    return new SharedSpatialIndex(RTree.build(jobs, options));
  }

  insert(job: Job): Promise<void> {
    return this.lock.withWrite(() => this.tree.insert(job));
  }

  radiusSearch(center: GeoPoint, radiusKm: number, title?: string): Promise<Job[]> {
    return this.lock.withRead(() => this.tree.rangeQuery(center, radiusKm, title));
  }

  search(
    center: GeoPoint,
    radiusKm: number,
    options: RadiusSearchOptions = {},
  ): Promise<RadiusMatch[]> {
    return this.lock.withRead(() => this.executor.radiusSearch(center, radiusKm, options));
  }

  stats(): Promise<RTreeStats> {
    return this.lock.withRead(() => this.tree.getStats());
  }

  check(): Promise<TreeCheckResult> {
    return this.lock.withRead(() => checkTree(this.tree));
  }
}
