/**
 * 职位数据访问层
 *
 * - 名称索引：小写职位名 → 职位列表，用于按名称精确查找
 * - 空间索引：SharedSpatialIndex，用于按半径查找
 * - LRU缓存：缓存半径查询结果，写入后整体失效
 */

import { LRUCache } from 'lru-cache';

import type { TreeCheckResult } from '../maintenance/check.js';
import { SharedSpatialIndex } from '../spatial/sharedIndex.js';
import { isGeoPoint } from '../spatial/types.js';
import type { GeoPoint, Job, RTreeOptions, RTreeStats } from '../spatial/types.js';
import { logInfo, warnOnce } from '../utils/log.js';
import { loadJobsCsv } from './csv.js';

export const DEFAULT_RADIUS_KM = 5;
export const DEFAULT_CACHE_SIZE = 500;

export interface JobStoreOptions extends RTreeOptions {
  /**
   * 半径为 0 时使用的默认半径，也是名称+位置查询的半径（千米）
   *
   * @default 5
   */
  defaultRadiusKm?: number;

  /**
   * 半径查询结果缓存条数，0 表示关闭缓存
   *
   * @default 500
   */
  cacheSize?: number;
}

export interface JobStoreStats {
  jobs: number;
  titles: number;
  index: RTreeStats;
}

function titleKey(title: string): string {
  return title.toLowerCase();
}

export class JobStore {
  private readonly titles = new Map<string, Job[]>();
  private readonly index: SharedSpatialIndex;
  private readonly cache: LRUCache<string, Job[]> | null;
  private readonly defaultRadiusKm: number;
  private generation = 0;

  private constructor(jobs: Job[], options: JobStoreOptions) {
    const { defaultRadiusKm, cacheSize, ...treeOptions } = options;
    if (
      defaultRadiusKm !== undefined &&
      (!Number.isFinite(defaultRadiusKm) || defaultRadiusKm <= 0)
    ) {
      throw new TypeError('defaultRadiusKm 须为正数');
    }
    if (cacheSize !== undefined && (!Number.isInteger(cacheSize) || cacheSize < 0)) {
      throw new TypeError('cacheSize 须为非负整数');
    }

    this.defaultRadiusKm = defaultRadiusKm ?? DEFAULT_RADIUS_KM;
    const max = cacheSize ?? DEFAULT_CACHE_SIZE;
    this.cache = max > 0 ? new LRUCache<string, Job[]>({ max }) : null;

    this.index = SharedSpatialIndex.build(jobs, treeOptions);
    for (const job of jobs) this.indexTitle(job);
  }

  /**
   * 由内存中的职位集合创建，空集合抛出 EmptyInputError
   */
  static fromJobs(jobs: Job[], options: JobStoreOptions = {}): JobStore {
    return new JobStore(jobs, options);
  }

  static async open(filePath: string, options: JobStoreOptions = {}): Promise<JobStore> {
    const parsed = await loadJobsCsv(filePath);
    const store = new JobStore(parsed.jobs, options);
    logInfo(
      `已从 ${filePath} 加载 ${parsed.jobs.length} 条职位` +
        (parsed.skipped.length > 0 ? `，跳过 ${parsed.skipped.length} 行` : ''),
    );
    return store;
  }

  private indexTitle(job: Job): void {
    const key = titleKey(job.title);
    const bucket = this.titles.get(key);
    if (bucket) {
      bucket.push(job);
    } else {
      this.titles.set(key, [job]);
    }
  }

  /**
   * 小写职位名到职位列表的映射
   */
  titleJobs(): Record<string, Job[]> {
    const result: Record<string, Job[]> = {};
    for (const [title, jobs] of this.titles) {
      result[title] = [...jobs];
    }
    return result;
  }

  searchJobsByTitle(title: string): Job[] {
    return [...(this.titles.get(titleKey(title)) ?? [])];
  }

  /**
   * 查找半径内的职位；半径为 0 时使用默认半径
   */
  async findJobsNearby(center: GeoPoint, radiusKm = 0): Promise<Job[]> {
    let radius = radiusKm;
    if (radius === 0) {
      warnOnce('default-radius', `未指定半径，使用默认半径 ${this.defaultRadiusKm}km`);
      radius = this.defaultRadiusKm;
    }
    return this.cachedSearch(center, radius);
  }

  /**
   * 在默认半径内查找名称匹配的职位
   */
  searchJobsByTitleAndLocation(title: string, center: GeoPoint): Promise<Job[]> {
    return this.cachedSearch(center, this.defaultRadiusKm, title);
  }

  async addJob(job: Job): Promise<void> {
    if (!isGeoPoint(job.location)) {
      throw new TypeError(`职位「${job.title}」的坐标无效`);
    }
    await this.index.insert(job);
    this.indexTitle(job);
    this.generation++;
    this.cache?.clear();
  }

  async stats(): Promise<JobStoreStats> {
    const index = await this.index.stats();
    return { jobs: index.size, titles: this.titles.size, index };
  }

  check(): Promise<TreeCheckResult> {
    return this.index.check();
  }

  private async cachedSearch(center: GeoPoint, radiusKm: number, title?: string): Promise<Job[]> {
    const key = JSON.stringify([
      center.longitude,
      center.latitude,
      radiusKm,
      title === undefined ? null : titleKey(title),
    ]);
    const hit = this.cache?.get(key);
    if (hit) {
      return [...hit];
    }

    // 查询期间若发生写入，结果不再写回缓存
    const generation = this.generation;
    const jobs = await this.index.radiusSearch(center, radiusKm, title);
    if (this.cache && generation === this.generation) {
      this.cache.set(key, jobs);
    }
    return [...jobs];
  }
}
