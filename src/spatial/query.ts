/**
 * 半径查询执行器
 *
 * 先用覆盖查询圆的矩形在索引中剪枝，再以 Haversine 距离精确过滤。
 */

import { GeometryUtils } from './geometry.js';
import type { Entry } from './node.js';
import type { Rect } from './rect.js';
import { isGeoPoint } from './types.js';
import type { GeoPoint, RadiusMatch, RadiusSearchOptions } from './types.js';

/**
 * 候选来源：能按矩形返回条目的索引
 */
export interface CandidateSource {
  readonly padDegrees: number;
  searchRect(rect: Rect): Entry[];
}

export function titleMatches(title: string, filter: string): boolean {
  return title.toLowerCase() === filter.toLowerCase();
}

export class QueryExecutor {
  constructor(private readonly source: CandidateSource) {}

  /**
   * 粗粒度候选集，跨经线时多个查询矩形的结果去重
   */
  candidates(center: GeoPoint, radiusKm: number): Entry[] {
    const rects = GeometryUtils.queryRects(center, radiusKm, this.source.padDegrees);
    if (rects.length === 1) {
      return this.source.searchRect(rects[0]);
    }

    const seen = new Set<Entry>();
    for (const rect of rects) {
      for (const entry of this.source.searchRect(rect)) seen.add(entry);
    }
    return [...seen];
  }

  radiusSearch(
    center: GeoPoint,
    radiusKm: number,
    options: RadiusSearchOptions = {},
  ): RadiusMatch[] {
    // 中心坐标非法时 NaN 会让矩形剪枝与距离比较同时失效
    if (!isGeoPoint(center)) {
      return [];
    }

    const radius = GeometryUtils.normalizeRadiusKm(radiusKm);
    const { title } = options;
    const matches: RadiusMatch[] = [];

    for (const entry of this.candidates(center, radius)) {
      const distanceKm = GeometryUtils.haversineKm(center, entry.job.location);
      if (!(distanceKm <= radius)) continue;
      if (title !== undefined && !titleMatches(entry.job.title, title)) continue;
      matches.push({ job: entry.job, distanceKm });
    }

    if (options.sortByDistance) {
      matches.sort((a, b) => a.distanceKm - b.distanceKm);
    }

    if (options.limit !== undefined && options.limit >= 0) {
      return matches.slice(0, options.limit);
    }
    return matches;
  }
}
