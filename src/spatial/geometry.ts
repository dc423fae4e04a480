/**
 * 球面距离与查询矩形计算
 */

import { Rect } from './rect.js';
import type { GeoPoint } from './types.js';

/**
 * 地球平均半径（千米）
 */
export const EARTH_RADIUS_KM = 6371;

export class GeometryUtils {
  static toRadians(degrees: number): number {
    return degrees * (Math.PI / 180);
  }

  static toDegrees(radians: number): number {
    return radians * (180 / Math.PI);
  }

  /**
   * 使用 Haversine 公式计算两点间大圆距离（千米）
   */
  static haversineKm(from: GeoPoint, to: GeoPoint): number {
    const dLat = this.toRadians(to.latitude - from.latitude);
    const dLon = this.toRadians(to.longitude - from.longitude);
    const lat1 = this.toRadians(from.latitude);
    const lat2 = this.toRadians(to.latitude);

    const a =
      Math.sin(dLat / 2) * Math.sin(dLat / 2) +
      Math.sin(dLon / 2) * Math.sin(dLon / 2) * Math.cos(lat1) * Math.cos(lat2);
    const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

    return EARTH_RADIUS_KM * c;
  }

  /**
   * 将经度折算到 [-180, 180)
   */
  static normalizeLongitude(longitude: number): number {
    return ((((longitude + 180) % 360) + 360) % 360) - 180;
  }

  /**
   * 非法或负数半径按 0 处理
   */
  static normalizeRadiusKm(radiusKm: number): number {
    if (typeof radiusKm !== 'number' || !Number.isFinite(radiusKm) || radiusKm < 0) {
      return 0;
    }
    return radiusKm;
  }

  /**
   * 半径对应的纬度/经度跨度（度）
   *
   * 只会高估不会低估：纬度跨度取 r/R，经度跨度按查询带内最高纬度处的
   * 大圆距离下界反推；跨度覆盖全部经度时返回 180。
   */
  static degreeDeltas(center: GeoPoint, radiusKm: number): { dLat: number; dLon: number } {
    const angular = this.normalizeRadiusKm(radiusKm) / EARTH_RADIUS_KM;
    if (angular >= Math.PI) {
      return { dLat: 180, dLon: 180 };
    }

    const dLat = this.toDegrees(angular);
    const maxAbsLat = Math.min(90, Math.abs(center.latitude) + dLat);
    const cosMax = Math.cos(this.toRadians(maxAbsLat));
    const s = cosMax > 0 ? Math.sin(angular / 2) / cosMax : Infinity;
    const dLon = s >= 1 ? 180 : this.toDegrees(2 * Math.asin(s));

    return { dLat, dLon };
  }

  /**
   * 构造覆盖查询圆的粗粒度矩形
   *
   * 矩形额外外扩 pad 度，保证零半径查询也拥有非零面积；
   * 跨越 ±180° 经线时追加平移 360° 的副本。
   */
  static queryRects(center: GeoPoint, radiusKm: number, pad: number): Rect[] {
    const { dLat, dLon } = this.degreeDeltas(center, radiusKm);
    const minX = center.latitude - dLat - pad;
    const maxX = center.latitude + dLat + pad;

    if (dLon >= 180) {
      return [new Rect(minX, maxX, -180 - pad, 180 + pad)];
    }

    const base = new Rect(minX, maxX, center.longitude - dLon - pad, center.longitude + dLon + pad);
    const rects = [base];
    if (base.minY < -180) rects.push(base.shiftY(360));
    if (base.maxY > 180) rects.push(base.shiftY(-360));
    return rects;
  }
}
