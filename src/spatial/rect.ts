/**
 * 最小外包矩形（MBR）
 *
 * X 轴对应纬度，Y 轴对应经度。实例不可变，所有运算返回新矩形。
 * 零面积矩形合法，但在重叠判断中视为不与任何矩形重叠。
 */

import type { GeoPoint } from './types.js';

export class Rect {
  constructor(
    readonly minX: number,
    readonly maxX: number,
    readonly minY: number,
    readonly maxY: number,
  ) {}

  /**
   * 将点向四周外扩 pad 度
   */
  static aroundPoint(point: GeoPoint, pad: number): Rect {
    return new Rect(
      point.latitude - pad,
      point.latitude + pad,
      point.longitude - pad,
      point.longitude + pad,
    );
  }

  /**
   * 计算一组矩形的并集外包矩形
   */
  static union(rects: Iterable<Rect>): Rect | null {
    let result: Rect | null = null;
    for (const rect of rects) {
      result = result ? result.expandToAccommodate(rect) : rect;
    }
    return result;
  }

  width(): number {
    return this.maxX - this.minX;
  }

  height(): number {
    return this.maxY - this.minY;
  }

  area(): number {
    return Math.abs(this.height() * this.width());
  }

  expandToAccommodate(other: Rect): Rect {
    return new Rect(
      Math.min(this.minX, other.minX),
      Math.max(this.maxX, other.maxX),
      Math.min(this.minY, other.minY),
      Math.max(this.maxY, other.maxY),
    );
  }

  /**
   * 分离轴判断；任一矩形面积为 0 时不重叠
   */
  overlaps(other: Rect): boolean {
    if (this.area() === 0 || other.area() === 0) return false;
    if (this.minX > other.maxX || other.minX > this.maxX) return false;
    if (this.minY > other.maxY || other.minY > this.maxY) return false;
    return true;
  }

  /**
   * other 严格落在当前矩形内部，且当前面积不小于 other
   */
  containsWithoutExpansion(other: Rect): boolean {
    if (this.area() < other.area()) return false;
    return (
      this.minX < other.minX &&
      this.maxX > other.maxX &&
      this.minY < other.minY &&
      this.maxY > other.maxY
    );
  }

  /**
   * 容纳 other 后面积相对当前面积的百分比（不扩张时为 100）
   */
  percentExpansionNeeded(other: Rect): number {
    const area = this.area();
    if (area === 0) {
      return other.area() === 0 ? 0 : Infinity;
    }
    return (this.expandToAccommodate(other).area() * 100) / area;
  }

  equals(other: Rect): boolean {
    return (
      this.minX === other.minX &&
      this.maxX === other.maxX &&
      this.minY === other.minY &&
      this.maxY === other.maxY
    );
  }

  /**
   * 沿经度方向平移，用于跨越 ±180° 的查询
   */
  shiftY(delta: number): Rect {
    return new Rect(this.minX, this.maxX, this.minY + delta, this.maxY + delta);
  }

  toString(): string {
    return `Rect[x=${this.minX}..${this.maxX}, y=${this.minY}..${this.maxY}]`;
  }
}
