/**
 * 线性代价分裂（Guttman 1984, §3.5.3）
 *
 * 叶子条目与内部子节点共用同一套算法，只要求元素携带外包矩形。
 */

import { InvariantViolationError } from './errors.js';
import { Rect } from './rect.js';

export interface Bounded {
  readonly rect: Rect;
}

export interface SplitGroups<T> {
  first: T[];
  second: T[];
}

interface Group<T> {
  items: T[];
  rect: Rect;
}

/**
 * 沿单轴寻找“最高下界”与“最低上界”两个极端元素，返回其归一化间距
 */
function extremesAlongAxis<T extends Bounded>(
  items: readonly T[],
  low: (r: Rect) => number,
  high: (r: Rect) => number,
  extent: number,
): { lowSeed: number; highSeed: number; separation: number } {
  let highestLow = 0;
  for (let i = 1; i < items.length; i++) {
    if (low(items[i].rect) > low(items[highestLow].rect)) highestLow = i;
  }

  let lowestHigh = highestLow === 0 ? 1 : 0;
  for (let i = 0; i < items.length; i++) {
    if (i === highestLow) continue;
    if (high(items[i].rect) < high(items[lowestHigh].rect)) lowestHigh = i;
  }

  const gap = low(items[highestLow].rect) - high(items[lowestHigh].rect);
  return {
    lowSeed: lowestHigh,
    highSeed: highestLow,
    separation: extent > 0 ? gap / extent : 0,
  };
}

/**
 * 选出两个分裂种子的下标
 *
 * 在 X、Y 两轴上分别计算极端元素对的归一化间距，取间距较大的轴；
 * 两轴相等时取 X 轴。
 */
export function linearPickSeeds<T extends Bounded>(items: readonly T[]): [number, number] {
  if (items.length < 2) {
    throw new InvariantViolationError(`分裂至少需要 2 个元素，实际为 ${items.length}`);
  }

  const bounds = Rect.union(items.map((item) => item.rect));
  if (!bounds) {
    throw new InvariantViolationError('无法计算分裂元素的外包矩形');
  }

  const alongX = extremesAlongAxis(
    items,
    (r) => r.minX,
    (r) => r.maxX,
    bounds.width(),
  );
  const alongY = extremesAlongAxis(
    items,
    (r) => r.minY,
    (r) => r.maxY,
    bounds.height(),
  );

  const chosen = alongY.separation > alongX.separation ? alongY : alongX;
  return [chosen.lowSeed, chosen.highSeed];
}

function assign<T extends Bounded>(group: Group<T>, item: T): void {
  group.items.push(item);
  group.rect = group.rect.expandToAccommodate(item.rect);
}

/**
 * 按扩张百分比、当前面积、当前元素数依次比较，返回应接收元素的分组
 */
function preferredGroup<T extends Bounded>(a: Group<T>, b: Group<T>, item: T): Group<T> {
  const expansionA = a.rect.percentExpansionNeeded(item.rect);
  const expansionB = b.rect.percentExpansionNeeded(item.rect);
  if (expansionA !== expansionB) return expansionA < expansionB ? a : b;

  const areaA = a.rect.area();
  const areaB = b.rect.area();
  if (areaA !== areaB) return areaA < areaB ? a : b;

  return b.items.length < a.items.length ? b : a;
}

/**
 * 将溢出的 M+1 个元素分配到两个分组，每组至少 minFanout 个
 */
export function linearSplit<T extends Bounded>(
  items: readonly T[],
  minFanout: number,
): SplitGroups<T> {
  if (items.length < 2 * minFanout) {
    throw new InvariantViolationError(
      `元素数 ${items.length} 不足以分裂为两个各含 ${minFanout} 个元素的节点`,
    );
  }

  const [seedA, seedB] = linearPickSeeds(items);
  const a: Group<T> = { items: [items[seedA]], rect: items[seedA].rect };
  const b: Group<T> = { items: [items[seedB]], rect: items[seedB].rect };
  const remaining = items.filter((_, i) => i !== seedA && i !== seedB);

  for (let i = 0; i < remaining.length; i++) {
    const left = remaining.length - i;

    // 剩余元素恰好只够补足某组的最小数量时，全部划入该组
    if (minFanout - a.items.length >= left) {
      for (const item of remaining.slice(i)) assign(a, item);
      break;
    }
    if (minFanout - b.items.length >= left) {
      for (const item of remaining.slice(i)) assign(b, item);
      break;
    }

    const item = remaining[i];
    assign(preferredGroup(a, b, item), item);
  }

  return { first: a.items, second: b.items };
}
