import { describe, it, expect } from 'vitest';
import { Rect } from '@/spatial/rect.js';
import { linearPickSeeds, linearSplit } from '@/spatial/split.js';
import { InvariantViolationError } from '@/spatial/errors.js';
import { seededRandom } from '../../helpers/jobs.js';

interface Item {
  name: string;
  rect: Rect;
}

const PAD = 0.2;

function item(name: string, latitude: number, longitude = 0): Item {
  return { name, rect: Rect.aroundPoint({ longitude, latitude }, PAD) };
}

const names = (items: Item[]) => items.map((i) => i.name);

describe('线性分裂 · 种子选择', () => {
  const clusters = [
    item('a0', 0),
    item('a1', 0.1),
    item('a2', 0.2),
    item('b0', 10),
    item('b1', 10.1),
    item('b2', 10.2),
  ];

  it('选取归一化间距最大的一对作为种子', () => {
    expect(linearPickSeeds(clusters)).toEqual([0, 5]);
  });

  it('纬度相同时沿经度轴选种', () => {
    const alongLon = [item('w', 0, -5), item('m', 0, 0), item('e', 0, 5)];
    expect(linearPickSeeds(alongLon)).toEqual([0, 2]);
  });

  it('元素不足 2 个时报告不变量错误', () => {
    expect(() => linearPickSeeds([item('solo', 0)])).toThrow(InvariantViolationError);
  });
});

describe('线性分裂 · 分组', () => {
  it('两个簇被分到不同分组', () => {
    const items = [
      item('a0', 0),
      item('a1', 0.1),
      item('a2', 0.2),
      item('b0', 10),
      item('b1', 10.1),
      item('b2', 10.2),
    ];
    const { first, second } = linearSplit(items, 2);
    expect(names(first)).toEqual(['a0', 'a1', 'a2']);
    expect(names(second)).toEqual(['b2', 'b0', 'b1']);
  });

  it('完全相同的元素按数量交替分配', () => {
    const items = Array.from({ length: 31 }, (_, i) => item(`same-${i}`, 1, 1));
    const { first, second } = linearSplit(items, 15);
    expect(first).toHaveLength(16);
    expect(second).toHaveLength(15);
  });

  it('剩余元素不足时强制补足较小分组', () => {
    // 种子为最远的两端，其余元素都靠近 a 端
    const items = [
      item('far', 50),
      item('n0', 0),
      item('n1', 0.05),
      item('n2', 0.1),
      item('n3', 0.15),
      item('n4', 0.2),
    ];
    const { first, second } = linearSplit(items, 3);
    expect(names(first)).toEqual(['n0', 'n1', 'n2']);
    expect(names(second)).toEqual(['far', 'n3', 'n4']);
  });

  it('随机输入：两组满足最小数量且恰好覆盖全部元素', () => {
    const random = seededRandom(11);
    for (let round = 0; round < 50; round++) {
      const items = Array.from({ length: 9 }, (_, i) =>
        item(`r${round}-${i}`, random() * 20 - 10, random() * 20 - 10),
      );
      const { first, second } = linearSplit(items, 4);
      expect(first.length).toBeGreaterThanOrEqual(4);
      expect(second.length).toBeGreaterThanOrEqual(4);
      expect([...names(first), ...names(second)].sort()).toEqual(names(items).sort());
    }
  });

  it('元素数少于 2 倍最小数量时报错', () => {
    expect(() => linearSplit([item('a', 0), item('b', 1), item('c', 2)], 2)).toThrow(
      InvariantViolationError,
    );
  });
});
