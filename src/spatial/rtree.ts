/**
 * R-Tree空间索引实现
 *
 * 面向点位职位记录的 Guttman R-Tree：逐条插入、线性代价分裂、
 * 自底向上的外包矩形调整，以及基于矩形剪枝的候选检索。
 */

import { EmptyInputError, InvariantViolationError } from './errors.js';
import { GeometryUtils } from './geometry.js';
import { NodeArena, nodeSize } from './node.js';
import type { Entry, InternalNode, LeafNode, NodeId, RTreeNode } from './node.js';
import { QueryExecutor } from './query.js';
import { Rect } from './rect.js';
import {
  DEFAULT_MAX_FANOUT,
  DEFAULT_PAD_DEGREES,
  assertRTreeOptions,
} from './types.js';
import type { GeoPoint, Job, RTreeOptions, RTreeStats } from './types.js';

/**
 * 解析构造选项，minFanout 缺省为 floor(maxFanout / 2)，叶子与内部节点共用
 */
export function resolveRTreeOptions(options: RTreeOptions = {}): Required<RTreeOptions> {
  assertRTreeOptions(options);
  const maxFanout = options.maxFanout ?? DEFAULT_MAX_FANOUT;
  return {
    maxFanout,
    minFanout: options.minFanout ?? Math.floor(maxFanout / 2),
    padDegrees: options.padDegrees ?? DEFAULT_PAD_DEGREES,
  };
}

export class RTree {
  readonly maxFanout: number;
  readonly minFanout: number;
  readonly padDegrees: number;

  private readonly arena: NodeArena;
  private rootId: NodeId;
  private treeHeight = 0;
  private entryCount = 0;
  private splitCount = 0;

  private constructor(first: Job, options: RTreeOptions) {
    const config = resolveRTreeOptions(options);
    this.maxFanout = config.maxFanout;
    this.minFanout = config.minFanout;
    this.padDegrees = config.padDegrees;
    this.arena = new NodeArena(this.maxFanout, this.minFanout);
    this.rootId = this.arena.createLeaf([this.createEntry(first)]).id;
    this.entryCount = 1;
  }

  /**
   * 按顺序逐条插入构建索引
   */
  static build(jobs: Iterable<Job>, options: RTreeOptions = {}): RTree {
    const iterator = jobs[Symbol.iterator]();
    const head = iterator.next();
    if (head.done) {
      throw new EmptyInputError();
    }

    const tree = new RTree(head.value, options);
    for (let next = iterator.next(); !next.done; next = iterator.next()) {
      tree.insert(next.value);
    }
    return tree;
  }

  /** 根节点层级为 0，向下递增 */
  get height(): number {
    return this.treeHeight;
  }

  get size(): number {
    return this.entryCount;
  }

  get root(): RTreeNode {
    return this.arena.get(this.rootId);
  }

  /**
   * 按编号读取节点，供一致性检查与调试使用
   */
  node(id: NodeId): RTreeNode {
    return this.arena.get(id);
  }

  /**
   * 条目矩形使用折算后的经度，查询矩形的 ±360° 副本只覆盖 [-180, 180]
   */
  createEntry(job: Job): Entry {
    const { longitude, latitude } = job.location;
    return {
      job,
      rect: Rect.aroundPoint(
        { longitude: GeometryUtils.normalizeLongitude(longitude), latitude },
        this.padDegrees,
      ),
    };
  }

  insert(job: Job): void {
    const entry = this.createEntry(job);
    const leaf = this.chooseLeaf(entry.rect);

    if (this.arena.canAcceptOneMore(leaf)) {
      this.arena.insertEntry(leaf, entry);
      this.expandAncestors(leaf);
    } else {
      const [first, second] = this.arena.split(leaf, entry);
      this.propagateSplit(leaf, first, second);
    }

    this.entryCount++;
  }

  /**
   * 自根向下选择插入叶子
   *
   * 优先进入无需扩张即可容纳的子节点；否则依次比较扩张百分比、
   * 扩张后面积、子节点自身的元素数。
   */
  chooseLeaf(rect: Rect): LeafNode {
    let node = this.root;
    while (node.kind === 'internal') {
      node = this.arena.get(this.chooseSubtree(node, rect));
    }
    return node;
  }

  private chooseSubtree(node: InternalNode, rect: Rect): NodeId {
    if (node.children.length === 0) {
      throw new InvariantViolationError(`内部节点 ${node.id} 没有子节点`, node.id);
    }

    let best: RTreeNode | null = null;
    let bestExpansion = Infinity;
    let bestArea = Infinity;

    for (const childId of node.children) {
      const child = this.arena.get(childId);
      if (child.rect.containsWithoutExpansion(rect)) {
        return childId;
      }

      const expansion = child.rect.percentExpansionNeeded(rect);
      const area = child.rect.expandToAccommodate(rect).area();
      if (
        best === null ||
        expansion < bestExpansion ||
        (expansion === bestExpansion && area < bestArea) ||
        (expansion === bestExpansion && area === bestArea && nodeSize(child) < nodeSize(best))
      ) {
        best = child;
        bestExpansion = expansion;
        bestArea = area;
      }
    }

    if (best === null) {
      throw new InvariantViolationError(`内部节点 ${node.id} 无可选子节点`, node.id);
    }
    return best.id;
  }

  /**
   * 未分裂时沿父链扩张外包矩形，矩形不再变化即可停止
   */
  private expandAncestors(node: RTreeNode): void {
    let child = node;
    while (child.parent !== null) {
      const parent = this.arena.getInternal(child.parent);
      const expanded = parent.rect.expandToAccommodate(child.rect);
      if (expanded.equals(parent.rect)) return;
      parent.rect = expanded;
      child = parent;
    }
  }

  /**
   * 分裂向上传播
   *
   * 循环不变量：original 已被 first/second 取代但尚未从父节点摘除。
   * 父节点能容纳新增子节点或 original 为根时循环结束，步数不超过树高。
   */
  private propagateSplit(original: RTreeNode, first: RTreeNode, second: RTreeNode): void {
    let current = original;
    let pair: [RTreeNode, RTreeNode] = [first, second];

    for (;;) {
      this.splitCount++;
      const parentId = current.parent;

      if (parentId === null) {
        const root = this.arena.createInternal([pair[0].id, pair[1].id]);
        this.arena.release(current.id);
        this.rootId = root.id;
        this.treeHeight++;
        return;
      }

      const parent = this.arena.getInternal(parentId);
      this.arena.insertChild(parent, pair[0].id);
      this.arena.removeChild(parent, current.id);
      this.arena.release(current.id);

      if (this.arena.canAcceptOneMore(parent)) {
        this.arena.insertChild(parent, pair[1].id);
        this.expandAncestors(parent);
        return;
      }

      pair = this.arena.split(parent, pair[1].id);
      current = parent;
    }
  }

  /**
   * 粗粒度检索：剪掉与查询矩形不重叠的子树，返回存活叶子中的全部条目
   */
  searchRect(query: Rect): Entry[] {
    const results: Entry[] = [];
    const stack: RTreeNode[] = [this.root];

    while (stack.length > 0) {
      const node = stack.pop();
      if (!node || !node.rect.overlaps(query)) continue;

      if (node.kind === 'leaf') {
        results.push(...node.entries);
      } else {
        for (const childId of node.children) {
          stack.push(this.arena.get(childId));
        }
      }
    }

    return results;
  }

  /**
   * 半径查询，可选职位名称过滤（大小写不敏感）
   */
  rangeQuery(center: GeoPoint, radiusKm: number, titleFilter?: string): Job[] {
    return new QueryExecutor(this)
      .radiusSearch(center, radiusKm, { title: titleFilter })
      .map((match) => match.job);
  }

  /**
   * 深度优先遍历全部节点，附带层级
   */
  *walk(): IterableIterator<{ node: RTreeNode; depth: number }> {
    const stack: Array<{ node: RTreeNode; depth: number }> = [{ node: this.root, depth: 0 }];
    while (stack.length > 0) {
      const item = stack.pop();
      if (!item) break;
      yield item;
      if (item.node.kind === 'internal') {
        for (const childId of item.node.children) {
          stack.push({ node: this.arena.get(childId), depth: item.depth + 1 });
        }
      }
    }
  }

  *jobs(): IterableIterator<Job> {
    for (const { node } of this.walk()) {
      if (node.kind === 'leaf') {
        for (const entry of node.entries) yield entry.job;
      }
    }
  }

  getStats(): RTreeStats {
    let leafCount = 0;
    for (const { node } of this.walk()) {
      if (node.kind === 'leaf') leafCount++;
    }

    return {
      size: this.entryCount,
      height: this.treeHeight,
      nodeCount: this.arena.count,
      leafCount,
      splitCount: this.splitCount,
      maxFanout: this.maxFanout,
      minFanout: this.minFanout,
    };
  }
}
