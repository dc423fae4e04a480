/**
 * R-Tree 节点与节点池
 *
 * 节点统一存放在 NodeArena 中，父子关系只记录节点编号：
 * 子节点归属于父节点的 children 列表，parent 字段仅作反向查找，
 * 分裂时被替换的节点从节点池释放，不会留下悬挂引用。
 */

import { InvariantViolationError } from './errors.js';
import { Rect } from './rect.js';
import { linearSplit } from './split.js';
import type { Job } from './types.js';

export type NodeId = number;

/**
 * 叶子条目：职位记录及其外扩后的 MBR
 */
export interface Entry {
  readonly job: Job;
  readonly rect: Rect;
}

interface NodeBase {
  readonly id: NodeId;
  rect: Rect;
  parent: NodeId | null;
}

export interface LeafNode extends NodeBase {
  readonly kind: 'leaf';
  readonly entries: Entry[];
}

export interface InternalNode extends NodeBase {
  readonly kind: 'internal';
  readonly children: NodeId[];
}

export type RTreeNode = LeafNode | InternalNode;

export function nodeSize(node: RTreeNode): number {
  return node.kind === 'leaf' ? node.entries.length : node.children.length;
}

export class NodeArena {
  private readonly nodes = new Map<NodeId, RTreeNode>();
  private nextId: NodeId = 0;

  constructor(
    readonly maxFanout: number,
    readonly minFanout: number,
  ) {}

  get count(): number {
    return this.nodes.size;
  }

  has(id: NodeId): boolean {
    return this.nodes.has(id);
  }

  get(id: NodeId): RTreeNode {
    const node = this.nodes.get(id);
    if (!node) {
      throw new InvariantViolationError(`节点 ${id} 不存在或已被释放`, id);
    }
    return node;
  }

  getInternal(id: NodeId): InternalNode {
    const node = this.get(id);
    if (node.kind !== 'internal') {
      throw new InvariantViolationError(`节点 ${id} 应为内部节点`, id);
    }
    return node;
  }

  createLeaf(entries: Entry[]): LeafNode {
    const rect = Rect.union(entries.map((e) => e.rect));
    if (!rect) {
      throw new InvariantViolationError('不能创建空叶子节点');
    }
    const leaf: LeafNode = {
      kind: 'leaf',
      id: this.nextId++,
      rect,
      parent: null,
      entries: [...entries],
    };
    this.nodes.set(leaf.id, leaf);
    return leaf;
  }

  createInternal(children: NodeId[]): InternalNode {
    const rect = Rect.union(children.map((id) => this.get(id).rect));
    if (!rect) {
      throw new InvariantViolationError('不能创建空内部节点');
    }
    const node: InternalNode = {
      kind: 'internal',
      id: this.nextId++,
      rect,
      parent: null,
      children: [...children],
    };
    this.nodes.set(node.id, node);
    for (const childId of children) {
      this.get(childId).parent = node.id;
    }
    return node;
  }

  release(id: NodeId): void {
    this.nodes.delete(id);
  }

  canAcceptOneMore(node: RTreeNode): boolean {
    return nodeSize(node) + 1 <= this.maxFanout;
  }

  insertEntry(leaf: LeafNode, entry: Entry): void {
    leaf.entries.push(entry);
    leaf.rect = leaf.rect.expandToAccommodate(entry.rect);
  }

  insertChild(parent: InternalNode, childId: NodeId): void {
    const child = this.get(childId);
    child.parent = parent.id;
    parent.children.push(childId);
    parent.rect = parent.rect.expandToAccommodate(child.rect);
  }

  /**
   * 移除子节点并按剩余子节点重新计算外包矩形
   */
  removeChild(parent: InternalNode, childId: NodeId): void {
    const index = parent.children.indexOf(childId);
    if (index < 0) {
      throw new InvariantViolationError(`节点 ${childId} 不是节点 ${parent.id} 的子节点`, parent.id);
    }
    if (parent.children.length === 1) {
      throw new InvariantViolationError(`移除后节点 ${parent.id} 将为空`, parent.id);
    }

    parent.children.splice(index, 1);
    const child = this.nodes.get(childId);
    if (child && child.parent === parent.id) {
      child.parent = null;
    }

    const rect = Rect.union(parent.children.map((id) => this.get(id).rect));
    if (!rect) {
      throw new InvariantViolationError(`节点 ${parent.id} 外包矩形计算失败`, parent.id);
    }
    parent.rect = rect;
  }

  /**
   * 将溢出元素连同原有内容分配到两个新节点
   *
   * 原节点保持不变，由调用方在父节点中完成替换后释放。
   */
  split(node: LeafNode, overflow: Entry): [LeafNode, LeafNode];
  split(node: InternalNode, overflow: NodeId): [InternalNode, InternalNode];
  split(node: RTreeNode, overflow: Entry | NodeId): [RTreeNode, RTreeNode];
  split(node: RTreeNode, overflow: Entry | NodeId): [RTreeNode, RTreeNode] {
    if (nodeSize(node) === 0) {
      throw new InvariantViolationError(`不能分裂空节点 ${node.id}`, node.id);
    }

    if (node.kind === 'leaf') {
      if (typeof overflow === 'number') {
        throw new InvariantViolationError(`叶子节点 ${node.id} 只能接收条目`, node.id);
      }
      const { first, second } = linearSplit([...node.entries, overflow], this.minFanout);
      return [this.createLeaf(first), this.createLeaf(second)];
    }

    if (typeof overflow !== 'number') {
      throw new InvariantViolationError(`内部节点 ${node.id} 只能接收子节点`, node.id);
    }
    const items = [...node.children, overflow].map((id) => ({ id, rect: this.get(id).rect }));
    const { first, second } = linearSplit(items, this.minFanout);
    return [
      this.createInternal(first.map((item) => item.id)),
      this.createInternal(second.map((item) => item.id)),
    ];
  }
}
