import { Rect } from '../spatial/rect.js';
import { nodeSize } from '../spatial/node.js';
import type { NodeId, RTreeNode } from '../spatial/node.js';
import type { RTree } from '../spatial/rtree.js';

export type TreeCheckReason =
  | 'rect_not_tight'
  | 'unbalanced_leaf'
  | 'fanout_out_of_bounds'
  | 'parent_mismatch'
  | 'root_has_parent'
  | 'size_mismatch'
  | 'height_mismatch';

export interface TreeCheckError {
  nodeId: NodeId;
  depth: number;
  reason: TreeCheckReason;
  detail?: string;
}

export interface TreeCheckResult {
  ok: boolean;
  errors: TreeCheckError[];
}

function contentRect(tree: RTree, node: RTreeNode): Rect | null {
  if (node.kind === 'leaf') {
    return Rect.union(node.entries.map((e) => e.rect));
  }
  return Rect.union(node.children.map((id) => tree.node(id).rect));
}

/**
 * 校验树的结构不变量：外包矩形紧致、叶子同层、扇出上下界、父子编号一致
 */
export function checkTree(tree: RTree): TreeCheckResult {
  const errors: TreeCheckError[] = [];
  const root = tree.root;
  let leafDepth: number | null = null;
  let entries = 0;

  if (root.parent !== null) {
    errors.push({ nodeId: root.id, depth: 0, reason: 'root_has_parent' });
  }

  for (const { node, depth } of tree.walk()) {
    const tight = contentRect(tree, node);
    if (!tight || !tight.equals(node.rect)) {
      errors.push({
        nodeId: node.id,
        depth,
        reason: 'rect_not_tight',
        detail: `${node.rect.toString()} vs ${tight ? tight.toString() : 'empty'}`,
      });
    }

    const size = nodeSize(node);
    const isRoot = node.id === root.id;
    const tooSmall = isRoot
      ? node.kind === 'internal' && size < 2
      : size < tree.minFanout;
    if (tooSmall || size > tree.maxFanout) {
      errors.push({
        nodeId: node.id,
        depth,
        reason: 'fanout_out_of_bounds',
        detail: `size=${size}, bounds=${tree.minFanout}..${tree.maxFanout}`,
      });
    }

    if (node.kind === 'leaf') {
      entries += node.entries.length;
      if (leafDepth === null) {
        leafDepth = depth;
      } else if (leafDepth !== depth) {
        errors.push({
          nodeId: node.id,
          depth,
          reason: 'unbalanced_leaf',
          detail: `expected depth ${leafDepth}`,
        });
      }
    } else {
      for (const childId of node.children) {
        const child = tree.node(childId);
        if (child.parent !== node.id) {
          errors.push({
            nodeId: childId,
            depth: depth + 1,
            reason: 'parent_mismatch',
            detail: `parent=${child.parent ?? 'null'}, expected ${node.id}`,
          });
        }
      }
    }
  }

  if (entries !== tree.size) {
    errors.push({
      nodeId: root.id,
      depth: 0,
      reason: 'size_mismatch',
      detail: `entries=${entries}, size=${tree.size}`,
    });
  }

  if (leafDepth !== null && leafDepth !== tree.height) {
    errors.push({
      nodeId: root.id,
      depth: 0,
      reason: 'height_mismatch',
      detail: `leafDepth=${leafDepth}, height=${tree.height}`,
    });
  }

  return { ok: errors.length === 0, errors };
}
