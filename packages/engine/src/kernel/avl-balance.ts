import { minNode } from './tree-node.js';
import { compareTreeValues, type TreeValue } from './tree-value.js';
import type { AvlNode, RotationPlan } from './types-tree.js';

/** Receives every rotation in the order the rebalancing routine performs it. */
export type RotationObserver = (rotation: RotationPlan) => void;

export const heightOf = (node: AvlNode | null): number => (node === null ? 0 : node.height);

export const balanceFactorOf = (node: AvlNode | null): number =>
  node === null ? 0 : heightOf(node.left) - heightOf(node.right);

export function createAvlNode(value: TreeValue, left: AvlNode | null = null, right: AvlNode | null = null): AvlNode {
  return { value, left, right, height: 1 + Math.max(heightOf(left), heightOf(right)) };
}

export function rotateLeft(node: AvlNode): AvlNode {
  const pivot = node.right;
  if (pivot === null) {
    return node;
  }
  const lowered = createAvlNode(node.value, node.left, pivot.left);
  return createAvlNode(pivot.value, lowered, pivot.right);
}

export function rotateRight(node: AvlNode): AvlNode {
  const pivot = node.left;
  if (pivot === null) {
    return node;
  }
  const lowered = createAvlNode(node.value, pivot.right, node.right);
  return createAvlNode(pivot.value, pivot.left, lowered);
}

/**
 * Restores the AVL property at `node`, assuming both subtrees already satisfy it.
 * Ties on the child's balance factor resolve to the single rotation (LL / RR).
 */
export function rebalance(node: AvlNode, observer?: RotationObserver): AvlNode {
  const balance = balanceFactorOf(node);

  if (balance > 1 && node.left !== null) {
    const child = node.left;
    if (balanceFactorOf(child) >= 0) {
      observer?.({ kind: 'LL', pivotKey: node.value, childKey: child.value, grandchildKey: null, newSubtreeRootKey: child.value });
      return rotateRight(node);
    }
    const grandchild = child.right;
    if (grandchild !== null) {
      observer?.({
        kind: 'LR',
        pivotKey: node.value,
        childKey: child.value,
        grandchildKey: grandchild.value,
        newSubtreeRootKey: grandchild.value,
      });
    }
    return rotateRight(createAvlNode(node.value, rotateLeft(child), node.right));
  }

  if (balance < -1 && node.right !== null) {
    const child = node.right;
    if (balanceFactorOf(child) <= 0) {
      observer?.({ kind: 'RR', pivotKey: node.value, childKey: child.value, grandchildKey: null, newSubtreeRootKey: child.value });
      return rotateLeft(node);
    }
    const grandchild = child.left;
    if (grandchild !== null) {
      observer?.({
        kind: 'RL',
        pivotKey: node.value,
        childKey: child.value,
        grandchildKey: grandchild.value,
        newSubtreeRootKey: grandchild.value,
      });
    }
    return rotateLeft(createAvlNode(node.value, node.left, rotateRight(child)));
  }

  return node;
}

/** Recursive insert that recomputes heights and rebalances on the way back up. */
export function insertAvl(node: AvlNode | null, value: TreeValue, observer?: RotationObserver): AvlNode {
  if (node === null) {
    return createAvlNode(value);
  }
  const order = compareTreeValues(value, node.value);
  if (order === 0) {
    return node;
  }
  const updated = order < 0
    ? createAvlNode(node.value, insertAvl(node.left, value, observer), node.right)
    : createAvlNode(node.value, node.left, insertAvl(node.right, value, observer));
  return rebalance(updated, observer);
}

export function deleteAvl(node: AvlNode | null, value: TreeValue, observer?: RotationObserver): AvlNode | null {
  if (node === null) {
    return null;
  }
  const order = compareTreeValues(value, node.value);
  let updated: AvlNode | null;
  if (order < 0) {
    updated = createAvlNode(node.value, deleteAvl(node.left, value, observer), node.right);
  } else if (order > 0) {
    updated = createAvlNode(node.value, node.left, deleteAvl(node.right, value, observer));
  } else if (node.left === null) {
    updated = node.right;
  } else if (node.right === null) {
    updated = node.left;
  } else {
    const successor = minNode(node.right);
    updated = createAvlNode(successor.value, node.left, deleteAvl(node.right, successor.value, observer));
  }
  return updated === null ? null : rebalance(updated, observer);
}

export function cloneAvl(node: AvlNode | null): AvlNode | null {
  if (node === null) {
    return null;
  }
  return { value: node.value, left: cloneAvl(node.left), right: cloneAvl(node.right), height: node.height };
}

/**
 * Replays the real insert on a disposable clone of the tree and reports the first
 * rotation it performs. An insert needs at most one (single or double) rotation.
 */
export function planInsertRotation(root: AvlNode | null, value: TreeValue): RotationPlan | null {
  let plan: RotationPlan | null = null;
  const shadow = cloneAvl(root);
  insertAvl(shadow, value, (rotation) => {
    plan ??= rotation;
  });
  return plan;
}

export function isBalanced(node: AvlNode | null): boolean {
  if (node === null) {
    return true;
  }
  return Math.abs(balanceFactorOf(node)) <= 1 && isBalanced(node.left) && isBalanced(node.right);
}

/** True when every stored height equals the height recomputed from the children. */
export function hasConsistentHeights(node: AvlNode | null): boolean {
  if (node === null) {
    return true;
  }
  return (
    node.height === 1 + Math.max(heightOf(node.left), heightOf(node.right))
    && hasConsistentHeights(node.left)
    && hasConsistentHeights(node.right)
  );
}
