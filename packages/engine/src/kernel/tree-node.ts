import { compareTreeValues, treeValueKind, type TreeValue, type TreeValueKind } from './tree-value.js';
import type { BstNode, SearchTreeNode, TraversalOrder } from './types-tree.js';

export interface DescentPath<N> {
  readonly nodes: readonly N[];
  /** The node holding the target, or null when the descent ran into an empty link. */
  readonly match: N | null;
}

export const createBstNode = (value: TreeValue, left: BstNode | null = null, right: BstNode | null = null): BstNode => ({
  value,
  left,
  right,
});

/** Walks from the root towards `target`, recording every node compared along the way. */
export function descend<N extends SearchTreeNode<N>>(root: N | null, target: TreeValue): DescentPath<N> {
  const nodes: N[] = [];
  let current = root;
  while (current !== null) {
    nodes.push(current);
    const order = compareTreeValues(target, current.value);
    if (order === 0) {
      return { nodes, match: current };
    }
    current = order < 0 ? current.left : current.right;
  }
  return { nodes, match: null };
}

export function pathValues<N extends SearchTreeNode<N>>(nodes: readonly N[]): readonly TreeValue[] {
  return nodes.map((node) => node.value);
}

export function findNode<N extends SearchTreeNode<N>>(root: N | null, target: TreeValue): N | null {
  return descend(root, target).match;
}

export function minNode<N extends SearchTreeNode<N>>(node: N): N {
  let current = node;
  while (current.left !== null) {
    current = current.left;
  }
  return current;
}

/** Nodes from `node` down the left spine to its minimum, inclusive. */
export function leftSpine<N extends SearchTreeNode<N>>(node: N): readonly N[] {
  const spine: N[] = [node];
  let current = node;
  while (current.left !== null) {
    current = current.left;
    spine.push(current);
  }
  return spine;
}

export function countNodes<N extends SearchTreeNode<N>>(node: N | null): number {
  if (node === null) {
    return 0;
  }
  return 1 + countNodes(node.left) + countNodes(node.right);
}

export function measureHeight<N extends SearchTreeNode<N>>(node: N | null): number {
  if (node === null) {
    return 0;
  }
  return 1 + Math.max(measureHeight(node.left), measureHeight(node.right));
}

export function rootValueKind<N extends SearchTreeNode<N>>(root: N | null): TreeValueKind | null {
  return root === null ? null : treeValueKind(root.value);
}

export function traverseValues<N extends SearchTreeNode<N>>(root: N | null, order: TraversalOrder): readonly TreeValue[] {
  const result: TreeValue[] = [];

  const walk = (node: N | null): void => {
    if (node === null) {
      return;
    }
    if (order === 'preorder') {
      result.push(node.value);
    }
    walk(node.left);
    if (order === 'inorder') {
      result.push(node.value);
    }
    walk(node.right);
    if (order === 'postorder') {
      result.push(node.value);
    }
  };

  if (order !== 'levelorder') {
    walk(root);
    return result;
  }

  const frontier: N[] = root === null ? [] : [root];
  for (let index = 0; index < frontier.length; index += 1) {
    const node = frontier[index];
    if (node === undefined) {
      break;
    }
    result.push(node.value);
    if (node.left !== null) {
      frontier.push(node.left);
    }
    if (node.right !== null) {
      frontier.push(node.right);
    }
  }
  return result;
}

export function isStrictlyOrdered<N extends SearchTreeNode<N>>(root: N | null): boolean {
  const values = traverseValues(root, 'inorder');
  for (let index = 1; index < values.length; index += 1) {
    const previous = values[index - 1];
    const current = values[index];
    if (previous === undefined || current === undefined || compareTreeValues(previous, current) >= 0) {
      return false;
    }
  }
  return true;
}

/** Ordinary recursive BST insert. Returns a new root; the input tree is left untouched. */
export function insertBst(node: BstNode | null, value: TreeValue): BstNode {
  if (node === null) {
    return createBstNode(value);
  }
  const order = compareTreeValues(value, node.value);
  if (order < 0) {
    return createBstNode(node.value, insertBst(node.left, value), node.right);
  }
  if (order > 0) {
    return createBstNode(node.value, node.left, insertBst(node.right, value));
  }
  return node;
}

/** Ordinary recursive BST delete; a two-children node takes its in-order successor's value. */
export function deleteBst(node: BstNode | null, value: TreeValue): BstNode | null {
  if (node === null) {
    return null;
  }
  const order = compareTreeValues(value, node.value);
  if (order < 0) {
    return createBstNode(node.value, deleteBst(node.left, value), node.right);
  }
  if (order > 0) {
    return createBstNode(node.value, node.left, deleteBst(node.right, value));
  }
  if (node.left === null) {
    return node.right;
  }
  if (node.right === null) {
    return node.left;
  }
  const successor = minNode(node.right);
  return createBstNode(successor.value, node.left, deleteBst(node.right, successor.value));
}

/** Structural equality on values and links, ignoring any extra fields. */
export function sameShape<A extends SearchTreeNode<A>, B extends SearchTreeNode<B>>(left: A | null, right: B | null): boolean {
  if (left === null || right === null) {
    return left === null && right === null;
  }
  return left.value === right.value && sameShape(left.left, right.left) && sameShape(left.right, right.right);
}
