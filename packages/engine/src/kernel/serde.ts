import type { ZodError } from 'zod';
import { createAvlNode, hasConsistentHeights, isBalanced } from './avl-balance.js';
import { countLeaves } from './huffman-codes.js';
import { serializedTreeInvalidError } from './runtime-error.js';
import {
  SerializedAvlTreeSchema,
  SerializedBstTreeSchema,
  SerializedHuffmanTreeSchema,
  type SerializedAvlNode,
  type SerializedAvlTree,
  type SerializedBstNode,
  type SerializedBstTree,
  type SerializedHuffmanNode,
  type SerializedHuffmanTree,
} from './schemas-tree.js';
import { createBstNode, isStrictlyOrdered, traverseValues } from './tree-node.js';
import { treeValueKind, type TreeValue } from './tree-value.js';
import type { FrequencyEntry, HuffmanFragment } from './types-huffman.js';
import type { AvlNode, BstNode, SearchTreeNode } from './types-tree.js';

export type HuffmanSnapshot =
  | { readonly source: 'frequencies'; readonly frequencies: readonly FrequencyEntry[] }
  | { readonly source: 'root'; readonly root: HuffmanFragment | null };

interface RootLoader<N> {
  loadRoot(root: N | null): void;
}

interface HuffmanLoader {
  loadFrequencies(frequencies: readonly FrequencyEntry[]): void;
  loadRoot(root: HuffmanFragment | null): void;
}

interface HuffmanSource {
  getFrequencies(): readonly FrequencyEntry[] | null;
  getRoot(): HuffmanFragment | null;
}

const describeIssues = (error: ZodError): readonly string[] =>
  error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);

function assertSearchTreeShape<N extends SearchTreeNode<N>>(root: N | null): void {
  const values: readonly TreeValue[] = traverseValues(root, 'inorder');
  const first = values[0];
  if (first !== undefined && !values.every((value) => treeValueKind(value) === treeValueKind(first))) {
    throw serializedTreeInvalidError('Tree mixes numeric and text values.');
  }
  if (!isStrictlyOrdered(root)) {
    throw serializedTreeInvalidError('Tree values are not strictly increasing in order.', { inorder: values });
  }
}

const bstToRecord = (node: BstNode | null): SerializedBstNode | null =>
  node === null ? null : { value: node.value, left: bstToRecord(node.left), right: bstToRecord(node.right) };

const bstFromRecord = (record: SerializedBstNode | null): BstNode | null =>
  record === null ? null : createBstNode(record.value, bstFromRecord(record.left), bstFromRecord(record.right));

const avlToRecord = (node: AvlNode | null): SerializedAvlNode | null =>
  node === null
    ? null
    : { value: node.value, height: node.height, left: avlToRecord(node.left), right: avlToRecord(node.right) };

const storedHeightsOf = (record: SerializedAvlNode | null): AvlNode | null =>
  record === null
    ? null
    : { value: record.value, height: record.height, left: storedHeightsOf(record.left), right: storedHeightsOf(record.right) };

const avlFromRecord = (record: SerializedAvlNode | null): AvlNode | null =>
  record === null ? null : createAvlNode(record.value, avlFromRecord(record.left), avlFromRecord(record.right));

export const serializeBstTree = (root: BstNode | null): SerializedBstTree => ({
  kind: 'bst',
  root: bstToRecord(root),
});

export const deserializeBstTree = (input: unknown): BstNode | null => {
  const parsed = SerializedBstTreeSchema.safeParse(input);
  if (!parsed.success) {
    throw serializedTreeInvalidError('Malformed BST document.', { issues: describeIssues(parsed.error) });
  }
  const root = bstFromRecord(parsed.data.root);
  assertSearchTreeShape(root);
  return root;
};

export const serializeAvlTree = (root: AvlNode | null): SerializedAvlTree => ({
  kind: 'avl',
  root: avlToRecord(root),
});

export const deserializeAvlTree = (input: unknown): AvlNode | null => {
  const parsed = SerializedAvlTreeSchema.safeParse(input);
  if (!parsed.success) {
    throw serializedTreeInvalidError('Malformed AVL document.', { issues: describeIssues(parsed.error) });
  }
  if (!hasConsistentHeights(storedHeightsOf(parsed.data.root))) {
    throw serializedTreeInvalidError('Stored AVL heights do not match the shape of the tree.');
  }
  const root = avlFromRecord(parsed.data.root);
  assertSearchTreeShape(root);
  if (!isBalanced(root)) {
    throw serializedTreeInvalidError('AVL tree is not height-balanced.');
  }
  return root;
};

const huffmanToRecord = (fragment: HuffmanFragment | null): SerializedHuffmanNode | null =>
  fragment === null
    ? null
    : {
        frequency: fragment.frequency,
        symbol: fragment.symbol,
        left: huffmanToRecord(fragment.left),
        right: huffmanToRecord(fragment.right),
      };

/**
 * Leaves are numbered left to right from 0, parents after them in post-order,
 * so a loaded tree carries the same id scheme as one merged round by round.
 */
function huffmanFromRecord(record: SerializedHuffmanNode | null): HuffmanFragment | null {
  if (record === null) {
    return null;
  }
  const symbols = new Set<string>();
  let nextLeafId = 0;
  let nextParentId = 0;

  const visit = (node: SerializedHuffmanNode, path: string): HuffmanFragment => {
    if (node.left === null && node.right === null) {
      if (node.symbol === null) {
        throw serializedTreeInvalidError('Huffman leaf has no symbol.', { path });
      }
      if (symbols.has(node.symbol)) {
        throw serializedTreeInvalidError(`Huffman symbol "${node.symbol}" appears more than once.`, { path });
      }
      symbols.add(node.symbol);
      const id = nextLeafId;
      nextLeafId += 1;
      return { id, frequency: node.frequency, symbol: node.symbol, left: null, right: null };
    }
    if (node.left === null || node.right === null || node.symbol !== null) {
      throw serializedTreeInvalidError('Huffman parent must have two children and no symbol.', { path });
    }
    const left = visit(node.left, `${path}.left`);
    const right = visit(node.right, `${path}.right`);
    if (node.frequency !== left.frequency + right.frequency) {
      throw serializedTreeInvalidError('Huffman parent frequency must equal the sum of its children.', { path });
    }
    const id = nextParentId;
    nextParentId += 1;
    return { id, frequency: node.frequency, symbol: null, left, right };
  };

  const provisional = visit(record, 'root');
  const leafCount = countLeaves(provisional);
  const offsetParents = (fragment: HuffmanFragment): HuffmanFragment =>
    fragment.left === null || fragment.right === null
      ? fragment
      : { ...fragment, id: leafCount + fragment.id, left: offsetParents(fragment.left), right: offsetParents(fragment.right) };
  return offsetParents(provisional);
}

/** Prefers the frequencies the tree was built from, as rebuilding reproduces the same tree. */
export const serializeHuffmanTree = (source: HuffmanSource): SerializedHuffmanTree => {
  const frequencies = source.getFrequencies();
  if (frequencies !== null) {
    return { kind: 'huffman', frequencies: frequencies.map(([symbol, frequency]): [string, number] => [symbol, frequency]) };
  }
  return { kind: 'huffman', root: huffmanToRecord(source.getRoot()) };
};

export const deserializeHuffmanTree = (input: unknown): HuffmanSnapshot => {
  const parsed = SerializedHuffmanTreeSchema.safeParse(input);
  if (!parsed.success) {
    throw serializedTreeInvalidError('Malformed Huffman document.', { issues: describeIssues(parsed.error) });
  }
  const document = parsed.data;
  if ('frequencies' in document) {
    return { source: 'frequencies', frequencies: document.frequencies };
  }
  return { source: 'root', root: huffmanFromRecord(document.root) };
};

/** Validates `input` and loads it; the engine's pending operation is reset to idle. */
export function restoreBstTree(engine: RootLoader<BstNode>, input: unknown): void {
  engine.loadRoot(deserializeBstTree(input));
}

export function restoreAvlTree(engine: RootLoader<AvlNode>, input: unknown): void {
  engine.loadRoot(deserializeAvlTree(input));
}

export function restoreHuffmanTree(engine: HuffmanLoader, input: unknown): void {
  const snapshot = deserializeHuffmanTree(input);
  if (snapshot.source === 'frequencies') {
    engine.loadFrequencies(snapshot.frequencies);
  } else {
    engine.loadRoot(snapshot.root);
  }
}
