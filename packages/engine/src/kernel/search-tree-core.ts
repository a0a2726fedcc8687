import { clampProgress, stepIndexAt } from './phase-boundaries.js';
import {
  invalidValueError,
  operationPendingError,
  structureInactiveError,
} from './runtime-error.js';
import {
  countNodes,
  descend,
  findNode,
  leftSpine,
  measureHeight,
  pathValues,
  rootValueKind,
  traverseValues,
} from './tree-node.js';
import {
  assertSameValueKind,
  describeComparison,
  normalizeTreeValue,
  type ComparisonResult,
  type TreeValue,
} from './tree-value.js';
import type {
  ChildSide,
  DeleteCase,
  DeletingOperation,
  IdleOperation,
  InsertingOperation,
  PendingOperation,
  RotationPlan,
  SearchTreeCommand,
  SearchTreeCommitOutcome,
  SearchTreeNode,
  SearchingOperation,
  TraversalOrder,
  TraversingOperation,
} from './types-tree.js';
import { TRAVERSAL_ORDERS } from './types-tree.js';
import { REQUEST_STARTED, type AnimatedStructure, type RequestResult } from './types-structure.js';

export interface InsertRequest<N> {
  readonly value: TreeValue;
  readonly root: N;
  /** Nodes compared on the way down; the last one receives the new child. */
  readonly path: readonly N[];
  readonly parentKey: TreeValue;
  readonly side: ChildSide;
}

export interface InsertingBase {
  readonly kind: 'inserting';
  readonly value: TreeValue;
  readonly parentKey: TreeValue;
  readonly side: ChildSide;
  readonly progress: number;
}

/** Everything that differs between a plain BST and a self-balancing tree. */
export interface SearchTreeAlgorithms<N extends SearchTreeNode<N>, TInserting extends InsertingBase> {
  readonly structureKind: 'bst' | 'avl';
  insert(root: N | null, value: TreeValue): N;
  remove(root: N | null, value: TreeValue): N | null;
  beginInsert(request: InsertRequest<N>): TInserting;
  advanceInsert(pending: TInserting, progress: number, root: N): TInserting;
  insertStepCount(pending: TInserting): number;
  /** Rotation the commit is expected to perform, reported in the outcome. */
  insertRotation(pending: TInserting): RotationPlan | null;
}

export type SearchTreePending<TInserting> = Exclude<PendingOperation, InsertingOperation> | TInserting;

export interface SearchTreeEngine<N extends SearchTreeNode<N>, TInserting extends InsertingBase>
  extends AnimatedStructure<SearchTreeCommand, SearchTreeCommitOutcome> {
  setActive(active: boolean): void;
  insert(value: unknown): RequestResult;
  search(value: unknown): RequestResult;
  delete(value: unknown): RequestResult;
  traverse(order: TraversalOrder): RequestResult;
  getPendingState(): SearchTreePending<TInserting>;
  getRoot(): N | null;
  /** Replaces the whole tree and drops any pending operation. */
  loadRoot(root: N | null): void;
  clear(): void;
  isEmpty(): boolean;
  getHeight(): number;
  getSize(): number;
  findNode(key: unknown): N | null;
  inorderValues(): readonly TreeValue[];
}

const IDLE: IdleOperation = Object.freeze({ kind: 'idle' });

type NonInsertOperation = Exclude<PendingOperation, InsertingOperation>;

interface Cursor {
  readonly cursorIndex: number;
  readonly cursorKey: TreeValue | null;
  readonly comparison: ComparisonResult | null;
}

export function cursorAlong(target: TreeValue, path: readonly TreeValue[], fraction: number): Cursor {
  const cursorIndex = stepIndexAt(fraction, path.length);
  const cursorKey = path[cursorIndex] ?? null;
  return {
    cursorIndex,
    cursorKey,
    comparison: cursorKey === null ? null : describeComparison(target, cursorKey),
  };
}

export interface InsertCursor {
  readonly cursorIndex: number;
  readonly cursorKey: TreeValue;
  readonly comparison: ComparisonResult;
}

/** Cursor for an insert descent; the path always ends at the new node's parent. */
export function insertCursorAlong(
  value: TreeValue,
  path: readonly TreeValue[],
  parentKey: TreeValue,
  fraction: number,
): InsertCursor {
  const cursorIndex = stepIndexAt(fraction, path.length);
  const cursorKey = path[cursorIndex] ?? parentKey;
  return { cursorIndex, cursorKey, comparison: describeComparison(value, cursorKey) };
}

export function isRestingKind(kind: PendingOperation['kind']): boolean {
  return kind === 'idle' || kind === 'searchFound' || kind === 'searchNotFound';
}

function classifyDelete<N extends SearchTreeNode<N>>(node: N | null): DeleteCase {
  if (node === null) {
    return 'notFound';
  }
  if (node.left !== null && node.right !== null) {
    return 'twoChildren';
  }
  return node.left === null && node.right === null ? 'noChildren' : 'oneChild';
}

export function createSearchTreeEngine<N extends SearchTreeNode<N>, TInserting extends InsertingBase>(
  algorithms: SearchTreeAlgorithms<N, TInserting>,
): SearchTreeEngine<N, TInserting> {
  const label = algorithms.structureKind.toUpperCase();

  let root: N | null = null;
  let active = false;
  // An insert in flight lives in `inserting`; every other operation in `operation`.
  let operation: NonInsertOperation = IDLE;
  let inserting: TInserting | null = null;

  const pendingKind = (): PendingOperation['kind'] => inserting?.kind ?? operation.kind;

  const isIdle = (): boolean => inserting === null && isRestingKind(operation.kind);

  const resetPending = (): void => {
    operation = IDLE;
    inserting = null;
  };

  const assertCanRequest = (): void => {
    if (!active) {
      throw structureInactiveError(label);
    }
    if (!isIdle()) {
      throw operationPendingError(label, pendingKind());
    }
  };

  const readValue = (input: unknown): TreeValue => {
    const value = normalizeTreeValue(input);
    assertSameValueKind(rootValueKind(root), value);
    return value;
  };

  const requestInsert = (input: unknown): RequestResult => {
    assertCanRequest();
    const value = readValue(input);

    if (root === null) {
      operation = { kind: 'creatingRoot', value, progress: 0 };
      return REQUEST_STARTED;
    }

    const descent = descend(root, value);
    const parent = descent.nodes.at(-1);
    if (descent.match !== null || parent === undefined) {
      return { status: 'skipped', reason: 'duplicate' };
    }

    operation = IDLE;
    inserting = algorithms.beginInsert({
      value,
      root,
      path: descent.nodes,
      parentKey: parent.value,
      side: describeComparison(value, parent.value) === 'less' ? 'left' : 'right',
    });
    return REQUEST_STARTED;
  };

  const requestSearch = (input: unknown): RequestResult => {
    assertCanRequest();
    const target = readValue(input);
    const path = pathValues(descend(root, target).nodes);
    const searching: SearchingOperation = { kind: 'searching', target, path, ...cursorAlong(target, path, 0), progress: 0 };
    operation = searching;
    return REQUEST_STARTED;
  };

  const requestDelete = (input: unknown): RequestResult => {
    assertCanRequest();
    const target = readValue(input);
    const descent = descend(root, target);
    const match = descent.match;
    const deleteCase = classifyDelete(match);
    const path = match === null ? [] : pathValues(descent.nodes);
    const successorSpine = deleteCase === 'twoChildren' && match !== null && match.right !== null
      ? pathValues(leftSpine(match.right))
      : [];

    const deleting: DeletingOperation = {
      kind: 'deleting',
      target,
      path,
      deleteCase,
      replacementKey: successorSpine.at(-1) ?? null,
      replacementPath: successorSpine,
      ...cursorAlong(target, path, 0),
      progress: 0,
    };
    operation = deleting;
    return REQUEST_STARTED;
  };

  const requestTraverse = (order: TraversalOrder): RequestResult => {
    assertCanRequest();
    if (!TRAVERSAL_ORDERS.includes(order)) {
      throw invalidValueError('Unknown traversal order.', { order: String(order) });
    }
    const sequence = traverseValues(root, order);
    const traversing: TraversingOperation = {
      kind: 'traversing',
      order,
      sequence,
      visited: [],
      cursorIndex: 0,
      cursor: sequence[0] ?? null,
      progress: 0,
    };
    operation = traversing;
    return REQUEST_STARTED;
  };

  const advance = (progress: number): void => {
    if (inserting !== null) {
      if (root !== null) {
        inserting = algorithms.advanceInsert(inserting, progress, root);
      }
      return;
    }
    switch (operation.kind) {
      case 'creatingRoot':
        operation = { ...operation, progress };
        return;
      case 'searching':
        operation = { ...operation, ...cursorAlong(operation.target, operation.path, progress), progress };
        return;
      case 'deleting':
        operation = { ...operation, ...cursorAlong(operation.target, operation.path, progress), progress };
        return;
      case 'traversing': {
        const cursorIndex = stepIndexAt(progress, operation.sequence.length);
        operation = {
          ...operation,
          cursorIndex,
          cursor: operation.sequence[cursorIndex] ?? null,
          visited: operation.sequence.slice(0, cursorIndex),
          progress,
        };
        return;
      }
      default:
        return;
    }
  };

  // Single point where the real tree changes. The captured request values are
  // replayed through the ordinary algorithms, never re-derived from live state.
  const commit = (): SearchTreeCommitOutcome | null => {
    if (inserting !== null) {
      const insertRequest = inserting;
      const rotation = algorithms.insertRotation(insertRequest);
      root = algorithms.insert(root, insertRequest.value);
      resetPending();
      return {
        kind: 'inserted',
        value: insertRequest.value,
        parentKey: insertRequest.parentKey,
        side: insertRequest.side,
        rotation,
      };
    }

    const request = operation;
    switch (request.kind) {
      case 'creatingRoot':
        root = algorithms.insert(null, request.value);
        resetPending();
        return { kind: 'inserted', value: request.value, parentKey: null, side: null, rotation: null };
      case 'searching': {
        const match = findNode(root, request.target);
        if (match !== null) {
          operation = { kind: 'searchFound', target: request.target, nodeKey: match.value, path: request.path };
          return { kind: 'found', target: request.target, path: request.path };
        }
        const lastKey = request.path.at(-1) ?? null;
        operation = { kind: 'searchNotFound', target: request.target, lastKey, path: request.path };
        return { kind: 'notFound', target: request.target, lastKey };
      }
      case 'deleting':
        resetPending();
        if (request.deleteCase === 'notFound') {
          return { kind: 'deleteMissed', target: request.target };
        }
        root = algorithms.remove(root, request.target);
        return {
          kind: 'deleted',
          target: request.target,
          deleteCase: request.deleteCase,
          replacementKey: request.replacementKey,
        };
      case 'traversing':
        resetPending();
        return { kind: 'traversed', order: request.order, sequence: request.sequence };
      default:
        return null;
    }
  };

  const stepCount = (): number => {
    if (inserting !== null) {
      return algorithms.insertStepCount(inserting);
    }
    switch (operation.kind) {
      case 'searching':
      case 'deleting':
        return Math.max(1, operation.path.length);
      case 'traversing':
        return Math.max(1, operation.sequence.length);
      default:
        return 1;
    }
  };

  return {
    structureKind: algorithms.structureKind,

    isActive(): boolean {
      return active;
    },

    setActive(value: boolean): void {
      active = value;
    },

    isIdle,

    insert: requestInsert,
    search: requestSearch,
    delete: requestDelete,
    traverse: requestTraverse,

    dispatch(command: SearchTreeCommand): RequestResult {
      switch (command.kind) {
        case 'insert':
          return requestInsert(command.value);
        case 'search':
          return requestSearch(command.value);
        case 'delete':
          return requestDelete(command.value);
        case 'traverse':
          return requestTraverse(command.order);
      }
    },

    setProgress(progress: number): SearchTreeCommitOutcome | null {
      const clamped = clampProgress(progress);
      if (isIdle()) {
        return null;
      }
      if (clamped >= 1) {
        return commit();
      }
      advance(clamped);
      return null;
    },

    getProgress(): number {
      if (inserting !== null) {
        return inserting.progress;
      }
      if (operation.kind === 'idle') {
        return 0;
      }
      if (operation.kind === 'searchFound' || operation.kind === 'searchNotFound') {
        return 1;
      }
      return operation.progress;
    },

    getStepCount: stepCount,

    getPendingKind: pendingKind,

    cancel: resetPending,

    getPendingState(): SearchTreePending<TInserting> {
      return inserting ?? operation;
    },

    getRoot(): N | null {
      return root;
    },

    loadRoot(nextRoot: N | null): void {
      root = nextRoot;
      resetPending();
    },

    clear(): void {
      root = null;
      resetPending();
    },

    isEmpty(): boolean {
      return root === null;
    },

    getHeight(): number {
      return measureHeight(root);
    },

    getSize(): number {
      return countNodes(root);
    },

    findNode(key: unknown): N | null {
      return findNode(root, normalizeTreeValue(key));
    },

    inorderValues(): readonly TreeValue[] {
      return traverseValues(root, 'inorder');
    },
  };
}
