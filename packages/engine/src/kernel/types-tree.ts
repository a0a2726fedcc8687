import type { ComparisonResult, TreeValue } from './tree-value.js';

export interface SearchTreeNode<TSelf> {
  readonly value: TreeValue;
  readonly left: TSelf | null;
  readonly right: TSelf | null;
}

export interface BstNode extends SearchTreeNode<BstNode> {}

/** `height` is 1 for a leaf and always `1 + max(height(left), height(right))` on the committed tree. */
export interface AvlNode extends SearchTreeNode<AvlNode> {
  readonly height: number;
}

export type ChildSide = 'left' | 'right';

export type TraversalOrder = 'preorder' | 'inorder' | 'postorder' | 'levelorder';

export const TRAVERSAL_ORDERS: readonly TraversalOrder[] = ['preorder', 'inorder', 'postorder', 'levelorder'];

export type DeleteCase = 'noChildren' | 'oneChild' | 'twoChildren' | 'notFound';

export type RotationKind = 'LL' | 'RR' | 'LR' | 'RL';

export interface RotationPlan {
  readonly kind: RotationKind;
  /** The lowest unbalanced node on the insert path; the rotation is rooted here. */
  readonly pivotKey: TreeValue;
  readonly childKey: TreeValue;
  readonly grandchildKey: TreeValue | null;
  /** Node that takes the pivot's place once the rotation has run. */
  readonly newSubtreeRootKey: TreeValue;
}

export interface IdleOperation {
  readonly kind: 'idle';
}

export interface CreatingRootOperation {
  readonly kind: 'creatingRoot';
  readonly value: TreeValue;
  readonly progress: number;
}

export interface InsertingOperation {
  readonly kind: 'inserting';
  readonly value: TreeValue;
  readonly parentKey: TreeValue;
  readonly side: ChildSide;
  readonly path: readonly TreeValue[];
  readonly cursorIndex: number;
  readonly cursorKey: TreeValue;
  readonly comparison: ComparisonResult;
  readonly progress: number;
}

export interface SearchingOperation {
  readonly kind: 'searching';
  readonly target: TreeValue;
  readonly path: readonly TreeValue[];
  readonly cursorIndex: number;
  readonly cursorKey: TreeValue | null;
  readonly comparison: ComparisonResult | null;
  readonly progress: number;
}

export interface SearchFoundOperation {
  readonly kind: 'searchFound';
  readonly target: TreeValue;
  readonly nodeKey: TreeValue;
  readonly path: readonly TreeValue[];
}

export interface SearchNotFoundOperation {
  readonly kind: 'searchNotFound';
  readonly target: TreeValue;
  readonly lastKey: TreeValue | null;
  readonly path: readonly TreeValue[];
}

export interface DeletingOperation {
  readonly kind: 'deleting';
  readonly target: TreeValue;
  readonly path: readonly TreeValue[];
  readonly deleteCase: DeleteCase;
  /** In-order successor for a two-children delete, located at request time. */
  readonly replacementKey: TreeValue | null;
  readonly replacementPath: readonly TreeValue[];
  readonly cursorIndex: number;
  readonly cursorKey: TreeValue | null;
  readonly comparison: ComparisonResult | null;
  readonly progress: number;
}

export interface TraversingOperation {
  readonly kind: 'traversing';
  readonly order: TraversalOrder;
  readonly sequence: readonly TreeValue[];
  readonly visited: readonly TreeValue[];
  readonly cursorIndex: number;
  readonly cursor: TreeValue | null;
  readonly progress: number;
}

export type PendingOperation =
  | IdleOperation
  | CreatingRootOperation
  | InsertingOperation
  | SearchingOperation
  | SearchFoundOperation
  | SearchNotFoundOperation
  | DeletingOperation
  | TraversingOperation;

export type PendingOperationKind = PendingOperation['kind'];

export type AvlInsertPhase = 'descent' | 'balanceCheck' | 'rotationDisclosure' | 'rotationExecution';

export interface AvlInsertingOperation extends Omit<InsertingOperation, 'kind'> {
  readonly kind: 'inserting';
  readonly phase: AvlInsertPhase;
  /** Insert path plus the new value, walked bottom-up during the balance check. */
  readonly checkPath: readonly TreeValue[];
  readonly checkKey: TreeValue | null;
  /** Balance factor of `checkKey` in the tree as it stands before the insert is committed. */
  readonly checkBalanceFactor: number | null;
  /** Disclosed from the rotation-disclosure phase onwards; null before it or when no rotation is planned. */
  readonly rotation: RotationPlan | null;
}

export type AvlPendingOperation = Exclude<PendingOperation, InsertingOperation> | AvlInsertingOperation;

export type SearchTreeCommand =
  | { readonly kind: 'insert'; readonly value: unknown }
  | { readonly kind: 'search'; readonly value: unknown }
  | { readonly kind: 'delete'; readonly value: unknown }
  | { readonly kind: 'traverse'; readonly order: TraversalOrder };

export type SearchTreeCommandKind = SearchTreeCommand['kind'];

export type SearchTreeCommitOutcome =
  | {
      readonly kind: 'inserted';
      readonly value: TreeValue;
      readonly parentKey: TreeValue | null;
      readonly side: ChildSide | null;
      readonly rotation: RotationPlan | null;
    }
  | { readonly kind: 'found'; readonly target: TreeValue; readonly path: readonly TreeValue[] }
  | { readonly kind: 'notFound'; readonly target: TreeValue; readonly lastKey: TreeValue | null }
  | {
      readonly kind: 'deleted';
      readonly target: TreeValue;
      readonly deleteCase: Exclude<DeleteCase, 'notFound'>;
      readonly replacementKey: TreeValue | null;
    }
  | { readonly kind: 'deleteMissed'; readonly target: TreeValue }
  | { readonly kind: 'traversed'; readonly order: TraversalOrder; readonly sequence: readonly TreeValue[] };
