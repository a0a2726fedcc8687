import { balanceFactorOf, deleteAvl, insertAvl, planInsertRotation } from './avl-balance.js';
import {
  DEFAULT_AVL_PHASE_BOUNDARIES,
  localPhaseProgress,
  phaseIndexAt,
  stepIndexAt,
  validatePhaseBoundaries,
  type PhaseBoundaries,
} from './phase-boundaries.js';
import {
  createSearchTreeEngine,
  insertCursorAlong,
  type SearchTreeEngine,
} from './search-tree-core.js';
import { findNode, pathValues } from './tree-node.js';
import { compareTreeValues, normalizeTreeValue } from './tree-value.js';
import type { AvlInsertPhase, AvlInsertingOperation, AvlNode, RotationPlan } from './types-tree.js';

const INSERT_PHASES: readonly AvlInsertPhase[] = ['descent', 'balanceCheck', 'rotationDisclosure', 'rotationExecution'];

export interface AvlEngineOptions {
  /** End points of the descent, balance-check, disclosure and execution phases. */
  readonly phaseBoundaries?: readonly number[];
}

export interface AvlEngine extends SearchTreeEngine<AvlNode, AvlInsertingOperation> {
  readonly phaseBoundaries: PhaseBoundaries;
  /** The rotation planned for the pending insert, whatever its phase; null otherwise. */
  getRotationPlan(): RotationPlan | null;
  /**
   * Balance factor in the committed tree. The value of a pending insert that is
   * not in the tree yet reports 0; unknown keys report null.
   */
  getBalanceFactor(key: unknown): number | null;
  getInsertPhase(): AvlInsertPhase | null;
}

export function createAvlEngine(options: AvlEngineOptions = {}): AvlEngine {
  const boundaries = validatePhaseBoundaries(options.phaseBoundaries ?? DEFAULT_AVL_PHASE_BOUNDARIES);

  // Recomputed on every insert request from a shadow copy of the tree.
  let plannedRotation: RotationPlan | null = null;

  const core = createSearchTreeEngine<AvlNode, AvlInsertingOperation>({
    structureKind: 'avl',
    insert: (root, value) => insertAvl(root, value),
    remove: (root, value) => deleteAvl(root, value),

    beginInsert({ value, root, path, parentKey, side }): AvlInsertingOperation {
      plannedRotation = planInsertRotation(root, value);
      const values = pathValues(path);
      return {
        kind: 'inserting',
        value,
        parentKey,
        side,
        path: values,
        ...insertCursorAlong(value, values, parentKey, 0),
        progress: 0,
        phase: 'descent',
        checkPath: [...values, value],
        checkKey: null,
        checkBalanceFactor: null,
        rotation: null,
      };
    },

    advanceInsert(pending, progress, root): AvlInsertingOperation {
      const phaseIndex = phaseIndexAt(boundaries, progress);
      const local = localPhaseProgress(boundaries, progress);
      const phase = INSERT_PHASES[phaseIndex] ?? 'rotationExecution';

      if (phase === 'descent') {
        return {
          ...pending,
          ...insertCursorAlong(pending.value, pending.path, pending.parentKey, local),
          phase,
          checkKey: null,
          checkBalanceFactor: null,
          rotation: null,
          progress,
        };
      }

      const descentEnd = insertCursorAlong(pending.value, pending.path, pending.parentKey, 1);

      if (phase === 'balanceCheck') {
        const bottomUp = [...pending.checkPath].reverse();
        const checkKey = bottomUp[stepIndexAt(local, bottomUp.length)] ?? null;
        // Read from the committed tree: the new node is not part of it yet.
        const checked = checkKey === null ? null : findNode(root, checkKey);
        return {
          ...pending,
          ...descentEnd,
          phase,
          checkKey,
          checkBalanceFactor: checked === null ? 0 : balanceFactorOf(checked),
          rotation: null,
          progress,
        };
      }

      return {
        ...pending,
        ...descentEnd,
        phase,
        checkKey: null,
        checkBalanceFactor: null,
        rotation: plannedRotation,
        progress,
      };
    },

    insertStepCount: (pending) => Math.max(1, pending.path.length),
    insertRotation: () => plannedRotation,
  });

  const pendingInsert = (): AvlInsertingOperation | null => {
    const pending = core.getPendingState();
    return pending.kind === 'inserting' ? pending : null;
  };

  return {
    ...core,
    phaseBoundaries: boundaries,

    getRotationPlan(): RotationPlan | null {
      return pendingInsert() === null ? null : plannedRotation;
    },

    getBalanceFactor(key: unknown): number | null {
      const value = normalizeTreeValue(key);
      const node = findNode(core.getRoot(), value);
      if (node !== null) {
        return balanceFactorOf(node);
      }
      const insert = pendingInsert();
      return insert !== null && compareTreeValues(insert.value, value) === 0 ? 0 : null;
    },

    getInsertPhase(): AvlInsertPhase | null {
      return pendingInsert()?.phase ?? null;
    },
  };
}
