import { createSearchTreeEngine, insertCursorAlong, type SearchTreeEngine } from './search-tree-core.js';
import { deleteBst, insertBst, pathValues } from './tree-node.js';
import type { BstNode, InsertingOperation } from './types-tree.js';

export type BstEngine = SearchTreeEngine<BstNode, InsertingOperation>;

export function createBstEngine(): BstEngine {
  return createSearchTreeEngine<BstNode, InsertingOperation>({
    structureKind: 'bst',
    insert: insertBst,
    remove: deleteBst,

    beginInsert({ value, path, parentKey, side }): InsertingOperation {
      const values = pathValues(path);
      return {
        kind: 'inserting',
        value,
        parentKey,
        side,
        path: values,
        ...insertCursorAlong(value, values, parentKey, 0),
        progress: 0,
      };
    },

    advanceInsert(pending, progress): InsertingOperation {
      return {
        ...pending,
        ...insertCursorAlong(pending.value, pending.path, pending.parentKey, progress),
        progress,
      };
    },

    insertStepCount: (pending) => Math.max(1, pending.path.length),
    insertRotation: () => null,
  });
}
