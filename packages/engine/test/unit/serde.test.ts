import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  createAvlEngine,
  createBstEngine,
  createHuffmanEngine,
  deserializeAvlTree,
  deserializeBstTree,
  deserializeHuffmanTree,
  restoreAvlTree,
  restoreBstTree,
  restoreHuffmanTree,
  sameShape,
  serializeAvlTree,
  serializeBstTree,
  serializeHuffmanTree,
} from '../../src/kernel/index.js';
import { activeAvl, activeBst, hasEngineErrorCode } from '../helpers/tree-drivers.js';

const leaf = (value: number | string) => ({ value, left: null, right: null });

describe('search tree serialization', () => {
  it('writes plain nested records without animation fields', () => {
    const engine = activeBst([2, 1, 3]);
    engine.search(3);

    assert.deepEqual(serializeBstTree(engine.getRoot()), {
      kind: 'bst',
      root: { value: 2, left: leaf(1), right: leaf(3) },
    });
  });

  it('restores a tree of the same shape and resets the pending operation', () => {
    const source = activeBst([50, 30, 70, 20, 40, 60, 80]);
    const document = serializeBstTree(source.getRoot());
    const target = activeBst([1]);
    target.search(1);

    restoreBstTree(target, JSON.parse(JSON.stringify(document)));

    assert.equal(sameShape(target.getRoot(), source.getRoot()), true);
    assert.deepEqual(target.getPendingState(), { kind: 'idle' });
  });

  it('rejects out-of-order trees', () => {
    const document = { kind: 'bst', root: { value: 5, left: leaf(9), right: null } };

    assert.throws(() => deserializeBstTree(document), hasEngineErrorCode('SERIALIZED_TREE_INVALID'));
  });

  it('rejects trees mixing value kinds', () => {
    const document = { kind: 'bst', root: { value: 5, left: null, right: leaf('z') } };

    assert.throws(() => deserializeBstTree(document), hasEngineErrorCode('SERIALIZED_TREE_INVALID'));
  });

  it('rejects records with missing or extra fields', () => {
    assert.throws(
      () => deserializeBstTree({ kind: 'bst', root: { value: 5, left: null } }),
      hasEngineErrorCode('SERIALIZED_TREE_INVALID'),
    );
    assert.throws(
      () => deserializeBstTree({ kind: 'bst', root: { ...leaf(5), progress: 0.5 } }),
      hasEngineErrorCode('SERIALIZED_TREE_INVALID'),
    );
  });

  it('an empty tree round-trips as a null root', () => {
    const engine = createBstEngine();

    assert.deepEqual(serializeBstTree(engine.getRoot()), { kind: 'bst', root: null });
    assert.equal(deserializeBstTree({ kind: 'bst', root: null }), null);
  });

  it('round-trips AVL heights', () => {
    const source = activeAvl([30, 20, 10, 40]);
    const document = serializeAvlTree(source.getRoot());
    const target = createAvlEngine();

    restoreAvlTree(target, document);

    assert.deepEqual(serializeAvlTree(target.getRoot()), document);
    assert.equal(target.getBalanceFactor(20), -1);
  });

  it('rejects AVL documents with wrong heights', () => {
    const document = {
      kind: 'avl',
      root: { value: 2, height: 3, left: { ...leaf(1), height: 1 }, right: { ...leaf(3), height: 1 } },
    };

    assert.throws(() => deserializeAvlTree(document), hasEngineErrorCode('SERIALIZED_TREE_INVALID'));
  });

  it('rejects AVL documents that are not height-balanced', () => {
    const document = {
      kind: 'avl',
      root: {
        value: 1,
        height: 3,
        left: null,
        right: { value: 2, height: 2, left: null, right: { ...leaf(3), height: 1 } },
      },
    };

    assert.throws(() => deserializeAvlTree(document), hasEngineErrorCode('SERIALIZED_TREE_INVALID'));
  });
});

describe('huffman serialization', () => {
  it('stores the frequencies a tree was built from and rebuilds it on load', () => {
    const source = createHuffmanEngine();
    source.setActive(true);
    source.build({ a: 5, b: 9, c: 12, d: 13, e: 16, f: 45 });
    source.mergeStep();
    source.setProgress(0.5);

    const document = serializeHuffmanTree(source);
    assert.deepEqual(document, {
      kind: 'huffman',
      frequencies: [['a', 5], ['b', 9], ['c', 12], ['d', 13], ['e', 16], ['f', 45]],
    });

    const target = createHuffmanEngine();
    restoreHuffmanTree(target, document);
    assert.equal(target.isComplete(), true);
    assert.deepEqual(target.getCodes(), source.getCodes());
  });

  it('stores a bare tree as nested records', () => {
    const document = {
      kind: 'huffman',
      root: {
        frequency: 3,
        symbol: null,
        left: { frequency: 1, symbol: 'x', left: null, right: null },
        right: { frequency: 2, symbol: 'y', left: null, right: null },
      },
    };
    const engine = createHuffmanEngine();

    restoreHuffmanTree(engine, document);

    assert.deepEqual(
      [engine.getRoot()?.id, engine.getRoot()?.left?.id, engine.getRoot()?.right?.id],
      [2, 0, 1],
    );
    assert.deepEqual(engine.getCodes(), { x: '0', y: '1' });
    assert.equal(engine.getFrequencies(), null);
    assert.deepEqual(serializeHuffmanTree(engine), document);
  });

  it('rejects parents whose frequency is not the sum of their children', () => {
    const document = {
      kind: 'huffman',
      root: {
        frequency: 4,
        symbol: null,
        left: { frequency: 1, symbol: 'x', left: null, right: null },
        right: { frequency: 2, symbol: 'y', left: null, right: null },
      },
    };

    assert.throws(() => deserializeHuffmanTree(document), hasEngineErrorCode('SERIALIZED_TREE_INVALID'));
  });

  it('rejects leaves without a symbol and repeated symbols', () => {
    const unnamed = { kind: 'huffman', root: { frequency: 1, symbol: null, left: null, right: null } };
    const repeated = {
      kind: 'huffman',
      root: {
        frequency: 2,
        symbol: null,
        left: { frequency: 1, symbol: 'x', left: null, right: null },
        right: { frequency: 1, symbol: 'x', left: null, right: null },
      },
    };

    assert.throws(() => deserializeHuffmanTree(unnamed), hasEngineErrorCode('SERIALIZED_TREE_INVALID'));
    assert.throws(() => deserializeHuffmanTree(repeated), hasEngineErrorCode('SERIALIZED_TREE_INVALID'));
  });
});
