import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { createHuffmanEngine, type FrequencyInput, type HuffmanEngine } from '../../src/kernel/index.js';
import { hasEngineErrorCode } from '../helpers/tree-drivers.js';

const CLASSIC = { a: 5, b: 9, c: 12, d: 13, e: 16, f: 45 };

const CLASSIC_CODES = { f: '0', c: '100', d: '101', a: '1100', b: '1101', e: '111' };

function builtEngine(frequencies: FrequencyInput): HuffmanEngine {
  const engine = createHuffmanEngine();
  engine.setActive(true);
  engine.build(frequencies);
  return engine;
}

const frequenciesOf = (engine: HuffmanEngine): readonly number[] =>
  engine.getQueue().map((fragment) => fragment.frequency);

describe('huffman engine build', () => {
  it('produces the same tree and codes on every run', () => {
    for (let run = 0; run < 3; run += 1) {
      const engine = builtEngine(CLASSIC);
      const root = engine.completeImmediately();

      assert.equal(root?.frequency, 100);
      assert.equal(root?.left?.symbol, 'f');
      assert.equal(root?.right?.frequency, 55);
      assert.deepEqual(engine.getCodes(), CLASSIC_CODES);
      assert.equal(engine.getHeight(), 5);
    }
  });

  it('queues leaves by frequency and numbers them in queue order', () => {
    const engine = builtEngine({ x: 4, y: 1, z: 2 });

    assert.deepEqual(
      engine.getQueue().map(({ id, symbol, frequency }) => [id, symbol, frequency]),
      [[0, 'y', 1], [1, 'z', 2], [2, 'x', 4]],
    );
    assert.deepEqual(engine.getMergePhase().totalRounds, 2);
  });

  it('keeps input order on equal frequencies and splices parents after equal fragments', () => {
    const engine = builtEngine([['x', 1], ['y', 1], ['z', 2]]);

    engine.mergeStep();
    engine.setProgress(1);

    assert.deepEqual(
      engine.getQueue().map(({ id, frequency }) => [id, frequency]),
      [[2, 2], [3, 2]],
    );
    assert.deepEqual(engine.getCodes(), { z: '0', x: '10', y: '11' });
  });

  it('zero symbols are done at once without a root', () => {
    const engine = builtEngine({});

    assert.equal(engine.isComplete(), true);
    assert.equal(engine.isEmpty(), true);
    assert.equal(engine.getRoot(), null);
    assert.equal(engine.getMergePhase().phase, 'done');
    assert.deepEqual(engine.mergeStep(), { status: 'skipped', reason: 'complete' });
    assert.deepEqual(engine.getCodes(), {});
    assert.equal(engine.encode(''), '');
    assert.equal(engine.decode(''), '');
  });

  it('a single symbol is the root and encodes as 0', () => {
    const engine = builtEngine({ x: 3 });

    assert.equal(engine.getRoot()?.symbol, 'x');
    assert.equal(engine.getMergePhase().phase, 'done');
    assert.deepEqual(engine.getCodes(), { x: '0' });
    assert.equal(engine.encode('xx'), '00');
    assert.equal(engine.decode('000'), 'xxx');
    assert.throws(() => engine.decode('01'), hasEngineErrorCode('HUFFMAN_BITS_INVALID'));
  });

  it('rejects malformed frequency maps', () => {
    const engine = createHuffmanEngine();
    engine.setActive(true);

    assert.throws(() => engine.build({ a: -1 }), hasEngineErrorCode('INVALID_FREQUENCY_MAP'));
    assert.throws(() => engine.build({ a: 1.5 }), hasEngineErrorCode('INVALID_FREQUENCY_MAP'));
    assert.throws(() => engine.build([['', 1]]), hasEngineErrorCode('INVALID_FREQUENCY_MAP'));
    assert.throws(() => engine.build([['a', 1], ['a', 2]]), hasEngineErrorCode('INVALID_FREQUENCY_MAP'));
  });

  it('rejects integer-like symbols in a record and keeps their order in an entry list', () => {
    const engine = createHuffmanEngine();
    engine.setActive(true);

    assert.throws(() => engine.build({ b: 1, a: 1, '2': 1 }), hasEngineErrorCode('INVALID_FREQUENCY_MAP'));

    engine.build([['b', 1], ['a', 1], ['2', 1]]);
    assert.deepEqual(engine.getQueue().map((fragment) => fragment.symbol), ['b', 'a', '2']);
    assert.deepEqual(engine.getCodes(), { '2': '0', b: '10', a: '11' });
  });

  it('requires activation before building', () => {
    const engine = createHuffmanEngine();

    assert.throws(() => engine.build(CLASSIC), hasEngineErrorCode('STRUCTURE_INACTIVE'));
    assert.equal(engine.getMergePhase().phase, 'idle');
  });
});

describe('huffman engine merge rounds', () => {
  it('walks select, move, merge and return before splicing the parent in', () => {
    const engine = builtEngine(CLASSIC);

    assert.deepEqual(engine.mergeStep(), { status: 'started' });
    let view = engine.getMergePhase();
    assert.equal(view.phase, 'select');
    assert.deepEqual(view.currentPair?.map((fragment) => fragment.symbol), ['a', 'b']);
    assert.equal(view.parentCandidate, null);
    assert.equal(view.queueAfter, view.queueBefore);

    engine.setProgress(0.3);
    assert.equal(engine.getMergePhase().phase, 'move');

    engine.setProgress(0.6);
    view = engine.getMergePhase();
    assert.equal(view.phase, 'merge');
    assert.equal(view.parentCandidate?.frequency, 14);
    assert.equal(view.parentCandidate?.id, 6);
    assert.deepEqual(view.queueAfter.map((fragment) => fragment.frequency), [12, 13, 14, 16, 45]);

    engine.setProgress(0.8);
    assert.equal(engine.getMergePhase().phase, 'return');
    assert.deepEqual(frequenciesOf(engine), [5, 9, 12, 13, 16, 45]);

    assert.deepEqual(engine.setProgress(1), {
      kind: 'merged',
      round: 0,
      leftId: 0,
      rightId: 1,
      parentId: 6,
      frequency: 14,
      queueLength: 5,
    });
    assert.deepEqual(frequenciesOf(engine), [12, 13, 14, 16, 45]);
    assert.equal(engine.getMergePhase().phase, 'idle');
    assert.equal(engine.getMergePhase().round, 1);
  });

  it('shrinks the queue by one per round and completes after n - 1 rounds', () => {
    const engine = builtEngine(CLASSIC);
    const expectedQueues = [
      [12, 13, 14, 16, 45],
      [14, 16, 25, 45],
      [25, 30, 45],
      [45, 55],
    ];

    for (const expected of expectedQueues) {
      engine.mergeStep();
      assert.equal(engine.setProgress(1)?.kind, 'merged');
      assert.deepEqual(frequenciesOf(engine), expected);
    }

    engine.mergeStep();
    assert.deepEqual(engine.setProgress(1), {
      kind: 'completed',
      round: 4,
      leftId: 5,
      rightId: 9,
      parentId: 10,
      frequency: 100,
      codes: CLASSIC_CODES,
    });
    assert.equal(engine.getMergePhase().phase, 'done');
    assert.deepEqual(engine.mergeStep(), { status: 'skipped', reason: 'complete' });
  });

  it('conserves the total frequency across rounds', () => {
    const engine = builtEngine(CLASSIC);

    while (engine.dispatch({ kind: 'mergeStep' }).status === 'started') {
      engine.setProgress(1);
      assert.equal(frequenciesOf(engine).reduce((sum, frequency) => sum + frequency, 0), 100);
    }
  });

  it('cancel mid-round leaves the queue untouched', () => {
    const engine = builtEngine(CLASSIC);
    const before = engine.getQueue();

    engine.mergeStep();
    engine.setProgress(0.6);
    engine.cancel();

    assert.equal(engine.isIdle(), true);
    assert.equal(engine.getQueue(), before);
  });

  it('rejects a new round or a rebuild while a round is pending', () => {
    const engine = builtEngine(CLASSIC);
    engine.mergeStep();

    assert.throws(() => engine.mergeStep(), hasEngineErrorCode('OPERATION_PENDING'));
    assert.throws(() => engine.build({ a: 1 }), hasEngineErrorCode('OPERATION_PENDING'));
    assert.throws(() => engine.completeImmediately(), hasEngineErrorCode('OPERATION_PENDING'));
  });

  it('finishes the remaining rounds at once', () => {
    const engine = builtEngine(CLASSIC);
    engine.mergeStep();
    engine.setProgress(1);

    const root = engine.completeImmediately();

    assert.equal(root?.frequency, 100);
    assert.equal(engine.getMergePhase().round, 5);
    assert.deepEqual(engine.getCodes(), CLASSIC_CODES);
  });
});

describe('huffman engine coding', () => {
  it('encodes and decodes text', () => {
    const engine = builtEngine(CLASSIC);
    engine.completeImmediately();

    assert.equal(engine.encode('abc'), '11001101100');
    assert.equal(engine.decode('11001101100'), 'abc');
    assert.equal(engine.decode(engine.encode('face')), 'face');
  });

  it('codes an unfinished queue without advancing it', () => {
    const engine = builtEngine(CLASSIC);
    engine.mergeStep();
    engine.setProgress(0.5);

    assert.deepEqual(engine.getCodes(), CLASSIC_CODES);
    assert.equal(engine.getQueue().length, 6);
    assert.equal(engine.getPendingState().kind, 'merging');
    assert.equal(engine.getRoot(), null);
  });

  it('rejects unknown symbols and malformed bit strings', () => {
    const engine = builtEngine(CLASSIC);

    assert.throws(() => engine.encode('az'), hasEngineErrorCode('HUFFMAN_SYMBOL_UNKNOWN'));
    assert.throws(() => engine.decode('102'), hasEngineErrorCode('HUFFMAN_BITS_INVALID'));
    assert.throws(() => engine.decode('11'), hasEngineErrorCode('HUFFMAN_BITS_INVALID'));
  });

  it('takes symbol arrays for multi-character symbols', () => {
    const engine = builtEngine({ ab: 1, c: 2 });

    assert.equal(engine.encode(['ab', 'c', 'ab']), '010');
    assert.deepEqual(engine.decodeSymbols('010'), ['ab', 'c', 'ab']);
  });
});
