import {
  countLeaves,
  createLeafQueue,
  decodeBits,
  encodeSymbols,
  fragmentHeight,
  generateCodes,
  mergeAll,
  normalizeFrequencies,
  planRound,
} from './huffman-codes.js';
import {
  clampProgress,
  DEFAULT_HUFFMAN_PHASE_BOUNDARIES,
  phaseIndexAt,
  validatePhaseBoundaries,
  type PhaseBoundaries,
} from './phase-boundaries.js';
import { operationPendingError, structureInactiveError } from './runtime-error.js';
import { REQUEST_STARTED, type AnimatedStructure, type RequestResult } from './types-structure.js';
import {
  HUFFMAN_ROUND_PHASES,
  type FrequencyEntry,
  type FrequencyInput,
  type HuffmanCodeTable,
  type HuffmanCommand,
  type HuffmanCommitOutcome,
  type HuffmanFragment,
  type HuffmanIdleOperation,
  type HuffmanMergeView,
  type HuffmanMergingOperation,
  type HuffmanPendingOperation,
  type HuffmanRoundSummary,
} from './types-huffman.js';

const LABEL = 'HUFFMAN';

const IDLE: HuffmanIdleOperation = Object.freeze({ kind: 'idle' });

export interface HuffmanEngineOptions {
  /** End points of the select, move, merge and return phases of one round. */
  readonly phaseBoundaries?: readonly number[];
}

export interface HuffmanEngine extends AnimatedStructure<HuffmanCommand, HuffmanCommitOutcome> {
  readonly phaseBoundaries: PhaseBoundaries;
  setActive(active: boolean): void;
  /** Replaces the queue with one leaf per symbol. Zero or one symbol is complete at once. */
  build(frequencies: FrequencyInput): void;
  /** Requests one animated merge round. */
  mergeStep(): RequestResult;
  /** Runs every remaining round without animation and returns the root. */
  completeImmediately(): HuffmanFragment | null;
  getPendingState(): HuffmanPendingOperation;
  getMergePhase(): HuffmanMergeView;
  getQueue(): readonly HuffmanFragment[];
  /** The finished tree, or null while rounds remain. */
  getRoot(): HuffmanFragment | null;
  /** Frequencies the queue was built from; null when a bare tree was loaded. */
  getFrequencies(): readonly FrequencyEntry[] | null;
  /** Builds from `frequencies` and completes it, regardless of activation. */
  loadFrequencies(frequencies: FrequencyInput): void;
  loadRoot(root: HuffmanFragment | null): void;
  isComplete(): boolean;
  isEmpty(): boolean;
  getHeight(): number;
  clear(): void;
  getCodes(): HuffmanCodeTable;
  /** Text is split into code points; pass an array for multi-character symbols. */
  encode(input: string | readonly string[]): string;
  decode(bits: string): string;
  decodeSymbols(bits: string): readonly string[];
}

export function createHuffmanEngine(options: HuffmanEngineOptions = {}): HuffmanEngine {
  const boundaries = validatePhaseBoundaries(options.phaseBoundaries ?? DEFAULT_HUFFMAN_PHASE_BOUNDARIES);

  let active = false;
  let built = false;
  let queue: readonly HuffmanFragment[] = [];
  let frequencies: readonly FrequencyEntry[] | null = null;
  let leafCount = 0;
  let round = 0;
  let operation: HuffmanPendingOperation = IDLE;

  const totalRounds = (): number => Math.max(0, leafCount - 1);

  const isComplete = (): boolean => queue.length <= 1;

  const completedRoot = (): HuffmanFragment | null => (queue.length === 1 ? queue[0] ?? null : null);

  // Codes and decoding read the finished tree; an unfinished queue is merged on a
  // scratch copy so the animated state is left alone.
  const codingRoot = (): HuffmanFragment | null => completedRoot() ?? mergeAll(queue, leafCount + round)[0] ?? null;

  const assertActive = (): void => {
    if (!active) {
      throw structureInactiveError(LABEL);
    }
  };

  const assertIdle = (): void => {
    if (operation.kind !== 'idle') {
      throw operationPendingError(LABEL, operation.kind);
    }
  };

  const reset = (): void => {
    built = false;
    queue = [];
    frequencies = null;
    leafCount = 0;
    round = 0;
    operation = IDLE;
  };

  const loadEntries = (input: FrequencyInput): void => {
    const entries = normalizeFrequencies(input);
    reset();
    built = true;
    frequencies = entries;
    queue = createLeafQueue(entries);
    leafCount = queue.length;
  };

  const finishAll = (): HuffmanFragment | null => {
    queue = mergeAll(queue, leafCount + round);
    round = totalRounds();
    return completedRoot();
  };

  const requestMergeStep = (): RequestResult => {
    assertActive();
    assertIdle();
    const planned = planRound(queue, leafCount + round);
    if (planned === null) {
      return { status: 'skipped', reason: 'complete' };
    }
    const merging: HuffmanMergingOperation = {
      kind: 'merging',
      round,
      phase: 'select',
      pair: planned.pair,
      parent: planned.parent,
      queueBefore: queue,
      queueAfter: planned.queueAfter,
      progress: 0,
    };
    operation = merging;
    return REQUEST_STARTED;
  };

  // The return splice is the only point where the queue changes.
  const commit = (merging: HuffmanMergingOperation): HuffmanCommitOutcome => {
    queue = merging.queueAfter;
    round = merging.round + 1;
    operation = IDLE;

    const summary: HuffmanRoundSummary = {
      round: merging.round,
      leftId: merging.pair[0].id,
      rightId: merging.pair[1].id,
      parentId: merging.parent.id,
      frequency: merging.parent.frequency,
    };
    if (isComplete()) {
      return { kind: 'completed', ...summary, codes: generateCodes(completedRoot()) };
    }
    return { kind: 'merged', ...summary, queueLength: queue.length };
  };

  return {
    structureKind: 'huffman',
    phaseBoundaries: boundaries,

    isActive(): boolean {
      return active;
    },

    setActive(value: boolean): void {
      active = value;
    },

    isIdle(): boolean {
      return operation.kind === 'idle';
    },

    build(input: FrequencyInput): void {
      assertActive();
      assertIdle();
      loadEntries(input);
    },

    mergeStep: requestMergeStep,

    dispatch(command: HuffmanCommand): RequestResult {
      switch (command.kind) {
        case 'mergeStep':
          return requestMergeStep();
      }
    },

    setProgress(progress: number): HuffmanCommitOutcome | null {
      const clamped = clampProgress(progress);
      if (operation.kind === 'idle') {
        return null;
      }
      if (clamped >= 1) {
        return commit(operation);
      }
      operation = {
        ...operation,
        phase: HUFFMAN_ROUND_PHASES[phaseIndexAt(boundaries, clamped)] ?? 'return',
        progress: clamped,
      };
      return null;
    },

    getProgress(): number {
      return operation.kind === 'idle' ? 0 : operation.progress;
    },

    getStepCount(): number {
      return operation.kind === 'idle' ? 1 : HUFFMAN_ROUND_PHASES.length;
    },

    getPendingKind(): string {
      return operation.kind;
    },

    cancel(): void {
      operation = IDLE;
    },

    completeImmediately(): HuffmanFragment | null {
      assertActive();
      assertIdle();
      return finishAll();
    },

    getPendingState(): HuffmanPendingOperation {
      return operation;
    },

    getMergePhase(): HuffmanMergeView {
      if (operation.kind === 'idle') {
        return {
          phase: built && isComplete() ? 'done' : 'idle',
          round,
          totalRounds: totalRounds(),
          queueBefore: queue,
          queueAfter: queue,
          currentPair: null,
          parentCandidate: null,
        };
      }
      const disclosed = operation.phase === 'merge' || operation.phase === 'return';
      return {
        phase: operation.phase,
        round: operation.round,
        totalRounds: totalRounds(),
        queueBefore: operation.queueBefore,
        queueAfter: disclosed ? operation.queueAfter : operation.queueBefore,
        currentPair: operation.pair,
        parentCandidate: disclosed ? operation.parent : null,
      };
    },

    getQueue(): readonly HuffmanFragment[] {
      return queue;
    },

    getRoot: completedRoot,

    getFrequencies(): readonly FrequencyEntry[] | null {
      return frequencies;
    },

    loadFrequencies(input: FrequencyInput): void {
      loadEntries(input);
      finishAll();
    },

    loadRoot(root: HuffmanFragment | null): void {
      reset();
      built = true;
      queue = root === null ? [] : [root];
      leafCount = countLeaves(root);
      round = totalRounds();
    },

    isComplete,

    isEmpty(): boolean {
      return queue.length === 0;
    },

    getHeight(): number {
      return fragmentHeight(completedRoot());
    },

    clear: reset,

    getCodes(): HuffmanCodeTable {
      return generateCodes(codingRoot());
    },

    encode(input: string | readonly string[]): string {
      const symbols = typeof input === 'string' ? Array.from(input) : input;
      return encodeSymbols(generateCodes(codingRoot()), symbols);
    },

    decode(bits: string): string {
      return decodeBits(codingRoot(), bits).join('');
    },

    decodeSymbols(bits: string): readonly string[] {
      return decodeBits(codingRoot(), bits);
    },
  };
}
