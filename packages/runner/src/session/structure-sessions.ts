import {
  createAvlEngine,
  createBstEngine,
  createHuffmanEngine,
  type AnimatedStructure,
  type AvlEngine,
  type AvlInsertPhase,
  type AvlNode,
  type AvlPendingOperation,
  type BstEngine,
  type BstNode,
  type HuffmanCodeTable,
  type HuffmanCommand,
  type HuffmanCommitOutcome,
  type HuffmanEngine,
  type HuffmanFragment,
  type HuffmanMergeView,
  type HuffmanPendingOperation,
  type PendingOperation,
  type RotationPlan,
  type SearchTreeCommand,
  type SearchTreeCommitOutcome,
  type TreeValue,
} from '@tree-motion/engine';

import type { AnimationLogger } from '../animation/animation-logger.js';
import { createPlaybackLoop, type PlaybackLoop } from '../animation/playback-loop.js';
import {
  createProgressController,
  type AnimatedCommand,
  type AnimatedOutcome,
  type ControllerRequestResult,
  type ProgressController,
} from '../animation/progress-controller.js';
import { DEFAULT_ANIMATION_CONFIG, type AnimationConfig } from '../config/animation-config-types.js';
import { createStructureSessionStore, type StructureSessionStore } from '../store/structure-session-store.js';

export interface BstView {
  readonly kind: 'bst';
  readonly pending: PendingOperation;
  readonly root: BstNode | null;
  readonly size: number;
  readonly height: number;
  readonly inorder: readonly TreeValue[];
}

export interface AvlView {
  readonly kind: 'avl';
  readonly pending: AvlPendingOperation;
  readonly root: AvlNode | null;
  readonly size: number;
  readonly height: number;
  readonly inorder: readonly TreeValue[];
  readonly rotationPlan: RotationPlan | null;
  readonly insertPhase: AvlInsertPhase | null;
}

export interface HuffmanView {
  readonly kind: 'huffman';
  readonly pending: HuffmanPendingOperation;
  readonly mergeView: HuffmanMergeView;
  readonly queue: readonly HuffmanFragment[];
  readonly root: HuffmanFragment | null;
  readonly complete: boolean;
  readonly codes: HuffmanCodeTable;
}

/**
 * One structure with its own controller, clock, store and loop. Sessions share
 * nothing, so several of them animate side by side without interfering.
 */
export interface StructureSession<
  TEngine extends AnimatedStructure<TCommand, TOutcome>,
  TCommand extends AnimatedCommand,
  TOutcome extends AnimatedOutcome,
  TView,
> {
  readonly engine: TEngine;
  readonly controller: ProgressController<TCommand, TOutcome>;
  readonly store: StructureSessionStore<TCommand, TOutcome, TView>;
  readonly loop: PlaybackLoop;
  /** Requests a command and makes sure the loop is ticking. */
  run(command: TCommand): ControllerRequestResult;
  runAll(commands: readonly TCommand[]): number;
  /** Runs a direct engine change (build, load, clear) between operations and refreshes the store. */
  apply(update: (engine: TEngine) => void): void;
  /** Resolves once every queued command has committed; rejects if the loop fails first. */
  whenIdle(): Promise<void>;
  destroy(): void;
}

export type BstSession = StructureSession<BstEngine, SearchTreeCommand, SearchTreeCommitOutcome, BstView>;
export type AvlSession = StructureSession<AvlEngine, SearchTreeCommand, SearchTreeCommitOutcome, AvlView>;
export type HuffmanSession = StructureSession<HuffmanEngine, HuffmanCommand, HuffmanCommitOutcome, HuffmanView>;

export interface StructureSessionOptions {
  readonly config?: AnimationConfig;
  readonly logger?: AnimationLogger;
  readonly now?: () => number;
  readonly onError?: (error: unknown) => void;
}

interface Waiter {
  readonly resolve: () => void;
  readonly reject: (error: unknown) => void;
}

function createSession<
  TEngine extends AnimatedStructure<TCommand, TOutcome>,
  TCommand extends AnimatedCommand,
  TOutcome extends AnimatedOutcome,
  TView,
>(
  engine: TEngine,
  readView: () => TView,
  options: StructureSessionOptions,
): StructureSession<TEngine, TCommand, TOutcome, TView> {
  const config = options.config ?? DEFAULT_ANIMATION_CONFIG;
  const now = options.now ?? (() => performance.now());
  const controller = createProgressController<TCommand, TOutcome>({
    structure: engine,
    config,
    ...(options.logger === undefined ? {} : { logger: options.logger }),
  });
  const store = createStructureSessionStore({ controller, readView, now });

  let waiters: Waiter[] = [];
  const settleWaiters = (error?: unknown): void => {
    const pending = waiters;
    waiters = [];
    for (const waiter of pending) {
      if (error === undefined) {
        waiter.resolve();
      } else {
        waiter.reject(error);
      }
    }
  };

  const loop = createPlaybackLoop({
    controller,
    tickIntervalMs: config.tickIntervalMs,
    now,
    onError: (error) => {
      settleWaiters(error);
      if (options.onError === undefined) {
        console.warn('Structure session stopped after an error.', error);
      } else {
        options.onError(error);
      }
    },
  });
  const unsubscribeIdle = controller.onIdle(() => {
    settleWaiters();
  });

  const ensureLoop = (): void => {
    if (controller.hasWork()) {
      loop.start();
    }
  };

  return {
    engine,
    controller,
    store,
    loop,

    run(command: TCommand): ControllerRequestResult {
      const result = store.getState().request(command);
      ensureLoop();
      return result;
    },

    runAll(commands: readonly TCommand[]): number {
      const queued = store.getState().enqueue(commands);
      ensureLoop();
      return queued;
    },

    apply(update: (engine: TEngine) => void): void {
      if (controller.hasWork()) {
        throw new Error(`${engine.structureKind} session cannot be changed while commands are pending.`);
      }
      update(engine);
      store.getState().syncFromController();
    },

    whenIdle(): Promise<void> {
      if (!controller.hasWork()) {
        return Promise.resolve();
      }
      // A loop stopped by an error leaves the rest of the queue waiting for a restart.
      ensureLoop();
      return new Promise<void>((resolve, reject) => {
        waiters.push({ resolve, reject });
      });
    },

    destroy(): void {
      loop.stop();
      unsubscribeIdle();
      store.getState().destroy();
      settleWaiters(new Error('Structure session destroyed.'));
    },
  };
}

export function createBstSession(options: StructureSessionOptions = {}): BstSession {
  const engine = createBstEngine();
  engine.setActive(true);
  return createSession<BstEngine, SearchTreeCommand, SearchTreeCommitOutcome, BstView>(engine, () => ({
    kind: 'bst',
    pending: engine.getPendingState(),
    root: engine.getRoot(),
    size: engine.getSize(),
    height: engine.getHeight(),
    inorder: engine.inorderValues(),
  }), options);
}

export function createAvlSession(options: StructureSessionOptions = {}): AvlSession {
  const config = options.config ?? DEFAULT_ANIMATION_CONFIG;
  const engine = createAvlEngine({ phaseBoundaries: config.avlPhaseBoundaries });
  engine.setActive(true);
  return createSession<AvlEngine, SearchTreeCommand, SearchTreeCommitOutcome, AvlView>(engine, () => ({
    kind: 'avl',
    pending: engine.getPendingState(),
    root: engine.getRoot(),
    size: engine.getSize(),
    height: engine.getHeight(),
    inorder: engine.inorderValues(),
    rotationPlan: engine.getRotationPlan(),
    insertPhase: engine.getInsertPhase(),
  }), options);
}

export function createHuffmanSession(options: StructureSessionOptions = {}): HuffmanSession {
  const config = options.config ?? DEFAULT_ANIMATION_CONFIG;
  const engine = createHuffmanEngine({ phaseBoundaries: config.huffmanPhaseBoundaries });
  engine.setActive(true);
  return createSession<HuffmanEngine, HuffmanCommand, HuffmanCommitOutcome, HuffmanView>(engine, () => ({
    kind: 'huffman',
    pending: engine.getPendingState(),
    mergeView: engine.getMergePhase(),
    queue: engine.getQueue(),
    root: engine.getRoot(),
    complete: engine.isComplete(),
    codes: engine.getCodes(),
  }), options);
}
