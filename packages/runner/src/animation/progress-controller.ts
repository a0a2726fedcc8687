import type { AnimatedStructure, RequestResult } from '@tree-motion/engine';

import type { AnimationConfig } from '../config/animation-config-types.js';
import { DEFAULT_ANIMATION_CONFIG } from '../config/animation-config-types.js';
import type { ClockEventKind, QueueEventKind } from './animation-diagnostics.js';
import { createAnimationClock } from './animation-clock.js';
import { createAnimationLogger, describeCommand, type AnimationLogger } from './animation-logger.js';

export type AnimatedCommand = { readonly kind: string };

export type AnimatedOutcome = { readonly kind: string };

export type ControllerRequestResult = RequestResult | { readonly status: 'queued'; readonly position: number };

export type CommitListener<TCommand, TOutcome> = (outcome: TOutcome, command: TCommand) => void;

export interface CancelOptions {
  readonly clearQueue?: boolean;
}

/**
 * Drives one structure through its operations, one at a time. Commands that
 * arrive while an operation is animating wait in a queue and start only after
 * the structure has committed and is idle again.
 */
export interface ProgressController<TCommand extends AnimatedCommand, TOutcome extends AnimatedOutcome> {
  readonly structure: AnimatedStructure<TCommand, TOutcome>;
  readonly queueLength: number;
  readonly isPaused: boolean;
  readonly speed: number;
  readonly activeCommand: TCommand | null;
  request(command: TCommand, nowMs: number): ControllerRequestResult;
  /** Appends every command or none of them; returns the resulting queue length. */
  enqueue(commands: readonly TCommand[], nowMs: number): number;
  /** Pushes the current clock reading into the structure; returns that progress. */
  advance(nowMs: number): number;
  pause(nowMs: number): void;
  resume(nowMs: number): void;
  setSpeed(multiplier: number, nowMs: number): void;
  cancel(options?: CancelOptions): void;
  getProgress(): number;
  isIdle(): boolean;
  hasWork(): boolean;
  onCommit(listener: CommitListener<TCommand, TOutcome>): () => void;
  onIdle(listener: () => void): () => void;
  /** Fires after every call that may have changed what a reader sees. */
  onChange(listener: () => void): () => void;
  destroy(): void;
}

export interface ProgressControllerOptions<TCommand extends AnimatedCommand, TOutcome extends AnimatedOutcome> {
  readonly structure: AnimatedStructure<TCommand, TOutcome>;
  readonly config?: AnimationConfig;
  readonly logger?: AnimationLogger;
}

export function resolveDurationMs(config: AnimationConfig, kind: string, stepCount: number): number {
  const { durationsMs, traversePerNodeMs } = config;
  switch (kind) {
    case 'insert':
      return durationsMs.insert;
    case 'search':
      return durationsMs.search;
    case 'delete':
      return durationsMs.delete;
    case 'mergeStep':
      return durationsMs.mergeStep;
    case 'traverse':
      return traversePerNodeMs === undefined
        ? durationsMs.traverse
        : Math.max(durationsMs.traverse, traversePerNodeMs * stepCount);
    default:
      throw new Error(`No animation duration configured for command kind "${kind}".`);
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createProgressController<TCommand extends AnimatedCommand, TOutcome extends AnimatedOutcome>(
  options: ProgressControllerOptions<TCommand, TOutcome>,
): ProgressController<TCommand, TOutcome> {
  const { structure } = options;
  const config = options.config ?? DEFAULT_ANIMATION_CONFIG;
  const logger = options.logger ?? createAnimationLogger({ enabled: config.debug });
  const clock = createAnimationClock(config.speed);
  const label = structure.structureKind.toUpperCase();

  const queue: TCommand[] = [];
  const commitListeners = new Set<CommitListener<TCommand, TOutcome>>();
  const idleListeners = new Set<() => void>();
  const changeListeners = new Set<() => void>();

  let active: TCommand | null = null;
  let busy = false;
  let destroyed = false;

  const assertLive = (): void => {
    if (destroyed) {
      throw new Error('Progress controller has been destroyed.');
    }
  };

  const logQueue = (event: QueueEventKind): void => {
    logger.logQueueEvent({ event, queueLength: queue.length, active: active !== null });
  };

  const logClock = (event: ClockEventKind, nowMs: number): void => {
    logger.logClockEvent({ event, nowMs, progress: clock.progressAt(nowMs), speed: clock.speed });
  };

  const notifyChange = (): void => {
    for (const listener of changeListeners) {
      listener();
    }
  };

  // Emits idle once per busy stretch, when the last queued command has finished.
  const settle = (): void => {
    if (!busy || active !== null || queue.length > 0) {
      return;
    }
    busy = false;
    logQueue('drained');
    for (const listener of idleListeners) {
      listener();
    }
  };

  const startCommand = (command: TCommand, nowMs: number, fromQueue: boolean): RequestResult => {
    logger.beginBatch(`${label} ${command.kind}`);
    if (fromQueue) {
      logQueue('dequeue');
    }

    let result: RequestResult;
    try {
      result = structure.dispatch(command);
    } catch (error) {
      logger.logWarning(`${label} rejected ${describeCommand(command)}: ${describeError(error)}`);
      logger.endBatch();
      throw error;
    }

    if (result.status === 'skipped') {
      logger.logRequest({ structure: label, command: describeCommand(command), status: 'skipped', reason: result.reason });
      logger.endBatch();
      return result;
    }

    const stepCount = structure.getStepCount();
    const durationMs = resolveDurationMs(config, command.kind, stepCount);
    clock.start(durationMs, nowMs);
    active = command;
    busy = true;
    logger.logRequest({ structure: label, command: describeCommand(command), status: 'started', durationMs, stepCount });
    logClock('start', nowMs);
    return result;
  };

  // Skipped commands finish on the spot, so keep pulling until one animates.
  const drain = (nowMs: number): void => {
    while (active === null && !destroyed) {
      const next = queue.shift();
      if (next === undefined) {
        return;
      }
      startCommand(next, nowMs, true);
    }
  };

  const finishActive = (command: TCommand, outcome: TOutcome | null): void => {
    active = null;
    clock.stop();
    if (outcome !== null) {
      logger.logCommit({ structure: label, command: describeCommand(command), outcomeKind: outcome.kind, outcome });
      for (const listener of commitListeners) {
        listener(outcome, command);
      }
    }
    logger.endBatch();
  };

  const addListener = <T>(listeners: Set<T>, listener: T): (() => void) => {
    if (destroyed) {
      return () => undefined;
    }
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  };

  const cancel = (cancelOptions: CancelOptions = {}): void => {
    if (destroyed) {
      return;
    }
    if (active !== null) {
      structure.cancel();
      clock.stop();
      active = null;
      logQueue('cancelled');
      logger.endBatch();
    }
    if (cancelOptions.clearQueue === true && queue.length > 0) {
      queue.length = 0;
      logger.logWarning(`${label} queue cleared`);
      logQueue('cleared');
    }
    settle();
    notifyChange();
  };

  return {
    structure,

    get queueLength(): number {
      return queue.length;
    },

    get isPaused(): boolean {
      return clock.isPaused;
    },

    get speed(): number {
      return clock.speed;
    },

    get activeCommand(): TCommand | null {
      return active;
    },

    request(command: TCommand, nowMs: number): ControllerRequestResult {
      assertLive();
      if (active !== null || queue.length > 0) {
        if (queue.length >= config.maxQueuedCommands) {
          throw new Error(`${label} command queue is full (${config.maxQueuedCommands}).`);
        }
        queue.push(command);
        logQueue('enqueue');
        notifyChange();
        return { status: 'queued', position: queue.length };
      }

      const result = startCommand(command, nowMs, false);
      notifyChange();
      return result;
    },

    enqueue(commands: readonly TCommand[], nowMs: number): number {
      assertLive();
      if (queue.length + commands.length > config.maxQueuedCommands) {
        throw new Error(`${label} command queue is full (${config.maxQueuedCommands}).`);
      }
      queue.push(...commands);
      busy = busy || queue.length > 0;
      logQueue('enqueue');
      drain(nowMs);
      settle();
      notifyChange();
      return queue.length;
    },

    advance(nowMs: number): number {
      if (destroyed) {
        return 0;
      }
      if (active === null) {
        if (queue.length === 0) {
          return 0;
        }
        drain(nowMs);
      }

      let progress = 0;
      for (let command = active; command !== null; command = active) {
        progress = clock.progressAt(nowMs);
        const outcome = structure.setProgress(progress);
        if (progress < 1) {
          break;
        }
        // The next command starts when this one actually finished, not at this tick.
        const finishedAtMs = Math.min(clock.completedAtMs() ?? nowMs, nowMs);
        finishActive(command, outcome);
        drain(finishedAtMs);
      }

      settle();
      notifyChange();
      return progress;
    },

    pause(nowMs: number): void {
      assertLive();
      clock.pause(nowMs);
      logClock('pause', nowMs);
      notifyChange();
    },

    resume(nowMs: number): void {
      assertLive();
      clock.resume(nowMs);
      logClock('resume', nowMs);
      notifyChange();
    },

    setSpeed(multiplier: number, nowMs: number): void {
      assertLive();
      clock.setSpeed(multiplier, nowMs);
      logClock('speed', nowMs);
      notifyChange();
    },

    cancel,

    getProgress(): number {
      return structure.getProgress();
    },

    isIdle(): boolean {
      return active === null && queue.length === 0;
    },

    hasWork(): boolean {
      return active !== null || queue.length > 0;
    },

    onCommit(listener: CommitListener<TCommand, TOutcome>): () => void {
      return addListener(commitListeners, listener);
    },

    onIdle(listener: () => void): () => void {
      return addListener(idleListeners, listener);
    },

    onChange(listener: () => void): () => void {
      return addListener(changeListeners, listener);
    },

    destroy(): void {
      if (destroyed) {
        return;
      }
      cancel({ clearQueue: true });
      destroyed = true;
      commitListeners.clear();
      idleListeners.clear();
      changeListeners.clear();
    },
  };
}
