import {
  createBstEngine,
  type BstEngine,
  type SearchTreeCommand,
  type SearchTreeCommitOutcome,
} from '@tree-motion/engine';
import { describe, expect, it, vi } from 'vitest';

import { createAnimationLogger, type LoggerConsole } from '../../src/animation/animation-logger.js';
import { createDiagnosticBuffer } from '../../src/animation/diagnostic-buffer.js';
import {
  createProgressController,
  resolveDurationMs,
  type ProgressController,
} from '../../src/animation/progress-controller.js';
import { AnimationConfigSchema, DEFAULT_ANIMATION_CONFIG, type AnimationConfigInput } from '../../src/config/animation-config-types.js';

interface Harness {
  readonly engine: BstEngine;
  readonly controller: ProgressController<SearchTreeCommand, SearchTreeCommitOutcome>;
}

function createHarness(config: AnimationConfigInput = {}): Harness {
  const engine = createBstEngine();
  engine.setActive(true);
  const controller = createProgressController({ structure: engine, config: AnimationConfigSchema.parse(config) });
  return { engine, controller };
}

const insert = (value: number): SearchTreeCommand => ({ kind: 'insert', value });

const SCENARIO_VALUES = [50, 30, 70, 20, 40, 60, 80] as const;

function buildScenarioTree(controller: Harness['controller']): number {
  controller.enqueue(SCENARIO_VALUES.map(insert), 0);
  let now = 0;
  for (let index = 0; index < SCENARIO_VALUES.length; index += 1) {
    now += 1000;
    controller.advance(now);
  }
  return now;
}

describe('createProgressController', () => {
  it('starts a request immediately and commits exactly when progress reaches 1', () => {
    const { engine, controller } = createHarness();
    const onCommit = vi.fn();
    controller.onCommit(onCommit);

    expect(controller.request(insert(50), 0)).toEqual({ status: 'started' });
    expect(controller.advance(500)).toBe(0.5);
    expect(engine.getPendingKind()).toBe('creatingRoot');
    expect(engine.getRoot()).toBeNull();
    expect(onCommit).not.toHaveBeenCalled();

    expect(controller.advance(1000)).toBe(1);
    expect(onCommit).toHaveBeenCalledTimes(1);
    expect(onCommit).toHaveBeenCalledWith(
      { kind: 'inserted', value: 50, parentKey: null, side: null, rotation: null },
      { kind: 'insert', value: 50 },
    );
    expect(engine.getRoot()?.value).toBe(50);
    expect(controller.isIdle()).toBe(true);
  });

  it('drains a batch strictly one operation at a time', () => {
    const { engine, controller } = createHarness();
    const onIdle = vi.fn();
    controller.onIdle(onIdle);

    expect(controller.enqueue(SCENARIO_VALUES.map(insert), 0)).toBe(6);
    expect(controller.activeCommand).toEqual(insert(50));

    controller.advance(1000);
    expect(engine.inorderValues()).toEqual([50]);
    expect(controller.activeCommand).toEqual(insert(30));
    expect(controller.queueLength).toBe(5);
    expect(onIdle).not.toHaveBeenCalled();

    for (let now = 2000; now <= 7000; now += 1000) {
      controller.advance(now);
    }

    expect(engine.inorderValues()).toEqual([20, 30, 40, 50, 60, 70, 80]);
    expect(onIdle).toHaveBeenCalledTimes(1);
    expect(controller.hasWork()).toBe(false);
  });

  it('starts each queued command when the previous one finished, not at the tick that noticed it', () => {
    const { controller } = createHarness();
    const commitTimes: number[] = [];
    let now = 0;
    controller.onCommit(() => {
      commitTimes.push(now);
    });

    controller.enqueue([insert(50), insert(30), insert(70), insert(20)], 0);
    while (controller.hasWork()) {
      now += 60;
      controller.advance(now);
    }

    expect(commitTimes).toEqual([1020, 2040, 3000, 4020]);
  });

  it('commits several queued operations within one long tick', () => {
    const { engine, controller } = createHarness();
    controller.enqueue([insert(50), insert(30), insert(70)], 0);

    expect(controller.advance(2500)).toBe(0.5);
    expect(engine.inorderValues()).toEqual([30, 50]);
    expect(controller.activeCommand).toEqual(insert(70));
  });

  it('reports a search miss with the last key on the path', () => {
    const { engine, controller } = createHarness();
    const start = buildScenarioTree(controller);
    const onCommit = vi.fn();
    controller.onCommit(onCommit);

    controller.request({ kind: 'search', value: 90 }, start);
    controller.advance(start + 2000);

    expect(onCommit).toHaveBeenCalledWith(
      { kind: 'notFound', target: 90, lastKey: 80 },
      { kind: 'search', value: 90 },
    );
    expect(engine.getPendingState()).toMatchObject({ kind: 'searchNotFound', target: 90, lastKey: 80 });
    expect(controller.isIdle()).toBe(true);
    expect(controller.getProgress()).toBe(1);
  });

  it('finishes skipped commands on the spot and moves on to the next one', () => {
    const { controller } = createHarness();
    controller.request(insert(50), 0);
    controller.advance(1000);

    expect(controller.request(insert(50), 1000)).toEqual({ status: 'skipped', reason: 'duplicate' });
    expect(controller.isIdle()).toBe(true);

    expect(controller.enqueue([insert(50), insert(60)], 1000)).toBe(0);
    expect(controller.activeCommand).toEqual(insert(60));
  });

  it('queues requests that arrive while an operation is animating', () => {
    const { controller } = createHarness();
    controller.request(insert(50), 0);

    expect(controller.request(insert(60), 100)).toEqual({ status: 'queued', position: 1 });
    expect(controller.queueLength).toBe(1);

    controller.advance(1000);
    expect(controller.activeCommand).toEqual(insert(60));
    expect(controller.advance(1500)).toBe(0.5);
  });

  it('holds progress while paused', () => {
    const { controller } = createHarness();
    controller.request(insert(50), 0);

    expect(controller.advance(300)).toBe(0.3);
    controller.pause(300);
    expect(controller.isPaused).toBe(true);
    expect(controller.advance(800)).toBe(0.3);

    controller.resume(1000);
    expect(controller.advance(1200)).toBe(0.5);
    expect(controller.advance(1700)).toBe(1);
  });

  it('finishes sooner after a mid-flight speed change', () => {
    const { engine, controller } = createHarness();
    controller.request(insert(50), 0);
    controller.advance(500);

    controller.setSpeed(2, 500);

    expect(controller.speed).toBe(2);
    expect(controller.advance(750)).toBe(1);
    expect(engine.getSize()).toBe(1);
  });

  it('discards the pending operation on cancel and keeps the queue unless told otherwise', () => {
    const { engine, controller } = createHarness();
    controller.enqueue([insert(50), insert(60), insert(70)], 0);
    controller.advance(500);

    controller.cancel();

    expect(engine.getPendingKind()).toBe('idle');
    expect(engine.getRoot()).toBeNull();
    expect(controller.queueLength).toBe(2);

    controller.advance(600);
    expect(controller.activeCommand).toEqual(insert(60));
  });

  it('clears the queue on request and reports idle once', () => {
    const { controller } = createHarness();
    const onIdle = vi.fn();
    controller.onIdle(onIdle);
    controller.enqueue([insert(50), insert(60), insert(70)], 0);

    controller.cancel({ clearQueue: true });

    expect(controller.queueLength).toBe(0);
    expect(controller.isIdle()).toBe(true);
    expect(onIdle).toHaveBeenCalledTimes(1);
  });

  it('rejects a batch that does not fit the queue without enqueuing any of it', () => {
    const { controller } = createHarness({ maxQueuedCommands: 2 });
    controller.request(insert(1), 0);

    expect(() => controller.enqueue([insert(2), insert(3), insert(4)], 0)).toThrow('BST command queue is full (2).');
    expect(controller.queueLength).toBe(0);
  });

  it('propagates engine errors and stays idle', () => {
    const { controller } = createHarness();
    controller.request(insert(50), 0);
    controller.advance(1000);

    let thrown: unknown = null;
    try {
      controller.request({ kind: 'insert', value: 'fifty' }, 1000);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toMatchObject({ code: 'VALUE_KIND_MISMATCH' });
    expect(controller.isIdle()).toBe(true);
  });

  it('notifies change listeners and stops after destroy', () => {
    const { controller } = createHarness();
    const onChange = vi.fn();
    const unsubscribe = controller.onChange(onChange);

    controller.request(insert(50), 0);
    controller.advance(100);
    expect(onChange).toHaveBeenCalledTimes(2);

    unsubscribe();
    controller.advance(200);
    expect(onChange).toHaveBeenCalledTimes(2);

    controller.destroy();
    expect(controller.advance(300)).toBe(0);
    expect(() => controller.request(insert(60), 300)).toThrow('Progress controller has been destroyed.');
  });

  it('records one diagnostic batch per operation', () => {
    const engine = createBstEngine();
    engine.setActive(true);
    const cons: LoggerConsole = { group: vi.fn(), groupEnd: vi.fn(), log: vi.fn(), table: vi.fn() };
    const diagnosticBuffer = createDiagnosticBuffer(10, { writeJson: vi.fn() });
    const logger = createAnimationLogger({ console: cons, diagnosticBuffer });
    const controller = createProgressController({ structure: engine, logger });

    controller.request(insert(50), 0);
    controller.advance(1000);
    controller.request(insert(50), 1000);

    const batches = diagnosticBuffer.getBatches();
    expect(batches.map((batch) => batch.label)).toEqual(['BST insert', 'BST insert']);
    expect(batches[0]?.request).toEqual({
      structure: 'BST',
      command: '{"kind":"insert","value":50}',
      status: 'started',
      durationMs: 1000,
      stepCount: 1,
    });
    expect(batches[0]?.commit?.outcomeKind).toBe('inserted');
    expect(batches[1]?.request).toMatchObject({ status: 'skipped', reason: 'duplicate' });
    expect(cons.log).not.toHaveBeenCalled();
  });
});

describe('resolveDurationMs', () => {
  it('uses the configured duration per command kind', () => {
    expect(resolveDurationMs(DEFAULT_ANIMATION_CONFIG, 'insert', 4)).toBe(1000);
    expect(resolveDurationMs(DEFAULT_ANIMATION_CONFIG, 'search', 4)).toBe(2000);
    expect(resolveDurationMs(DEFAULT_ANIMATION_CONFIG, 'mergeStep', 4)).toBe(2000);
    expect(resolveDurationMs(DEFAULT_ANIMATION_CONFIG, 'traverse', 7)).toBe(1000);
  });

  it('stretches traversals by the per-node time when one is configured', () => {
    const config = AnimationConfigSchema.parse({ traversePerNodeMs: 400 });

    expect(resolveDurationMs(config, 'traverse', 2)).toBe(1000);
    expect(resolveDurationMs(config, 'traverse', 3)).toBe(1200);
  });

  it('rejects unknown command kinds', () => {
    expect(() => resolveDurationMs(DEFAULT_ANIMATION_CONFIG, 'rotate', 1)).toThrow(
      'No animation duration configured for command kind "rotate".',
    );
  });
});
