import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';

import type {
  AnimatedCommand,
  AnimatedOutcome,
  CancelOptions,
  ControllerRequestResult,
  ProgressController,
} from '../animation/progress-controller.js';

interface StructureSessionState<TCommand, TOutcome, TView> {
  readonly progress: number;
  readonly paused: boolean;
  readonly speed: number;
  readonly queueLength: number;
  readonly activeCommand: TCommand | null;
  readonly lastOutcome: TOutcome | null;
  readonly commitCount: number;
  readonly view: TView;
}

interface StructureSessionActions<TCommand> {
  request(command: TCommand): ControllerRequestResult;
  enqueue(commands: readonly TCommand[]): number;
  pause(): void;
  resume(): void;
  setSpeed(multiplier: number): void;
  cancel(options?: CancelOptions): void;
  syncFromController(): void;
  destroy(): void;
}

export type StructureSessionStoreState<TCommand, TOutcome, TView> =
  StructureSessionState<TCommand, TOutcome, TView> & StructureSessionActions<TCommand>;

export interface StructureSessionStoreOptions<TCommand extends AnimatedCommand, TOutcome extends AnimatedOutcome, TView> {
  readonly controller: ProgressController<TCommand, TOutcome>;
  /** Reads the structure-specific part of the snapshot. */
  readonly readView: () => TView;
  readonly now?: () => number;
}

type ControllerSnapshot<TCommand, TView> = Omit<
  StructureSessionState<TCommand, unknown, TView>,
  'lastOutcome' | 'commitCount'
>;

function snapshotFromController<TCommand extends AnimatedCommand, TOutcome extends AnimatedOutcome, TView>(
  controller: ProgressController<TCommand, TOutcome>,
  readView: () => TView,
): ControllerSnapshot<TCommand, TView> {
  return {
    progress: controller.getProgress(),
    paused: controller.isPaused,
    speed: controller.speed,
    queueLength: controller.queueLength,
    activeCommand: controller.activeCommand,
    view: readView(),
  };
}

export function createStructureSessionStore<TCommand extends AnimatedCommand, TOutcome extends AnimatedOutcome, TView>(
  options: StructureSessionStoreOptions<TCommand, TOutcome, TView>,
) {
  const { controller, readView } = options;
  const now = options.now ?? (() => performance.now());

  return createStore<StructureSessionStoreState<TCommand, TOutcome, TView>>()(
    subscribeWithSelector((set, get) => {
      const unsubscribeChange = controller.onChange(() => {
        get().syncFromController();
      });
      const unsubscribeCommit = controller.onCommit((outcome) => {
        set((state) => ({ lastOutcome: outcome, commitCount: state.commitCount + 1 }));
      });

      return {
        ...snapshotFromController(controller, readView),
        lastOutcome: null,
        commitCount: 0,

        request(command: TCommand): ControllerRequestResult {
          return controller.request(command, now());
        },

        enqueue(commands: readonly TCommand[]): number {
          return controller.enqueue(commands, now());
        },

        pause(): void {
          controller.pause(now());
        },

        resume(): void {
          controller.resume(now());
        },

        setSpeed(multiplier: number): void {
          controller.setSpeed(multiplier, now());
        },

        cancel(cancelOptions?: CancelOptions): void {
          controller.cancel(cancelOptions);
        },

        syncFromController(): void {
          set(snapshotFromController(controller, readView));
        },

        destroy(): void {
          unsubscribeChange();
          unsubscribeCommit();
          controller.destroy();
          set(snapshotFromController(controller, readView));
        },
      };
    }),
  );
}

export type StructureSessionStore<TCommand extends AnimatedCommand, TOutcome extends AnimatedOutcome, TView> =
  ReturnType<typeof createStructureSessionStore<TCommand, TOutcome, TView>>;
