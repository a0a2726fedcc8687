export interface PlaybackTarget {
  readonly isPaused: boolean;
  advance(nowMs: number): number;
  hasWork(): boolean;
}

export interface PlaybackLoopOptions {
  readonly controller: PlaybackTarget;
  readonly tickIntervalMs: number;
  readonly now?: () => number;
  /** Called with whatever a tick threw; the loop has already stopped by then. */
  readonly onError?: (error: unknown) => void;
}

export interface PlaybackLoop {
  readonly isRunning: boolean;
  start(): void;
  stop(): void;
  /** Runs one tick by hand. */
  tick(): void;
}

/**
 * Polls the controller on a fixed interval. The loop stops on its own once
 * there is nothing left to animate, so it never keeps the process alive idle.
 */
export function createPlaybackLoop(options: PlaybackLoopOptions): PlaybackLoop {
  const { controller } = options;
  if (!Number.isInteger(options.tickIntervalMs) || options.tickIntervalMs <= 0) {
    throw new RangeError(`Tick interval must be a positive integer. Received: ${String(options.tickIntervalMs)}`);
  }
  const now = options.now ?? (() => performance.now());
  const onError = options.onError ?? ((error: unknown) => {
    console.warn('Playback loop stopped after an error.', error);
  });

  let timer: ReturnType<typeof setInterval> | null = null;

  const stop = (): void => {
    if (timer !== null) {
      clearInterval(timer);
      timer = null;
    }
  };

  const tick = (): void => {
    if (!controller.hasWork()) {
      stop();
      return;
    }
    if (controller.isPaused) {
      return;
    }
    try {
      controller.advance(now());
    } catch (error) {
      stop();
      onError(error);
    }
  };

  return {
    get isRunning(): boolean {
      return timer !== null;
    },

    start(): void {
      if (timer !== null) {
        return;
      }
      timer = setInterval(tick, options.tickIntervalMs);
    },

    stop,
    tick,
  };
}
