export interface AnimationClockSnapshot {
  readonly running: boolean;
  readonly paused: boolean;
  readonly durationMs: number;
  readonly startMs: number;
  readonly pausedTotalMs: number;
  readonly pausedAtMs: number | null;
  readonly speed: number;
}

/**
 * Progress of one timed operation:
 * `clamp((now - start - pausedTotal) * speed / duration, 0, 1)`.
 * Pausing freezes the reading; a speed change moves the virtual start so the
 * progress reached so far is kept and only the remainder is rescaled.
 */
export interface AnimationClock {
  readonly isRunning: boolean;
  readonly isPaused: boolean;
  readonly speed: number;
  start(durationMs: number, nowMs: number): void;
  progressAt(nowMs: number): number;
  /**
   * Time at which the running operation reaches 1 at the current speed. Only
   * meaningful once progress has reached 1, or while running unpaused.
   */
  completedAtMs(): number | null;
  pause(nowMs: number): void;
  resume(nowMs: number): void;
  setSpeed(multiplier: number, nowMs: number): void;
  stop(): void;
  snapshot(): AnimationClockSnapshot;
}

function assertTime(nowMs: number): void {
  if (!Number.isFinite(nowMs)) {
    throw new RangeError(`Animation clock time must be a finite number. Received: ${String(nowMs)}`);
  }
}

export function assertSpeedMultiplier(multiplier: number): void {
  if (!Number.isFinite(multiplier) || multiplier <= 0) {
    throw new Error('Animation speed multiplier must be a finite number > 0.');
  }
}

export function createAnimationClock(initialSpeed = 1): AnimationClock {
  assertSpeedMultiplier(initialSpeed);

  let running = false;
  // Pausing is a mode of the clock, so it carries over to the next operation started.
  let paused = false;
  let durationMs = 1;
  let startMs = 0;
  let pausedTotalMs = 0;
  let pausedAtMs: number | null = null;
  let speed = initialSpeed;

  const referenceTime = (nowMs: number): number => pausedAtMs ?? nowMs;

  const scaledElapsedAt = (nowMs: number): number =>
    Math.max(0, referenceTime(nowMs) - startMs - pausedTotalMs) * speed;

  return {
    get isRunning(): boolean {
      return running;
    },

    get isPaused(): boolean {
      return paused;
    },

    get speed(): number {
      return speed;
    },

    start(duration: number, nowMs: number): void {
      assertTime(nowMs);
      if (!Number.isFinite(duration) || duration <= 0) {
        throw new RangeError(`Animation duration must be a finite number > 0. Received: ${String(duration)}`);
      }
      running = true;
      durationMs = duration;
      startMs = nowMs;
      pausedTotalMs = 0;
      pausedAtMs = paused ? nowMs : null;
    },

    progressAt(nowMs: number): number {
      assertTime(nowMs);
      if (!running) {
        return 0;
      }
      return Math.min(1, scaledElapsedAt(nowMs) / durationMs);
    },

    completedAtMs(): number | null {
      if (!running) {
        return null;
      }
      return startMs + pausedTotalMs + durationMs / speed;
    },

    pause(nowMs: number): void {
      assertTime(nowMs);
      if (paused) {
        return;
      }
      paused = true;
      if (running) {
        pausedAtMs = nowMs;
      }
    },

    resume(nowMs: number): void {
      assertTime(nowMs);
      if (!paused) {
        return;
      }
      paused = false;
      if (pausedAtMs !== null) {
        pausedTotalMs += Math.max(0, nowMs - pausedAtMs);
        pausedAtMs = null;
      }
    },

    setSpeed(multiplier: number, nowMs: number): void {
      assertSpeedMultiplier(multiplier);
      assertTime(nowMs);
      if (running) {
        const scaled = scaledElapsedAt(nowMs);
        startMs = referenceTime(nowMs) - pausedTotalMs - scaled / multiplier;
      }
      speed = multiplier;
    },

    stop(): void {
      running = false;
      pausedAtMs = null;
      pausedTotalMs = 0;
    },

    snapshot(): AnimationClockSnapshot {
      return { running, paused, durationMs, startMs, pausedTotalMs, pausedAtMs, speed };
    },
  };
}
