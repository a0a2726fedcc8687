import type { DiagnosticBuffer } from './diagnostic-buffer.js';
import type {
  ClockLogEntry,
  CommitLogEntry,
  QueueLogEntry,
  RequestLogEntry,
} from './animation-diagnostics.js';

// ---------------------------------------------------------------------------
// Console abstraction (for testing)
// ---------------------------------------------------------------------------

export interface LoggerConsole {
  group(...args: unknown[]): void;
  groupEnd(): void;
  log(...args: unknown[]): void;
  table(data: unknown): void;
}

// ---------------------------------------------------------------------------
// Logger interface
// ---------------------------------------------------------------------------

export interface AnimationLogger {
  readonly enabled: boolean;
  setEnabled(enabled: boolean): void;
  beginBatch(label: string): void;
  endBatch(): void;
  logRequest(entry: RequestLogEntry): void;
  logCommit(entry: CommitLogEntry): void;
  logQueueEvent(entry: QueueLogEntry): void;
  logClockEvent(entry: ClockLogEntry): void;
  logWarning(message: string): void;
}

// ---------------------------------------------------------------------------
// Summary helpers (exported for direct testing)
// ---------------------------------------------------------------------------

export interface OutcomeFieldSummary {
  readonly field: string;
  readonly value: string;
}

/** Flattens a commit outcome into rows for `console.table`. */
export function summarizeOutcome(outcome: unknown): readonly OutcomeFieldSummary[] {
  if (outcome === null || typeof outcome !== 'object') {
    return [{ field: 'value', value: String(outcome) }];
  }
  return Object.entries(outcome).map(([field, value]) => ({
    field,
    value: typeof value === 'string' ? value : JSON.stringify(value) ?? 'undefined',
  }));
}

export function describeCommand<TCommand extends { readonly kind: string }>(command: TCommand): string {
  return JSON.stringify(command);
}

// ---------------------------------------------------------------------------
// Stage label colors
// ---------------------------------------------------------------------------

const STAGE_STYLES = {
  request: 'color: #00bcd4; font-weight: bold',
  commit: 'color: #4caf50; font-weight: bold',
  queue: 'color: #9c27b0; font-weight: bold',
  clock: 'color: #607d8b; font-weight: bold',
  warning: 'color: #f44336; font-weight: bold',
} as const;

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface CreateAnimationLoggerOptions {
  readonly console?: LoggerConsole;
  readonly enabled?: boolean;
  readonly diagnosticBuffer?: DiagnosticBuffer;
}

export function createAnimationLogger(options?: CreateAnimationLoggerOptions): AnimationLogger {
  const cons: LoggerConsole = options?.console ?? globalThis.console;
  const diagnosticBuffer = options?.diagnosticBuffer;
  let enabled = options?.enabled ?? false;

  return {
    get enabled(): boolean {
      return enabled;
    },

    setEnabled(value: boolean): void {
      enabled = value;
    },

    beginBatch(label: string): void {
      diagnosticBuffer?.beginBatch(label);
    },

    endBatch(): void {
      diagnosticBuffer?.endBatch();
    },

    logRequest(entry: RequestLogEntry): void {
      diagnosticBuffer?.recordRequest(entry);
      if (!enabled) return;
      const suffix = entry.status === 'started'
        ? ` for ${entry.durationMs ?? 0}ms over ${entry.stepCount ?? 1} steps`
        : entry.reason === undefined ? '' : ` (${entry.reason})`;
      cons.log(`%c[AnimRequest] ${entry.structure} ${entry.command} ${entry.status}${suffix}`, STAGE_STYLES.request);
    },

    logCommit(entry: CommitLogEntry): void {
      diagnosticBuffer?.recordCommit(entry);
      if (!enabled) return;
      cons.group(`%c[AnimCommit] ${entry.structure} ${entry.command} → ${entry.outcomeKind}`, STAGE_STYLES.commit);
      cons.table(summarizeOutcome(entry.outcome));
      cons.groupEnd();
    },

    logQueueEvent(entry: QueueLogEntry): void {
      diagnosticBuffer?.recordQueueEvent(entry);
      if (!enabled) return;
      cons.log(`%c[AnimQueue] ${entry.event} — queue: ${entry.queueLength}, active: ${entry.active}`, STAGE_STYLES.queue);
    },

    logClockEvent(entry: ClockLogEntry): void {
      diagnosticBuffer?.recordClockEvent(entry);
      if (!enabled) return;
      cons.log(
        `%c[AnimClock] ${entry.event} at ${entry.nowMs}ms — progress: ${entry.progress.toFixed(3)}, speed: ${entry.speed}`,
        STAGE_STYLES.clock,
      );
    },

    logWarning(message: string): void {
      diagnosticBuffer?.recordWarning(message);
      if (!enabled) return;
      cons.log(`%c[AnimWarn] ${message}`, STAGE_STYLES.warning);
    },
  };
}
