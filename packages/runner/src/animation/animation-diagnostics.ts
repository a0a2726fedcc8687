export type RequestStatus = 'started' | 'skipped';

export interface RequestLogEntry {
  readonly structure: string;
  readonly command: string;
  readonly status: RequestStatus;
  readonly reason?: string;
  readonly durationMs?: number;
  readonly stepCount?: number;
}

export interface CommitLogEntry {
  readonly structure: string;
  readonly command: string;
  readonly outcomeKind: string;
  readonly outcome: unknown;
}

export type QueueEventKind = 'enqueue' | 'dequeue' | 'drained' | 'cleared' | 'cancelled';

export interface QueueLogEntry {
  readonly event: QueueEventKind;
  readonly queueLength: number;
  readonly active: boolean;
}

export type ClockEventKind = 'start' | 'pause' | 'resume' | 'speed';

export interface ClockLogEntry {
  readonly event: ClockEventKind;
  readonly nowMs: number;
  readonly progress: number;
  readonly speed: number;
}

/** Everything recorded for one operation, from its request to its commit. */
export interface DiagnosticBatch {
  readonly batchId: number;
  readonly timestampIso: string;
  readonly label: string;
  readonly request?: RequestLogEntry;
  readonly clockEvents: readonly ClockLogEntry[];
  readonly queueEvents: readonly QueueLogEntry[];
  readonly commit?: CommitLogEntry;
  readonly warnings: readonly string[];
}
