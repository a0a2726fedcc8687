import { writeFileSync } from 'node:fs';
import { join } from 'node:path';

import type {
  ClockLogEntry,
  CommitLogEntry,
  DiagnosticBatch,
  QueueLogEntry,
  RequestLogEntry,
} from './animation-diagnostics.js';

export interface DiagnosticBuffer {
  readonly maxBatches: number;
  beginBatch(label: string): void;
  recordRequest(entry: RequestLogEntry): void;
  recordClockEvent(entry: ClockLogEntry): void;
  recordQueueEvent(entry: QueueLogEntry): void;
  recordCommit(entry: CommitLogEntry): void;
  recordWarning(message: string): void;
  endBatch(): void;
  getBatches(): readonly DiagnosticBatch[];
  exportJson(): string;
  /** Writes the export through the runtime and returns the file name used. */
  saveAsJson(): string;
  clear(): void;
}

export interface DiagnosticBufferRuntime {
  writeJson(payload: { readonly filename: string; readonly content: string }): void;
}

interface MutableBatch {
  readonly batchId: number;
  readonly timestampIso: string;
  readonly label: string;
  request?: RequestLogEntry;
  clockEvents: ClockLogEntry[];
  queueEvents: QueueLogEntry[];
  commit?: CommitLogEntry;
  warnings: string[];
}

function cloneSerializable<T>(value: T): T {
  return globalThis.structuredClone(value);
}

function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
    return value;
  }

  Object.freeze(value);
  const members: unknown[] = Object.values(value);
  for (const member of members) {
    deepFreeze(member);
  }
  return value;
}

function toFrozenBatch(batch: MutableBatch): DiagnosticBatch {
  const frozen: DiagnosticBatch = {
    batchId: batch.batchId,
    timestampIso: batch.timestampIso,
    label: batch.label,
    ...(batch.request ? { request: cloneSerializable(batch.request) } : {}),
    clockEvents: cloneSerializable(batch.clockEvents),
    queueEvents: cloneSerializable(batch.queueEvents),
    ...(batch.commit ? { commit: cloneSerializable(batch.commit) } : {}),
    warnings: cloneSerializable(batch.warnings),
  };
  return deepFreeze(frozen);
}

function sanitizeTimestampForFilename(timestampIso: string): string {
  return timestampIso.replace(/[:]/g, '-');
}

function createDefaultRuntime(): DiagnosticBufferRuntime {
  return {
    writeJson(payload): void {
      writeFileSync(join(process.cwd(), payload.filename), payload.content, 'utf8');
    },
  };
}

function createMutableBatch(batchId: number, label: string): MutableBatch {
  return {
    batchId,
    timestampIso: new Date().toISOString(),
    label,
    clockEvents: [],
    queueEvents: [],
    warnings: [],
  };
}

export function createDiagnosticBuffer(
  maxBatches = 100,
  runtime: DiagnosticBufferRuntime = createDefaultRuntime(),
): DiagnosticBuffer {
  if (!Number.isInteger(maxBatches) || maxBatches < 1) {
    throw new RangeError('Diagnostic buffer maxBatches must be a positive integer');
  }

  const batches: DiagnosticBatch[] = [];
  let currentBatch: MutableBatch | undefined;
  let nextBatchId = 1;

  function appendBatch(batch: DiagnosticBatch): void {
    batches.push(batch);
    if (batches.length > maxBatches) {
      batches.shift();
    }
  }

  function withCurrentBatch(mutator: (batch: MutableBatch) => void): void {
    if (!currentBatch) {
      return;
    }
    mutator(currentBatch);
  }

  function exportPayload(): string {
    const snapshot = batches.slice();
    const payload = {
      meta: {
        exportedAt: new Date().toISOString(),
        batchCount: snapshot.length,
        oldestBatchId: snapshot[0]?.batchId ?? 0,
        newestBatchId: snapshot[snapshot.length - 1]?.batchId ?? 0,
      },
      batches: snapshot,
    };
    return JSON.stringify(payload, null, 2);
  }

  return {
    maxBatches,

    beginBatch(label: string): void {
      if (currentBatch) {
        appendBatch(toFrozenBatch(currentBatch));
      }
      currentBatch = createMutableBatch(nextBatchId, label);
      nextBatchId += 1;
    },

    recordRequest(entry: RequestLogEntry): void {
      withCurrentBatch((batch) => {
        batch.request = cloneSerializable(entry);
      });
    },

    recordClockEvent(entry: ClockLogEntry): void {
      withCurrentBatch((batch) => {
        batch.clockEvents.push(cloneSerializable(entry));
      });
    },

    recordQueueEvent(entry: QueueLogEntry): void {
      withCurrentBatch((batch) => {
        batch.queueEvents.push(cloneSerializable(entry));
      });
    },

    recordCommit(entry: CommitLogEntry): void {
      withCurrentBatch((batch) => {
        batch.commit = cloneSerializable(entry);
      });
    },

    recordWarning(message: string): void {
      withCurrentBatch((batch) => {
        batch.warnings.push(message);
      });
    },

    endBatch(): void {
      if (!currentBatch) {
        return;
      }
      appendBatch(toFrozenBatch(currentBatch));
      currentBatch = undefined;
    },

    getBatches(): readonly DiagnosticBatch[] {
      return Object.freeze(batches.slice());
    },

    exportJson: exportPayload,

    saveAsJson(): string {
      const filename = `tree-motion-diagnostic-${sanitizeTimestampForFilename(new Date().toISOString())}.json`;
      runtime.writeJson({ filename, content: exportPayload() });
      return filename;
    },

    clear(): void {
      batches.length = 0;
      currentBatch = undefined;
    },
  };
}
