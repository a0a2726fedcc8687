export type StructureKind = 'bst' | 'avl' | 'huffman';

export type SkipReason = 'duplicate' | 'complete';

export type RequestResult =
  | { readonly status: 'started' }
  | { readonly status: 'skipped'; readonly reason: SkipReason };

export const REQUEST_STARTED: RequestResult = Object.freeze({ status: 'started' });

/**
 * Contract between an engine and whatever drives its progress. Requests only
 * record a pending operation; the structure changes inside `setProgress` when
 * progress reaches 1.
 */
export interface AnimatedStructure<TCommand extends { readonly kind: string }, TOutcome> {
  readonly structureKind: StructureKind;
  isActive(): boolean;
  /** True when a new command may be dispatched. */
  isIdle(): boolean;
  dispatch(command: TCommand): RequestResult;
  /** Returns the commit outcome exactly once, on the call that first reaches 1. */
  setProgress(progress: number): TOutcome | null;
  getProgress(): number;
  /** Discrete steps the pending operation walks through (path or sequence length). */
  getStepCount(): number;
  getPendingKind(): string;
  cancel(): void;
}
