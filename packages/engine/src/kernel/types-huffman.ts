export type FrequencyEntry = readonly [symbol: string, frequency: number];

/**
 * Ties between equal frequencies follow input order. A record cannot hold
 * integer-like symbols such as "2" (object key order would move them first);
 * use the entry list for those.
 */
export type FrequencyInput = Readonly<Record<string, number>> | readonly FrequencyEntry[];

/**
 * A leaf (symbol set, no children) or a merged parent (symbol null, both children set).
 * Leaves are numbered in queue order from 0; the parent made in round r gets `leafCount + r`.
 */
export interface HuffmanFragment {
  readonly id: number;
  readonly frequency: number;
  readonly symbol: string | null;
  readonly left: HuffmanFragment | null;
  readonly right: HuffmanFragment | null;
}

export type HuffmanMergePhase = 'idle' | 'select' | 'move' | 'merge' | 'return' | 'done';

export type HuffmanRoundPhase = Exclude<HuffmanMergePhase, 'idle' | 'done'>;

export const HUFFMAN_ROUND_PHASES: readonly HuffmanRoundPhase[] = ['select', 'move', 'merge', 'return'];

export interface HuffmanIdleOperation {
  readonly kind: 'idle';
}

export interface HuffmanMergingOperation {
  readonly kind: 'merging';
  /** Zero-based round number. */
  readonly round: number;
  readonly phase: HuffmanRoundPhase;
  /** Left = first selected (lowest frequency, earliest on ties), right = second. */
  readonly pair: readonly [HuffmanFragment, HuffmanFragment];
  readonly parent: HuffmanFragment;
  readonly queueBefore: readonly HuffmanFragment[];
  /** Queue once the parent has been spliced back in. */
  readonly queueAfter: readonly HuffmanFragment[];
  readonly progress: number;
}

export type HuffmanPendingOperation = HuffmanIdleOperation | HuffmanMergingOperation;

/** Read-only view for renderers; `currentPair` and `parentCandidate` are null between rounds. */
export interface HuffmanMergeView {
  readonly phase: HuffmanMergePhase;
  readonly round: number;
  readonly totalRounds: number;
  readonly queueBefore: readonly HuffmanFragment[];
  readonly queueAfter: readonly HuffmanFragment[];
  readonly currentPair: readonly [HuffmanFragment, HuffmanFragment] | null;
  /** Disclosed from the merge phase onwards. */
  readonly parentCandidate: HuffmanFragment | null;
}

export type HuffmanCommand = { readonly kind: 'mergeStep' };

export type HuffmanCodeTable = Readonly<Record<string, string>>;

export interface HuffmanRoundSummary {
  readonly round: number;
  readonly leftId: number;
  readonly rightId: number;
  readonly parentId: number;
  readonly frequency: number;
}

export type HuffmanCommitOutcome =
  | ({ readonly kind: 'merged'; readonly queueLength: number } & HuffmanRoundSummary)
  | ({ readonly kind: 'completed'; readonly codes: HuffmanCodeTable } & HuffmanRoundSummary);
