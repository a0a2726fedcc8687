import {
  huffmanBitsInvalidError,
  huffmanSymbolUnknownError,
  invalidFrequencyMapError,
} from './runtime-error.js';
import { FrequencyInputSchema } from './schemas-tree.js';
import type { FrequencyEntry, HuffmanCodeTable, HuffmanFragment } from './types-huffman.js';

export interface PlannedRound {
  readonly pair: readonly [HuffmanFragment, HuffmanFragment];
  readonly parent: HuffmanFragment;
  readonly queueAfter: readonly HuffmanFragment[];
}

const BITS_PATTERN = /^[01]*$/;

// Keys that object property order lists first, ahead of insertion order.
const ARRAY_INDEX_KEY_PATTERN = /^(0|[1-9]\d*)$/;

const isArrayIndexKey = (key: string): boolean =>
  ARRAY_INDEX_KEY_PATTERN.test(key) && Number(key) < 2 ** 32 - 1;

export function normalizeFrequencies(input: unknown): readonly FrequencyEntry[] {
  const parsed = FrequencyInputSchema.safeParse(input);
  if (!parsed.success) {
    throw invalidFrequencyMapError('Frequencies must map non-empty symbols to non-negative integers.', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    });
  }

  let entries: readonly FrequencyEntry[];
  if (Array.isArray(parsed.data)) {
    entries = parsed.data;
  } else {
    const record = Object.entries(parsed.data);
    const indexKey = record.find(([symbol]) => isArrayIndexKey(symbol));
    if (indexKey !== undefined) {
      throw invalidFrequencyMapError(
        `Symbol "${indexKey[0]}" would not keep its insertion order in a record; pass an entry list instead.`,
        { symbol: indexKey[0] },
      );
    }
    entries = record;
  }
  const seen = new Set<string>();
  for (const [symbol] of entries) {
    if (seen.has(symbol)) {
      throw invalidFrequencyMapError(`Symbol "${symbol}" appears more than once.`, { symbol });
    }
    seen.add(symbol);
  }
  return entries.map(([symbol, frequency]): FrequencyEntry => [symbol, frequency]);
}

/** Leaves sorted by frequency; equal frequencies keep their input order. */
export function createLeafQueue(entries: readonly FrequencyEntry[]): readonly HuffmanFragment[] {
  return [...entries]
    .sort((left, right) => left[1] - right[1])
    .map(([symbol, frequency], id) => ({ id, frequency, symbol, left: null, right: null }));
}

/** Inserts `parent` after every fragment whose frequency does not exceed its own. */
export function spliceParent(queue: readonly HuffmanFragment[], parent: HuffmanFragment): readonly HuffmanFragment[] {
  const index = queue.findIndex((fragment) => fragment.frequency > parent.frequency);
  if (index === -1) {
    return [...queue, parent];
  }
  return [...queue.slice(0, index), parent, ...queue.slice(index)];
}

export function planRound(queue: readonly HuffmanFragment[], parentId: number): PlannedRound | null {
  const [left, right, ...rest] = queue;
  if (left === undefined || right === undefined) {
    return null;
  }
  const parent: HuffmanFragment = {
    id: parentId,
    frequency: left.frequency + right.frequency,
    symbol: null,
    left,
    right,
  };
  return { pair: [left, right], parent, queueAfter: spliceParent(rest, parent) };
}

/** Runs every remaining round at once and returns the final queue (at most one fragment). */
export function mergeAll(queue: readonly HuffmanFragment[], firstParentId: number): readonly HuffmanFragment[] {
  let current = queue;
  let parentId = firstParentId;
  for (let round = planRound(current, parentId); round !== null; round = planRound(current, parentId)) {
    current = round.queueAfter;
    parentId += 1;
  }
  return current;
}

export function isLeaf(fragment: HuffmanFragment): boolean {
  return fragment.left === null && fragment.right === null;
}

export function countLeaves(fragment: HuffmanFragment | null): number {
  if (fragment === null) {
    return 0;
  }
  return isLeaf(fragment) ? 1 : countLeaves(fragment.left) + countLeaves(fragment.right);
}

export function fragmentHeight(fragment: HuffmanFragment | null): number {
  if (fragment === null) {
    return 0;
  }
  return 1 + Math.max(fragmentHeight(fragment.left), fragmentHeight(fragment.right));
}

/** Left edges read 0, right edges 1. A tree of one leaf gives that leaf the code "0". */
export function generateCodes(root: HuffmanFragment | null): HuffmanCodeTable {
  const codes: Array<readonly [string, string]> = [];

  const walk = (fragment: HuffmanFragment | null, prefix: string): void => {
    if (fragment === null) {
      return;
    }
    if (fragment.symbol !== null) {
      codes.push([fragment.symbol, prefix.length === 0 ? '0' : prefix]);
      return;
    }
    walk(fragment.left, `${prefix}0`);
    walk(fragment.right, `${prefix}1`);
  };

  walk(root, '');
  return Object.fromEntries(codes);
}

export function encodeSymbols(codes: HuffmanCodeTable, symbols: readonly string[]): string {
  let bits = '';
  for (const symbol of symbols) {
    const code = Object.hasOwn(codes, symbol) ? codes[symbol] : undefined;
    if (code === undefined) {
      throw huffmanSymbolUnknownError(symbol);
    }
    bits += code;
  }
  return bits;
}

export function decodeBits(root: HuffmanFragment | null, bits: string): readonly string[] {
  if (!BITS_PATTERN.test(bits)) {
    throw huffmanBitsInvalidError('Encoded input may only contain the characters 0 and 1.', { bits });
  }
  if (bits.length === 0) {
    return [];
  }
  if (root === null) {
    throw huffmanBitsInvalidError('Cannot decode bits without a Huffman tree.', { bits });
  }

  const symbols: string[] = [];
  if (root.symbol !== null) {
    const single = root.symbol;
    for (const [index, bit] of Array.from(bits).entries()) {
      if (bit !== '0') {
        throw huffmanBitsInvalidError('A single-symbol tree only decodes the bit 0.', { index });
      }
      symbols.push(single);
    }
    return symbols;
  }

  let current: HuffmanFragment = root;
  for (const [index, bit] of Array.from(bits).entries()) {
    const next: HuffmanFragment | null = bit === '0' ? current.left : current.right;
    if (next === null) {
      throw huffmanBitsInvalidError('Bits lead past a leaf of the Huffman tree.', { index });
    }
    if (next.symbol !== null) {
      symbols.push(next.symbol);
      current = root;
    } else {
      current = next;
    }
  }
  if (current !== root) {
    throw huffmanBitsInvalidError('Encoded input ends in the middle of a code.', { length: bits.length });
  }
  return symbols;
}
