import { invalidValueError, valueKindMismatchError } from './runtime-error.js';

export type TreeValue = number | string;

export type TreeValueKind = 'number' | 'string';

export type ComparisonResult = 'less' | 'greater' | 'equal';

const NUMERIC_TEXT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Accepts finite numbers and non-empty strings. Text that reads as a number is
 * stored as that number, so "42" and 42 address the same node.
 */
export function normalizeTreeValue(input: unknown): TreeValue {
  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw invalidValueError('Tree values must be finite numbers.', { received: String(input) });
    }
    return Object.is(input, -0) ? 0 : input;
  }

  if (typeof input === 'string') {
    const trimmed = input.trim();
    if (trimmed.length === 0) {
      throw invalidValueError('Tree values must not be empty.');
    }
    if (NUMERIC_TEXT_PATTERN.test(trimmed)) {
      const numeric = Number(trimmed);
      if (Number.isFinite(numeric)) {
        return Object.is(numeric, -0) ? 0 : numeric;
      }
    }
    return trimmed;
  }

  throw invalidValueError('Tree values must be numbers or strings.', {
    receivedType: input === null ? 'null' : typeof input,
  });
}

export function treeValueKind(value: TreeValue): TreeValueKind {
  return typeof value === 'number' ? 'number' : 'string';
}

export function assertSameValueKind(expected: TreeValueKind | null, value: TreeValue): void {
  if (expected === null) {
    return;
  }
  const received = treeValueKind(value);
  if (received !== expected) {
    throw valueKindMismatchError(expected, received);
  }
}

// Numbers order before strings; a single tree never mixes the two kinds.
export function compareTreeValues(left: TreeValue, right: TreeValue): -1 | 0 | 1 {
  if (typeof left === 'number' && typeof right === 'number') {
    return orderOf(left, right);
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return orderOf(left, right);
  }
  return typeof left === 'number' ? -1 : 1;
}

function orderOf<T extends number | string>(left: T, right: T): -1 | 0 | 1 {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}

export function describeComparison(target: TreeValue, against: TreeValue): ComparisonResult {
  const order = compareTreeValues(target, against);
  if (order < 0) {
    return 'less';
  }
  return order > 0 ? 'greater' : 'equal';
}
