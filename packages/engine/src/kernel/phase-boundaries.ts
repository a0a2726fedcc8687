import { invalidPhaseBoundariesError, invalidProgressError } from './runtime-error.js';

export type PhaseBoundaries = readonly [number, number, number, number];

export const DEFAULT_AVL_PHASE_BOUNDARIES: PhaseBoundaries = [0.35, 0.75, 0.85, 1.0];
export const DEFAULT_HUFFMAN_PHASE_BOUNDARIES: PhaseBoundaries = [0.25, 0.5, 0.75, 1.0];

export function validatePhaseBoundaries(boundaries: readonly number[]): PhaseBoundaries {
  const [first, second, third, fourth] = boundaries;
  if (
    boundaries.length !== 4
    || first === undefined
    || second === undefined
    || third === undefined
    || fourth === undefined
  ) {
    throw invalidPhaseBoundariesError('Exactly four phase boundaries are required.', boundaries);
  }
  if (!boundaries.every((boundary) => Number.isFinite(boundary))) {
    throw invalidPhaseBoundariesError('Phase boundaries must be finite numbers.', boundaries);
  }
  if (!(first > 0 && first < second && second < third && third < fourth)) {
    throw invalidPhaseBoundariesError('Phase boundaries must be strictly increasing and above 0.', boundaries);
  }
  if (fourth !== 1) {
    throw invalidPhaseBoundariesError('The last phase boundary must be 1.', boundaries);
  }
  return [first, second, third, fourth];
}

export function clampProgress(progress: number): number {
  if (!Number.isFinite(progress)) {
    throw invalidProgressError(progress);
  }
  return Math.min(1, Math.max(0, progress));
}

/** Index of the phase `progress` falls into: phase i covers [boundary[i-1], boundary[i]). */
export function phaseIndexAt(boundaries: PhaseBoundaries, progress: number): 0 | 1 | 2 | 3 {
  if (progress < boundaries[0]) {
    return 0;
  }
  if (progress < boundaries[1]) {
    return 1;
  }
  return progress < boundaries[2] ? 2 : 3;
}

/** Progress rescaled to [0, 1) within its own phase. */
export function localPhaseProgress(boundaries: PhaseBoundaries, progress: number): number {
  const index = phaseIndexAt(boundaries, progress);
  const start = index === 0 ? 0 : boundaries[index - 1] ?? 0;
  const end = boundaries[index];
  return Math.min(1, Math.max(0, (progress - start) / (end - start)));
}

/** Index of the element a cursor rests on after `fraction` of a walk over `length` steps. */
export function stepIndexAt(fraction: number, length: number): number {
  if (length <= 0) {
    return 0;
  }
  return Math.min(Math.floor(fraction * length), length - 1);
}
