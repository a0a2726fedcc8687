export type EngineErrorCode =
  | 'OPERATION_PENDING'
  | 'STRUCTURE_INACTIVE'
  | 'INVALID_VALUE'
  | 'VALUE_KIND_MISMATCH'
  | 'INVALID_PROGRESS'
  | 'INVALID_PHASE_BOUNDARIES'
  | 'INVALID_FREQUENCY_MAP'
  | 'HUFFMAN_SYMBOL_UNKNOWN'
  | 'HUFFMAN_BITS_INVALID'
  | 'SERIALIZED_TREE_INVALID';

export type EngineErrorContext = Readonly<Record<string, unknown>>;

function formatMessage(message: string, context?: EngineErrorContext): string {
  if (context === undefined) {
    return message;
  }

  return `${message} context=${JSON.stringify(context)}`;
}

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly context?: EngineErrorContext;

  constructor(code: EngineErrorCode, message: string, context?: EngineErrorContext) {
    super(formatMessage(message, context));
    this.name = 'EngineError';
    this.code = code;
    if (context !== undefined) {
      this.context = Object.freeze({ ...context });
    }
  }
}

export function createEngineError(
  code: EngineErrorCode,
  message: string,
  context?: EngineErrorContext,
): EngineError {
  return new EngineError(code, message, context);
}

export function isEngineError(error: unknown, code?: EngineErrorCode): error is EngineError {
  return error instanceof EngineError && (code === undefined || error.code === code);
}

export function operationPendingError(structure: string, pendingKind: string): EngineError {
  return createEngineError(
    'OPERATION_PENDING',
    `Cannot start a new ${structure} operation while "${pendingKind}" is still pending.`,
    { structure, pendingKind },
  );
}

export function structureInactiveError(structure: string): EngineError {
  return createEngineError('STRUCTURE_INACTIVE', `The ${structure} structure has not been activated.`, { structure });
}

export function invalidValueError(message: string, context?: EngineErrorContext): EngineError {
  return createEngineError('INVALID_VALUE', message, context);
}

export function valueKindMismatchError(expected: string, received: string): EngineError {
  return createEngineError(
    'VALUE_KIND_MISMATCH',
    `Tree holds ${expected} values; received a ${received}.`,
    { expected, received },
  );
}

export function invalidProgressError(progress: number): EngineError {
  return createEngineError('INVALID_PROGRESS', 'Animation progress must be a finite number.', {
    progress: String(progress),
  });
}

export function invalidPhaseBoundariesError(message: string, boundaries: readonly number[]): EngineError {
  return createEngineError('INVALID_PHASE_BOUNDARIES', message, { boundaries });
}

export function invalidFrequencyMapError(message: string, context?: EngineErrorContext): EngineError {
  return createEngineError('INVALID_FREQUENCY_MAP', message, context);
}

export function serializedTreeInvalidError(message: string, context?: EngineErrorContext): EngineError {
  return createEngineError('SERIALIZED_TREE_INVALID', message, context);
}

export function huffmanSymbolUnknownError(symbol: string): EngineError {
  return createEngineError('HUFFMAN_SYMBOL_UNKNOWN', `Symbol "${symbol}" has no Huffman code.`, { symbol });
}

export function huffmanBitsInvalidError(message: string, context?: EngineErrorContext): EngineError {
  return createEngineError('HUFFMAN_BITS_INVALID', message, context);
}
