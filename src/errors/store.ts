import { MicrovecError } from './base.js';

export class DimensionMismatchError extends MicrovecError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(`Vector dimension mismatch: expected ${expected}, got ${actual}`, 'DIMENSION_MISMATCH');
  }
}

/** A zero-norm vector reached a place that has to divide by its norm. */
export class DegenerateQueryError extends MicrovecError {
  constructor(message = 'Cannot normalize a zero-norm vector') {
    super(message, 'DEGENERATE_QUERY');
  }
}

export class IndexOutOfRangeError extends MicrovecError {
  constructor(
    public readonly index: number,
    public readonly size: number,
  ) {
    super(`Index ${index} out of range for store of size ${size}`, 'INDEX_OUT_OF_RANGE');
  }
}

export class NotFoundError extends MicrovecError {
  constructor(message: string) {
    super(message, 'NOT_FOUND');
  }
}

export class InvalidArgumentError extends MicrovecError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
  }
}
