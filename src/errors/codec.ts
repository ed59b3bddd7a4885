import { MicrovecError } from './base.js';

export class CorruptDataError extends MicrovecError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CORRUPT_DATA', cause);
  }
}
