import { MicrovecError } from './base.js';

export class IOFailureError extends MicrovecError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, 'IO_FAILURE', cause);
  }
}
