import { MicrovecError } from './base.js';

export class BackendError extends MicrovecError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: unknown,
  ) {
    super(message, 'BACKEND_ERROR', cause);
  }
}
