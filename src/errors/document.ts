import { MicrovecError } from './base.js';

export class MissingKeyError extends MicrovecError {
  constructor(public readonly keyPath: string) {
    super(`Document has no value at key "${keyPath}"`, 'MISSING_KEY');
  }
}
